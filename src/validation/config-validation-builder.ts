import type { ConfigValidationError } from '../errors/config-validation-error.js';
import { ConfigKitArgumentError } from '../errors/argument-errors.js';
import { createBootstrapLogger, type Logger } from '../core/logging/index.js';
import { DEFAULT_URL_TIMEOUT_MS, detectEnvironment } from '../config/app-config.js';
import type { FileSystemProbePort } from '../ports/file-system-probe.port.js';
import type { PortProbePort } from '../ports/port-probe.port.js';
import type { HttpProbePort } from '../ports/http-probe.port.js';
import { NodeFileSystemProbe } from '../infra/local/file-system-probe/index.js';
import { NodePortProbe } from '../infra/local/port-probe/index.js';
import { FetchHttpProbe } from '../infra/local/http-probe/index.js';
import type { SecretFormat } from '../security/secret-format.js';
import type { SecurityLevel } from '../security/security-level.js';
import type { Comparator } from './comparison.js';
import type { StringKey } from './property-accessor.js';
import type { Predicate, ValidationRule } from './validation-rule.js';
import {
  ConditionalRule,
  DefaultValueWarningRule,
  DirectoryExistsRule,
  FileExistsRule,
  GreaterThanRule,
  LessThanRule,
  MaximumRule,
  MinimumRule,
  NoPlainTextSecretsRule,
  NotEmptyRule,
  NotNullRule,
  PortAvailableRule,
  RangeRule,
  RegexRule,
  SecretFormatRule,
  UrlReachableRule,
  type OrderedKey,
  type OrderedValue,
  type PortKey,
} from './rules/index.js';

export interface ValidationProbes {
  readonly fileSystem: FileSystemProbePort;
  readonly ports: PortProbePort;
  readonly http: HttpProbePort;
}

export interface ValidationBuilderOptions {
  /** Environment name for `whenEnvironment` blocks. Defaults to CONFIGKIT_ENVIRONMENT / NODE_ENV / `production`. */
  readonly environment?: string;
  /** Default timeout for `urlReachable` rules. */
  readonly urlTimeoutMs?: number;
  /** Replace the Node-backed probes (tests, sandboxes). */
  readonly probes?: Partial<ValidationProbes>;
  readonly logger?: Logger;
}

/**
 * Handle for an open conditional scope. Rules added between
 * `beginConditionalScope` and `endConditionalScope` are gated by `predicate`.
 */
export interface ConditionalScope<T> {
  readonly predicate: Predicate<T>;
  readonly start: number;
}

export type Configure<T extends object> = (builder: ConfigValidationBuilder<T>) => void;

/**
 * Fluent, ordered collection of rules for one configuration section.
 *
 * Rules run in registration order; every rule runs on every validation and
 * all failures are collected. Adding rules happens during setup; validating
 * only reads the rule list, so it can be repeated (e.g. on each reload).
 *
 * @example
 * const builder = new ConfigValidationBuilder<DatabaseConfig>('Database')
 *   .notEmpty('connectionString')
 *   .inRange('maxPoolSize', 1, 1000)
 *   .when((c) => c.requireSsl, (ssl) => ssl.matchesPattern('connectionString', /Encrypt=True/i));
 */
export class ConfigValidationBuilder<T extends object> {
  private readonly rules: ValidationRule<T>[] = [];
  private readonly openScopes: ConditionalScope<T>[] = [];
  private readonly probes: ValidationProbes;
  private readonly environment: string;
  private readonly urlTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    readonly sectionName: string,
    options: ValidationBuilderOptions = {}
  ) {
    if (typeof sectionName !== 'string' || sectionName.trim().length === 0) {
      throw new ConfigKitArgumentError('sectionName', 'must not be empty');
    }

    const urlTimeoutMs = options.urlTimeoutMs ?? DEFAULT_URL_TIMEOUT_MS;
    assertPositiveTimeout(urlTimeoutMs);

    this.urlTimeoutMs = urlTimeoutMs;
    this.environment = options.environment ?? detectEnvironment(process.env);
    this.probes = {
      fileSystem: options.probes?.fileSystem ?? new NodeFileSystemProbe(),
      ports: options.probes?.ports ?? new NodePortProbe(),
      http: options.probes?.http ?? new FetchHttpProbe(),
    };
    this.logger = (options.logger ?? createBootstrapLogger('ConfigValidationBuilder')).child({ section: sectionName });
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  addRule(rule: ValidationRule<T>): this {
    this.rules.push(rule);
    return this;
  }

  // ═══════════════════════════════════════════════════════════════════
  // EVALUATION
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Lazily yields failures in registration order. Each call starts a fresh
   * pass; a consumer that stops early (first-error semantics) stops evaluation.
   */
  async *errors(options: T): AsyncGenerator<ConfigValidationError, void, undefined> {
    const rules = [...this.rules];
    for (const rule of rules) {
      const error = await rule.validate(options, this.sectionName);
      if (error !== null) {
        yield error;
      }
    }
  }

  /** Runs every rule and collects every failure. */
  async validate(options: T): Promise<readonly ConfigValidationError[]> {
    const collected: ConfigValidationError[] = [];
    for await (const error of this.errors(options)) {
      collected.push(error);
    }

    this.logger.debug({ rules: this.rules.length, errors: collected.length }, 'Section validated');
    return collected;
  }

  // ═══════════════════════════════════════════════════════════════════
  // CONDITIONAL SCOPES
  // ═══════════════════════════════════════════════════════════════════

  beginConditionalScope(predicate: Predicate<T>): ConditionalScope<T> {
    const scope: ConditionalScope<T> = { predicate, start: this.rules.length };
    this.openScopes.push(scope);
    return scope;
  }

  /**
   * Re-wraps every rule added since `scope` opened in a ConditionalRule, in
   * place. Inner scopes must be closed before outer ones; nesting composes by AND.
   */
  endConditionalScope(scope: ConditionalScope<T>): this {
    if (this.openScopes[this.openScopes.length - 1] !== scope) {
      throw new ConfigKitArgumentError('scope', 'conditional scopes must be closed in reverse order of opening');
    }
    this.openScopes.pop();

    const added = this.rules.splice(scope.start);
    for (const rule of added) {
      this.rules.push(new ConditionalRule(scope.predicate, rule));
    }
    return this;
  }

  /**
   * Rules added inside `configure` only apply when `predicate` holds.
   */
  when(predicate: Predicate<T>, configure: Configure<T>): this {
    const scope = this.beginConditionalScope(predicate);
    try {
      configure(this);
    } catch (error) {
      // Close only when `configure` left no inner scope open.
      if (this.openScopes[this.openScopes.length - 1] === scope) {
        this.endConditionalScope(scope);
      }
      throw error;
    }
    return this.endConditionalScope(scope);
  }

  /**
   * Rules added inside `configure` are registered only when the current
   * environment matches `environmentName` (case-insensitive). Decided once,
   * while the rules are being declared.
   */
  whenEnvironment(environmentName: string, configure: Configure<T>): this {
    if (this.environment.toLowerCase() === environmentName.toLowerCase()) {
      configure(this);
    }
    return this;
  }

  whenDevelopment(configure: Configure<T>): this {
    return this.whenEnvironment('development', configure);
  }

  whenStaging(configure: Configure<T>): this {
    return this.whenEnvironment('staging', configure);
  }

  whenProduction(configure: Configure<T>): this {
    return this.whenEnvironment('production', configure);
  }

  // ═══════════════════════════════════════════════════════════════════
  // VALUE RULES
  // ═══════════════════════════════════════════════════════════════════

  notEmpty<K extends StringKey<T>>(key: K, message?: string): this {
    return this.addRule(new NotEmptyRule<T, K>(key, message));
  }

  notNull<K extends keyof T & string>(key: K, message?: string): this {
    return this.addRule(new NotNullRule<T, K>(key, message));
  }

  greaterThan<K extends OrderedKey<T>>(
    key: K,
    minimum: OrderedValue<T, K>,
    message?: string,
    compare?: Comparator<OrderedValue<T, K>>
  ): this {
    return this.addRule(new GreaterThanRule<T, K>(key, minimum, message, compare));
  }

  lessThan<K extends OrderedKey<T>>(
    key: K,
    maximum: OrderedValue<T, K>,
    message?: string,
    compare?: Comparator<OrderedValue<T, K>>
  ): this {
    return this.addRule(new LessThanRule<T, K>(key, maximum, message, compare));
  }

  minimum<K extends OrderedKey<T>>(
    key: K,
    minimum: OrderedValue<T, K>,
    message?: string,
    compare?: Comparator<OrderedValue<T, K>>
  ): this {
    return this.addRule(new MinimumRule<T, K>(key, minimum, message, compare));
  }

  maximum<K extends OrderedKey<T>>(
    key: K,
    maximum: OrderedValue<T, K>,
    message?: string,
    compare?: Comparator<OrderedValue<T, K>>
  ): this {
    return this.addRule(new MaximumRule<T, K>(key, maximum, message, compare));
  }

  inRange<K extends OrderedKey<T>>(
    key: K,
    minimum: OrderedValue<T, K>,
    maximum: OrderedValue<T, K>,
    message?: string,
    compare?: Comparator<OrderedValue<T, K>>
  ): this {
    return this.addRule(new RangeRule<T, K>(key, minimum, maximum, message, compare));
  }

  matchesPattern<K extends StringKey<T>>(key: K, pattern: string | RegExp, message?: string): this {
    return this.addRule(new RegexRule<T, K>(key, pattern, message));
  }

  // ═══════════════════════════════════════════════════════════════════
  // SECURITY RULES
  // ═══════════════════════════════════════════════════════════════════

  noPlainTextSecrets<K extends StringKey<T>>(key: K, message?: string): this {
    return this.addRule(new NoPlainTextSecretsRule<T, K>(key, message));
  }

  validateSecretFormat<K extends StringKey<T>>(key: K, format: SecretFormat, message?: string): this {
    return this.addRule(new SecretFormatRule<T, K>(key, format, message));
  }

  warnIfDefaultValue<K extends StringKey<T>>(
    key: K,
    defaultValue: string,
    level: SecurityLevel = 'warning',
    message?: string
  ): this {
    return this.addRule(new DefaultValueWarningRule<T, K>(key, defaultValue, level, message));
  }

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE RULES (probe the filesystem / network at validation time)
  // ═══════════════════════════════════════════════════════════════════

  fileExists<K extends StringKey<T>>(key: K, message?: string): this {
    return this.addRule(new FileExistsRule<T, K>(key, this.probes.fileSystem, message));
  }

  directoryExists<K extends StringKey<T>>(key: K, message?: string): this {
    return this.addRule(new DirectoryExistsRule<T, K>(key, this.probes.fileSystem, message));
  }

  portAvailable<K extends PortKey<T>>(key: K, message?: string): this {
    return this.addRule(new PortAvailableRule<T, K>(key, this.probes.ports, message));
  }

  urlReachable<K extends StringKey<T>>(key: K, timeoutMs?: number, message?: string): this {
    const timeout = timeoutMs ?? this.urlTimeoutMs;
    assertPositiveTimeout(timeout);
    return this.addRule(new UrlReachableRule<T, K>(key, this.probes.http, timeout, message));
  }
}

function assertPositiveTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigKitArgumentError('timeoutMs', `must be a positive number of milliseconds (got ${timeoutMs})`);
  }
}

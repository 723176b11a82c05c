/**
 * Library configuration - parse, don't validate.
 *
 * - Environment variables are read once, at the composition root
 * - Zod validates at the boundary and returns typed, branded data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { LOG_LEVELS, type LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type EnvironmentName = Brand<string, 'EnvironmentName'>;
export type TimeoutMs = Brand<number, 'TimeoutMs'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  /** Host environment name, used by `whenEnvironment` blocks. */
  readonly environment: EnvironmentName;
  readonly probes: { readonly urlTimeoutMs: TimeoutMs };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_ENVIRONMENT = 'production';
export const DEFAULT_URL_TIMEOUT_MS = 5_000;
const MAX_URL_TIMEOUT_MS = 300_000;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const blankToUndefined = (v: string | undefined): string | undefined => {
  const trimmed = v?.trim();
  return trimmed ? trimmed : undefined;
};

const EnvSchema = z.object({
  CONFIGKIT_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => blankToUndefined(v)?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  CONFIGKIT_ENVIRONMENT: z.string().optional().transform(blankToUndefined),
  NODE_ENV: z.string().optional().transform(blankToUndefined),

  CONFIGKIT_URL_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('CONFIGKIT_URL_TIMEOUT_MS must be a whole number of milliseconds')
        .min(1, 'CONFIGKIT_URL_TIMEOUT_MS must be positive')
        .max(MAX_URL_TIMEOUT_MS, `CONFIGKIT_URL_TIMEOUT_MS cannot exceed ${MAX_URL_TIMEOUT_MS}ms`)
        .default(DEFAULT_URL_TIMEOUT_MS)
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: brands a config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return Object.freeze({ ...value, __brand: 'ValidatedAppConfig' as const });
}

/**
 * Environment name lookup for code that runs without a loaded config
 * (builders created directly by callers). Same precedence as `loadConfig`.
 */
export function detectEnvironment(env: Record<string, string | undefined>): string {
  return blankToUndefined(env['CONFIGKIT_ENVIRONMENT']) ?? blankToUndefined(env['NODE_ENV']) ?? DEFAULT_ENVIRONMENT;
}

/**
 * Lenient log level lookup for the bootstrap logger: unknown values fall back to `silent`.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'silent';
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const environment = env.CONFIGKIT_ENVIRONMENT ?? env.NODE_ENV ?? DEFAULT_ENVIRONMENT;

  return {
    logging: { level: env.CONFIGKIT_LOG_LEVEL },
    environment: environment as EnvironmentName,
    probes: { urlTimeoutMs: env.CONFIGKIT_URL_TIMEOUT_MS as TimeoutMs },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

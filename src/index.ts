// Required for tsyringe DI decorators
import 'reflect-metadata';

// DI Container exports
export { initializeContainer, resetContainer, isInitialized, container } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Validation
export { ConfigValidationBuilder } from './validation/config-validation-builder.js';
export type {
  ConditionalScope,
  Configure,
  ValidationBuilderOptions,
  ValidationProbes,
} from './validation/config-validation-builder.js';
export type { ValidationRule, RuleOutcome, Predicate } from './validation/validation-rule.js';
export type { KeysMatching, StringKey, PropertyAccessor } from './validation/property-accessor.js';
export { createPropertyAccessor } from './validation/property-accessor.js';
export type { Comparator, Comparable, Orderable } from './validation/comparison.js';
export { compareOrdered } from './validation/comparison.js';
export * from './validation/rules/index.js';

// Security heuristics
export * from './security/index.js';

// Errors
export * from './errors/index.js';

// Result adapter
export * from './result/index.js';

// Startup validation
export { StartupValidator } from './startup/startup-validator.js';
export type { StartupError } from './startup/startup-validator.js';

// Configuration
export { loadConfig, createValidatedConfig, detectEnvironment } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, LoadConfigOptions } from './config/app-config.js';

// Probes (ports + Node adapters)
export type { FileSystemProbePort, PathKind, FsProbeError } from './ports/file-system-probe.port.js';
export type { PortProbePort, PortProbeError } from './ports/port-probe.port.js';
export type { HttpProbePort, HttpProbeResponse, HttpProbeError } from './ports/http-probe.port.js';
export { NodeFileSystemProbe } from './infra/local/file-system-probe/index.js';
export { NodePortProbe } from './infra/local/port-probe/index.js';
export { FetchHttpProbe } from './infra/local/http-probe/index.js';

// Logging
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory } from './core/logging/index.js';

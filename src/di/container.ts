import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initialization: Promise<void> | null = null;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment to parse the library config from. Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function registerRuntime(mode: RuntimeMode): void {
  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): void {
  // Tests may inject config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env });
  if (configResult.isErr()) {
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    console.error(formatAppError(configResult.error));
    return terminator.terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerServices(): Promise<void> {
  // Import order matters: the logger factory before anything that logs.
  const { PinoLoggerFactory } = await import('../core/logging/create-logger.js');
  const { StartupValidator } = await import('../startup/startup-validator.js');

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
  container.register(DI.Validation.Startup, {
    useFactory: instanceCachingFactory((c) => c.resolve(StartupValidator)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Concurrent calls share one initialization; calls after it completed return immediately.
 * A failed initialization is not retried: the caller should restart the process.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return;
  if (initialization !== null) return initialization;

  initialization = (async () => {
    const env = options.env ?? process.env;
    try {
      registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));
      registerConfig(env);
      await registerServices();
      initialized = true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`[DI] Container initialization failed: ${message}`);
    }
  })();

  return initialization;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
  initialization = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };

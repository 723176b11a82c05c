/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Add @singleton() to the class
 * 3. Register the token alias in container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Process terminator (composition roots and startup validation only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Library configuration parsed from the environment. */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** pino logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // VALIDATION
  // ═══════════════════════════════════════════════════════════════════
  Validation: {
    /** Runs every registered section before the host starts serving */
    Startup: Symbol('Validation.Startup'),
  },
} as const;

/** Type helper for token values */
export type DIToken = (typeof DI)[keyof typeof DI][keyof (typeof DI)[keyof typeof DI]];

/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Inject with @inject(DI.YourToken); decorator metadata is not relied on
 * 3. Register it in container.ts, behind isRegistered() when tests may override it
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Ordered first-match rule table */
    Classifier: Symbol('Services.Classifier'),
    /** Per-kind remediation state machine (one per process) */
    Dispatcher: Symbol('Services.Dispatcher'),
    /** Poll → classify → dispatch loop */
    Watchdog: Symbol('Services.Watchdog'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Tails the monitored log files */
    LogSource: Symbol('Infra.LogSource'),
    /** Performs repairs (dry run or filesystem) */
    RepairProvider: Symbol('Infra.RepairProvider'),
    /** Error-kind descriptions loaded from metadata/error-kinds.json */
    ErrorKindCatalog: Symbol('Infra.ErrorKindCatalog'),
    /** Wall clock */
    Clock: Symbol('Infra.Clock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Process-wide log context (also the logger factory) */
    Context: Symbol('Logging.Context'),
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (service/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling, etc) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];

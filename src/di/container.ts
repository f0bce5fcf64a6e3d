import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import { toProcessLifecyclePolicy, type ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { RecordingProcessSignals, ThrowingProcessTerminator } from '../runtime/adapters/test-process-adapters.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import { currentHost, type HostPlatform } from '../config/default-paths.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { ResilientLogContext, createBootstrapLogger, type LogContext, type ILoggerFactory } from '../core/logging/index.js';
import { SystemClock, type Clock } from '../application/ports/clock.js';
import type { LogSource } from '../application/ports/log-source.js';
import type { RepairActionProvider } from '../application/ports/repair-action-provider.js';
import { PatternClassifier, type Classifier } from '../application/services/pattern-classifier.js';
import { DefaultRemediationDispatcher } from '../application/services/remediation-dispatcher.js';
import { WatchdogService } from '../application/services/watchdog-service.js';
import { FileLogSource } from '../infrastructure/log-source/file-log-source.js';
import { DryRunRepairActionProvider } from '../infrastructure/repair/dry-run-repair-provider.js';
import { FileSystemRepairActionProvider } from '../infrastructure/repair/file-system-repair-provider.js';
import { DEFAULT_METADATA_FILE, loadErrorKindMetadata } from '../infrastructure/metadata/error-kind-metadata.js';
import { assertNever } from '../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<Result<void, AppError>> | null = null;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment to read config from; defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
  readonly host?: HostPlatform;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'service' };
}

function closeLogContextIfRegistered(): void {
  if (container.isRegistered(DI.Logging.Context)) {
    container.resolve<LogContext>(DI.Logging.Context).close();
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const bootstrapLogger = createBootstrapLogger('ProcessSignals');
    const signals: ProcessSignals =
      policy.kind === 'no_signal_handlers'
        ? new RecordingProcessSignals()
        : new NodeProcessSignals((error, signal) =>
            bootstrapLogger.error({ err: error, signal }, 'Signal handler failed'),
          );
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }

  // Shutdown event bus is always available (even in tests) but only used when something emits.
  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator(closeLogContextIfRegistered);
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<ValidatedConfig, AppError> {
  // Allow tests to inject config explicitly before container initialization.
  // This prevents the composition root from overwriting test-provided values.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const configResult = loadConfig({ env: options.env ?? process.env, host: options.host ?? currentHost() });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(configResult.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerLogging(config: ValidatedConfig): void {
  if (!container.isRegistered(DI.Logging.Context)) {
    const { logging } = config;
    container.register<LogContext>(DI.Logging.Context, {
      useFactory: instanceCachingFactory(
        () =>
          new ResilientLogContext({
            candidates: logging.candidates,
            level: logging.level,
            mirrorToStderr: logging.mirrorToStderr,
            flushIntervalMs: logging.flushIntervalMs,
            reprobeIntervalMs: logging.reprobeIntervalMs,
            maxFileBytes: logging.maxFileBytes,
            maxFiles: logging.maxFiles,
          }),
      ),
    });
  }

  // The context is the factory; one instance behind both tokens.
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve<LogContext>(DI.Logging.Context)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function createRepairProvider(config: ValidatedConfig, loggers: ILoggerFactory): RepairActionProvider {
  const { mode } = config.remediation;
  switch (mode.kind) {
    case 'dry_run':
      return new DryRunRepairActionProvider(mode.appRoot, loggers.create('DryRunRepair'));
    case 'filesystem':
      return new FileSystemRepairActionProvider({ appRoot: mode.appRoot }, loggers.create('FileSystemRepair'));
    default:
      return assertNever(mode, 'repair mode');
  }
}

async function registerInfrastructure(config: ValidatedConfig): Promise<Result<void, AppError>> {
  if (!container.isRegistered(DI.Infra.Clock)) {
    container.register<Clock>(DI.Infra.Clock, { useValue: new SystemClock() });
  }

  if (!container.isRegistered(DI.Infra.ErrorKindCatalog)) {
    const catalog = await loadErrorKindMetadata(config.metadataFile ?? DEFAULT_METADATA_FILE);
    if (catalog.isErr()) return err(catalog.error);
    container.register(DI.Infra.ErrorKindCatalog, { useValue: catalog.value });
  }

  if (!container.isRegistered(DI.Infra.LogSource)) {
    container.register<LogSource>(DI.Infra.LogSource, {
      useFactory: instanceCachingFactory(
        (c: DependencyContainer) =>
          new FileLogSource(
            {
              files: config.source.logFiles,
              initialPosition: config.source.initialPosition,
              maxBytesPerPoll: config.source.maxBytesPerPoll,
            },
            c.resolve<Clock>(DI.Infra.Clock),
            c.resolve<ILoggerFactory>(DI.Logging.Factory).create('LogSource'),
          ),
      ),
    });
  }

  if (!container.isRegistered(DI.Infra.RepairProvider)) {
    container.register<RepairActionProvider>(DI.Infra.RepairProvider, {
      useFactory: instanceCachingFactory((c) => createRepairProvider(config, c.resolve<ILoggerFactory>(DI.Logging.Factory))),
    });
  }

  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  if (!container.isRegistered(DI.Services.Classifier)) {
    container.register<Classifier>(DI.Services.Classifier, {
      useFactory: instanceCachingFactory(() => new PatternClassifier()),
    });
  }
  // Using instanceCachingFactory with class resolution - ensures singleton behavior
  if (!container.isRegistered(DI.Services.Dispatcher)) {
    container.register(DI.Services.Dispatcher, {
      useFactory: instanceCachingFactory((c) => c.resolve(DefaultRemediationDispatcher)),
    });
  }
  if (!container.isRegistered(DI.Services.Watchdog)) {
    container.register(DI.Services.Watchdog, {
      useFactory: instanceCachingFactory((c) => c.resolve(WatchdogService)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

async function initialize(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  try {
    registerRuntime(options);
    const config = registerConfig(options);
    if (config.isErr()) return err(config.error);

    registerLogging(config.value);
    const infra = await registerInfrastructure(config.value);
    if (infra.isErr()) return err(infra.error);

    registerServices();
    initialized = true;
    return ok(undefined);
  } catch (error) {
    return err(Err.startupFailed('container', 'Container initialization failed', error));
  }
}

/**
 * Initialize the DI container.
 *
 * Idempotent: concurrent and repeated calls share the first call's result.
 * Tokens registered before the call (test doubles) are left in place.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (!initializationPromise) {
    initializationPromise = initialize(options);
  }
  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };

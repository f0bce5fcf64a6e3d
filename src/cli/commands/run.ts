/**
 * Run Command
 *
 * Runs the watchdog in the foreground until a shutdown is requested.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { ProcessSignals } from '../../runtime/ports/process-signals.js';
import { describeShutdown, type ShutdownEvents, type ShutdownSignal } from '../../runtime/ports/shutdown-events.js';
import type { Logger } from '../../core/logging/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface WatchdogControl {
  start(): Promise<void>;
  stop(reason: string): Promise<void>;
}

export interface RunCommandDeps {
  readonly watchdog: WatchdogControl;
  readonly signals: ProcessSignals;
  readonly shutdownEvents: ShutdownEvents;
  readonly logger: Logger;
  /** Synchronous last-chance flush, run from the process `exit` hook. */
  readonly closeLogs: () => void;
}

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the run command. Resolves once the watchdog has stopped.
 */
export async function executeRunCommand(deps: RunCommandDeps): Promise<CliResult> {
  const stopRequested = new Promise<string>((resolve) => {
    let shutdownStarted = false;
    deps.shutdownEvents.onShutdown((event) => {
      if (shutdownStarted) return;
      shutdownStarted = true;
      resolve(describeShutdown(event));
    });
  });

  for (const signal of SHUTDOWN_SIGNALS) {
    deps.signals.on(signal, () => deps.shutdownEvents.emit({ kind: 'shutdown_requested', signal }));
  }
  deps.signals.on('exit', deps.closeLogs);
  deps.signals.onFault((error, origin) => {
    deps.logger.error({ err: error, origin }, 'Unhandled fault; watchdog keeps running');
  });

  try {
    await deps.watchdog.start();
  } catch (error) {
    await deps.watchdog.stop('start failed');
    return failure(`Failed to start watchdog: ${error instanceof Error ? error.message : String(error)}`);
  }

  const reason = await stopRequested;
  await deps.watchdog.stop(reason);

  return success({
    message: 'Watchdog stopped',
    details: [`Reason: ${reason}`],
  });
}

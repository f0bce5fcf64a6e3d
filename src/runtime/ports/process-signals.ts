/**
 * Port for registering process signal handlers.
 * Keeps `process.on` out of the watchdog services so tests never touch the real process.
 */
export type ProcessSignal = NodeJS.Signals | 'exit';

/** Where an otherwise unhandled failure surfaced. */
export type FaultOrigin = 'uncaughtException' | 'unhandledRejection';

export interface ProcessSignals {
  /**
   * Register a handler for an OS signal, or for `exit`.
   * `exit` handlers run synchronously while the process is going down: only sync work lands.
   */
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void;

  /**
   * Register a handler for faults that escaped every other boundary.
   * Installing one keeps the process alive; the watchdog logs and carries on.
   */
  onFault(handler: (error: unknown, origin: FaultOrigin) => void): void;
}

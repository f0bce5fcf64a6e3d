import type { FaultOrigin, ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Wraps handlers to ignore Node-provided parameters and to keep a rejecting handler
 * from turning into an unhandled rejection of its own.
 */
export class NodeProcessSignals implements ProcessSignals {
  constructor(private readonly reportHandlerError: (error: unknown, signal: ProcessSignal) => void) {}

  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    if (signal === 'exit') {
      process.on('exit', () => this.run(signal, handler));
      return;
    }
    process.on(signal, () => this.run(signal, handler));
  }

  onFault(handler: (error: unknown, origin: FaultOrigin) => void): void {
    process.on('uncaughtException', (error) => handler(error, 'uncaughtException'));
    process.on('unhandledRejection', (reason) => handler(reason, 'unhandledRejection'));
  }

  private run(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    try {
      const pending = handler();
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => this.reportHandlerError(error, signal));
      }
    } catch (error) {
      this.reportHandlerError(error, signal);
    }
  }
}

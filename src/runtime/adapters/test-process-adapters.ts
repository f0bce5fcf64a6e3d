import type { FaultOrigin, ProcessSignal, ProcessSignals } from '../ports/process-signals.js';
import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * ProcessSignals for test mode: records registrations instead of touching `process`,
 * so a test can fire a signal by hand.
 */
export class RecordingProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ProcessSignal, Array<() => void | Promise<void>>>();
  private readonly faultHandlers: Array<(error: unknown, origin: FaultOrigin) => void> = [];

  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    const list = this.handlers.get(signal) ?? [];
    list.push(handler);
    this.handlers.set(signal, list);
  }

  onFault(handler: (error: unknown, origin: FaultOrigin) => void): void {
    this.faultHandlers.push(handler);
  }

  async fire(signal: ProcessSignal): Promise<void> {
    for (const handler of this.handlers.get(signal) ?? []) {
      await handler();
    }
  }

  fault(error: unknown, origin: FaultOrigin = 'uncaughtException'): void {
    for (const handler of this.faultHandlers) {
      handler(error, origin);
    }
  }

  registered(): readonly ProcessSignal[] {
    return [...this.handlers.keys()];
  }
}

/**
 * Test adapter: never exits the process.
 * Catches accidental termination during tests.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind}) called in test mode`);
  }
}

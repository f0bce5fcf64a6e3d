import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

/**
 * Exits the process. `beforeExit` runs first (synchronously) so the log context can
 * fsync and close its streams; a throwing hook never prevents the exit.
 */
export class NodeProcessTerminator implements ProcessTerminator {
  constructor(private readonly beforeExit: () => void = () => undefined) {}

  terminate(code: ExitCode): never {
    try {
      this.beforeExit();
    } catch (error) {
      console.error('[ProcessTerminator] beforeExit hook failed:', error);
    }
    switch (code.kind) {
      case 'success':
        return process.exit(0);
      case 'failure':
        return process.exit(1);
      default:
        return assertNever(code, 'exit code');
    }
  }
}

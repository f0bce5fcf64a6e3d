/**
 * Port for terminating the current process.
 * Only composition roots (the CLI) may call it; the watchdog loop itself never exits the process.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

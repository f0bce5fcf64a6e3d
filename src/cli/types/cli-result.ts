import type { ExitCode } from './exit-code.js';

/**
 * What a repairwatch command prints. `message` is the headline; `details` are the rows
 * (matched lines, kinds, pointer files), `warnings` flag anything odd found on the way
 * and `suggestions` tell the operator what to try next.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Outcome of `run`, `scan`, `kinds` or `where`. Commands never exit the process
 * themselves; `interpretCliResult` in the composition root turns this into output and
 * an exit code.
 */
export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export interface FailureOptions {
  /** Defaults to `general_error`. */
  readonly exitCode?: ExitCode;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/** The command ran and hit a problem: unreadable log, invalid metadata, startup failure. */
export function failure(message: string, options: FailureOptions = {}): CliResult {
  const { exitCode = { kind: 'general_error' }, details, suggestions } = options;
  return { kind: 'failure', exitCode, output: { message, details, suggestions } };
}

/** The command was pointed at something it cannot work on, such as a directory for `scan`. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return { kind: 'failure', exitCode: { kind: 'misuse' }, output: { message, suggestions } };
}

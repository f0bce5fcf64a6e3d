/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Interpret a CLI result and handle termination via ProcessTerminator.
 * Use this when DI container is available.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Don't explicitly exit on success; let the process end naturally.
      return;
    case 'failure':
      return terminator.terminate(toProcessExitCode(result.exitCode));
    default:
      assertNever(result, 'cli result');
  }
}

/**
 * Interpret a CLI result without DI (container failed or was never needed).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      return process.exit(toNumericExitCode(result.exitCode));
    default:
      assertNever(result, 'cli result');
  }
}

/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import { assertNever } from '../runtime/assert-never.js';

function section(title: string, items: readonly string[] | undefined, paint: (text: string) => string): string[] {
  if (!items || items.length === 0) return [];
  return ['', paint(title), ...items.map((item) => paint(`  • ${item}`))];
}

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`)];

  // Details are preformatted (indentation, blank separators) and printed as-is.
  if (output.details && output.details.length > 0) {
    lines.push('', ...output.details.map((detail) => (detail === '' ? '' : chalk.white(`  ${detail}`))));
  }

  lines.push(...section('⚠️  Warnings:', output.warnings, chalk.yellow));
  lines.push(...section('💡 Suggestions:', output.suggestions, chalk.gray));

  return lines.join('\n');
}

/**
 * Format a CliResult to a styled string.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';
    case 'failure':
      return formatOutput(result.output, true);
    default:
      return assertNever(result, 'cli result');
  }
}

/**
 * Print a CliResult: failures to stderr, everything else to stdout.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;
  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

/**
 * Scan Command
 *
 * Classifies every line of a log file once. Never repairs anything.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import { errorCode } from '../../errors/formatter.js';
import type { ErrorKind } from '../../domain/error-kind.js';
import { ERROR_KINDS } from '../../domain/error-kind.js';
import type { TextMatch } from '../../application/services/pattern-classifier.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ScanCommandDeps {
  readonly readFile: (filePath: string) => Promise<string>;
  readonly classifyText: (raw: string) => TextMatch | null;
}

/** Longer lines are cut in the report. */
const MAX_SHOWN_CHARS = 160;

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeScanCommand(filePath: string, deps: ScanCommandDeps): Promise<CliResult> {
  let content: string;
  try {
    content = await deps.readFile(filePath);
  } catch (error) {
    if (errorCode(error) === 'EISDIR') {
      return misuse(`${filePath} is a directory`, ['Pass a single log file, e.g. mobiletouch.log']);
    }
    return failure(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      suggestions: ['Check the path and that the file is readable'],
    });
  }

  const lines = content.split('\n');
  const counts = new Map<ErrorKind, number>();
  const details: string[] = [];

  lines.forEach((line, index) => {
    const text = line.endsWith('\r') ? line.slice(0, -1) : line;
    const match = deps.classifyText(text);
    if (!match) return;

    counts.set(match.kind, (counts.get(match.kind) ?? 0) + 1);
    details.push(`line ${index + 1}: ${match.kind} (${match.ruleId}) ${truncate(text.trim())}`);
  });

  const matched = details.length;
  if (matched === 0) {
    return success({ message: `No known errors in ${filePath}` });
  }

  details.push('');
  for (const kind of ERROR_KINDS) {
    const count = counts.get(kind);
    if (count !== undefined) details.push(`${kind}: ${count}`);
  }

  return success({
    message: `${matched} known error line(s) in ${filePath}`,
    details,
  });
}

function truncate(text: string): string {
  return text.length > MAX_SHOWN_CHARS ? `${text.slice(0, MAX_SHOWN_CHARS - 1)}…` : text;
}

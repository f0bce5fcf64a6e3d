/**
 * Where Command
 *
 * Finds the watchdog's own logs by reading the location pointer left in each
 * candidate directory.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';

export interface WhereCommandDeps {
  readonly candidates: readonly string[];
  /** Pointer file contents, or null when the directory has none. */
  readonly readPointer: (directory: string) => Promise<string | null>;
}

export async function executeWhereCommand(deps: WhereCommandDeps): Promise<CliResult> {
  const details: string[] = [];
  const warnings: string[] = [];

  for (const directory of deps.candidates) {
    const pointer = await deps.readPointer(directory);
    if (pointer === null) continue;

    const target = pointer.trim();
    if (target === '') {
      warnings.push(`Empty pointer file in ${directory}`);
      continue;
    }
    details.push(target === directory ? target : `${target} (pointer in ${directory})`);
  }

  if (details.length === 0) {
    return success({
      message: 'No log location pointer found',
      warnings: warnings.length > 0 ? warnings : undefined,
      suggestions: ['Start the watchdog once with "repairwatch run"', `Searched: ${deps.candidates.join(', ')}`],
    });
  }

  return success({
    message: 'Watchdog log locations',
    details,
    warnings: warnings.length > 0 ? warnings : undefined,
  });
}

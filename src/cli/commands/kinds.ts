/**
 * Kinds Command
 *
 * Prints the error kinds the watchdog recognizes and what it does about each.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { ErrorKindCatalog } from '../../infrastructure/metadata/error-kind-metadata.js';
import type { MetadataInvalidError } from '../../errors/app-error.js';

export interface KindsCommandDeps {
  readonly loadCatalog: () => PromiseLike<Result<ErrorKindCatalog, MetadataInvalidError>>;
}

export async function executeKindsCommand(deps: KindsCommandDeps): Promise<CliResult> {
  const catalog = await deps.loadCatalog();
  if (catalog.isErr()) {
    return failure(catalog.error.message, {
      details: catalog.error.issues.map((issue) => `${issue.path}: ${issue.message}`),
    });
  }

  const details = catalog.value.entries.flatMap((entry, index) => [
    `${index + 1}. ${entry.id}${entry.producesAlerts ? '' : ' (no alerts)'}`,
    `   ${entry.description}`,
    `   Repair: ${entry.repair}`,
  ]);

  return success({ message: 'Known error kinds', details });
}

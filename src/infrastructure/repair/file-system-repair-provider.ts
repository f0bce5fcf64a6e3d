import { setTimeout as sleep } from 'timers/promises';
import type { RepairActionProvider, RepairAttemptContext } from '../../application/ports/repair-action-provider.js';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorKind } from '../../domain/error-kind.js';
import { RepairOutcomes, type RepairOutcome } from '../../domain/remediation.js';
import { assertNever } from '../../runtime/assert-never.js';
import { NodeDirectoryRemover, type DirectoryRemover, type RemoveFailure } from './directory-remover.js';
import { describeRepairAction, repairActionFor } from './repair-plan.js';

export interface FileSystemRepairOptions {
  /** The monitored application's data root; `AppData` lives below it. */
  readonly appRoot: string;
  /** Extra tries after the first when a directory is locked. */
  readonly maxRetries?: number;
  /** First retry delay; doubles on every retry. */
  readonly retryDelayMs?: number;
  /** Handles kinds that need more than file deletion (reference table repair). */
  readonly delegate?: RepairActionProvider;
  readonly remover?: DirectoryRemover;
}

type RemovalOutcome =
  | { readonly kind: 'done'; readonly result: 'removed' | 'absent' }
  | { readonly kind: 'failed'; readonly reason: string };

/**
 * Filesystem repairs for the monitored application.
 *
 * Deleting a directory that is already gone counts as success, so every action is
 * idempotent. The application (or anti-virus) may hold files open for a moment; locked
 * deletes are retried with exponential backoff until the retry budget or the signal runs out.
 */
export class FileSystemRepairActionProvider implements RepairActionProvider {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly remover: DirectoryRemover;

  constructor(
    private readonly options: FileSystemRepairOptions,
    private readonly logger: Logger,
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.remover = options.remover ?? new NodeDirectoryRemover();
  }

  async attempt(kind: ErrorKind, context: RepairAttemptContext): Promise<RepairOutcome> {
    const action = repairActionFor(kind, this.options.appRoot);
    this.logger.info({ kind, action: action.type }, `Repair: ${describeRepairAction(action)}`);

    switch (action.type) {
      case 'hard_clear':
      case 'clear_network_state':
        return this.removeAll(action.targets, context.signal);

      case 'clear_reference_tables':
        if (this.options.delegate) {
          return this.options.delegate.attempt(kind, context);
        }
        return RepairOutcomes.failed('unsupported: reference table repair needs a browser-driven provider');

      default:
        return assertNever(action, 'repair action');
    }
  }

  private async removeAll(targets: readonly string[], signal: AbortSignal): Promise<RepairOutcome> {
    for (const target of targets) {
      const outcome = await this.removeWithRetry(target, signal);
      if (outcome.kind === 'failed') return RepairOutcomes.failed(outcome.reason);
      this.logger.info({ target, result: outcome.result }, outcome.result === 'removed' ? 'Removed directory' : 'Directory already absent');
    }
    return RepairOutcomes.succeeded();
  }

  private async removeWithRetry(target: string, signal: AbortSignal): Promise<RemovalOutcome> {
    for (let attempt = 0; ; attempt++) {
      if (signal.aborted) return { kind: 'failed', reason: `aborted before removing ${target}` };

      const removed = await this.remover.remove(target);
      if (removed.isOk()) return { kind: 'done', result: removed.value };

      const failure: RemoveFailure = removed.error;
      if (failure.code !== 'REMOVE_BUSY' || attempt >= this.maxRetries) {
        return { kind: 'failed', reason: failure.message };
      }

      const delayMs = this.retryDelayMs * Math.pow(2, attempt);
      this.logger.warn(
        { target, code: failure.osCode, attempt: attempt + 1, maxRetries: this.maxRetries, delayMs },
        'Directory in use; retrying',
      );

      const waited = await sleep(delayMs, 'elapsed', { signal }).then(
        (value) => value,
        (error: unknown) => {
          this.logger.debug({ target, err: error }, 'Retry wait interrupted');
          return 'aborted' as const;
        },
      );
      if (waited === 'aborted') return { kind: 'failed', reason: `aborted while waiting to remove ${target}` };
    }
  }
}

import type { ErrorKind } from '../../domain/error-kind.js';
import type { RepairOutcome } from '../../domain/remediation.js';

export interface RepairAttemptContext {
  /** Aborted when the attempt exceeds its deadline or the dispatcher gives up on it. */
  readonly signal: AbortSignal;
  /** Absolute time (epoch ms) after which the attempt counts as failed. */
  readonly deadlineMs: number;
}

/**
 * Performs the repair action for one error kind.
 *
 * Contract:
 * - Idempotent: running the action against an already repaired application succeeds.
 * - Expected failures are returned as `{ kind: 'failed' }`; a rejection is treated the same way.
 * - Should stop early once `signal` is aborted.
 */
export interface RepairActionProvider {
  attempt(kind: ErrorKind, context: RepairAttemptContext): Promise<RepairOutcome>;
}

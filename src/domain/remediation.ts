import type { ErrorKind } from './error-kind.js';

/**
 * Per-kind remediation state.
 *
 *   idle -> pending -> in_progress -> succeeded | failed -> cooldown -> idle
 *
 * `terminal_failed` is entered from `failed` once the retry ceiling is exceeded and is
 * only left by restarting the process.
 */
export type RemediationState =
  | 'idle'
  | 'pending'
  | 'in_progress'
  | 'succeeded'
  | 'failed'
  | 'cooldown'
  | 'terminal_failed';

export type RepairOutcome =
  | { readonly kind: 'succeeded' }
  | { readonly kind: 'failed'; readonly reason: string };

export interface RemediationRecord {
  readonly kind: ErrorKind;
  readonly state: RemediationState;
  /** Consecutive failed attempts; reset by a success. */
  readonly attemptCount: number;
  readonly lastAttemptAtMs: number | null;
  readonly lastOutcome: RepairOutcome | null;
  /** Earliest time a new attempt may start. */
  readonly eligibleAtMs: number;
}

export type SuppressionReason = 'cooldown' | 'in_progress' | 'terminal';

export type DispatchDecision =
  | { readonly kind: 'attempted'; readonly outcome: RepairOutcome; readonly record: RemediationRecord }
  | { readonly kind: 'suppressed'; readonly reason: SuppressionReason; readonly record: RemediationRecord };

export function initialRecord(kind: ErrorKind): RemediationRecord {
  return {
    kind,
    state: 'idle',
    attemptCount: 0,
    lastAttemptAtMs: null,
    lastOutcome: null,
    eligibleAtMs: 0,
  };
}

export const RepairOutcomes = {
  succeeded: (): RepairOutcome => ({ kind: 'succeeded' }),
  failed: (reason: string): RepairOutcome => ({ kind: 'failed', reason }),
} as const;

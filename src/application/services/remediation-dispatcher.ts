import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import { cooldownFor } from '../../config/app-config.js';
import type { ErrorKind } from '../../domain/error-kind.js';
import type { ClassifiedEvent } from '../../domain/log-event.js';
import {
  initialRecord,
  RepairOutcomes,
  type DispatchDecision,
  type RemediationRecord,
  type RemediationState,
  type RepairOutcome,
  type SuppressionReason,
} from '../../domain/remediation.js';
import type { RepairActionProvider } from '../ports/repair-action-provider.js';
import type { Clock } from '../ports/clock.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ErrorKindCatalog } from '../../infrastructure/metadata/error-kind-metadata.js';
import { runWithDeadline } from '../../utils/with-timeout.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface RemediationDispatcher {
  dispatch(classified: ClassifiedEvent): Promise<DispatchDecision>;
  /** Current record for a kind; an elapsed cooldown reads as `idle`. */
  getRecord(kind: ErrorKind): RemediationRecord;
  snapshot(): readonly RemediationRecord[];
}

/**
 * Per-kind remediation state machine.
 *
 * The check-and-claim in `dispatch` runs synchronously before the first await, so a
 * second event of a kind whose repair is running is dropped instead of invoking the
 * provider twice. An attempt that missed its deadline keeps its kind claimed until the
 * provider call actually returns. Kinds never block each other.
 */
@singleton()
export class DefaultRemediationDispatcher implements RemediationDispatcher {
  private readonly records = new Map<ErrorKind, RemediationRecord>();
  /** Kinds whose timed-out provider call has not returned yet. */
  private readonly overrunning = new Set<ErrorKind>();
  private readonly logger: Logger;
  private readonly audit: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Infra.RepairProvider) private readonly provider: RepairActionProvider,
    @inject(DI.Infra.Clock) private readonly clock: Clock,
    @inject(DI.Logging.Factory) loggers: ILoggerFactory,
    @inject(DI.Infra.ErrorKindCatalog) private readonly catalog: ErrorKindCatalog,
  ) {
    this.logger = loggers.create('RemediationDispatcher');
    this.audit = loggers.create('remediation-audit');
  }

  async dispatch(classified: ClassifiedEvent): Promise<DispatchDecision> {
    const { kind } = classified;
    const record = this.observe(kind, this.clock.nowMs());

    const blocked = this.overrunning.has(kind) ? 'in_progress' : this.suppressionFor(record);
    if (blocked !== null) {
      this.logger.debug(
        { kind, ruleId: classified.ruleId, reason: blocked, state: record.state, source: classified.event.source.path },
        'suppressed-duplicate',
      );
      return { kind: 'suppressed', reason: blocked, record };
    }

    const startedAtMs = this.clock.nowMs();
    this.transition(kind, { ...record, state: 'pending' });
    this.transition(kind, { ...this.current(kind), state: 'in_progress', lastAttemptAtMs: startedAtMs });

    this.logger.info(
      {
        kind,
        ruleId: classified.ruleId,
        source: classified.event.source.path,
        lineNumber: classified.event.lineNumber,
        attempt: record.attemptCount + 1,
      },
      'Starting repair',
    );

    const outcome = await this.runAttempt(kind, startedAtMs);
    return { kind: 'attempted', outcome, record: this.settle(kind, outcome) };
  }

  getRecord(kind: ErrorKind): RemediationRecord {
    return this.observe(kind, this.clock.nowMs());
  }

  snapshot(): readonly RemediationRecord[] {
    const now = this.clock.nowMs();
    return [...this.records.keys()].map((kind) => ({ ...this.observe(kind, now) }));
  }

  private suppressionFor(record: RemediationRecord): SuppressionReason | null {
    switch (record.state) {
      case 'idle':
        return this.clock.nowMs() >= record.eligibleAtMs ? null : 'cooldown';
      case 'cooldown':
        return 'cooldown';
      case 'pending':
      case 'in_progress':
      case 'succeeded':
      case 'failed':
        return 'in_progress';
      case 'terminal_failed':
        return 'terminal';
      default:
        return assertNever(record.state, 'remediation state');
    }
  }

  private async runAttempt(kind: ErrorKind, startedAtMs: number): Promise<RepairOutcome> {
    const timeoutMs = this.config.remediation.repairTimeoutMs;
    const deadlineMs = startedAtMs + timeoutMs;

    try {
      const result = await runWithDeadline(
        (signal) => this.provider.attempt(kind, { signal, deadlineMs }),
        timeoutMs,
        `repair ${kind}`,
        (error) => this.logger.warn({ kind, err: error }, 'Repair failed after its deadline had passed'),
      );
      if (result.kind === 'timed_out') {
        this.holdUntilSettled(kind, result.settled);
        return RepairOutcomes.failed(`timed out after ${result.timeoutMs}ms`);
      }
      return result.value;
    } catch (error) {
      this.logger.warn({ kind, err: error }, 'Repair provider threw');
      return RepairOutcomes.failed(`provider error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private holdUntilSettled(kind: ErrorKind, settled: Promise<void>): void {
    this.overrunning.add(kind);
    void settled.finally(() => {
      this.overrunning.delete(kind);
      this.logger.info({ kind }, 'Timed-out repair has returned; kind released');
    });
  }

  private settle(kind: ErrorKind, outcome: RepairOutcome): RemediationRecord {
    const now = this.clock.nowMs();
    const attempted = this.current(kind);

    switch (outcome.kind) {
      case 'succeeded': {
        this.transition(kind, { ...attempted, state: 'succeeded', attemptCount: 0, lastOutcome: outcome });
        const cooldownMs = cooldownFor(this.config, kind);
        this.logger.info({ kind, cooldownMs }, 'Repair succeeded');
        return this.transition(kind, { ...this.current(kind), state: 'cooldown', eligibleAtMs: now + cooldownMs });
      }

      case 'failed': {
        const attemptCount = attempted.attemptCount + 1;
        this.transition(kind, { ...attempted, state: 'failed', attemptCount, lastOutcome: outcome });

        const { retryCeiling } = this.config.remediation;
        if (attemptCount > retryCeiling) {
          const { description, repair } = this.catalog.describe(kind);
          this.logger.error(
            { kind, attemptCount, retryCeiling, reason: outcome.reason, description, repair },
            'Repair keeps failing; giving up on this error kind until restart',
          );
          return this.transition(kind, { ...this.current(kind), state: 'terminal_failed' });
        }

        const backoffMs = this.backoffFor(kind, attemptCount);
        this.logger.warn({ kind, attemptCount, retryCeiling, backoffMs, reason: outcome.reason }, 'Repair failed');
        return this.transition(kind, { ...this.current(kind), state: 'cooldown', eligibleAtMs: now + backoffMs });
      }

      default:
        return assertNever(outcome, 'repair outcome');
    }
  }

  private backoffFor(kind: ErrorKind, attemptCount: number): number {
    const { backoffFactor, maxBackoffMs } = this.config.remediation;
    const scaled = cooldownFor(this.config, kind) * Math.pow(backoffFactor, attemptCount - 1);
    return Math.min(scaled, maxBackoffMs);
  }

  /** Applies the lazy `cooldown → idle` transition once the window has elapsed. */
  private observe(kind: ErrorKind, now: number): RemediationRecord {
    const record = this.current(kind);
    if (record.state === 'cooldown' && now >= record.eligibleAtMs) {
      return this.transition(kind, { ...record, state: 'idle' }, now);
    }
    return record;
  }

  private current(kind: ErrorKind): RemediationRecord {
    return this.records.get(kind) ?? initialRecord(kind);
  }

  private transition(kind: ErrorKind, next: RemediationRecord, atMs: number = this.clock.nowMs()): RemediationRecord {
    const from: RemediationState = this.current(kind).state;
    this.records.set(kind, next);
    this.audit.info(
      { kind, from, to: next.state, at: new Date(atMs).toISOString(), attemptCount: next.attemptCount },
      'remediation transition',
    );
    return next;
  }
}

import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { LogContext, Logger } from '../../core/logging/index.js';
import type { LogEvent } from '../../domain/log-event.js';
import type { LogSource } from '../ports/log-source.js';
import type { Clock } from '../ports/clock.js';
import type { Classifier } from './pattern-classifier.js';
import type { RemediationDispatcher } from './remediation-dispatcher.js';
import { runWithDeadline } from '../../utils/with-timeout.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface CycleReport {
  readonly linesRead: number;
  readonly classified: number;
  readonly attempted: number;
  readonly suppressed: number;
  /** Classified lines older than `maxEventAgeMs` by their own timestamp; never dispatched. */
  readonly stale: number;
  /** Attempts whose outcome was FAILED (including timeouts). */
  readonly repairsFailed: number;
  /** Errors caught at the event or poll boundary. A cycle with any is a failing cycle. */
  readonly failures: number;
  /** The cycle stopped early (budget exceeded or stop requested). */
  readonly aborted: boolean;
  readonly durationMs: number;
}

export type WatchdogState = 'idle' | 'running' | 'stopping' | 'stopped';

interface InFlightCycle {
  readonly controller: AbortController;
  readonly promise: Promise<CycleReport>;
}

interface CycleCounters {
  linesRead: number;
  classified: number;
  attempted: number;
  suppressed: number;
  stale: number;
  repairsFailed: number;
  failures: number;
}

/**
 * Owns the poll → classify → dispatch loop.
 *
 * Cycles never overlap: the next one is scheduled only after the previous one has
 * finished. Every event is handled inside its own try/catch and the cycle as a whole is
 * isolated as well, so one bad line or one failing read never ends the loop.
 */
@singleton()
export class WatchdogService {
  private readonly logger: Logger;
  private _state: WatchdogState = 'idle';
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: InFlightCycle | null = null;
  private consecutiveFailures = 0;
  private cycleCount = 0;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Context) private readonly logContext: LogContext,
    @inject(DI.Infra.LogSource) private readonly source: LogSource,
    @inject(DI.Services.Classifier) private readonly classifier: Classifier,
    @inject(DI.Services.Dispatcher) private readonly dispatcher: RemediationDispatcher,
    @inject(DI.Infra.Clock) private readonly clock: Clock,
  ) {
    this.logger = logContext.create('WatchdogService');
  }

  get state(): WatchdogState {
    return this._state;
  }

  /**
   * Initializes logging, runs one cycle immediately, then keeps polling.
   * Idempotent - later calls return the first call's promise.
   */
  start(): Promise<void> {
    if (this.startPromise) return this.startPromise;
    if (this._state !== 'idle') return Promise.resolve();

    this._state = 'running';
    this.startPromise = this.begin();
    return this.startPromise;
  }

  /**
   * Stops scheduling, gives the in-flight cycle up to `stopGraceMs` to finish, then
   * flushes and closes the log context. A running repair is never interrupted.
   * Idempotent - concurrent calls share one promise.
   */
  stop(reason: string): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown(reason);
    }
    return this.stopPromise;
  }

  /** Runs one cycle now, or joins the one already running. */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight) return this.inFlight.promise;

    const controller = new AbortController();
    const promise = this.executeCycle(controller).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = { controller, promise };
    return promise;
  }

  private async begin(): Promise<void> {
    this.logContext.init();
    const { source, schedule, remediation, logging } = this.config;
    this.logger.info(
      {
        logFiles: source.logFiles,
        initialPosition: source.initialPosition,
        maxEventAgeMs: source.maxEventAgeMs,
        pollIntervalMs: schedule.pollIntervalMs,
        cycleBudgetMs: schedule.cycleBudgetMs,
        repairMode: remediation.mode.kind,
        retryCeiling: remediation.retryCeiling,
        defaultCooldownMs: remediation.defaultCooldownMs,
        logLocation: this.logContext.activeLocation()?.directory ?? null,
        logCandidates: logging.candidates,
      },
      'Watchdog starting',
    );
    if (this.logContext.isDegraded()) {
      this.logger.warn({ candidates: logging.candidates }, 'No writable log location; file logging is degraded');
    }

    await this.tick();
  }

  private async tick(): Promise<void> {
    try {
      this.recordCycle(await this.runCycle());
    } catch (error) {
      this.consecutiveFailures++;
      this.logger.error({ err: error, consecutiveFailures: this.consecutiveFailures }, 'Watchdog cycle crashed');
    } finally {
      this.scheduleNext();
    }
  }

  private scheduleNext(): void {
    if (this._state !== 'running') return;

    const delayMs = this.nextDelayMs();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  /** Linear backoff while cycles keep failing. */
  private nextDelayMs(): number {
    const { pollIntervalMs, maxPollBackoffMs } = this.config.schedule;
    if (this.consecutiveFailures === 0) return pollIntervalMs;
    return Math.min(pollIntervalMs * this.consecutiveFailures, maxPollBackoffMs);
  }

  private recordCycle(report: CycleReport): void {
    this.cycleCount++;

    if (report.failures > 0) {
      this.consecutiveFailures++;
      this.logger.warn(
        { ...report, consecutiveFailures: this.consecutiveFailures, nextDelayMs: this.nextDelayMs() },
        'Watchdog cycle had failures',
      );
      return;
    }

    if (this.consecutiveFailures > 0) {
      this.logger.info({ afterFailures: this.consecutiveFailures }, 'Watchdog cycles healthy again');
    }
    this.consecutiveFailures = 0;
    if (report.linesRead > 0 || report.aborted) {
      this.logger.debug({ cycle: this.cycleCount, ...report }, 'Watchdog cycle complete');
    }
  }

  private async executeCycle(controller: AbortController): Promise<CycleReport> {
    const startedAtMs = this.clock.nowMs();
    const counters: CycleCounters = {
      linesRead: 0,
      classified: 0,
      attempted: 0,
      suppressed: 0,
      stale: 0,
      repairsFailed: 0,
      failures: 0,
    };

    const budgetMs = this.config.schedule.cycleBudgetMs;
    const budget = setTimeout(() => {
      this.logger.warn({ budgetMs }, 'Cycle budget exceeded; remaining lines wait for the next cycle');
      controller.abort(new Error(`cycle budget of ${budgetMs}ms exceeded`));
    }, budgetMs);

    try {
      for await (const event of this.source.poll(controller.signal)) {
        counters.linesRead++;
        await this.handleEvent(event, counters);
        if (controller.signal.aborted) break;
      }
    } catch (error) {
      counters.failures++;
      this.logger.error({ err: error }, 'Polling log files failed');
    } finally {
      clearTimeout(budget);
    }

    return {
      ...counters,
      aborted: controller.signal.aborted,
      durationMs: this.clock.nowMs() - startedAtMs,
    };
  }

  private async handleEvent(event: LogEvent, counters: CycleCounters): Promise<void> {
    try {
      const classified = this.classifier.classify(event);
      if (!classified) return;

      counters.classified++;
      this.logger.info(
        {
          kind: classified.kind,
          ruleId: classified.ruleId,
          source: event.source.path,
          lineNumber: event.lineNumber,
          line: event.raw,
        },
        'Known error detected',
      );

      const ageMs = this.staleAgeMs(event);
      if (ageMs !== null) {
        counters.stale++;
        this.logger.debug(
          { kind: classified.kind, source: event.source.path, lineNumber: event.lineNumber, ageMs },
          'Ignoring stale log entry',
        );
        return;
      }

      const decision = await this.dispatcher.dispatch(classified);
      switch (decision.kind) {
        case 'attempted':
          counters.attempted++;
          if (decision.outcome.kind === 'failed') counters.repairsFailed++;
          return;
        case 'suppressed':
          counters.suppressed++;
          return;
        default:
          assertNever(decision, 'dispatch decision');
      }
    } catch (error) {
      counters.failures++;
      this.logger.error(
        { err: error, source: event.source.path, lineNumber: event.lineNumber },
        'Handling log line failed',
      );
    }
  }

  /** Age of a line whose own timestamp is past the cutoff, else null. Lines without one are never stale. */
  private staleAgeMs(event: LogEvent): number | null {
    const { maxEventAgeMs } = this.config.source;
    if (maxEventAgeMs === 0 || event.entry === null) return null;

    const ageMs = this.clock.nowMs() - event.entry.timestamp.getTime();
    return ageMs > maxEventAgeMs ? ageMs : null;
  }

  private async shutdown(reason: string): Promise<void> {
    this._state = 'stopping';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info({ reason }, 'Watchdog stopping');

    const inFlight = this.inFlight;
    if (inFlight) {
      inFlight.controller.abort(new Error(`stop requested: ${reason}`));
      await this.awaitInFlight(inFlight);
    }

    this._state = 'stopped';
    this.logger.info({ reason, cycles: this.cycleCount, records: this.dispatcher.snapshot() }, 'Watchdog stopped');
    this.logContext.flush();
    this.logContext.close();
  }

  private async awaitInFlight(inFlight: InFlightCycle): Promise<void> {
    const graceMs = this.config.schedule.stopGraceMs;
    try {
      const waited = await runWithDeadline(
        () => inFlight.promise,
        graceMs,
        'in-flight cycle',
        (error) => this.logger.error({ err: error }, 'In-flight cycle failed after stop'),
      );
      if (waited.kind === 'timed_out') {
        this.logger.warn({ graceMs }, 'Stop grace period elapsed; a repair may still be running');
      }
    } catch (error) {
      this.logger.error({ err: error }, 'In-flight cycle failed during stop');
    }
  }
}

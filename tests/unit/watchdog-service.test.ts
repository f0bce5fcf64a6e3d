import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WatchdogService } from '../../src/application/services/watchdog-service.js';
import { DefaultRemediationDispatcher } from '../../src/application/services/remediation-dispatcher.js';
import { PatternClassifier, type Classifier } from '../../src/application/services/pattern-classifier.js';
import type { ValidatedConfig } from '../../src/config/app-config.js';
import type { ClassifiedEvent, LogEvent } from '../../src/domain/log-event.js';
import { FakeClock } from '../fakes/fake-clock.js';
import { InMemoryLogSource } from '../fakes/in-memory-log-source.js';
import { ScriptedRepairProvider, type ScriptStep } from '../fakes/scripted-repair-provider.js';
import { FakeLogContext } from '../helpers/FakeLoggerFactory.js';
import { testConfig } from '../helpers/test-config.js';
import { testCatalog } from '../helpers/catalog.js';

const OBJECT_STORE_ERROR = "ERROR: object store 'charts' could not be opened";

/** Throws on lines containing "poison"; classifies everything else normally. */
class PoisonableClassifier implements Classifier {
  private readonly inner = new PatternClassifier();

  classify(event: LogEvent): ClassifiedEvent | null {
    if (event.raw.includes('poison')) throw new Error('classifier exploded');
    return this.inner.classify(event);
  }
}

describe('WatchdogService', () => {
  let clock: FakeClock;
  let logContext: FakeLogContext;
  let source: InMemoryLogSource;
  const running: WatchdogService[] = [];

  beforeEach(() => {
    clock = new FakeClock();
    logContext = new FakeLogContext();
    source = new InMemoryLogSource();
  });

  afterEach(async () => {
    await Promise.all(running.map((w) => w.stop('test cleanup')));
    running.length = 0;
    vi.useRealTimers();
  });

  function setup(script: readonly ScriptStep[] = [], config: ValidatedConfig = testConfig()) {
    const provider = new ScriptedRepairProvider(script);
    const dispatcher = new DefaultRemediationDispatcher(config, provider, clock, logContext, testCatalog());
    const watchdog = new WatchdogService(config, logContext, source, new PoisonableClassifier(), dispatcher, clock);
    running.push(watchdog);
    return { provider, dispatcher, watchdog, logger: logContext.getLogger('WatchdogService') };
  }

  describe('runCycle', () => {
    it('classifies every new line and dispatches known errors once', async () => {
      const { provider, watchdog, logger } = setup();
      source.append('2025-05-26 09:33:40,383 INFO all good', OBJECT_STORE_ERROR, OBJECT_STORE_ERROR);

      const report = await watchdog.runCycle();

      expect(report).toEqual({
        linesRead: 3,
        classified: 2,
        attempted: 1,
        suppressed: 1,
        stale: 0,
        repairsFailed: 0,
        failures: 0,
        aborted: false,
        durationMs: 0,
      });
      expect(provider.attempts.map((a) => a.kind)).toEqual(['STORES_NOT_CORRECTLY_SET_UP']);
      expect(logger.getEntries('info').find((e) => e.msg === 'Known error detected')?.obj).toEqual({
        kind: 'STORES_NOT_CORRECTLY_SET_UP',
        ruleId: 'object-store-open-failed',
        source: '/var/log/app/app.log',
        lineNumber: 2,
        line: OBJECT_STORE_ERROR,
      });
    });

    it('counts failed repairs apart from cycle failures', async () => {
      const { watchdog } = setup([{ type: 'fail', reason: 'locked' }]);
      source.append(OBJECT_STORE_ERROR);

      const report = await watchdog.runCycle();

      expect(report).toMatchObject({ attempted: 1, repairsFailed: 1, failures: 0 });
    });

    it('does not act on known errors older than the age cutoff', async () => {
      const { provider, watchdog, logger } = setup([], testConfig({ source: { maxEventAgeMs: 7_200_000 } }));
      const now = new Date(clock.nowMs());
      const stamp = (ageMs: number): string => {
        const at = new Date(now.getTime() - ageMs);
        const pad = (n: number, width = 2) => String(n).padStart(width, '0');
        return (
          `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ` +
          `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())},${pad(at.getMilliseconds(), 3)}`
        );
      };
      source.append(
        `${stamp(3 * 24 * 3_600_000)} ERROR Stores not correctly set up, db`,
        `${stamp(60_000)} ERROR Stores not correctly set up, db`,
      );

      const report = await watchdog.runCycle();

      expect(report).toMatchObject({ linesRead: 2, classified: 2, stale: 1, attempted: 1, suppressed: 0 });
      expect(provider.callCount()).toBe(1);
      expect(logger.getEntries('debug').find((e) => e.msg === 'Ignoring stale log entry')?.obj).toEqual({
        kind: 'STORES_NOT_CORRECTLY_SET_UP',
        source: '/var/log/app/app.log',
        lineNumber: 1,
        ageMs: 3 * 24 * 3_600_000,
      });
    });

    it('treats lines without a timestamp as current', async () => {
      const { provider, watchdog } = setup([], testConfig({ source: { maxEventAgeMs: 1 } }));
      source.append(OBJECT_STORE_ERROR);

      const report = await watchdog.runCycle();

      expect(report).toMatchObject({ stale: 0, attempted: 1 });
      expect(provider.callCount()).toBe(1);
    });

    it('keeps going after a line that cannot be handled', async () => {
      const { watchdog, logger } = setup();
      source.append('poison pill', OBJECT_STORE_ERROR);

      const report = await watchdog.runCycle();

      expect(report).toMatchObject({ linesRead: 2, failures: 1, attempted: 1 });
      expect(logger.hasEntry('error', 'Handling log line failed')).toBe(true);
    });

    it('reports a failing poll as a cycle failure', async () => {
      const { watchdog, logger } = setup();
      source.failNextPolls(1);

      const report = await watchdog.runCycle();

      expect(report).toMatchObject({ linesRead: 0, failures: 1, aborted: false });
      expect(logger.hasEntry('error', 'Polling log files failed')).toBe(true);
    });

    it('joins a cycle that is already running', async () => {
      const { provider, watchdog } = setup([{ type: 'block' }]);
      source.append(OBJECT_STORE_ERROR);

      const first = watchdog.runCycle();
      const second = watchdog.runCycle();
      await vi.waitFor(() => expect(provider.callCount()).toBe(1));
      provider.release();

      expect(second).toBe(first);
      expect(await second).toMatchObject({ linesRead: 1, attempted: 1 });
      expect(source.polls).toBe(1);
    });

    it('stops reading when the cycle budget runs out', async () => {
      const config = testConfig({ schedule: { cycleBudgetMs: 20 } });
      const { provider, watchdog, logger } = setup([{ type: 'block' }], config);
      source.append(OBJECT_STORE_ERROR, 'left for later');

      const cycle = watchdog.runCycle();
      await vi.waitFor(() => expect(logger.hasEntry('warn', 'Cycle budget exceeded')).toBe(true));
      provider.release();

      expect(await cycle).toMatchObject({ linesRead: 1, aborted: true });
      expect(await watchdog.runCycle()).toMatchObject({ linesRead: 1, aborted: false });
    });
  });

  describe('lifecycle', () => {
    it('initializes logging and runs a first cycle on start', async () => {
      const { watchdog, logger } = setup();
      source.append(OBJECT_STORE_ERROR);

      const started = watchdog.start();
      await started;

      expect(watchdog.start()).toBe(started);
      expect(logContext.initCalls).toBe(1);
      expect(watchdog.state).toBe('running');
      expect(source.polls).toBe(1);
      expect(logger.getEntries('info')[0]).toMatchObject({
        msg: 'Watchdog starting',
        obj: { repairMode: 'dry_run', logLocation: null },
      });
    });

    it('warns when logging has no writable location', async () => {
      logContext.degraded = true;
      const { watchdog, logger } = setup();

      await watchdog.start();

      expect(logger.hasEntry('warn', 'No writable log location; file logging is degraded')).toBe(true);
    });

    it('stops once, then flushes and closes logging', async () => {
      const { watchdog, logger } = setup();
      await watchdog.start();

      const stopping = watchdog.stop('signal SIGTERM');
      expect(watchdog.stop('again')).toBe(stopping);
      await stopping;

      expect(watchdog.state).toBe('stopped');
      expect(logContext.flushCalls).toBe(1);
      expect(logContext.closeCalls).toBe(1);
      expect(logger.getEntries('info').at(-1)).toMatchObject({ msg: 'Watchdog stopped', obj: { reason: 'signal SIGTERM' } });
    });

    it('lets a running repair finish before stopping', async () => {
      const { provider, watchdog } = setup([{ type: 'block' }]);
      source.append(OBJECT_STORE_ERROR);

      const started = watchdog.start();
      await vi.waitFor(() => expect(provider.callCount()).toBe(1));

      const stopping = watchdog.stop('test');
      expect(watchdog.state).toBe('stopping');
      provider.release();
      await stopping;
      await started;

      expect(watchdog.state).toBe('stopped');
      expect(provider.attempts[0]?.signal.aborted).toBe(false);
    });

    it('gives up waiting after the grace period', async () => {
      const config = testConfig({ schedule: { stopGraceMs: 20 } });
      const { provider, watchdog, logger } = setup([{ type: 'block' }], config);
      source.append(OBJECT_STORE_ERROR);

      const started = watchdog.start();
      await vi.waitFor(() => expect(provider.callCount()).toBe(1));
      await watchdog.stop('test');

      expect(logger.hasEntry('warn', 'Stop grace period elapsed; a repair may still be running')).toBe(true);
      expect(watchdog.state).toBe('stopped');

      provider.release();
      await started;
    });

    it('backs off linearly while cycles fail and recovers afterwards', async () => {
      vi.useFakeTimers();
      const config = testConfig({ schedule: { pollIntervalMs: 1000, maxPollBackoffMs: 1500 } });
      const { watchdog, logger } = setup([], config);
      source.failNextPolls(2);

      await watchdog.start();
      await vi.advanceTimersByTimeAsync(1000);
      await vi.advanceTimersByTimeAsync(1500);

      expect(logger.getEntries('warn').map((e) => e.obj?.['nextDelayMs'])).toEqual([1000, 1500]);
      expect(logger.hasEntry('info', 'Watchdog cycles healthy again')).toBe(true);
      expect(source.polls).toBe(3);
    });
  });
});

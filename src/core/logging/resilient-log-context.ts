import pino from 'pino';
import type { DestinationStream, Level, StreamEntry } from 'pino';
import { randomUUID } from 'crypto';
import { Result } from 'neverthrow';
import type { Logger, LogContext, LogLevel, LogStreamName, WritableLocation } from './types.js';
import { NodeLogFileOps, type LogFileOps } from './file-ops.js';
import { RotatingFileSink } from './rotating-file-sink.js';
import { selectWritableLocation, writeLocationPointer, type ProbeFailure } from './writable-location.js';
import { errorCode } from '../../errors/formatter.js';

export interface ResilientLogContextOptions {
  /** Candidate directories in rank order. */
  readonly candidates: readonly string[];
  readonly level: LogLevel;
  readonly mirrorToStderr: boolean;
  readonly flushIntervalMs: number;
  readonly reprobeIntervalMs: number;
  readonly maxFileBytes: number;
  readonly maxFiles: number;
  readonly fileOps?: LogFileOps;
  readonly now?: () => number;
  /** Lines kept while no location is open yet. */
  readonly bufferLimit?: number;
}

interface PendingLine {
  readonly stream: LogStreamName;
  readonly line: string;
}

type InternalLevel = 'debug' | 'info' | 'warn' | 'error';

const PINO_LEVEL_VALUES: Record<InternalLevel, number> = { debug: 20, info: 30, warn: 40, error: 50 };
const DEFAULT_BUFFER_LIMIT = 1000;
const COMPONENT = 'log-context';

/**
 * Process-wide logging context.
 *
 * pino writes through `pino.multistream` into two sinks owned by this context; the sinks
 * delegate every line back here so a failing directory can be swapped for the next
 * writable candidate without the loggers handed out earlier noticing.
 *
 * Logging never throws to the caller. With no writable location the context is degraded:
 * lines are dropped and candidates are re-probed at most every `reprobeIntervalMs`.
 */
export class ResilientLogContext implements LogContext {
  private readonly ops: LogFileOps;
  private readonly now: () => number;
  private readonly bufferLimit: number;
  private readonly probeToken = randomUUID().slice(0, 8);
  private readonly _root: Logger;

  private location: WritableLocation | null = null;
  private sinks: Record<LogStreamName, RotatingFileSink> | null = null;
  private pending: PendingLine[] = [];
  private lastProbeAtMs: number | null = null;
  private flushTimer: NodeJS.Timeout | null = null;
  private initialized = false;
  private closed = false;
  private dropped = 0;

  constructor(private readonly options: ResilientLogContextOptions) {
    this.ops = options.fileOps ?? new NodeLogFileOps();
    this.now = options.now ?? Date.now;
    this.bufferLimit = options.bufferLimit ?? DEFAULT_BUFFER_LIMIT;
    this._root = this.createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }

  init(): void {
    if (this.initialized || this.closed) return;
    this.initialized = true;

    const failures = this.acquireLocation([]);
    this.lastProbeAtMs = this.now();

    if (this.location) {
      this.reportRejections(failures);
      this.writeInternal('info', 'log location selected', { directory: this.location.directory });
    }
    this.drainPending();

    this.flushTimer = setInterval(() => this.flush(), this.options.flushIntervalMs);
    this.flushTimer.unref();
  }

  flush(): void {
    if (this.closed) return;
    if (!this.sinks) {
      if (this.initialized) this.reprobeIfDue();
      return;
    }
    for (const stream of STREAMS) {
      const sink = this.sinks?.[stream];
      if (!sink) return;
      const synced = Result.fromThrowable(() => sink.sync(), (error) => error)();
      if (synced.isErr()) this.failOver(stream, null, synced.error);
    }
  }

  close(): void {
    if (this.closed) return;
    this.flush();
    this.closed = true;
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.releaseSinks();
    this.pending = [];
  }

  activeLocation(): WritableLocation | null {
    return this.location;
  }

  isDegraded(): boolean {
    return this.initialized && !this.closed && this.location === null;
  }

  /** Lines lost to buffer overflow or degraded mode since construction. */
  droppedLineCount(): number {
    return this.dropped;
  }

  private createRootLogger(): Logger {
    const streams: StreamEntry<Level>[] = [
      { level: 'info', stream: this.sinkStream('operational') },
      { level: 'debug', stream: this.sinkStream('debug') },
    ];
    const level = this.options.level;
    if (this.options.mirrorToStderr && level !== 'silent') {
      streams.push({ level, stream: pino.destination({ dest: 2, sync: true }) });
    }

    return pino(
      {
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: { err: pino.stdSerializers.err },
      },
      pino.multistream(streams),
    );
  }

  private sinkStream(stream: LogStreamName): DestinationStream {
    return { write: (line: string) => this.writeLine(stream, line) };
  }

  private writeLine(stream: LogStreamName, line: string): void {
    if (this.closed) return;

    if (!this.initialized) {
      this.bufferLine({ stream, line });
      return;
    }

    if (!this.sinks) {
      this.reprobeIfDue();
      if (!this.sinks) {
        this.dropped++;
        return;
      }
    }

    this.writeToSink(stream, line);
  }

  private writeToSink(stream: LogStreamName, line: string): void {
    const sink = this.sinks?.[stream];
    if (!sink) {
      this.dropped++;
      return;
    }
    const written = Result.fromThrowable(() => sink.write(line), (error) => error)();
    if (written.isErr()) this.failOver(stream, line, written.error);
  }

  private bufferLine(entry: PendingLine): void {
    if (this.pending.length >= this.bufferLimit) {
      this.pending.shift();
      this.dropped++;
    }
    this.pending.push(entry);
  }

  private drainPending(): void {
    const pending = this.pending;
    this.pending = [];
    for (const entry of pending) {
      if (this.sinks) {
        this.writeToSink(entry.stream, entry.line);
      } else {
        this.dropped++;
      }
    }
  }

  /**
   * A sink failed: abandon its directory, probe the remaining candidates, and retry the
   * failed line once in the new location.
   */
  private failOver(stream: LogStreamName, line: string | null, cause: unknown): void {
    const failed = this.location;
    const closeErrors = this.releaseSinks();
    this.location = null;

    const failures = this.acquireLocation(failed ? [failed.directory] : []);
    this.lastProbeAtMs = this.now();

    const relocated = this.activeLocation();
    if (!relocated) {
      if (line !== null) this.dropped++;
      return;
    }

    this.writeInternal('warn', 'log location switched', {
      from: failed?.directory ?? null,
      to: relocated.directory,
      stream,
      code: errorCode(cause) ?? null,
      error: cause instanceof Error ? cause.message : String(cause),
    });
    for (const error of closeErrors) {
      this.writeInternal('debug', 'closing abandoned log file failed', { error: describe(error) });
    }
    this.reportRejections(failures);

    if (line === null) return;
    const retried = Result.fromThrowable(() => this.sinks?.[stream].write(line), (error) => error)();
    if (retried.isErr()) {
      this.dropped++;
      this.releaseSinks();
      this.location = null;
    }
  }

  private reprobeIfDue(): void {
    const now = this.now();
    if (this.lastProbeAtMs !== null && now - this.lastProbeAtMs < this.options.reprobeIntervalMs) return;
    this.lastProbeAtMs = now;

    const failures = this.acquireLocation([]);
    if (this.location) {
      this.writeInternal('warn', 'log location recovered', {
        to: this.location.directory,
        droppedLines: this.dropped,
      });
      this.reportRejections(failures);
    }
  }

  private reportRejections(failures: readonly ProbeFailure[]): void {
    for (const failure of failures) {
      this.writeInternal('debug', 'log location candidate rejected', probeDetails(failure));
    }
  }

  /**
   * Probe candidates until one both passes the probe and accepts the sinks and pointer file.
   * Returns every rejection seen on the way.
   */
  private acquireLocation(exclude: readonly string[]): ProbeFailure[] {
    const excluded = [...exclude];
    const failures: ProbeFailure[] = [];

    for (;;) {
      const selection = selectWritableLocation(this.options.candidates, this.ops, this.probeToken, excluded);
      failures.push(...selection.failures);
      const candidate = selection.location;
      if (!candidate) return failures;

      const activated = this.activate(candidate);
      if (activated.isOk()) return failures;

      failures.push(activated.error);
      excluded.push(candidate.directory);
    }
  }

  private activate(location: WritableLocation): Result<void, ProbeFailure> {
    const rotation = { maxFileBytes: this.options.maxFileBytes, maxFiles: this.options.maxFiles };
    const sinks: Record<LogStreamName, RotatingFileSink> = {
      operational: new RotatingFileSink(location.operationalLogPath, this.ops, rotation),
      debug: new RotatingFileSink(location.debugLogPath, this.ops, rotation),
    };

    const opened = Result.fromThrowable(
      () => {
        sinks.operational.open();
        sinks.debug.open();
      },
      (error): ProbeFailure => ({
        directory: location.directory,
        stage: 'write',
        code: errorCode(error),
        message: describe(error),
      }),
    )().andThen(() => writeLocationPointer(location, this.ops));

    if (opened.isErr()) {
      closeAll(sinks);
      return opened;
    }

    this.sinks = sinks;
    this.location = location;
    return opened;
  }

  private releaseSinks(): unknown[] {
    const sinks = this.sinks;
    this.sinks = null;
    return sinks ? closeAll(sinks) : [];
  }

  /**
   * Lines about the context itself bypass pino: they are written straight to the sinks so
   * a failure while reporting a failure cannot recurse.
   */
  private writeInternal(level: InternalLevel, msg: string, details: Record<string, unknown>): void {
    if (!this.sinks) return;
    const line =
      JSON.stringify({
        level: PINO_LEVEL_VALUES[level],
        time: new Date(this.now()).toISOString(),
        pid: process.pid,
        component: COMPONENT,
        ...details,
        msg,
      }) + '\n';

    const targets: LogStreamName[] = level === 'debug' ? ['debug'] : ['operational', 'debug'];
    for (const stream of targets) {
      const sink = this.sinks[stream];
      const written = Result.fromThrowable(() => sink.write(line), (error) => error)();
      if (written.isErr()) this.dropped++;
    }
  }
}

const STREAMS: readonly LogStreamName[] = ['operational', 'debug'];

function closeAll(sinks: Record<LogStreamName, RotatingFileSink>): unknown[] {
  const errors: unknown[] = [];
  for (const stream of STREAMS) {
    const closed = Result.fromThrowable(() => sinks[stream].close(), (error) => error)();
    if (closed.isErr()) errors.push(closed.error);
  }
  return errors;
}

function probeDetails(failure: ProbeFailure): Record<string, unknown> {
  return {
    directory: failure.directory,
    stage: failure.stage,
    code: failure.code ?? null,
    error: failure.message,
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

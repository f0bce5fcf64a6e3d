import type { LogCursor, LogSource } from '../../application/ports/log-source.js';
import type { Clock } from '../../application/ports/clock.js';
import type { InitialPosition } from '../../config/app-config.js';
import type { Logger } from '../../core/logging/index.js';
import { formatFingerprint, sameFingerprint, type LogEvent } from '../../domain/log-event.js';
import { parseLogLine } from '../../domain/log-line.js';
import { assertNever } from '../../runtime/assert-never.js';
import { NodeLogFileReader, type LogFileReader, type LogFileStat, type ReadFailure } from './log-file-reader.js';
import { splitWindow } from './line-splitter.js';

export interface FileLogSourceOptions {
  readonly files: readonly string[];
  readonly initialPosition: InitialPosition;
  readonly maxBytesPerPoll: number;
}

/**
 * Tails a fixed list of log files, one cursor per file.
 *
 * - First sighting: the cursor starts at `initialPosition`
 * - Fingerprint change: rotation, restart at 0 (the old file's unread tail is lost)
 * - Same file but shorter than the cursor: truncation, restart at 0
 * - Missing file: nothing yielded, logged once per appear/disappear transition
 */
export class FileLogSource implements LogSource {
  private readonly state = new Map<string, LogCursor>();
  private readonly missing = new Set<string>();
  private readonly lastFailure = new Map<string, string>();

  constructor(
    private readonly options: FileLogSourceOptions,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly reader: LogFileReader = new NodeLogFileReader(),
  ) {}

  async *poll(signal?: AbortSignal): AsyncGenerator<LogEvent> {
    for (const filePath of this.options.files) {
      if (signal?.aborted) return;
      yield* this.pollFile(filePath, signal);
    }
  }

  cursors(): readonly LogCursor[] {
    return [...this.state.values()];
  }

  reset(): void {
    this.state.clear();
    this.missing.clear();
    this.lastFailure.clear();
  }

  private async *pollFile(filePath: string, signal: AbortSignal | undefined): AsyncGenerator<LogEvent> {
    const pending = await this.readPending(filePath);
    if (!pending) return;

    const { cursor, bytes } = pending;
    const windowWasFull = bytes.length >= this.options.maxBytesPerPoll;
    const source = { path: filePath, fingerprint: cursor.fingerprint };
    let lineNumber = cursor.lineNumber;

    for (const line of splitWindow(bytes, cursor.offset, windowWasFull)) {
      if (signal?.aborted) return;

      lineNumber += 1;
      this.state.set(filePath, { ...cursor, offset: line.nextOffset, lineNumber });
      if (line.text.trim() === '') continue;

      const entry = parseLogLine(line.text);
      yield {
        source,
        offset: line.offset,
        lineNumber,
        timestamp: entry?.timestamp ?? new Date(this.clock.nowMs()),
        raw: line.text,
        entry,
      };
    }
  }

  /**
   * Opens the file once, reconciles the cursor against that handle's size and fingerprint,
   * and reads the unread window through the same handle. The handle is closed before any
   * line is yielded.
   */
  private async readPending(filePath: string): Promise<{ cursor: LogCursor; bytes: Buffer } | null> {
    const opened = await this.reader.open(filePath);
    if (opened.isErr()) {
      this.reportFailure(filePath, opened.error);
      return null;
    }
    const file = opened.value;

    try {
      this.noteReadable(filePath);
      const cursor = this.reconcile(filePath, file.stat);
      const available = file.stat.size - cursor.offset;
      if (available <= 0) return null;

      const window = await file.read(cursor.offset, Math.min(available, this.options.maxBytesPerPoll));
      if (window.isErr()) {
        this.reportFailure(filePath, window.error);
        return null;
      }
      return { cursor, bytes: window.value };
    } finally {
      await file.close();
    }
  }

  /** Returns the cursor to read from, resetting it on rotation or truncation. */
  private reconcile(filePath: string, stat: LogFileStat): LogCursor {
    const existing = this.state.get(filePath);

    if (!existing) {
      const offset = this.options.initialPosition === 'end' ? stat.size : 0;
      const cursor: LogCursor = { path: filePath, offset, fingerprint: stat.fingerprint, lineNumber: 0 };
      this.state.set(filePath, cursor);
      this.logger.debug(
        { path: filePath, offset, initialPosition: this.options.initialPosition, fingerprint: formatFingerprint(stat.fingerprint) },
        'Tracking log file',
      );
      return cursor;
    }

    if (!sameFingerprint(existing.fingerprint, stat.fingerprint)) {
      this.logger.info(
        {
          path: filePath,
          previous: formatFingerprint(existing.fingerprint),
          current: formatFingerprint(stat.fingerprint),
          skippedFromOffset: existing.offset,
        },
        'Log rotation detected',
      );
      return this.restart(filePath, stat);
    }

    if (stat.size < existing.offset) {
      this.logger.info({ path: filePath, previousOffset: existing.offset, size: stat.size }, 'Log truncation detected');
      return this.restart(filePath, stat);
    }

    return existing;
  }

  private restart(filePath: string, stat: LogFileStat): LogCursor {
    const cursor: LogCursor = { path: filePath, offset: 0, fingerprint: stat.fingerprint, lineNumber: 0 };
    this.state.set(filePath, cursor);
    return cursor;
  }

  private noteReadable(filePath: string): void {
    this.lastFailure.delete(filePath);
    if (this.missing.delete(filePath)) {
      this.logger.debug({ path: filePath }, 'Log file appeared');
    }
  }

  private reportFailure(filePath: string, failure: ReadFailure): void {
    switch (failure.code) {
      case 'LOG_NOT_FOUND':
        if (!this.missing.has(filePath)) {
          this.missing.add(filePath);
          this.logger.debug({ path: filePath }, 'Log file not present');
        }
        return;

      case 'LOG_TRANSIENT':
        this.logger.debug({ path: filePath, code: failure.osCode }, 'Log file busy; retrying next poll');
        return;

      case 'LOG_IO_ERROR': {
        const key = failure.osCode ?? failure.message;
        if (this.lastFailure.get(filePath) !== key) {
          this.lastFailure.set(filePath, key);
          this.logger.warn({ path: filePath, code: failure.osCode, error: failure.message }, 'Log file unreadable');
        }
        return;
      }

      default:
        assertNever(failure, 'read failure');
    }
  }
}

import type { LogEvent, LogFingerprint } from '../../domain/log-event.js';

/** Read position inside one monitored file. */
export interface LogCursor {
  readonly path: string;
  /** Byte offset of the next unread line; never beyond the file length. */
  readonly offset: number;
  readonly fingerprint: LogFingerprint;
  /** Lines consumed since the cursor last reset. */
  readonly lineNumber: number;
}

/**
 * Incremental reader over the monitored log files.
 *
 * `poll()` yields the lines written since the previous poll and then completes. A consumer
 * that stops iterating early resumes at the first line it did not consume.
 */
export interface LogSource {
  poll(signal?: AbortSignal): AsyncIterable<LogEvent>;
  cursors(): readonly LogCursor[];
  reset(): void;
}

import type { ErrorKind } from './error-kind.js';
import type { ParsedLogLine } from './log-line.js';

/**
 * Identity of a log file at a point in time.
 * A change in any field means the path now names a different file (rotation).
 */
export interface LogFingerprint {
  readonly dev: number;
  readonly ino: number;
  readonly birthtimeMs: number;
}

export interface LogSourceRef {
  readonly path: string;
  readonly fingerprint: LogFingerprint;
}

/** One line observed in a monitored log file. */
export interface LogEvent {
  readonly source: LogSourceRef;
  /** Byte offset of the first byte of the line. */
  readonly offset: number;
  /** 1-based line number since the cursor last reset; 0 when unknown. */
  readonly lineNumber: number;
  /** Timestamp written by the application, else the time the line was read. */
  readonly timestamp: Date;
  readonly raw: string;
  readonly entry: ParsedLogLine | null;
}

export interface ClassifiedEvent {
  readonly event: LogEvent;
  readonly kind: ErrorKind;
  readonly ruleId: string;
}

export function sameFingerprint(a: LogFingerprint, b: LogFingerprint): boolean {
  return a.dev === b.dev && a.ino === b.ino && a.birthtimeMs === b.birthtimeMs;
}

export function formatFingerprint(fingerprint: LogFingerprint): string {
  return `${fingerprint.dev}:${fingerprint.ino}:${Math.trunc(fingerprint.birthtimeMs)}`;
}

/**
 * Parser for the monitored application's log line layout:
 *
 *   2025-05-26 09:33:40,383 INFO JS API: getNativeVersion returned: 2023.2.208
 *
 * The timestamp carries no zone and is interpreted in local time, as the application
 * writes it. Unknown levels read as INFO.
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type AppLogLevel = (typeof LOG_LEVELS)[number];

export interface ParsedLogLine {
  readonly timestamp: Date;
  readonly level: AppLogLevel;
  readonly message: string;
}

const LINE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}),(\d{3}) (\S+) (.*)$/;

function toLevel(token: string): AppLogLevel {
  return LOG_LEVELS.find((level) => level === token) ?? 'INFO';
}

export function parseLogLine(raw: string): ParsedLogLine | null {
  const match = LINE_PATTERN.exec(raw);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, millis, level, message] = match;
  const timestamp = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Number(millis),
  );

  // Date rolls 2025-02-30 over into March; treat impossible dates as unparsed.
  if (timestamp.getDate() !== Number(day) || timestamp.getMonth() !== Number(month) - 1) {
    return null;
  }

  return { timestamp, level: toLevel(level ?? ''), message: message ?? '' };
}

import type { ErrorKind } from '../../src/domain/error-kind.js';
import type { ClassifiedEvent, LogEvent } from '../../src/domain/log-event.js';
import { parseLogLine } from '../../src/domain/log-line.js';

export const TEST_LOG_PATH = '/var/log/app/app.log';

export function logEvent(raw: string, overrides: Partial<LogEvent> = {}): LogEvent {
  const entry = parseLogLine(raw);
  return {
    source: { path: TEST_LOG_PATH, fingerprint: { dev: 1, ino: 42, birthtimeMs: 0 } },
    offset: 0,
    lineNumber: 1,
    timestamp: entry?.timestamp ?? new Date(0),
    raw,
    entry,
    ...overrides,
  };
}

export function classified(kind: ErrorKind, ruleId = 'test-rule', raw = 'ERROR something broke'): ClassifiedEvent {
  return { event: logEvent(raw), kind, ruleId };
}

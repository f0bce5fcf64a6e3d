import { describe, it, expect } from 'vitest';
import { parseLogLine } from '../../src/domain/log-line.js';

describe('parseLogLine', () => {
  it('parses timestamp, level and message', () => {
    const parsed = parseLogLine('2025-05-26 09:33:40,383 INFO JS API: getNativeVersion returned: 2023.2.208');

    expect(parsed).not.toBeNull();
    expect(parsed?.timestamp.getTime()).toBe(new Date(2025, 4, 26, 9, 33, 40, 383).getTime());
    expect(parsed?.level).toBe('INFO');
    expect(parsed?.message).toBe('JS API: getNativeVersion returned: 2023.2.208');
  });

  it('keeps known levels', () => {
    expect(parseLogLine('2025-05-26 09:33:40,383 ERROR init schema: error: Internal error')?.level).toBe('ERROR');
    expect(parseLogLine('2025-05-26 09:33:40,383 WARNING disk almost full')?.level).toBe('WARNING');
  });

  it('reads unknown levels as INFO', () => {
    expect(parseLogLine('2025-05-26 09:33:40,383 NOTICE something')?.level).toBe('INFO');
  });

  it('returns null for lines without the timestamp prefix', () => {
    expect(parseLogLine("ERROR: object store 'charts' could not be opened")).toBeNull();
    expect(parseLogLine('')).toBeNull();
  });

  it('returns null for impossible dates', () => {
    expect(parseLogLine('2025-02-30 10:00:00,000 INFO rolled over')).toBeNull();
  });
});

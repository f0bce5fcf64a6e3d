const NEWLINE = 0x0a;

export interface WindowLine {
  /** Byte offset of the line start in the file. */
  readonly offset: number;
  /** Byte offset just past the line terminator; the cursor moves here once the line is consumed. */
  readonly nextOffset: number;
  readonly text: string;
}

/**
 * Splits a read window into complete lines.
 *
 * A trailing fragment without `\n` is left for the next read, except when the window is
 * full and contains no newline at all: then the whole window becomes one line so a
 * single oversized line cannot pin the cursor forever.
 */
export function splitWindow(window: Buffer, windowOffset: number, windowWasFull: boolean): WindowLine[] {
  const lines: WindowLine[] = [];
  let start = 0;

  for (let index = window.indexOf(NEWLINE); index !== -1; index = window.indexOf(NEWLINE, start)) {
    lines.push({
      offset: windowOffset + start,
      nextOffset: windowOffset + index + 1,
      text: stripCarriageReturn(window.toString('utf8', start, index)),
    });
    start = index + 1;
  }

  if (lines.length === 0 && windowWasFull && window.length > 0) {
    lines.push({
      offset: windowOffset,
      nextOffset: windowOffset + window.length,
      text: stripCarriageReturn(window.toString('utf8')),
    });
  }

  return lines;
}

function stripCarriageReturn(text: string): string {
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

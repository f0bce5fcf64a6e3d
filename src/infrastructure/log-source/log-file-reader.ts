import * as fs from 'fs/promises';
import { ResultAsync } from 'neverthrow';
import type { LogFingerprint } from '../../domain/log-event.js';
import { errorCode } from '../../errors/formatter.js';

/**
 * Errors the host throws while another process (the monitored application, anti-virus)
 * holds the file. Retried on the next poll.
 */
const TRANSIENT_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EAGAIN', 'EPERM', 'EACCES', 'EMFILE']);

export type ReadFailure =
  | { readonly code: 'LOG_NOT_FOUND'; readonly message: string }
  | { readonly code: 'LOG_TRANSIENT'; readonly osCode: string; readonly message: string }
  | { readonly code: 'LOG_IO_ERROR'; readonly osCode: string | undefined; readonly message: string };

export interface LogFileStat {
  readonly fingerprint: LogFingerprint;
  readonly size: number;
}

export function isTransientReadError(code: string | undefined): boolean {
  return code !== undefined && TRANSIENT_CODES.has(code);
}

function mapReadError(e: unknown, filePath: string): ReadFailure {
  const code = errorCode(e);
  const detail = e instanceof Error ? e.message : String(e);

  if (code === 'ENOENT') return { code: 'LOG_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code !== undefined && isTransientReadError(code)) {
    return { code: 'LOG_TRANSIENT', osCode: code, message: `Temporarily unreadable: ${filePath}: ${detail}` };
  }
  return { code: 'LOG_IO_ERROR', osCode: code, message: `Read error at ${filePath}: ${detail}` };
}

/** A log file held open for one poll. Size and fingerprint come from the handle itself. */
export interface OpenLogFile {
  readonly stat: LogFileStat;
  read(offset: number, length: number): ResultAsync<Buffer, ReadFailure>;
  close(): Promise<void>;
}

/** Read-side file access for the log source. */
export interface LogFileReader {
  open(filePath: string): ResultAsync<OpenLogFile, ReadFailure>;
}

export class NodeLogFileReader implements LogFileReader {
  open(filePath: string): ResultAsync<OpenLogFile, ReadFailure> {
    return ResultAsync.fromPromise(openWithStat(filePath), (e) => mapReadError(e, filePath));
  }
}

async function openWithStat(filePath: string): Promise<OpenLogFile> {
  const handle = await fs.open(filePath, 'r');
  const stats = await handle.stat().catch(async (error: unknown) => {
    await handle.close();
    throw error;
  });

  return {
    stat: {
      fingerprint: { dev: stats.dev, ino: stats.ino, birthtimeMs: stats.birthtimeMs },
      size: stats.size,
    },
    read: (offset, length) =>
      ResultAsync.fromPromise(readRange(handle, offset, length), (e) => mapReadError(e, filePath)),
    close: () => handle.close(),
  };
}

async function readRange(handle: fs.FileHandle, offset: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, offset + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

import * as fs from 'fs/promises';
import { ResultAsync } from 'neverthrow';
import { errorCode } from '../../errors/formatter.js';

export type RemoveFailure =
  | { readonly code: 'REMOVE_BUSY'; readonly osCode: string; readonly message: string }
  | { readonly code: 'REMOVE_IO_ERROR'; readonly osCode: string | undefined; readonly message: string };

export type RemoveResult = 'removed' | 'absent';

/** Locked-file errors worth another try once the holder lets go. */
const BUSY_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EPERM', 'EACCES', 'ENOTEMPTY']);

export interface DirectoryRemover {
  remove(dirPath: string): ResultAsync<RemoveResult, RemoveFailure>;
}

function mapRemoveError(e: unknown, dirPath: string): RemoveFailure {
  const code = errorCode(e);
  const detail = e instanceof Error ? e.message : String(e);
  if (code !== undefined && BUSY_CODES.has(code)) {
    return { code: 'REMOVE_BUSY', osCode: code, message: `In use: ${dirPath}: ${detail}` };
  }
  return { code: 'REMOVE_IO_ERROR', osCode: code, message: `Cannot remove ${dirPath}: ${detail}` };
}

export class NodeDirectoryRemover implements DirectoryRemover {
  remove(dirPath: string): ResultAsync<RemoveResult, RemoveFailure> {
    return ResultAsync.fromPromise(removeIfPresent(dirPath), (e) => mapRemoveError(e, dirPath));
  }
}

async function removeIfPresent(dirPath: string): Promise<RemoveResult> {
  try {
    await fs.rm(dirPath, { recursive: true });
    return 'removed';
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return 'absent';
    throw error;
  }
}

import * as path from 'path';
import { Result } from 'neverthrow';
import type { LogFileOps } from './file-ops.js';
import type { WritableLocation } from './types.js';
import { errorCode } from '../../errors/formatter.js';

export const OPERATIONAL_LOG_FILE = 'repairwatch.log';
export const DEBUG_LOG_FILE = 'repairwatch-debug.log';
export const LOCATION_POINTER_FILE = 'repairwatch-location.txt';

export type ProbeStage = 'mkdir' | 'write' | 'delete';

/** Why a candidate directory was rejected. */
export interface ProbeFailure {
  readonly directory: string;
  readonly stage: ProbeStage;
  readonly code: string | undefined;
  readonly message: string;
}

export interface LocationSelection {
  readonly location: WritableLocation | null;
  readonly failures: readonly ProbeFailure[];
}

export function locationFor(directory: string): WritableLocation {
  const resolved = path.resolve(directory);
  return {
    directory: resolved,
    operationalLogPath: path.join(resolved, OPERATIONAL_LOG_FILE),
    debugLogPath: path.join(resolved, DEBUG_LOG_FILE),
    pointerPath: path.join(resolved, LOCATION_POINTER_FILE),
  };
}

function step(directory: string, stage: ProbeStage, action: () => void): Result<void, ProbeFailure> {
  return Result.fromThrowable(action, (error): ProbeFailure => ({
    directory,
    stage,
    code: errorCode(error),
    message: error instanceof Error ? error.message : String(error),
  }))();
}

/**
 * Live write probe: create the directory, write and fsync a sentinel file, delete it.
 * A directory that lets us create but not delete files is rejected too; anti-virus
 * locks show up exactly that way.
 */
export function probeDirectory(directory: string, ops: LogFileOps, token: string): Result<WritableLocation, ProbeFailure> {
  const location = locationFor(directory);
  const sentinel = path.join(location.directory, `.repairwatch-probe-${token}.tmp`);

  return step(location.directory, 'mkdir', () => ops.mkdirp(location.directory))
    .andThen(() => step(location.directory, 'write', () => ops.writeFileDurable(sentinel, `probe ${token}\n`)))
    .andThen(() => step(location.directory, 'delete', () => ops.unlink(sentinel)))
    .map(() => location);
}

/**
 * Probe candidates in rank order and return the first writable one.
 * `exclude` holds directories known to be failing right now.
 */
export function selectWritableLocation(
  candidates: readonly string[],
  ops: LogFileOps,
  token: string,
  exclude: readonly string[] = [],
): LocationSelection {
  const excluded = new Set(exclude.map((dir) => path.resolve(dir)));
  const failures: ProbeFailure[] = [];

  for (const candidate of candidates) {
    if (excluded.has(path.resolve(candidate))) continue;

    const probed = probeDirectory(candidate, ops, token);
    if (probed.isOk()) {
      return { location: probed.value, failures };
    }
    failures.push(probed.error);
  }

  return { location: null, failures };
}

/** Single line: the absolute directory holding the active logs. */
export function writeLocationPointer(location: WritableLocation, ops: LogFileOps): Result<void, ProbeFailure> {
  return step(location.directory, 'write', () => ops.writeFileDurable(location.pointerPath, `${location.directory}\n`));
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { NodeLogFileOps } from '../../../src/core/logging/file-ops.js';
import {
  LOCATION_POINTER_FILE,
  locationFor,
  probeDirectory,
  selectWritableLocation,
  writeLocationPointer,
} from '../../../src/core/logging/writable-location.js';
import { FaultyLogFileOps } from '../../fakes/faulty-log-file-ops.js';
import { createTempDir } from '../../helpers/temp-dir.js';

describe('writable location selection', () => {
  let root: string;
  let cleanup: () => Promise<void>;
  const ops = new NodeLogFileOps();

  beforeEach(async () => {
    ({ root, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('creates the directory and leaves no probe file behind', () => {
    const dir = path.join(root, 'nested', 'logs');

    const probed = probeDirectory(dir, ops, 'abc123');

    expect(probed.isOk()).toBe(true);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('falls through to the next candidate when a directory cannot be created', () => {
    const blocker = path.join(root, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const fallback = path.join(root, 'fallback');

    const selection = selectWritableLocation([path.join(blocker, 'logs'), fallback], ops, 'tok');

    expect(selection.location?.directory).toBe(fallback);
    expect(selection.failures).toHaveLength(1);
    expect(selection.failures[0]).toMatchObject({ directory: path.join(blocker, 'logs'), stage: 'mkdir' });
  });

  it('reports the stage at which a probe failed', () => {
    const faulty = new FaultyLogFileOps();
    const denied = path.join(root, 'denied');
    faulty.denyDirectory(denied);

    const probed = probeDirectory(denied, faulty, 'tok');

    expect(probed.isErr() && probed.error).toMatchObject({ stage: 'mkdir', code: 'EACCES' });
  });

  it('returns no location when every candidate fails', () => {
    const faulty = new FaultyLogFileOps();
    const a = path.join(root, 'a');
    const b = path.join(root, 'b');
    faulty.denyDirectory(a);
    faulty.denyDirectory(b);

    const selection = selectWritableLocation([a, b], faulty, 'tok');

    expect(selection.location).toBeNull();
    expect(selection.failures.map((f) => f.directory)).toEqual([a, b]);
  });

  it('skips excluded candidates', () => {
    const a = path.join(root, 'a');
    const b = path.join(root, 'b');

    const selection = selectWritableLocation([a, b], ops, 'tok', [a]);

    expect(selection.location?.directory).toBe(b);
    expect(fs.existsSync(a)).toBe(false);
  });

  it('writes the pointer as one line naming the directory', () => {
    const location = locationFor(path.join(root, 'logs'));
    fs.mkdirSync(location.directory);

    expect(writeLocationPointer(location, ops).isOk()).toBe(true);
    expect(fs.readFileSync(path.join(location.directory, LOCATION_POINTER_FILE), 'utf8')).toBe(`${location.directory}\n`);
  });
});

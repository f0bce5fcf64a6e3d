import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { NodeLogFileOps } from '../../../src/core/logging/file-ops.js';
import { RotatingFileSink } from '../../../src/core/logging/rotating-file-sink.js';
import { createTempDir } from '../../helpers/temp-dir.js';

describe('RotatingFileSink', () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let file: string;

  beforeEach(async () => {
    ({ root, cleanup } = await createTempDir());
    file = path.join(root, 'out.log');
  });

  afterEach(async () => {
    await cleanup();
  });

  const read = (p: string) => fs.readFileSync(p, 'utf8');

  it('appends to an existing file', () => {
    fs.writeFileSync(file, 'existing\n');
    const sink = new RotatingFileSink(file, new NodeLogFileOps(), { maxFileBytes: 1024, maxFiles: 2 });

    sink.open();
    sink.write('next\n');
    sink.close();

    expect(read(file)).toBe('existing\nnext\n');
  });

  it('rotates by size and keeps the configured number of generations', () => {
    const sink = new RotatingFileSink(file, new NodeLogFileOps(), { maxFileBytes: 10, maxFiles: 2 });

    sink.open();
    for (const letter of ['a', 'b', 'c', 'd']) {
      sink.write(`${letter.repeat(6)}\n`);
    }
    sink.close();

    expect(read(file)).toBe('dddddd\n');
    expect(read(`${file}.1`)).toBe('cccccc\n');
    expect(read(`${file}.2`)).toBe('bbbbbb\n');
    expect(fs.existsSync(`${file}.3`)).toBe(false);
  });

  it('never rotates when the size limit is 0', () => {
    const sink = new RotatingFileSink(file, new NodeLogFileOps(), { maxFileBytes: 0, maxFiles: 2 });

    sink.write('one\n');
    sink.write('two\n');
    sink.close();

    expect(read(file)).toBe('one\ntwo\n');
    expect(fs.existsSync(`${file}.1`)).toBe(false);
  });

  it('discards the full file when no generations are kept', () => {
    const sink = new RotatingFileSink(file, new NodeLogFileOps(), { maxFileBytes: 5, maxFiles: 0 });

    sink.write('first\n');
    sink.write('second\n');
    sink.close();

    expect(fs.readdirSync(root)).toEqual(['out.log']);
    expect(read(file)).toBe('second\n');
  });

  it('closes idempotently', () => {
    const sink = new RotatingFileSink(file, new NodeLogFileOps(), { maxFileBytes: 100, maxFiles: 1 });
    sink.open();
    sink.close();

    expect(() => sink.close()).not.toThrow();
  });
});

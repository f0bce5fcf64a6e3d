import * as path from 'path';
import { NodeLogFileOps } from '../../src/core/logging/file-ops.js';

function fault(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

/**
 * Real file operations with switchable faults.
 *
 * - `denyDirectory(dir)`: every operation under `dir` fails with EACCES (probe included)
 * - `failWritesUnder(dir)`: the directory still probes fine, but writes to already open
 *   log files under it fail with EIO, as when a disk fills or anti-virus locks the file
 */
export class FaultyLogFileOps extends NodeLogFileOps {
  private readonly denied = new Set<string>();
  private readonly failingWrites = new Set<string>();
  private readonly fdPaths = new Map<number, string>();
  writeFailures = 0;

  denyDirectory(dir: string): void {
    this.denied.add(path.resolve(dir));
  }

  allowDirectory(dir: string): void {
    this.denied.delete(path.resolve(dir));
  }

  failWritesUnder(dir: string): void {
    this.failingWrites.add(path.resolve(dir));
  }

  restoreWrites(dir: string): void {
    this.failingWrites.delete(path.resolve(dir));
  }

  override mkdirp(dirPath: string): void {
    this.check(dirPath);
    super.mkdirp(dirPath);
  }

  override openAppend(filePath: string): number {
    this.check(filePath);
    const fd = super.openAppend(filePath);
    this.fdPaths.set(fd, filePath);
    return fd;
  }

  override write(fd: number, data: string): void {
    const filePath = this.fdPaths.get(fd);
    if (filePath !== undefined && this.under(this.failingWrites, filePath)) {
      this.writeFailures++;
      throw fault('EIO', `write failed for ${filePath}`);
    }
    super.write(fd, data);
  }

  override close(fd: number): void {
    this.fdPaths.delete(fd);
    super.close(fd);
  }

  override writeFileDurable(filePath: string, data: string): void {
    this.check(filePath);
    super.writeFileDurable(filePath, data);
  }

  private check(target: string): void {
    if (this.under(this.denied, target)) {
      throw fault('EACCES', `permission denied, ${target}`);
    }
  }

  private under(dirs: ReadonlySet<string>, target: string): boolean {
    const resolved = path.resolve(target);
    for (const dir of dirs) {
      if (resolved === dir || resolved.startsWith(dir + path.sep)) return true;
    }
    return false;
  }
}

import * as fs from 'fs';

/**
 * Synchronous file operations used by the log context.
 *
 * pino hands lines to the sinks synchronously, and the context flushes
 * and closes from a process `exit` hook.
 * Every method throws the underlying Node error; callers decide what is fatal.
 */
export interface LogFileOps {
  mkdirp(dirPath: string): void;
  openAppend(filePath: string): number;
  write(fd: number, data: string): void;
  fsync(fd: number): void;
  close(fd: number): void;
  /** Size in bytes, 0 when the file does not exist. */
  size(filePath: string): number;
  rename(fromPath: string, toPath: string): void;
  unlink(filePath: string): void;
  exists(filePath: string): boolean;
  /** Create or truncate, write, fsync and close. */
  writeFileDurable(filePath: string, data: string): void;
}

export class NodeLogFileOps implements LogFileOps {
  mkdirp(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }

  openAppend(filePath: string): number {
    return fs.openSync(filePath, 'a', 0o644);
  }

  write(fd: number, data: string): void {
    const bytes = Buffer.from(data, 'utf8');
    let written = 0;
    while (written < bytes.length) {
      written += fs.writeSync(fd, bytes, written, bytes.length - written);
    }
  }

  fsync(fd: number): void {
    fs.fsyncSync(fd);
  }

  close(fd: number): void {
    fs.closeSync(fd);
  }

  size(filePath: string): number {
    try {
      return fs.statSync(filePath).size;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 0;
      throw error;
    }
  }

  rename(fromPath: string, toPath: string): void {
    fs.renameSync(fromPath, toPath);
  }

  unlink(filePath: string): void {
    fs.unlinkSync(filePath);
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  writeFileDurable(filePath: string, data: string): void {
    const fd = fs.openSync(filePath, 'w', 0o644);
    try {
      this.write(fd, data);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }
}

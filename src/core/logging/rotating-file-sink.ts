import type { LogFileOps } from './file-ops.js';

export interface RotationPolicy {
  /** 0 disables rotation. */
  readonly maxFileBytes: number;
  /** Number of rotated generations kept beside the live file (`.1` … `.N`). */
  readonly maxFiles: number;
}

/**
 * One append-only log file. Every write is followed by an fsync so a crash or a
 * forced kill loses at most the line being written.
 *
 * All methods throw the underlying fs error; the owning context decides whether to fail over.
 */
export class RotatingFileSink {
  private fd: number | null = null;
  private bytes = 0;

  constructor(
    readonly filePath: string,
    private readonly ops: LogFileOps,
    private readonly rotation: RotationPolicy,
  ) {}

  open(): void {
    if (this.fd !== null) return;
    this.bytes = this.ops.size(this.filePath);
    this.fd = this.ops.openAppend(this.filePath);
  }

  write(line: string): void {
    const length = Buffer.byteLength(line, 'utf8');
    if (this.rotation.maxFileBytes > 0 && this.bytes > 0 && this.bytes + length > this.rotation.maxFileBytes) {
      this.rotate();
    }
    const fd = this.openFd();
    this.ops.write(fd, line);
    this.ops.fsync(fd);
    this.bytes += length;
  }

  sync(): void {
    if (this.fd !== null) this.ops.fsync(this.fd);
  }

  close(): void {
    const fd = this.fd;
    this.fd = null;
    if (fd !== null) this.ops.close(fd);
  }

  private openFd(): number {
    if (this.fd === null) this.open();
    if (this.fd === null) throw new Error(`log file ${this.filePath} is not open`);
    return this.fd;
  }

  private rotate(): void {
    this.close();

    const oldest = `${this.filePath}.${this.rotation.maxFiles}`;
    if (this.ops.exists(oldest)) this.ops.unlink(oldest);

    for (let generation = this.rotation.maxFiles - 1; generation >= 1; generation--) {
      const from = `${this.filePath}.${generation}`;
      if (this.ops.exists(from)) this.ops.rename(from, `${this.filePath}.${generation + 1}`);
    }
    if (this.rotation.maxFiles >= 1) {
      this.ops.rename(this.filePath, `${this.filePath}.1`);
    } else {
      this.ops.unlink(this.filePath);
    }

    this.open();
  }
}

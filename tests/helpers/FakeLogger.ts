import type { Logger } from '../../src/core/logging/index.js';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  level: LogLevelName;
  obj?: Record<string, unknown>;
  msg?: string;
}

type LogMethod = (objOrMsg: object | string, msg?: string) => void;

/**
 * Captures pino-style calls (`logger.info({ kind }, 'msg')`) for assertions.
 * Covers only the surface the watchdog calls; `asLogger()` hands it to code typed against pino.
 */
export class FakeLogger {
  readonly entries: LogEntry[] = [];
  level = 'debug';

  readonly trace = this.recorder('trace');
  readonly debug = this.recorder('debug');
  readonly info = this.recorder('info');
  readonly warn = this.recorder('warn');
  readonly error = this.recorder('error');
  readonly fatal = this.recorder('fatal');

  child(): FakeLogger {
    return this;
  }

  clear(): void {
    this.entries.length = 0;
  }

  hasEntry(level: LogLevelName, msgContains: string): boolean {
    return this.entries.some((e) => e.level === level && (e.msg ?? '').includes(msgContains));
  }

  getEntries(level?: LogLevelName): LogEntry[] {
    return this.entries.filter((e) => level === undefined || e.level === level);
  }

  messages(level?: LogLevelName): string[] {
    return this.getEntries(level).map((e) => e.msg ?? '');
  }

  asLogger(): Logger {
    return this as unknown as Logger;
  }

  private recorder(level: LogLevelName): LogMethod {
    return (objOrMsg, msg) => {
      this.entries.push(
        typeof objOrMsg === 'string' ? { level, msg: objOrMsg } : { level, obj: { ...objOrMsg }, msg },
      );
    };
  }
}

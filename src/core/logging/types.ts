import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - matches pino's Logger exactly.
 *
 * No abstraction: use the library types directly.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ kind }, 'Repair succeeded');
 *   logger.error({ err: error }, 'Cycle failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

/**
 * Log level type.
 */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/** The two file streams kept at the active location. */
export type LogStreamName = 'operational' | 'debug';

/** A directory that passed the write probe, with the files the logger keeps there. */
export interface WritableLocation {
  readonly directory: string;
  readonly operationalLogPath: string;
  readonly debugLogPath: string;
  readonly pointerPath: string;
}

/**
 * Process-wide logging context with an explicit lifecycle.
 * Constructed once by the composition root and handed to every component.
 */
export interface LogContext extends ILoggerFactory {
  init(): void;
  flush(): void;
  close(): void;
  activeLocation(): WritableLocation | null;
  isDegraded(): boolean;
}

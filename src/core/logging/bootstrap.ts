import pino from 'pino';
import type { Logger, LogLevel } from './types.js';

/**
 * Bootstrap logger for use BEFORE the log context is initialized.
 *
 * Used by:
 * - the CLI composition root (config errors, fatal startup errors)
 * - NodeProcessSignals handler failures
 *
 * Writes synchronously to stderr; after startup, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

const LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function bootstrapLevel(): LogLevel {
  const configured = process.env['REPAIRWATCH_BOOTSTRAP_LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((level) => level === configured) ?? 'warn';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: bootstrapLevel(),
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: { err: pino.stdSerializers.err },
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}

// Types
export type { Logger, ILoggerFactory, LogLevel, LogContext, LogStreamName, WritableLocation } from './types.js';

// Context (for DI registration)
export { ResilientLogContext, type ResilientLogContextOptions } from './resilient-log-context.js';
export { NodeLogFileOps, type LogFileOps } from './file-ops.js';
export {
  OPERATIONAL_LOG_FILE,
  DEBUG_LOG_FILE,
  LOCATION_POINTER_FILE,
  locationFor,
  probeDirectory,
  selectWritableLocation,
  type ProbeFailure,
} from './writable-location.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

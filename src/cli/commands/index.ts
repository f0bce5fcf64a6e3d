/**
 * CLI Commands - Public API
 */

export { executeRunCommand, type RunCommandDeps, type WatchdogControl } from './run.js';
export { executeScanCommand, type ScanCommandDeps } from './scan.js';
export { executeKindsCommand, type KindsCommandDeps } from './kinds.js';
export { executeWhereCommand, type WhereCommandDeps } from './where.js';

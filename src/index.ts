// DI Container exports
export { initializeContainer, container, resetContainer, type ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Domain
export { ERROR_KINDS, ErrorKindSchema, isErrorKind, type ErrorKind } from './domain/error-kind.js';
export type { LogEvent, ClassifiedEvent, LogFingerprint } from './domain/log-event.js';
export { parseLogLine, type ParsedLogLine } from './domain/log-line.js';
export type {
  DispatchDecision,
  RemediationRecord,
  RemediationState,
  RepairOutcome,
  SuppressionReason,
} from './domain/remediation.js';
export { RepairOutcomes } from './domain/remediation.js';

// Ports
export type { RepairActionProvider, RepairAttemptContext } from './application/ports/repair-action-provider.js';
export type { LogSource, LogCursor } from './application/ports/log-source.js';
export type { Clock } from './application/ports/clock.js';

// Services
export { PatternClassifier, type Classifier } from './application/services/pattern-classifier.js';
export { DEFAULT_CLASSIFICATION_RULES, type ClassificationRule } from './application/services/classification-rules.js';
export { DefaultRemediationDispatcher, type RemediationDispatcher } from './application/services/remediation-dispatcher.js';
export { WatchdogService, type CycleReport } from './application/services/watchdog-service.js';

// Infrastructure
export { FileLogSource } from './infrastructure/log-source/file-log-source.js';
export { DryRunRepairActionProvider } from './infrastructure/repair/dry-run-repair-provider.js';
export { FileSystemRepairActionProvider } from './infrastructure/repair/file-system-repair-provider.js';
export { loadErrorKindMetadata, type ErrorKindCatalog } from './infrastructure/metadata/error-kind-metadata.js';

// Logging
export { ResilientLogContext, type LogContext, type Logger, type ILoggerFactory } from './core/logging/index.js';

// Config
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';

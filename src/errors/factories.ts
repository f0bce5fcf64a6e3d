import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  MetadataInvalidError,
  StartupFailedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  metadataInvalid: (filePath: string, issues: readonly ConfigIssue[]): MetadataInvalidError => ({
    _tag: 'MetadataInvalid',
    filePath,
    issues,
    message: `Invalid error-kind metadata in ${filePath}`,
  }),

  startupFailed: (phase: string, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  MetadataInvalidError,
  StartupFailedError,
  UnexpectedError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, safeToString, errorCode } from './formatter.js';

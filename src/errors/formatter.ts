import type { AppError, ConfigIssue } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid':
      return `${error.message}\n\n${formatIssues(error.issues)}`;

    case 'MetadataInvalid':
      return `${error.message}\n\n${formatIssues(error.issues)}`;

    case 'StartupFailed': {
      const base = `Startup failed during ${error.phase}: ${error.message}`;
      return error.cause !== undefined ? `${base}\nCause: ${safeToString(error.cause)}` : base;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error, 'app error');
  }
}

function formatIssues(issues: readonly ConfigIssue[]): string {
  return issues.length
    ? issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
    : '  - (no details)';
}

export function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Node fs errors carry a string `code`; anything else yields undefined. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const code: unknown = error.code;
  return typeof code === 'string' ? code : undefined;
}

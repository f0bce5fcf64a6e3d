import { z } from 'zod';

/**
 * The closed taxonomy of failure signatures the watchdog knows how to repair.
 *
 * The identifiers are shared with the error-kind metadata file and with the fixture
 * harness that replays captured logs, so renaming one is a breaking change.
 */
export const ERROR_KINDS = [
  'REFERENCE_TABLE_CORRUPT',
  'DEVICE_INFO_INVALID',
  'SCHEMA_CORRUPT',
  'STORES_NOT_CORRECTLY_SET_UP',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export const ErrorKindSchema = z.enum(ERROR_KINDS);

export function isErrorKind(value: string): value is ErrorKind {
  return ErrorKindSchema.safeParse(value).success;
}

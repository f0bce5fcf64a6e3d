import * as fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ResultAsync, type Result, err, ok } from 'neverthrow';
import { ERROR_KINDS, ErrorKindSchema, type ErrorKind } from '../../domain/error-kind.js';
import { Err } from '../../errors/factories.js';
import type { ConfigIssue, MetadataInvalidError } from '../../errors/app-error.js';

/** Shipped beside `src/` and `dist/`; both resolve three levels up to the package root. */
export const DEFAULT_METADATA_FILE = fileURLToPath(new URL('../../../metadata/error-kinds.json', import.meta.url));

const ErrorKindEntrySchema = z
  .object({
    id: ErrorKindSchema,
    description: z.string().min(1),
    producesAlerts: z.boolean(),
    repair: z.string().min(1),
  })
  .strict();

const ErrorKindFileSchema = z
  .object({
    version: z.literal(1),
    kinds: z.array(ErrorKindEntrySchema),
  })
  .strict();

export type ErrorKindMetadata = z.infer<typeof ErrorKindEntrySchema>;

export interface ErrorKindCatalog {
  readonly entries: readonly ErrorKindMetadata[];
  describe(kind: ErrorKind): ErrorKindMetadata;
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/** Every taxonomy kind exactly once. */
function coverageIssues(entries: readonly ErrorKindMetadata[]): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const counts = new Map<ErrorKind, number>();
  for (const entry of entries) counts.set(entry.id, (counts.get(entry.id) ?? 0) + 1);

  for (const kind of ERROR_KINDS) {
    const count = counts.get(kind) ?? 0;
    if (count === 0) issues.push({ path: 'kinds', message: `missing entry for ${kind}` });
    if (count > 1) issues.push({ path: 'kinds', message: `${kind} is listed ${count} times` });
  }
  return issues;
}

export function parseErrorKindMetadata(filePath: string, raw: unknown): Result<ErrorKindCatalog, MetadataInvalidError> {
  const parsed = ErrorKindFileSchema.safeParse(raw);
  if (!parsed.success) return err(Err.metadataInvalid(filePath, toIssues(parsed.error)));

  const issues = coverageIssues(parsed.data.kinds);
  if (issues.length > 0) return err(Err.metadataInvalid(filePath, issues));

  const byKind = new Map(parsed.data.kinds.map((entry) => [entry.id, entry] as const));
  const entries = ERROR_KINDS.map((kind) => byKind.get(kind)).filter(
    (entry): entry is ErrorKindMetadata => entry !== undefined,
  );

  return ok({
    entries,
    describe(kind: ErrorKind): ErrorKindMetadata {
      const entry = byKind.get(kind);
      if (!entry) throw new Error(`No metadata for error kind ${kind}`);
      return entry;
    },
  });
}

function parseJson(filePath: string, text: string): Result<unknown, MetadataInvalidError> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(
      Err.metadataInvalid(filePath, [
        { path: '(root)', message: `not valid JSON: ${error instanceof Error ? error.message : String(error)}` },
      ]),
    );
  }
}

export function loadErrorKindMetadata(filePath: string = DEFAULT_METADATA_FILE): ResultAsync<ErrorKindCatalog, MetadataInvalidError> {
  return ResultAsync.fromPromise(fs.readFile(filePath, 'utf8'), (error) =>
    Err.metadataInvalid(filePath, [
      { path: '(file)', message: `cannot read: ${error instanceof Error ? error.message : String(error)}` },
    ]),
  ).andThen((text) => parseJson(filePath, text).andThen((raw) => parseErrorKindMetadata(filePath, raw)));
}

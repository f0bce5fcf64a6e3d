/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as path from 'path';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/app-error.js';
import { ERROR_KINDS, type ErrorKind } from '../domain/error-kind.js';
import { defaultAppRoot, defaultLogCandidates, defaultLogFiles, type HostPlatform } from './default-paths.js';

// =============================================================================
// Config shape
// =============================================================================

export type InitialPosition = 'start' | 'end';

/** Both modes know the application root: the dry run reports the paths it would touch. */
export type RepairMode =
  | { readonly kind: 'dry_run'; readonly appRoot: string }
  | { readonly kind: 'filesystem'; readonly appRoot: string };

export type ConfigLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AppConfig {
  readonly source: {
    readonly logFiles: readonly string[];
    readonly initialPosition: InitialPosition;
    readonly maxBytesPerPoll: number;
    /** Classified lines whose own timestamp is older than this are not acted on; 0 disables the cutoff. */
    readonly maxEventAgeMs: number;
  };
  readonly schedule: {
    readonly pollIntervalMs: number;
    readonly maxPollBackoffMs: number;
    readonly cycleBudgetMs: number;
    readonly stopGraceMs: number;
  };
  readonly remediation: {
    readonly defaultCooldownMs: number;
    readonly cooldownOverridesMs: Readonly<Partial<Record<ErrorKind, number>>>;
    readonly minCooldownMs: number;
    readonly retryCeiling: number;
    readonly backoffFactor: number;
    readonly maxBackoffMs: number;
    readonly repairTimeoutMs: number;
    readonly mode: RepairMode;
  };
  readonly logging: {
    readonly candidates: readonly string[];
    readonly level: ConfigLogLevel;
    readonly mirrorToStderr: boolean;
    readonly flushIntervalMs: number;
    readonly reprobeIntervalMs: number;
    readonly maxFileBytes: number;
    readonly maxFiles: number;
  };
  readonly metadataFile: string | null;
}

/** Proof that a config went through `loadConfig` (or `createValidatedConfig` in tests). */
export type ValidatedConfig = AppConfig & z.BRAND<'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly host: HostPlatform;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const intFromEnv = (name: string, fallback: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback),
    );

const listFromEnv = z
  .string()
  .optional()
  .transform((v) =>
    v === undefined
      ? []
      : v
          .split(path.delimiter)
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0),
  );

const flagFromEnv = z.enum(['0', '1']).default('0');

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

const EnvSchema = z.object({
    REPAIRWATCH_LOG_FILES: listFromEnv,
    REPAIRWATCH_INITIAL_POSITION: z.enum(['start', 'end']).default('end'),
    REPAIRWATCH_MAX_BYTES_PER_POLL: intFromEnv('REPAIRWATCH_MAX_BYTES_PER_POLL', 1_048_576, 1024, 64 * 1_048_576),
    REPAIRWATCH_MAX_EVENT_AGE_MS: intFromEnv('REPAIRWATCH_MAX_EVENT_AGE_MS', 2 * HOUR_MS, 0, 30 * DAY_MS),

    REPAIRWATCH_POLL_INTERVAL_MS: intFromEnv('REPAIRWATCH_POLL_INTERVAL_MS', 1000, 50, HOUR_MS),
    REPAIRWATCH_MAX_POLL_BACKOFF_MS: intFromEnv('REPAIRWATCH_MAX_POLL_BACKOFF_MS', 10_000, 50, HOUR_MS),
    REPAIRWATCH_CYCLE_BUDGET_MS: intFromEnv('REPAIRWATCH_CYCLE_BUDGET_MS', 300_000, 100, HOUR_MS),
    REPAIRWATCH_STOP_GRACE_MS: intFromEnv('REPAIRWATCH_STOP_GRACE_MS', 10_000, 0, HOUR_MS),

    REPAIRWATCH_COOLDOWN_MS: intFromEnv('REPAIRWATCH_COOLDOWN_MS', 300_000, 0, DAY_MS),
    REPAIRWATCH_MIN_COOLDOWN_MS: intFromEnv('REPAIRWATCH_MIN_COOLDOWN_MS', 1000, 0, DAY_MS),
    REPAIRWATCH_RETRY_CEILING: intFromEnv('REPAIRWATCH_RETRY_CEILING', 3, 0, 100),
    REPAIRWATCH_BACKOFF_FACTOR: intFromEnv('REPAIRWATCH_BACKOFF_FACTOR', 2, 1, 10),
    REPAIRWATCH_MAX_BACKOFF_MS: intFromEnv('REPAIRWATCH_MAX_BACKOFF_MS', HOUR_MS, 0, 7 * DAY_MS),
    REPAIRWATCH_REPAIR_TIMEOUT_MS: intFromEnv('REPAIRWATCH_REPAIR_TIMEOUT_MS', 120_000, 100, HOUR_MS),
    REPAIRWATCH_REPAIR_MODE: z.enum(['dry_run', 'filesystem']).default('dry_run'),
    REPAIRWATCH_APP_ROOT: z.string().min(1).optional(),

    REPAIRWATCH_LOG_DIRS: listFromEnv,
    REPAIRWATCH_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('debug'),
    REPAIRWATCH_LOG_STDERR: flagFromEnv,
    REPAIRWATCH_FLUSH_INTERVAL_MS: intFromEnv('REPAIRWATCH_FLUSH_INTERVAL_MS', 2000, 100, HOUR_MS),
    REPAIRWATCH_REPROBE_INTERVAL_MS: intFromEnv('REPAIRWATCH_REPROBE_INTERVAL_MS', 30_000, 0, HOUR_MS),
    REPAIRWATCH_LOG_MAX_BYTES: intFromEnv('REPAIRWATCH_LOG_MAX_BYTES', 5 * 1_048_576, 0, 1024 * 1_048_576),
    REPAIRWATCH_LOG_MAX_FILES: intFromEnv('REPAIRWATCH_LOG_MAX_FILES', 5, 0, 100),

    REPAIRWATCH_METADATA_FILE: z.string().min(1).optional(),
});

const CooldownOverrideSchema = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
  .pipe(z.number().int('must be an integer').min(0, 'must be >= 0').max(DAY_MS, `must be <= ${DAY_MS}`).optional());

const cooldownOverrideKey = (kind: ErrorKind): string => `REPAIRWATCH_COOLDOWN_${kind}_MS`;

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);
  const overrides = parseCooldownOverrides(options.env);

  if (!parsed.success || overrides.isErr()) {
    const issues = [
      ...(parsed.success ? [] : toConfigIssues(parsed.error)),
      ...(overrides.isErr() ? overrides.error : []),
    ];
    return err(Err.configInvalid(issues));
  }

  const config = buildConfig(parsed.data, overrides.value, options.host);
  const issues = crossFieldIssues(config);
  if (issues.length > 0) {
    return err(Err.configInvalid(issues));
  }

  return ok(createValidatedConfig(config));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return ValidatedConfigSchema.parse(value);
}

/** Cooldown for one kind: the override when set, never below the configured floor. */
export function cooldownFor(config: AppConfig, kind: ErrorKind): number {
  const base = config.remediation.cooldownOverridesMs[kind] ?? config.remediation.defaultCooldownMs;
  return Math.max(base, config.remediation.minCooldownMs);
}

// =============================================================================
// Internal
// =============================================================================

const ValidatedConfigSchema = z.custom<AppConfig>((value) => typeof value === 'object' && value !== null).brand<'ValidatedConfig'>();

function parseCooldownOverrides(
  env: Record<string, string | undefined>,
): Result<Partial<Record<ErrorKind, number>>, ConfigIssue[]> {
  const overrides: Partial<Record<ErrorKind, number>> = {};
  const issues: ConfigIssue[] = [];

  for (const kind of ERROR_KINDS) {
    const key = cooldownOverrideKey(kind);
    const parsed = CooldownOverrideSchema.safeParse(env[key]);
    if (!parsed.success) {
      issues.push(...parsed.error.errors.map((issue) => ({ path: key, message: issue.message })));
    } else if (parsed.data !== undefined) {
      overrides[kind] = parsed.data;
    }
  }

  return issues.length > 0 ? err(issues) : ok(overrides);
}

function buildConfig(
  env: ParsedEnv,
  cooldownOverridesMs: Partial<Record<ErrorKind, number>>,
  host: HostPlatform,
): AppConfig {
  const appRoot = env.REPAIRWATCH_APP_ROOT ?? defaultAppRoot(host);
  const mode: RepairMode =
    env.REPAIRWATCH_REPAIR_MODE === 'filesystem' ? { kind: 'filesystem', appRoot } : { kind: 'dry_run', appRoot };

  return {
    source: {
      logFiles: env.REPAIRWATCH_LOG_FILES.length > 0 ? env.REPAIRWATCH_LOG_FILES : defaultLogFiles(host),
      initialPosition: env.REPAIRWATCH_INITIAL_POSITION,
      maxBytesPerPoll: env.REPAIRWATCH_MAX_BYTES_PER_POLL,
      maxEventAgeMs: env.REPAIRWATCH_MAX_EVENT_AGE_MS,
    },
    schedule: {
      pollIntervalMs: env.REPAIRWATCH_POLL_INTERVAL_MS,
      maxPollBackoffMs: env.REPAIRWATCH_MAX_POLL_BACKOFF_MS,
      cycleBudgetMs: env.REPAIRWATCH_CYCLE_BUDGET_MS,
      stopGraceMs: env.REPAIRWATCH_STOP_GRACE_MS,
    },
    remediation: {
      defaultCooldownMs: env.REPAIRWATCH_COOLDOWN_MS,
      cooldownOverridesMs,
      minCooldownMs: env.REPAIRWATCH_MIN_COOLDOWN_MS,
      retryCeiling: env.REPAIRWATCH_RETRY_CEILING,
      backoffFactor: env.REPAIRWATCH_BACKOFF_FACTOR,
      maxBackoffMs: env.REPAIRWATCH_MAX_BACKOFF_MS,
      repairTimeoutMs: env.REPAIRWATCH_REPAIR_TIMEOUT_MS,
      mode,
    },
    logging: {
      candidates: defaultLogCandidates(host, env.REPAIRWATCH_LOG_DIRS),
      level: env.REPAIRWATCH_LOG_LEVEL,
      mirrorToStderr: env.REPAIRWATCH_LOG_STDERR === '1',
      flushIntervalMs: env.REPAIRWATCH_FLUSH_INTERVAL_MS,
      reprobeIntervalMs: env.REPAIRWATCH_REPROBE_INTERVAL_MS,
      maxFileBytes: env.REPAIRWATCH_LOG_MAX_BYTES,
      maxFiles: env.REPAIRWATCH_LOG_MAX_FILES,
    },
    metadataFile: env.REPAIRWATCH_METADATA_FILE ?? null,
  };
}

function crossFieldIssues(config: AppConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (config.schedule.maxPollBackoffMs < config.schedule.pollIntervalMs) {
    issues.push({
      path: 'REPAIRWATCH_MAX_POLL_BACKOFF_MS',
      message: 'must be >= REPAIRWATCH_POLL_INTERVAL_MS',
    });
  }
  if (config.remediation.repairTimeoutMs > config.schedule.cycleBudgetMs) {
    issues.push({
      path: 'REPAIRWATCH_REPAIR_TIMEOUT_MS',
      message: 'must be <= REPAIRWATCH_CYCLE_BUDGET_MS so one repair fits in a cycle',
    });
  }
  return issues;
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

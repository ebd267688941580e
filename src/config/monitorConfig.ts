/**
 * Monitor configuration.
 *
 * Read from environment variables, optionally seeded from a `.env` file,
 * and validated as a whole: every invalid or missing variable is reported
 * in one {@link ConfigError}.
 *
 * @module config/monitorConfig
 */

import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../logging/logger.js';
import type { SmtpConfig } from '../notifications/emailTransport.js';
import type { QrsTaskSourceConfig } from '../sources/qrsTaskSource.js';
import type { TimeBasis } from '../time/wallClock.js';
import { DEFAULT_DB_CONFIG, type DbConfig } from '../utils/db.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type HistoryConfig = { mode: 'csv'; path: string } | { mode: 'postgres'; db: DbConfig };

export interface MonitorConfig {
  taskSource: QrsTaskSourceConfig;
  /** Hours before a still-failing occurrence is reported again; 0 reports every run. */
  reminderHours: number;
  timeBasis: TimeBasis;
  dryRun: boolean;
  history: HistoryConfig;
  email: {
    from: string;
    /** Null on a dry run without an SMTP host. */
    smtp: SmtpConfig | null;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
}

export class ConfigError extends Error {
  public readonly code = 'CONFIG_ERROR';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

// ─── Schema ──────────────────────────────────────────────────────────────────

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function booleanFlag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
      return z.NEVER;
    });
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

const dbEnvShape = {
  DB_HOST: z.string().trim().min(1).default(DEFAULT_DB_CONFIG.host),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_DB_CONFIG.port),
  DB_NAME: z.string().trim().min(1).default(DEFAULT_DB_CONFIG.database),
  DB_USER: z.string().trim().min(1).default(DEFAULT_DB_CONFIG.user),
  DB_PASSWORD: z.string().default(DEFAULT_DB_CONFIG.password),
  DB_POOL_MAX: z.coerce.number().int().positive().default(DEFAULT_DB_CONFIG.max),
  DB_IDLE_TIMEOUT: z.coerce.number().int().min(0).default(DEFAULT_DB_CONFIG.idleTimeoutMillis),
  DB_CONNECT_TIMEOUT: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_DB_CONFIG.connectionTimeoutMillis),
  DB_SSL: booleanFlag(DEFAULT_DB_CONFIG.ssl),
};

const dbEnvSchema = z.object(dbEnvShape);

type DbEnv = z.infer<typeof dbEnvSchema>;

function toDbConfig(e: DbEnv): DbConfig {
  return {
    host: e.DB_HOST,
    port: e.DB_PORT,
    database: e.DB_NAME,
    user: e.DB_USER,
    password: e.DB_PASSWORD,
    max: e.DB_POOL_MAX,
    idleTimeoutMillis: e.DB_IDLE_TIMEOUT,
    connectionTimeoutMillis: e.DB_CONNECT_TIMEOUT,
    ssl: e.DB_SSL,
  };
}

const envSchema = z
  .object({
    ...dbEnvShape,

    QRS_SERVER: z.string().trim().min(1),
    QRS_AUTH_HEADER_NAME: z.string().trim().optional(),
    QRS_AUTH_HEADER_VALUE: z.string().optional(),
    QRS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    QRS_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    QRS_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
    QRS_WARM_UP: booleanFlag(true),

    MONITOR_REMINDER_HOURS: z.coerce.number().finite().min(0).default(24),
    MONITOR_TIME_BASIS: z.enum(['local', 'utc']).default('local'),
    MONITOR_CUSTOM_PROPERTY: z.string().trim().min(1).default('CS_Tasks'),
    MONITOR_LOG_ARCHIVE_PATH: z.string().trim().default(''),
    MONITOR_DRY_RUN: booleanFlag(false),

    HISTORY_MODE: z.enum(['csv', 'postgres']).default('csv'),
    HISTORY_PATH: z.string().trim().min(1).default('task_failures.csv'),

    SMTP_HOST: z.string().trim().optional(),
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    SMTP_SECURE: booleanFlag(false),
    SMTP_USER: z.string().trim().optional(),
    SMTP_PASSWORD: z.string().optional(),
    EMAIL_FROM: z.string().trim().optional(),
    EMAIL_DEFAULT_RECIPIENT: z.string().trim().email(),

    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(logLevelSchema)
      .default('info'),
    LOG_FILE: z.string().trim().optional(),
  })
  .superRefine((env, ctx) => {
    if (!env.MONITOR_DRY_RUN) {
      for (const key of ['SMTP_HOST', 'EMAIL_FROM'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'Required unless MONITOR_DRY_RUN is set',
          });
        }
      }
    }
    if (Boolean(env.QRS_AUTH_HEADER_NAME) !== Boolean(env.QRS_AUTH_HEADER_VALUE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['QRS_AUTH_HEADER_NAME'],
        message: 'QRS_AUTH_HEADER_NAME and QRS_AUTH_HEADER_VALUE must be set together',
      });
    }
  });

// ─── Loading ─────────────────────────────────────────────────────────────────

/** Unset and blank variables are treated alike. */
function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`),
  );
}

function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value;
  }
  return result;
}

/**
 * Seed `process.env` from a `.env` file. Variables already set win;
 * a missing file is not an error.
 */
export function loadDotEnv(envPath: string = path.resolve(process.cwd(), '.env')): void {
  dotenv.config({ path: envPath });
}

export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) throw toConfigError(parsed.error);
  const e = parsed.data;

  const authHeader =
    e.QRS_AUTH_HEADER_NAME && e.QRS_AUTH_HEADER_VALUE
      ? { name: e.QRS_AUTH_HEADER_NAME, value: e.QRS_AUTH_HEADER_VALUE }
      : undefined;

  const history: HistoryConfig =
    e.HISTORY_MODE === 'postgres'
      ? { mode: 'postgres', db: toDbConfig(e) }
      : { mode: 'csv', path: e.HISTORY_PATH };

  const smtp: SmtpConfig | null = e.SMTP_HOST
    ? {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE,
        user: e.SMTP_USER,
        password: e.SMTP_PASSWORD,
      }
    : null;

  return {
    taskSource: {
      server: e.QRS_SERVER,
      authHeader,
      timeoutMs: e.QRS_TIMEOUT_MS,
      maxRetries: e.QRS_MAX_RETRIES,
      retryDelayMs: e.QRS_RETRY_DELAY_MS,
      warmUp: e.QRS_WARM_UP,
      customPropertyName: e.MONITOR_CUSTOM_PROPERTY,
      defaultRecipient: e.EMAIL_DEFAULT_RECIPIENT,
      logArchivePath: e.MONITOR_LOG_ARCHIVE_PATH,
      timeBasis: e.MONITOR_TIME_BASIS,
    },
    reminderHours: e.MONITOR_REMINDER_HOURS,
    timeBasis: e.MONITOR_TIME_BASIS,
    dryRun: e.MONITOR_DRY_RUN,
    history,
    email: { from: e.EMAIL_FROM ?? '', smtp },
    logging: { level: e.LOG_LEVEL, file: e.LOG_FILE },
  };
}

/** The `DB_*` settings alone, for tools that only talk to the database. */
export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  const parsed = dbEnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) throw toConfigError(parsed.error);
  return toDbConfig(parsed.data);
}

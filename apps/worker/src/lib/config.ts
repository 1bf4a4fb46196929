import { z } from 'zod';
import { ConfigError } from './errors';
import type { RetryPolicy } from './retry';

// "project.dataset" or "project.dataset.table" are accepted and reduced to the last segment
const lastSegment = (value: string): string => value.split('.').pop() ?? value;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

// ============ ENVIRONMENT SCHEMA ============
const envSchema = z.object({
  PROJECT_ID: z.string().min(1),
  DATASET_ID: z.string().min(1).transform(lastSegment),
  MANIFEST_TABLE_ID: z.string().min(1).default('manifest_audit_log').transform(lastSegment),
  ADMIN_USER_EMAIL: z.string().email(),
  SERVICE_ACCOUNT_EMAIL: z.string().email(),

  ALLOWED_DOMAINS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((domain) => domain.trim().toLowerCase())
        .filter(Boolean)
    ),
  EXCLUDE_SUSPENDED_USERS: booleanFlag.default('true'),

  MAX_WORKERS: positiveInt.max(64).default(8),
  BQ_BATCH_SIZE: positiveInt.max(10_000).default(500),
  BQ_FLUSH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30_000),
  BQ_MAX_ATTEMPTS: positiveInt.max(10).default(5),
  EXTRACT_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  AUTH_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  RETRY_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(10_000),
  CALL_TIMEOUT_MS: positiveInt.default(60_000),
  // Stays below the one hour request timeout of the deployment
  RUN_DEADLINE_MS: positiveInt.default(55 * 60_000),

  PORT: positiveInt.max(65_535).default(8080),
});

export interface AppConfig {
  projectId: string;
  datasetId: string;
  tableId: string;
  adminUserEmail: string;
  serviceAccountEmail: string;
  allowedDomains: string[];
  excludeSuspendedUsers: boolean;
  maxWorkers: number;
  batchSize: number;
  flushIntervalMs: number;
  callTimeoutMs: number;
  runDeadlineMs: number;
  port: number;
  retry: {
    auth: RetryPolicy;
    extraction: RetryPolicy;
    write: RetryPolicy;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so that defaults and required checks apply
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  if (vars.RETRY_MAX_DELAY_MS < vars.RETRY_MIN_DELAY_MS) {
    throw new ConfigError(['RETRY_MAX_DELAY_MS: must not be lower than RETRY_MIN_DELAY_MS']);
  }

  const backoff = { minDelayMs: vars.RETRY_MIN_DELAY_MS, maxDelayMs: vars.RETRY_MAX_DELAY_MS };

  return {
    projectId: vars.PROJECT_ID,
    datasetId: vars.DATASET_ID,
    tableId: vars.MANIFEST_TABLE_ID,
    adminUserEmail: vars.ADMIN_USER_EMAIL,
    serviceAccountEmail: vars.SERVICE_ACCOUNT_EMAIL,
    allowedDomains: vars.ALLOWED_DOMAINS,
    excludeSuspendedUsers: vars.EXCLUDE_SUSPENDED_USERS,
    maxWorkers: vars.MAX_WORKERS,
    batchSize: vars.BQ_BATCH_SIZE,
    flushIntervalMs: vars.BQ_FLUSH_INTERVAL_MS,
    callTimeoutMs: vars.CALL_TIMEOUT_MS,
    runDeadlineMs: vars.RUN_DEADLINE_MS,
    port: vars.PORT,
    retry: {
      auth: { attempts: vars.AUTH_MAX_ATTEMPTS, ...backoff },
      extraction: { attempts: vars.EXTRACT_MAX_ATTEMPTS, ...backoff },
      write: { attempts: vars.BQ_MAX_ATTEMPTS, ...backoff },
    },
  };
}

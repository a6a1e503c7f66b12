import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === '' ? fallback : Number(val)))
    .pipe(z.number().int().min(min));

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val.trim() : undefined));

export const purgeEnvSchema = z.object({
  MAIL_TENANT_ID: optionalString,
  MAIL_CLIENT_ID: optionalString,
  MAIL_CLIENT_SECRET: optionalString,
  EDISCOVERY_CASE_ID: optionalString,
  GRAPH_BASE_URL: z.string().url().default('https://graph.microsoft.com/v1.0'),
  GRAPH_AUTHORITY_URL: z.string().url().default('https://login.microsoftonline.com'),
  GRAPH_REQUEST_TIMEOUT_MS: intFromEnv(30000, 1000),
  PURGE_BATCH_PAUSE_MS: intFromEnv(200, 0),
  PURGE_MAX_RETRIES: intFromEnv(3, 1),
  PURGE_BACKOFF_BASE_SECONDS: intFromEnv(2, 0),
  BULK_SEARCH_POLL_INTERVAL_MS: intFromEnv(30000, 0),
  AUDIT_LOG_DIR: z.string().default('./logs'),
});

export interface GraphCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface PurgeConfig {
  credentials?: GraphCredentials;
  ediscoveryCaseId?: string;
  graphBaseUrl: string;
  authorityUrl: string;
  requestTimeoutMs: number;
  batchPauseMs: number;
  // Total delete attempts per batch, including the first
  maxAttempts: number;
  backoffBaseSeconds: number;
  pollIntervalMs: number;
  auditLogDir: string;
}

export function loadPurgeConfig(env: NodeJS.ProcessEnv = process.env): PurgeConfig {
  const parsed = purgeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;
  const credentials =
    vars.MAIL_TENANT_ID && vars.MAIL_CLIENT_ID && vars.MAIL_CLIENT_SECRET
      ? { tenantId: vars.MAIL_TENANT_ID, clientId: vars.MAIL_CLIENT_ID, clientSecret: vars.MAIL_CLIENT_SECRET }
      : undefined;

  return {
    credentials,
    ediscoveryCaseId: vars.EDISCOVERY_CASE_ID,
    graphBaseUrl: vars.GRAPH_BASE_URL.replace(/\/+$/, ''),
    authorityUrl: vars.GRAPH_AUTHORITY_URL.replace(/\/+$/, ''),
    requestTimeoutMs: vars.GRAPH_REQUEST_TIMEOUT_MS,
    batchPauseMs: vars.PURGE_BATCH_PAUSE_MS,
    maxAttempts: vars.PURGE_MAX_RETRIES,
    backoffBaseSeconds: vars.PURGE_BACKOFF_BASE_SECONDS,
    pollIntervalMs: vars.BULK_SEARCH_POLL_INTERVAL_MS,
    auditLogDir: vars.AUDIT_LOG_DIR,
  };
}

/** Reads `.env` (if present) before validating the process environment. */
export function loadPurgeConfigFromProcess(): PurgeConfig {
  loadDotenv();
  return loadPurgeConfig(process.env);
}

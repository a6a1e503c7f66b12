/*
 * Operational logger: one JSON line per event on stdout/stderr,
 * filtered by LOG_LEVEL, with credentials masked before anything is written.
 * The audit trail of a purge run is separate (see adapters/audit-log.file.ts).
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type EmitLevel = Exclude<Level, 'silent'>;

export type LogContext = Record<string, unknown> | Error;

const SEVERITY: Record<Level, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: Number.POSITIVE_INFINITY,
};

function isLevel(value: string): value is Level {
  return value in SEVERITY;
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return SEVERITY[isLevel(configured) ? configured : 'info'];
}

// Compared lowercased with separators removed: clientSecret, client_secret and client-secret all match
const MASKED_KEYS = new Set(['authorization', 'password', 'token', 'accesstoken', 'refreshtoken', 'secret', 'clientsecret', 'apikey', 'xapikey']);

const BEARER = /^Bearer\s+/i;
const JWT_SHAPE = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

function isMaskedKey(key: string): boolean {
  return MASKED_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactValue(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (BEARER.test(value)) return 'Bearer [REDACTED]';
  if (JWT_SHAPE.test(value)) return '[REDACTED_JWT]';
  return value;
}

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (isPlainObject(value)) return redactObject(value);
  return redactValue(value);
}

export function redactObject(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).map(([key, value]) => [key, isMaskedKey(key) ? '[REDACTED]' : redact(value)]));
}

function emit(level: EmitLevel, msg: string, ctx?: LogContext): void {
  if (SEVERITY[level] < threshold()) return;
  const fields = ctx instanceof Error ? { error: ctx.message, errorName: ctx.name } : ctx;
  const line = JSON.stringify({ level, msg, timestamp: new Date().toISOString(), ...(fields ? redactObject(fields) : {}) });
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (msg: string, ctx?: LogContext) => emit('debug', msg, ctx),
  info: (msg: string, ctx?: LogContext) => emit('info', msg, ctx),
  warn: (msg: string, ctx?: LogContext) => emit('warn', msg, ctx),
  error: (msg: string, ctx?: LogContext) => emit('error', msg, ctx),
};

export type Logger = typeof logger;
export type { Level };

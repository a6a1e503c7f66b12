import { z } from 'zod';
import {
  AuthError,
  QuotaOrPermissionError,
  RemoteApiError,
  ThrottleError,
  TransientNetworkError,
} from '../../utils/errors';

const graphErrorBodySchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});

const QUOTA_PATTERN = /quota/i;

export function parseRetryAfterMs(headerValue: unknown): number | undefined {
  if (typeof headerValue !== 'string') return undefined;
  const trimmed = headerValue.trim();
  if (!trimmed) return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.max(0, Math.round(Number(trimmed) * 1000));
  }
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - Date.now());
  }
  return undefined;
}

export function readGraphError(body: unknown): { code?: string; message?: string } {
  const parsed = graphErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error : {};
}

export function isThrottleStatus(status: number): boolean {
  return status === 429 || status === 503;
}

export function isPermissionOrQuota(status: number, body: unknown): boolean {
  const { code, message } = readGraphError(body);
  return status === 403 || (code !== undefined && QUOTA_PATTERN.test(code)) || (message !== undefined && QUOTA_PATTERN.test(message));
}

/** Maps a non-2xx Graph response onto the error taxonomy. */
export function mapGraphError(
  status: number,
  body: unknown,
  retryAfterHeader: unknown,
  endpoint: string
): RemoteApiError | AuthError {
  const { code, message } = readGraphError(body);
  const detail = `${endpoint} returned ${status}${code ? ` ${code}` : ''}${message ? `: ${message}` : ''}`;

  if (status === 401) return new AuthError(detail);
  if (isThrottleStatus(status)) return new ThrottleError(detail, status, parseRetryAfterMs(retryAfterHeader));
  if (isPermissionOrQuota(status, body)) {
    return new QuotaOrPermissionError(detail, status, code);
  }
  if (status >= 500) return new TransientNetworkError(detail, status);
  return new RemoteApiError(detail, status, code);
}

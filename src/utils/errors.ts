export class AppError extends Error {
  public exitCode: number;
  public details?: string[];
  public isOperational: boolean;

  constructor(message: string, exitCode: number, details?: string[]) {
    super(message);
    this.exitCode = exitCode;
    this.details = details;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 2, details);
    this.name = 'ValidationError';
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(message: string = 'Invalid date range') {
    super(message, [
      'Supply both --start and --end as ISO dates (YYYY-MM-DD or a full timestamp)',
      '--start must not be after --end and the window may span at most 365 days',
    ]);
    this.name = 'InvalidRangeError';
  }
}

export class ConflictingFilterError extends ValidationError {
  constructor(message: string = 'A date range cannot be combined with a cutoff filter') {
    super(message, [
      'Use either --older-than-days / --before, or --start with --end, not both',
    ]);
    this.name = 'ConflictingFilterError';
  }
}

export class AuthError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 1);
    this.name = 'AuthError';
  }
}

export class RemoteApiError extends AppError {
  public status?: number;
  public code?: string;

  constructor(message: string, status?: number, code?: string) {
    super(message, 1);
    this.name = 'RemoteApiError';
    this.status = status;
    this.code = code;
  }
}

export class ThrottleError extends RemoteApiError {
  public retryAfterMs?: number;

  constructor(message: string = 'Request throttled', status: number = 429, retryAfterMs?: number) {
    super(message, status);
    this.name = 'ThrottleError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class QuotaOrPermissionError extends RemoteApiError {
  constructor(message: string = 'Access denied or quota exceeded', status?: number, code?: string) {
    super(message, status, code);
    this.name = 'QuotaOrPermissionError';
  }
}

export class TransientNetworkError extends RemoteApiError {
  constructor(message: string = 'Network request failed', status?: number) {
    super(message, status);
    this.name = 'TransientNetworkError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

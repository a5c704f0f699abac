/**
 * Error taxonomy shared by every hopline component.
 */

// ============================================================================
// Codes
// ============================================================================

export const ErrorCode = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  INVALID_SHORT_CODE: "INVALID_SHORT_CODE",
  CONFLICT: "CONFLICT",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  EXPIRED: "EXPIRED",
  INACTIVE: "INACTIVE",
  RATE_LIMIT_EXCEEDED: "RATE_LIMIT_EXCEEDED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  UNAVAILABLE: "UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  INVALID_SHORT_CODE: 400,
  CONFLICT: 409,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  EXPIRED: 410,
  INACTIVE: 410,
  RATE_LIMIT_EXCEEDED: 429,
  INTERNAL_ERROR: 500,
  UNAVAILABLE: 503,
};

// ============================================================================
// Error Classes
// ============================================================================

export interface AppErrorOptions {
  details?: Record<string, unknown>;
  retryable?: boolean;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  /** Whether repeating the same call may succeed */
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.code = code;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
  }

  get status(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  toJSON(): { code: ErrorCode; message: string; details?: Record<string, unknown> } {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

/**
 * Raised by withDeadline when the wrapped operation does not settle in time.
 */
export class DeadlineExceededError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function hasErrorCode(err: unknown, code: ErrorCode): boolean {
  return err instanceof AppError && err.code === code;
}

export const validationError = (message: string, details?: Record<string, unknown>): AppError =>
  new AppError(ErrorCode.VALIDATION_ERROR, message, { details });

export const invalidShortCodeError = (code: string): AppError =>
  new AppError(ErrorCode.INVALID_SHORT_CODE, "Invalid short code format", { details: { code } });

export const conflictError = (message: string, details?: Record<string, unknown>): AppError =>
  new AppError(ErrorCode.CONFLICT, message, { details });

export const forbiddenError = (message = "You do not own this URL"): AppError =>
  new AppError(ErrorCode.FORBIDDEN, message);

export const notFoundError = (message = "URL not found"): AppError =>
  new AppError(ErrorCode.NOT_FOUND, message);

export const expiredError = (): AppError => new AppError(ErrorCode.EXPIRED, "URL has expired");

export const inactiveError = (): AppError => new AppError(ErrorCode.INACTIVE, "URL is inactive");

export const rateLimitError = (details?: Record<string, unknown>): AppError =>
  new AppError(ErrorCode.RATE_LIMIT_EXCEEDED, "Rate limit exceeded", { details });

export const internalError = (message: string, cause?: unknown): AppError =>
  new AppError(ErrorCode.INTERNAL_ERROR, message, { cause });

export const unavailableError = (message: string, options: { retryable: boolean; cause?: unknown }): AppError =>
  new AppError(ErrorCode.UNAVAILABLE, message, options);

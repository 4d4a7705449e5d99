/**
 * Backend Error Classes
 * Typed error classes for consistent error handling across the pipeline
 */

// ============================================
// Base Application Error
// ============================================

/**
 * Base error class for all application errors
 * Provides consistent error structure and metadata
 */
export class AppError extends Error {
  public code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: this.message,
      code: this.code,
    };
  }
}

// ============================================
// Validation Errors
// ============================================

export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.field ? { field: this.field } : {}),
    };
  }
}

export class InvalidInputError extends ValidationError {
  constructor(field: string, message?: string) {
    super(message || `Invalid value for ${field}`, field);
    this.code = 'INVALID_INPUT';
  }
}

/**
 * Honeypot, duplicate and content-scan denials
 * The message is always generic; the matched pattern stays in the logs only
 */
export class SubmissionRejectedError extends AppError {
  constructor(message: string, code: string) {
    super(message, code, 400);
  }
}

// ============================================
// Policy Errors
// ============================================

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class BlockedError extends AppError {
  constructor(message: string = 'Access denied') {
    super(message, 'BLOCKED', 403);
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Too many requests', retryAfter?: number) {
    super(message, 'RATE_LIMIT_EXCEEDED', 429);
    this.retryAfter = retryAfter;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.retryAfter !== undefined ? { retryAfter: this.retryAfter } : {}),
    };
  }
}

export class RegionBlockedError extends AppError {
  public readonly region: string;

  constructor(region: string) {
    super('This service is not available in your region', 'REGION_BLOCKED', 451);
    this.region = region;
  }
}

// ============================================
// Archive Errors
// ============================================

export class ArchiveRejectedError extends AppError {
  constructor(message: string, code: string = 'ARCHIVE_REJECTED') {
    super(message, code, 400);
  }
}

// ============================================
// Resource Errors
// ============================================

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Resource already exists') {
    super(message, 'CONFLICT', 409);
  }
}

export class InvalidTransitionError extends ConflictError {
  public readonly from: string;
  public readonly action: string;

  constructor(from: string, action: string) {
    super(`Cannot ${action} a submission that is ${from}`);
    this.code = 'INVALID_TRANSITION';
    this.from = from;
    this.action = action;
  }
}

// ============================================
// Infrastructure Errors
// ============================================

export class StorageError extends AppError {
  constructor(message: string = 'Storage operation failed') {
    super(message, 'STORAGE_ERROR', 500, false);
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string = 'Operation') {
    super(`${operation} timed out`, 'TIMEOUT', 504);
  }
}

// ============================================
// Utility Functions
// ============================================

/**
 * Check if error is an operational AppError
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Check if error is a specific AppError type
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Get error message safely from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors raised in another realm fail instanceof but still carry a message
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(getErrorMessage(error), 'INTERNAL_ERROR', 500, false);
}

/**
 * Create error response object
 * Non-operational errors never expose their internal message
 */
export function createErrorResponse(error: unknown, requestId?: string): Record<string, unknown> {
  const appError = toAppError(error);
  const body = appError.isOperational
    ? appError.toJSON()
    : { success: false, error: 'Internal server error', code: appError.code };
  return {
    ...body,
    ...(requestId ? { requestId } : {}),
  };
}

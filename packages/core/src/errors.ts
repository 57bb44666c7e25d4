/**
 * Custom error classes for the application
 * These errors provide safe, non-PHI error messages for callers
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for a response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Caller is not allowed to access a record owned by someone else
 */
export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * External service error (OpenAI, etc.)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'EXTERNAL_SERVICE_ERROR', 502);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * JSON store load/save failure
 */
export class StoreOperationError extends AppError {
  public readonly store: string;
  public readonly operation: 'load' | 'save';
  public readonly originalError: Error | undefined;

  constructor(store: string, operation: 'load' | 'save', message: string, originalError?: Error) {
    super(`Store ${store} ${operation} failed: ${message}`, 'STORE_OPERATION_ERROR', 500);
    this.name = 'StoreOperationError';
    this.store = store;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

/**
 * Normalize a caught value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

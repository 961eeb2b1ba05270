/**
 * Custom error classes for the control-plane client
 *
 * Every failure reaching a caller is one of these. Server-provided `msg` and
 * `detail` strings are kept verbatim, since the API has no structured error
 * codes for most failure classes.
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
   * Get safe error details (no credentials, no raw payload)
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
 * Invalid client options or environment
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Failure below the application protocol: connection refused, timeout,
 * or a response body that could not be decoded.
 *
 * A timeout says nothing about whether the remote mutation applied.
 */
export class TransportError extends AppError {
  public override readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', 502);
    this.name = 'TransportError';
    this.cause = cause;
  }
}

/**
 * Status payload returned by the API alongside failures
 */
export interface ApiErrorPayload {
  msg?: string | undefined;
  detail?: string | undefined;
  status?: string | undefined;
  [key: string]: unknown;
}

export interface ApiErrorOptions {
  serverMessage: string;
  serverDetail?: string | undefined;
  httpStatus?: number | undefined;
  payload?: ApiErrorPayload | undefined;
}

/**
 * Format the server's message the way it is shown to callers
 */
export function formatServerMessage(serverMessage: string, serverDetail?: string): string {
  return serverDetail ? `${serverMessage} (${serverDetail})` : serverMessage;
}

/**
 * Any response whose payload status is not "ok"
 */
export class ApiError extends AppError {
  public readonly serverMessage: string;
  public readonly serverDetail: string | undefined;
  public readonly httpStatus: number | undefined;
  public readonly payload: ApiErrorPayload | undefined;

  constructor(options: ApiErrorOptions, code = 'API_ERROR', statusCode = 502) {
    super(formatServerMessage(options.serverMessage, options.serverDetail), code, statusCode);
    this.name = 'ApiError';
    this.serverMessage = options.serverMessage;
    this.serverDetail = options.serverDetail;
    this.httpStatus = options.httpStatus;
    this.payload = options.payload;
  }
}

/**
 * Login failed or the session/key was rejected
 */
export class AuthenticationError extends ApiError {
  constructor(options: ApiErrorOptions = { serverMessage: 'Authentication required' }) {
    super(options, 'AUTHENTICATION_ERROR', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Referenced service, version or object does not exist
 */
export class NotFoundError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Create collided with an existing name, or the write targeted a locked version
 */
export class ConflictError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options, 'CONFLICT', 409);
    this.name = 'ConflictError';
  }
}

/**
 * Server-side configuration validation failed
 */
export class ValidationError extends ApiError {
  public readonly errors: string[];

  constructor(options: ApiErrorOptions, errors: string[] = []) {
    super(options, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * The server refused to activate a version
 */
export class ActivationError extends ValidationError {
  public readonly serviceId: string;
  public readonly versionNumber: number;

  constructor(serviceId: string, versionNumber: number, options: ApiErrorOptions) {
    super(options);
    this.name = 'ActivationError';
    this.serviceId = serviceId;
    this.versionNumber = versionNumber;
  }
}

/**
 * A delete answered with a status other than "ok"
 */
export class DeletionError extends ApiError {
  constructor(options: ApiErrorOptions) {
    super(options, 'DELETION_ERROR', 502);
    this.name = 'DeletionError';
  }
}

/**
 * Rate limit error. Surfaced, never retried by the client.
 */
export class RateLimitError extends ApiError {
  public readonly retryAfter: number;

  constructor(retryAfter = 60, options: ApiErrorOptions = { serverMessage: 'Rate limit exceeded' }) {
    super(options, 'RATE_LIMIT_ERROR', 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
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

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

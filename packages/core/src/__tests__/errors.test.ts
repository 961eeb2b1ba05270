import { describe, it, expect } from 'vitest';
import {
  AppError,
  ApiError,
  ActivationError,
  AuthenticationError,
  ConfigurationError,
  ConflictError,
  DeletionError,
  NotFoundError,
  RateLimitError,
  TransportError,
  ValidationError,
  formatServerMessage,
  isOperationalError,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE', 400);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
  });

  it('should default to 500 status code', () => {
    const error = new AppError('Test', 'CODE');
    expect(error.statusCode).toBe(500);
  });

  it('should produce safe error details', () => {
    const safe = new AppError('Something failed', 'CODE', 400).toSafeError();

    expect(safe).toEqual({ code: 'CODE', message: 'Something failed', statusCode: 400 });
  });
});

describe('formatServerMessage', () => {
  it('should append the detail in parentheses', () => {
    expect(formatServerMessage('Record not found', "Couldn't find backend 'b1'")).toBe(
      "Record not found (Couldn't find backend 'b1')"
    );
  });

  it('should return the message alone without a detail', () => {
    expect(formatServerMessage('Version locked')).toBe('Version locked');
  });
});

describe('ApiError', () => {
  it('should keep the server message and detail verbatim', () => {
    const error = new ApiError({
      serverMessage: 'Bad request',
      serverDetail: 'port must be numeric',
      httpStatus: 400,
      payload: { msg: 'Bad request', detail: 'port must be numeric', status: 'error' },
    });

    expect(error.message).toBe('Bad request (port must be numeric)');
    expect(error.serverMessage).toBe('Bad request');
    expect(error.serverDetail).toBe('port must be numeric');
    expect(error.httpStatus).toBe(400);
    expect(error.payload?.status).toBe('error');
    expect(error.code).toBe('API_ERROR');
    expect(error.name).toBe('ApiError');
  });
});

describe('AuthenticationError', () => {
  it('should have 401 status code and a default message', () => {
    const error = new AuthenticationError();

    expect(error.statusCode).toBe(401);
    expect(error.code).toBe('AUTHENTICATION_ERROR');
    expect(error.message).toBe('Authentication required');
    expect(error).toBeInstanceOf(ApiError);
  });
});

describe('typed API errors', () => {
  it.each([
    [new NotFoundError({ serverMessage: 'Record not found' }), 'NOT_FOUND', 404],
    [new ConflictError({ serverMessage: 'Duplicate record' }), 'CONFLICT', 409],
    [new ValidationError({ serverMessage: 'Version has errors' }), 'VALIDATION_ERROR', 400],
    [new DeletionError({ serverMessage: 'Delete failed' }), 'DELETION_ERROR', 502],
  ])('%s should carry code %s and status %i', (error, code, statusCode) => {
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(statusCode);
    expect(error).toBeInstanceOf(ApiError);
  });

  it('should store validation messages', () => {
    const error = new ValidationError({ serverMessage: 'Version has errors' }, [
      "Condition 'is-api' does not exist",
    ]);
    expect(error.errors).toEqual(["Condition 'is-api' does not exist"]);
  });
});

describe('ActivationError', () => {
  it('should be a ValidationError naming the version', () => {
    const error = new ActivationError('svc-1', 3, {
      serverMessage: 'Version has errors',
      serverDetail: 'syntax error in main.vcl',
      httpStatus: 400,
    });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe('ActivationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.serviceId).toBe('svc-1');
    expect(error.versionNumber).toBe(3);
    expect(error.message).toBe('Version has errors (syntax error in main.vcl)');
  });
});

describe('RateLimitError', () => {
  it('should default to a 60 second retry window', () => {
    const error = new RateLimitError();

    expect(error.retryAfter).toBe(60);
    expect(error.statusCode).toBe(429);
    expect(error.message).toBe('Rate limit exceeded');
  });
});

describe('TransportError', () => {
  it('should keep the underlying cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new TransportError('Request to /service failed: ECONNREFUSED', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('TRANSPORT_ERROR');
    expect(error).not.toBeInstanceOf(ApiError);
  });
});

describe('ConfigurationError', () => {
  it('should list the offending issues', () => {
    const error = new ConfigurationError('Invalid environment', ['FASTLY_API_KEY: Required']);

    expect(error.issues).toEqual(['FASTLY_API_KEY: Required']);
    expect(error.code).toBe('CONFIGURATION_ERROR');
  });
});

describe('isOperationalError', () => {
  it('should return true for AppError subclasses', () => {
    expect(isOperationalError(new NotFoundError({ serverMessage: 'x' }))).toBe(true);
  });

  it('should return false for plain errors and non-errors', () => {
    expect(isOperationalError(new Error('boom'))).toBe(false);
    expect(isOperationalError('boom')).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should expose operational error details', () => {
    expect(toSafeErrorResponse(new ConflictError({ serverMessage: 'Duplicate record' }))).toEqual({
      code: 'CONFLICT',
      message: 'Duplicate record',
      statusCode: 409,
    });
  });

  it('should hide unexpected errors', () => {
    expect(toSafeErrorResponse(new TypeError('undefined is not a function'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});

/**
 * Unit Tests for the error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  AuthErrors,
  AuthServiceError,
  ConfigError,
  createErrorResponse,
  isAuthServiceError,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('AuthErrors', () => {
  it('should map each code to its HTTP status', () => {
    expect(AuthErrors.INVALID_CREDENTIALS().statusCode).toBe(401);
    expect(AuthErrors.UNAUTHENTICATED().statusCode).toBe(401);
    expect(AuthErrors.STORE_UNAVAILABLE().statusCode).toBe(503);
    expect(AuthErrors.REQUEST_TIMEOUT(30).statusCode).toBe(408);
    expect(AuthErrors.INVALID_REQUEST().statusCode).toBe(400);
    expect(AuthErrors.EMAIL_TAKEN().statusCode).toBe(409);
    expect(AuthErrors.PHONE_TAKEN().statusCode).toBe(409);
    expect(AuthErrors.PAYLOAD_TOO_LARGE().statusCode).toBe(413);
  });

  it('should keep a fixed client message regardless of the internal reason', () => {
    const expired = AuthErrors.UNAUTHENTICATED({ reason: 'expired' });
    const revoked = AuthErrors.UNAUTHENTICATED({ reason: 'revoked' });

    expect(expired.message).toBe('Unauthorized: Authentication required');
    expect(revoked.message).toBe(expired.message);
    expect(expired.details).toEqual({ reason: 'expired' });
  });

  it('should include the deadline in the timeout message', () => {
    expect(AuthErrors.REQUEST_TIMEOUT(30).message).toBe(
      'Request exceeded the maximum allowed time of 30 seconds'
    );
  });

  it('should be recognised by isAuthServiceError', () => {
    expect(isAuthServiceError(AuthErrors.EMAIL_TAKEN())).toBe(true);
    expect(isAuthServiceError(new Error('plain'))).toBe(false);
  });
});

describe('createErrorResponse', () => {
  it('should never serialize details', () => {
    const error = AuthErrors.UNAUTHENTICATED({ reason: 'superseded', userId: '7' });

    expect(createErrorResponse(error)).toEqual({
      statusCode: 401,
      body: {
        error: 'UNAUTHENTICATED',
        error_description: 'Unauthorized: Authentication required',
      },
    });
  });
});

describe('ConfigError', () => {
  it('should name the field in its message', () => {
    const error = new ConfigError('auth.signingSecret', 'Required');

    expect(error.message).toBe('Invalid configuration: auth.signingSecret: Required');
    expect(error.field).toBe('auth.signingSecret');
    expect(error.issues).toEqual([{ field: 'auth.signingSecret', message: 'Required' }]);
    expect(error.name).toBe('ConfigError');
  });
});

describe('sanitizeError', () => {
  it('should include details for service errors', () => {
    const error = new AuthServiceError('STORE_UNAVAILABLE', 'down', 503, { operation: 'findById' });

    expect(sanitizeError(error)).toEqual({
      type: 'AuthServiceError',
      code: 'STORE_UNAVAILABLE',
      message: 'down',
      statusCode: 503,
      details: { operation: 'findById' },
    });
  });

  it('should list config issues', () => {
    const error = new ConfigError('server.port', 'Required');

    expect(sanitizeError(error)).toEqual({
      type: 'ConfigError',
      field: 'server.port',
      issues: [{ field: 'server.port', message: 'Required' }],
    });
  });

  it('should handle non-Error values', () => {
    expect(sanitizeError('boom')).toEqual({
      type: 'Unknown',
      message: 'An unknown error occurred',
    });
  });
});

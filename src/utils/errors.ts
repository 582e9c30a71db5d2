/**
 * Error taxonomy for the authentication service.
 *
 * Every request-scoped failure is an AuthServiceError carrying a stable code and
 * an HTTP status. `details` hold the internal reason (expired, forged, revoked,
 * superseded, ...) for logs and audit only; createErrorResponse() never emits them.
 *
 * ConfigError is the one fatal category: it aborts startup.
 */

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'UNAUTHENTICATED'
  | 'STORE_UNAVAILABLE'
  | 'REQUEST_TIMEOUT'
  | 'INVALID_REQUEST'
  | 'EMAIL_TAKEN'
  | 'PHONE_TAKEN'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export class AuthServiceError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthServiceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthServiceError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createAuthError(
  code: AuthErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): AuthServiceError {
  return new AuthServiceError(code, message, statusCode, details);
}

// Client-facing messages are fixed per code; the reason lives in details.
export const AuthErrors = {
  INVALID_CREDENTIALS: (details?: Record<string, unknown>) =>
    createAuthError('INVALID_CREDENTIALS', 'Invalid email or password', 401, details),

  UNAUTHENTICATED: (details?: Record<string, unknown>) =>
    createAuthError('UNAUTHENTICATED', 'Unauthorized: Authentication required', 401, details),

  STORE_UNAVAILABLE: (details?: Record<string, unknown>) =>
    createAuthError('STORE_UNAVAILABLE', 'Credential store unavailable', 503, details),

  REQUEST_TIMEOUT: (timeoutSecs: number) =>
    createAuthError(
      'REQUEST_TIMEOUT',
      `Request exceeded the maximum allowed time of ${timeoutSecs} seconds`,
      408
    ),

  INVALID_REQUEST: (details?: Record<string, unknown>) =>
    createAuthError('INVALID_REQUEST', 'Invalid request body', 400, details),

  EMAIL_TAKEN: () => createAuthError('EMAIL_TAKEN', 'Email already exists', 409),

  PHONE_TAKEN: () => createAuthError('PHONE_TAKEN', 'Phone number already exists', 409),

  PAYLOAD_TOO_LARGE: (details?: Record<string, unknown>) =>
    createAuthError('PAYLOAD_TOO_LARGE', 'Request body too large', 413, details),
} as const;

export function isAuthServiceError(error: unknown): error is AuthServiceError {
  return error instanceof AuthServiceError;
}

/**
 * A single validation failure inside a ConfigError.
 */
export interface ConfigIssue {
  /** Dotted path of the offending field, e.g. "auth.signingSecret" */
  field: string;
  message: string;
}

/**
 * Fatal configuration failure. `field` names the first offending field.
 */
export class ConfigError extends Error {
  public readonly field: string;
  public readonly issues: ConfigIssue[];

  constructor(field: string, message: string, issues?: ConfigIssue[]) {
    super(`Invalid configuration: ${field}: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
    this.issues = issues ?? [{ field, message }];

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthServiceError) {
    return {
      type: 'AuthServiceError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
    };
  }

  if (error instanceof ConfigError) {
    return {
      type: 'ConfigError',
      field: error.field,
      issues: error.issues,
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper - details are never serialized
export function createErrorResponse(error: AuthServiceError): {
  statusCode: number;
  body: { error: AuthErrorCode; error_description: string };
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: error.code,
      error_description: error.message,
    },
  };
}

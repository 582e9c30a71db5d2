/**
 * HTTP Server for the authentication API
 *
 * Routes (under /api/v1/auth):
 * - POST /register  create a user (full name joined from first and last)
 * - POST /login     check password, issue pair, set cookies
 * - POST /refresh   rotate the refresh token (cookie or body)
 * - POST /logout    revoke the session, clear cookies
 * - GET  /me        guarded; returns the caller's identity
 *
 * plus GET /health at the root. Error bodies are always
 * `{ error, error_description }`; internal reasons never leave the process.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import { createServer, type Server } from 'http';
import { z } from 'zod';
import type { AuthContext } from '../core/context.js';
import type { TokenPair } from '../core/types.js';
import {
  AuthErrors,
  AuthServiceError,
  createAuthError,
  createErrorResponse,
  sanitizeError,
} from '../utils/errors.js';
import { asyncHandler, readCookie, extractAccessToken, requestTimeout, requireAuth } from './middleware.js';

export const API_PREFIX = '/api/v1/auth';

// ============================================================================
// Request Bodies
// ============================================================================

export const RegisterBodySchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  email: z.string().trim().email(),
  password: z.string().min(8).max(128),
  country: z.string().trim().min(1).max(100),
  phoneNumber: z
    .string()
    .trim()
    .regex(/^\+?\d{4,19}$/, 'must be 4 to 19 digits with an optional leading +'),
});

export const LoginBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const RefreshBodySchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw AuthErrors.INVALID_REQUEST({
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export function serializePair(pair: TokenPair) {
  return {
    accessToken: pair.accessToken,
    accessExpiresAt: pair.accessExpiresAt.toISOString(),
    refreshToken: pair.refreshToken,
    refreshExpiresAt: pair.refreshExpiresAt.toISOString(),
    issuedAt: pair.issuedAt.toISOString(),
  };
}

// ============================================================================
// Server
// ============================================================================

/**
 * Create the express application for an auth context.
 *
 * @example
 * ```typescript
 * const app = createAuthServer(context);
 * const server = await startHTTPServer(app, config.server.port, config.server.host);
 * ```
 */
export function createAuthServer(context: AuthContext): express.Application {
  const { authService, sessionPolicy, config } = context;
  const cookies = sessionPolicy.cookieNames();
  const app = express();

  app.use(requestTimeout(config.server.requestTimeoutSecs));
  app.use(express.json({ limit: '16kb' }));
  app.use(cookieParser());

  const setSessionCookies = (res: Response, pair: TokenPair) => {
    const access = sessionPolicy.accessCookie();
    const refresh = sessionPolicy.refreshCookie();
    res.cookie(access.name, pair.accessToken, access.options);
    res.cookie(refresh.name, pair.refreshToken, refresh.options);
  };

  const router = express.Router();

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const body = parseBody(RegisterBodySchema, req.body);
      const user = await authService.register(body);
      if (res.headersSent) {
        return;
      }
      res.status(201).json({ message: 'User registered successfully', user });
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const body = parseBody(LoginBodySchema, req.body);
      const { user, pair } = await authService.login(body.email, body.password);
      if (res.headersSent) {
        return;
      }
      setSessionCookies(res, pair);
      res.json({ message: 'Login successful', user, tokens: serializePair(pair) });
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const body = parseBody(RefreshBodySchema, req.body);
      const token = readCookie(req, cookies.refresh) ?? body.refreshToken;
      if (!token) {
        throw AuthErrors.UNAUTHENTICATED({ reason: 'missing_token', kind: 'refresh' });
      }

      const { pair } = await authService.refresh(token);
      if (res.headersSent) {
        return;
      }
      setSessionCookies(res, pair);
      res.json({ message: 'Token refreshed', tokens: serializePair(pair) });
    })
  );

  router.post(
    '/logout',
    asyncHandler(async (req, res) => {
      const token = extractAccessToken(req, cookies.access);
      if (!token) {
        throw AuthErrors.UNAUTHENTICATED({ reason: 'missing_token', kind: 'access' });
      }

      await authService.logout(token);
      if (res.headersSent) {
        return;
      }
      const clearOptions = sessionPolicy.clearOptions();
      res.clearCookie(cookies.access, clearOptions);
      res.clearCookie(cookies.refresh, clearOptions);
      res.json({ message: 'Logout successful' });
    })
  );

  router.get('/me', requireAuth(authService, cookies.access), (req: Request, res: Response) => {
    res.json({ identity: req.identity });
  });

  app.use(API_PREFIX, router);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: config.app.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'NOT_FOUND', error_description: 'Route not found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toServiceError(err);

    if (error.statusCode >= 500) {
      console.error('[HTTP Server] Error:', { path: req.path, ...sanitizeError(err) });
    } else {
      console.warn('[HTTP Server] Request rejected:', {
        path: req.path,
        code: error.code,
        details: error.details,
      });
    }

    if (res.headersSent) {
      return;
    }
    const { statusCode, body } = createErrorResponse(error);
    res.status(statusCode).json(body);
  });

  return app;
}

/**
 * Body-parser failures arrive with `type: 'entity.parse.failed'` and friends.
 * An oversized body is 413; anything unrecognised becomes INTERNAL_ERROR.
 */
function toServiceError(err: unknown): AuthServiceError {
  if (err instanceof AuthServiceError) {
    return err;
  }
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    if (err.type === 'entity.too.large') {
      return AuthErrors.PAYLOAD_TOO_LARGE({ parser: err.type });
    }
    if (err.type.startsWith('entity.') || err.type === 'encoding.unsupported') {
      return AuthErrors.INVALID_REQUEST({ parser: err.type });
    }
  }
  return createAuthError('INTERNAL_ERROR', 'Internal server error', 500);
}

/**
 * Start listening.
 *
 * @returns The node HTTP server (close it on shutdown)
 */
export function startHTTPServer(
  app: express.Application,
  port: number,
  host: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, host, () => {
      console.log(`[HTTP Server] Listening on http://${host}:${port}`);
      console.log(`[HTTP Server] Auth API: http://${host}:${port}${API_PREFIX}`);
      resolve(server);
    });
  });
}

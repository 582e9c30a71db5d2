/**
 * HTTP middleware: request deadline, token extraction and the auth guard
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthenticationService } from '../core/authentication-service.js';
import { AuthErrors, createErrorResponse } from '../utils/errors.js';
import './types.js';

/**
 * Express 4 does not forward rejected promises from handlers.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Answer 408 once `timeoutSecs` elapse without a response.
 *
 * The handler keeps running; anything it tries to send afterwards is dropped
 * (handlers check `res.headersSent`).
 */
export function requestTimeout(timeoutSecs: number): RequestHandler {
  return (req, res, next) => {
    const timer = setTimeout(() => {
      if (res.headersSent) {
        return;
      }
      console.warn('[HTTP Server] Request timed out:', { method: req.method, path: req.path });
      const { statusCode, body } = createErrorResponse(AuthErrors.REQUEST_TIMEOUT(timeoutSecs));
      res.status(statusCode).json(body);
    }, timeoutSecs * 1000);

    const clear = () => clearTimeout(timer);
    res.on('finish', clear);
    res.on('close', clear);
    next();
  };
}

export function readCookie(req: Request, name: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null || !(name in cookies)) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, name);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Access token from `Authorization: Bearer <token>`, falling back to the
 * access cookie.
 */
export function extractAccessToken(req: Request, cookieName: string): string | undefined {
  const header = req.headers.authorization;
  if (header) {
    const match = /^Bearer\s+(\S+)$/i.exec(header);
    if (match) {
      return match[1];
    }
  }
  return readCookie(req, cookieName);
}

/**
 * Guard: reject with 401 unless the request carries the current access token
 * of a logged-in identity. Sets `req.identity`.
 */
export function requireAuth(
  authService: AuthenticationService,
  accessCookieName: string
): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const token = extractAccessToken(req, accessCookieName);
    if (!token) {
      throw AuthErrors.UNAUTHENTICATED({ reason: 'missing_token' });
    }
    req.identity = await authService.authenticate(token);
    next();
  });
}

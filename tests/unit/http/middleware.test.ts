/**
 * Unit Tests for HTTP middleware
 */

import { describe, it, expect } from 'vitest';
import express, { type NextFunction, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import request from 'supertest';
import {
  asyncHandler,
  extractAccessToken,
  readCookie,
  requestTimeout,
} from '../../../src/http/middleware.js';

function tokenEchoApp() {
  const app = express();
  app.use(cookieParser());
  app.get('/token', (req: Request, res: Response) => {
    res.json({ token: extractAccessToken(req, 'access_token') ?? null });
  });
  app.get('/cookie', (req: Request, res: Response) => {
    res.json({ value: readCookie(req, 'refresh_token') ?? null });
  });
  return app;
}

describe('extractAccessToken', () => {
  const app = tokenEchoApp();

  it('should read a Bearer token', async () => {
    const res = await request(app).get('/token').set('Authorization', 'Bearer abc.def.ghi');

    expect(res.body).toEqual({ token: 'abc.def.ghi' });
  });

  it('should accept the scheme case-insensitively', async () => {
    const res = await request(app).get('/token').set('Authorization', 'bearer abc.def.ghi');

    expect(res.body).toEqual({ token: 'abc.def.ghi' });
  });

  it('should fall back to the access cookie', async () => {
    const res = await request(app).get('/token').set('Cookie', 'access_token=from-cookie');

    expect(res.body).toEqual({ token: 'from-cookie' });
  });

  it('should prefer the header over the cookie', async () => {
    const res = await request(app)
      .get('/token')
      .set('Authorization', 'Bearer from-header')
      .set('Cookie', 'access_token=from-cookie');

    expect(res.body).toEqual({ token: 'from-header' });
  });

  it('should ignore other schemes', async () => {
    const res = await request(app).get('/token').set('Authorization', 'Basic dXNlcjpwYXNz');

    expect(res.body).toEqual({ token: null });
  });
});

describe('readCookie', () => {
  const app = tokenEchoApp();

  it('should return a present cookie', async () => {
    const res = await request(app).get('/cookie').set('Cookie', 'refresh_token=r1');

    expect(res.body).toEqual({ value: 'r1' });
  });

  it('should treat an empty cookie as absent', async () => {
    const res = await request(app).get('/cookie').set('Cookie', 'refresh_token=');

    expect(res.body).toEqual({ value: null });
  });
});

describe('asyncHandler', () => {
  it('should forward a rejected handler to the error middleware', async () => {
    const app = express();
    app.get(
      '/fail',
      asyncHandler(async () => {
        throw new Error('boom');
      })
    );
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      res.status(500).json({ message: err instanceof Error ? err.message : 'unknown' });
    });

    const res = await request(app).get('/fail');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ message: 'boom' });
  });
});

describe('requestTimeout', () => {
  it('should answer 408 when the handler is too slow', async () => {
    const app = express();
    app.use(requestTimeout(1));
    app.get('/slow', () => {
      // never responds
    });

    const res = await request(app).get('/slow');

    expect(res.status).toBe(408);
    expect(res.body).toEqual({
      error: 'REQUEST_TIMEOUT',
      error_description: 'Request exceeded the maximum allowed time of 1 seconds',
    });
  });

  it('should leave fast responses alone', async () => {
    const app = express();
    app.use(requestTimeout(1));
    app.get('/fast', (_req: Request, res: Response) => {
      res.json({ ok: true });
    });

    const res = await request(app).get('/fast');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });
});

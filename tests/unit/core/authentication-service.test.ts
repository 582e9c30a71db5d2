/**
 * AuthenticationService Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { composeFullName } from '../../../src/core/authentication-service.js';
import { createTestContext, seedUser, type TestContext } from '../../../src/testing/index.js';
import { rejectionOf } from '../../helpers.js';

describe('AuthenticationService', () => {
  let context: TestContext;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    context = createTestContext();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('register', () => {
    it('should create a user and return its public fields', async () => {
      const user = await context.authService.register({
        email: ' User@Example.com ',
        password: 'CorrectPass1!',
        firstName: ' Test',
        lastName: 'User ',
        phoneNumber: '15550100',
        country: 'NZ',
      });

      expect(user).toEqual({ id: '1', email: 'user@example.com', fullName: 'Test User' });
      expect(context.store.snapshot('1')).toMatchObject({
        fullName: 'Test User',
        phoneNumber: '15550100',
        country: 'NZ',
      });
    });

    it('should reject a duplicate phone number', async () => {
      await seedUser(context, 'user@example.com', 'CorrectPass1!', { phoneNumber: '15550100' });

      const error = await rejectionOf(
        seedUser(context, 'other@example.com', 'OtherPass2!', { phoneNumber: '15550100' })
      );

      expect(error.code).toBe('PHONE_TAKEN');
      expect(error.statusCode).toBe(409);
    });

    it('should store a hash, never the password', async () => {
      await seedUser(context, 'user@example.com', 'CorrectPass1!');

      const record = context.store.snapshot('1');
      expect(record?.passwordHash.startsWith('$argon2id$')).toBe(true);
      expect(record?.passwordHash).not.toContain('CorrectPass1!');
    });

    it('should reject a duplicate email', async () => {
      await seedUser(context, 'user@example.com', 'CorrectPass1!');

      const error = await rejectionOf(seedUser(context, 'USER@example.com', 'OtherPass2!'));

      expect(error.code).toBe('EMAIL_TAKEN');
      expect(error.statusCode).toBe(409);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await seedUser(context, 'user@example.com', 'CorrectPass1!');
    });

    it('should issue a pair for the right password', async () => {
      const { user, pair } = await context.authService.login('user@example.com', 'CorrectPass1!');

      expect(user).toEqual({ id: '1', email: 'user@example.com', fullName: 'Test User' });
      expect(pair.issuedAt.getTime()).toBeLessThan(pair.accessExpiresAt.getTime());
      expect(pair.accessExpiresAt.getTime()).toBeLessThan(pair.refreshExpiresAt.getTime());
      await expect(context.authService.authenticate(pair.accessToken)).resolves.toBe('1');
    });

    it('should reject a wrong password', async () => {
      const error = await rejectionOf(context.authService.login('user@example.com', 'WrongPass1!'));

      expect(error.code).toBe('INVALID_CREDENTIALS');
      expect(error.message).toBe('Invalid email or password');
    });

    it('should answer an unknown email exactly like a wrong password', async () => {
      const dummy = vi.spyOn(context.hasher, 'dummyVerify');

      const unknown = await rejectionOf(
        context.authService.login('nobody@example.com', 'CorrectPass1!')
      );
      const wrong = await rejectionOf(context.authService.login('user@example.com', 'WrongPass1!'));

      expect(unknown.code).toBe(wrong.code);
      expect(unknown.message).toBe(wrong.message);
      expect(unknown.statusCode).toBe(wrong.statusCode);
      expect(dummy).toHaveBeenCalledTimes(1);
    });

    it('should audit failures with their reason', async () => {
      await rejectionOf(context.authService.login('nobody@example.com', 'CorrectPass1!'));
      await rejectionOf(context.authService.login('user@example.com', 'WrongPass1!'));

      const failures = context.auditStorage
        .getEntries()
        .filter((e) => e.source === 'auth:service' && !e.success);
      expect(failures.map((e) => e.reason)).toEqual(['unknown_identity', 'password_mismatch']);
    });

    it('should replace the previous session on a second login', async () => {
      const first = await context.authService.login('user@example.com', 'CorrectPass1!');
      await context.authService.login('user@example.com', 'CorrectPass1!');

      const error = await rejectionOf(context.authService.authenticate(first.pair.accessToken));
      expect(error.code).toBe('UNAUTHENTICATED');
    });

    it('should report an unreachable store', async () => {
      context.store.setUnavailable(true);

      const error = await rejectionOf(
        context.authService.login('user@example.com', 'CorrectPass1!')
      );

      expect(error.code).toBe('STORE_UNAVAILABLE');
    });
  });

  describe('refresh, logout and authenticate', () => {
    it('should rotate, then log out, then reject the guard', async () => {
      await seedUser(context, 'user@example.com', 'CorrectPass1!');
      const { pair } = await context.authService.login('user@example.com', 'CorrectPass1!');

      const rotated = await context.authService.refresh(pair.refreshToken);
      await expect(context.authService.logout(rotated.pair.accessToken)).resolves.toBe('1');

      const error = await rejectionOf(context.authService.authenticate(rotated.pair.accessToken));
      expect(error.code).toBe('UNAUTHENTICATED');
      expect(error.details?.reason).toBe('revoked');
    });

    it('should reject a garbage token at the guard', async () => {
      const error = await rejectionOf(context.authService.authenticate('garbage'));

      expect(error.code).toBe('UNAUTHENTICATED');
      expect(error.details?.reason).toBe('malformed');
    });
  });
});

describe('composeFullName', () => {
  it('should join trimmed first and last names with one space', () => {
    expect(composeFullName('  Ada ', ' Lovelace')).toBe('Ada Lovelace');
  });

  it('should not leave a stray space when a part is blank', () => {
    expect(composeFullName('Ada', '   ')).toBe('Ada');
  });
});

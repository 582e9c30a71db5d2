/**
 * Unit Tests for EnvProvider
 */

import { describe, it, expect, afterEach } from 'vitest';
import { EnvProvider } from '../../../../src/config/secrets/providers/EnvProvider.js';

describe('EnvProvider', () => {
  afterEach(() => {
    delete process.env.CHAT_AUTH_TEST_SECRET;
  });

  it('should resolve from an injected environment', async () => {
    const provider = new EnvProvider({ AUTH_SIGNING_SECRET: 'test-secret' });

    await expect(provider.resolve('AUTH_SIGNING_SECRET')).resolves.toBe('test-secret');
  });

  it('should read process.env by default', async () => {
    process.env.CHAT_AUTH_TEST_SECRET = 'from-process';

    await expect(new EnvProvider().resolve('CHAT_AUTH_TEST_SECRET')).resolves.toBe('from-process');
  });

  it('should trim whitespace', async () => {
    const provider = new EnvProvider({ SECRET: '  padded  ' });

    await expect(provider.resolve('SECRET')).resolves.toBe('padded');
  });

  it('should treat unset and blank values as not found', async () => {
    const provider = new EnvProvider({ BLANK: '   ', EMPTY: '' });

    await expect(provider.resolve('MISSING')).resolves.toBeUndefined();
    await expect(provider.resolve('BLANK')).resolves.toBeUndefined();
    await expect(provider.resolve('EMPTY')).resolves.toBeUndefined();
  });
});

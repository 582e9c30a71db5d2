import { describe, it, expect, vi } from 'vitest';
import { PasswordHasher } from '../../../src/core/password-hasher.js';
import { FAST_HASHER_OPTIONS } from '../../../src/testing/index.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher(FAST_HASHER_OPTIONS);

  it('should produce argon2id PHC strings', async () => {
    const hash = await hasher.hash('CorrectPass1!');

    expect(hash.startsWith('$argon2id$')).toBe(true);
  });

  it('should salt every hash', async () => {
    const first = await hasher.hash('CorrectPass1!');
    const second = await hasher.hash('CorrectPass1!');

    expect(first).not.toBe(second);
  });

  it('should verify the matching password', async () => {
    const hash = await hasher.hash('CorrectPass1!');

    await expect(hasher.verify('CorrectPass1!', hash)).resolves.toBe(true);
  });

  it('should reject a different password', async () => {
    const hash = await hasher.hash('OtherPass2!');

    await expect(hasher.verify('CorrectPass1!', hash)).resolves.toBe(false);
  });

  it('should fail closed on a malformed stored hash', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const dummy = vi.spyOn(hasher, 'dummyVerify');

    await expect(hasher.verify('CorrectPass1!', 'not-a-phc-string')).resolves.toBe(false);
    expect(dummy).toHaveBeenCalledWith('CorrectPass1!');

    dummy.mockRestore();
    warn.mockRestore();
  });

  it('should complete a dummy verification', async () => {
    await expect(hasher.dummyVerify('anything')).resolves.toBeUndefined();
  });
});

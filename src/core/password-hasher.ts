/**
 * Password Hasher - argon2id hashing and verification
 *
 * `hash()` embeds a fresh random salt in every PHC string it produces.
 * `verify()` fails closed: a malformed stored hash yields false, after a
 * verification against an internal dummy hash so both failure paths cost the
 * same amount of work.
 */

import argon2 from 'argon2';
import type { Options } from 'argon2';

export type PasswordHasherOptions = Pick<Options, 'memoryCost' | 'timeCost' | 'parallelism'>;

const DEFAULT_OPTIONS: PasswordHasherOptions = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

const DUMMY_PLAINTEXT = 'timing-equalizer';

export class PasswordHasher {
  private readonly options: PasswordHasherOptions;
  private dummyHash: Promise<string> | null = null;

  constructor(options: Partial<PasswordHasherOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, { ...this.options, type: argon2.argon2id });
  }

  /**
   * Verify a plaintext password against a stored PHC hash.
   *
   * Never throws: any failure to parse the stored hash is reported as a mismatch.
   */
  async verify(plaintext: string, storedHash: string): Promise<boolean> {
    try {
      return await argon2.verify(storedHash, plaintext);
    } catch (error) {
      console.warn('[PasswordHasher] Stored hash could not be parsed:', {
        reason: error instanceof Error ? error.message : 'Unknown error',
      });
      await this.dummyVerify(plaintext);
      return false;
    }
  }

  /**
   * Burn one verification against the dummy hash.
   *
   * Used at login for unknown identities so the response time does not reveal
   * whether the account exists.
   */
  async dummyVerify(plaintext: string): Promise<void> {
    const dummy = await this.getDummyHash();
    await argon2.verify(dummy, plaintext);
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash(DUMMY_PLAINTEXT);
    }
    return this.dummyHash;
  }
}

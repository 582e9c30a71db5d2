/**
 * Credential Store contract
 *
 * A key-value-by-identity view of the `users` table. Every mutation is a
 * single-row atomic update; rotation is conditioned on the refresh token the
 * caller presented, so a superseded token can never win a race.
 */

import type { CredentialRecord } from '../core/types.js';

export interface NewCredential {
  email: string;
  fullName: string;
  passwordHash: string;
  phoneNumber?: string;
  country?: string;
}

export interface StoredTokenPair {
  accessToken: string;
  refreshToken: string;
}

export interface CredentialStore {
  /** Lookup by login identifier (case-insensitive) */
  findByEmail(email: string): Promise<CredentialRecord | null>;

  findById(id: string): Promise<CredentialRecord | null>;

  /**
   * Insert a new user row.
   *
   * @throws {AuthServiceError} EMAIL_TAKEN when the email already exists,
   *         PHONE_TAKEN when the phone number does
   */
  create(input: NewCredential): Promise<CredentialRecord>;

  /**
   * Overwrite the stored pair, clear is_logged_out and mark the user online.
   *
   * @returns false when no row exists for `id`
   */
  storeTokenPair(id: string, pair: StoredTokenPair): Promise<boolean>;

  /**
   * Replace the stored pair only if the row still holds `expectedRefreshToken`
   * and is not logged out.
   *
   * @returns true when exactly one row was updated
   */
  rotateTokenPair(id: string, expectedRefreshToken: string, pair: StoredTokenPair): Promise<boolean>;

  /**
   * Set is_logged_out, clear both tokens and mark the user offline.
   *
   * @returns false when no row exists for `id`
   */
  revoke(id: string): Promise<boolean>;

  close(): Promise<void>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

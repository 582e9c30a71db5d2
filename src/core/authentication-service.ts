/**
 * Authentication Service - login, registration and the request guard
 *
 * Coordinates:
 * - credential lookup (CredentialStore)
 * - password verification (PasswordHasher)
 * - token issue/rotate/revoke (TokenLifecycleManager)
 * - audit logging (AuditService)
 *
 * CRITICAL POLICIES:
 * - Unknown email and wrong password are indistinguishable to the caller:
 *   same error, and an unknown email still pays for one password verification
 * - Source field is 'auth:service' for every audit entry written here
 */

import { AuthErrors } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { normalizeEmail, type CredentialStore } from '../store/credential-store.js';
import { AuditService } from './audit-service.js';
import { PasswordHasher } from './password-hasher.js';
import { TokenLifecycleManager, type RefreshResult } from './token-lifecycle.js';
import type { CredentialRecord, TokenPair } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface AuthenticationServiceConfig {
  /** Deadline for each credential store call (default: 10s) */
  storeTimeoutMs?: number;
}

export interface RegisterInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  phoneNumber?: string;
  country?: string;
}

/** The part of a credential record that may leave the service */
export interface PublicUser {
  id: string;
  email: string;
  fullName: string;
}

export interface LoginResult {
  user: PublicUser;
  pair: TokenPair;
}

const DEFAULT_STORE_TIMEOUT_MS = 10000;
const AUDIT_SOURCE = 'auth:service';

/**
 * Stored display name: "<first> <last>", each part trimmed.
 */
export function composeFullName(firstName: string, lastName: string): string {
  return [firstName.trim(), lastName.trim()].filter((part) => part.length > 0).join(' ');
}

export function toPublicUser(record: CredentialRecord): PublicUser {
  return { id: record.id, email: record.email, fullName: record.fullName };
}

// ============================================================================
// Authentication Service Class
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const auth = new AuthenticationService(store, hasher, lifecycle, auditService);
 *
 * const { user, pair } = await auth.login('user@example.com', 'CorrectPass1!');
 * const identity = await auth.authenticate(pair.accessToken);
 * await auth.logout(pair.accessToken);
 * ```
 */
export class AuthenticationService {
  private readonly auditService: AuditService;
  private readonly storeTimeoutMs: number;

  constructor(
    private readonly store: CredentialStore,
    private readonly hasher: PasswordHasher,
    private readonly lifecycle: TokenLifecycleManager,
    auditService?: AuditService,
    config: AuthenticationServiceConfig = {}
  ) {
    this.auditService = auditService ?? new AuditService();
    this.storeTimeoutMs = config.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
  }

  /**
   * Create a credential record. Does not start a session.
   *
   * @throws {AuthServiceError} EMAIL_TAKEN or PHONE_TAKEN when either is already registered
   */
  async register(input: RegisterInput): Promise<PublicUser> {
    const passwordHash = await this.hasher.hash(input.password);

    try {
      const record = await this.storeCall(
        'create',
        this.store.create({
          email: input.email,
          fullName: composeFullName(input.firstName, input.lastName),
          passwordHash,
          phoneNumber: input.phoneNumber,
          country: input.country,
        })
      );
      console.log('[AuthenticationService] User registered:', { userId: record.id });
      await this.audit('register', true, record.id);
      return toPublicUser(record);
    } catch (error) {
      const reason = error instanceof Error ? error.message : undefined;
      await this.audit('register', false, undefined, reason);
      throw error;
    }
  }

  /**
   * Check a password and issue a fresh token pair.
   *
   * @throws {AuthServiceError} INVALID_CREDENTIALS for an unknown email or a wrong password
   */
  async login(email: string, password: string): Promise<LoginResult> {
    const record = await this.storeCall('findByEmail', this.store.findByEmail(email));

    if (!record) {
      await this.hasher.dummyVerify(password);
      console.warn('[AuthenticationService] Login rejected: unknown email');
      await this.audit('login', false, undefined, 'unknown_identity', {
        email: normalizeEmail(email),
      });
      throw AuthErrors.INVALID_CREDENTIALS();
    }

    const matches = await this.hasher.verify(password, record.passwordHash);
    if (!matches) {
      console.warn('[AuthenticationService] Login rejected: password mismatch', {
        userId: record.id,
      });
      await this.audit('login', false, record.id, 'password_mismatch');
      throw AuthErrors.INVALID_CREDENTIALS();
    }

    const pair = await this.lifecycle.issue(record.id);
    await this.audit('login', true, record.id);
    return { user: toPublicUser(record), pair };
  }

  /**
   * Rotate a refresh token into a new pair.
   */
  async refresh(refreshToken: string): Promise<RefreshResult> {
    return this.lifecycle.refresh(refreshToken);
  }

  /**
   * End the session an access token belongs to.
   *
   * @returns The identity that was logged out
   */
  async logout(accessToken: string): Promise<string> {
    return this.lifecycle.logout(accessToken);
  }

  /**
   * Request guard: resolve the identity behind an access token.
   *
   * @throws {AuthServiceError} UNAUTHENTICATED for any rejected token
   */
  async authenticate(accessToken: string): Promise<string> {
    return this.lifecycle.validateAccess(accessToken);
  }

  private storeCall<T>(operation: string, pending: Promise<T>): Promise<T> {
    return withTimeout(pending, this.storeTimeoutMs, () =>
      AuthErrors.STORE_UNAVAILABLE({ operation, originalError: 'timed out' })
    );
  }

  private async audit(
    action: string,
    success: boolean,
    userId?: string,
    reason?: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.auditService.log({
      timestamp: new Date(),
      source: AUDIT_SOURCE,
      userId,
      action,
      success,
      reason,
      metadata,
    });
  }
}

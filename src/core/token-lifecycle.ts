/**
 * Token Lifecycle Manager - issue, rotate and revoke access/refresh pairs
 *
 * Per-identity states: no_session → active → active (rotated) → revoked
 *
 * CRITICAL POLICIES:
 * - One active pair per identity: issuing overwrites the previous pair
 * - A token is accepted only if it verifies, is unexpired, has the expected kind
 *   AND equals the value currently stored for its identity while not logged out
 * - Refresh tokens are single-use: rotation is a conditional store update keyed
 *   on the presented token, so a replayed or raced token always loses
 * - Every rejection is UNAUTHENTICATED to callers; the reason goes to logs/audit
 */

import { AuthErrors, AuthServiceError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { CredentialStore, StoredTokenPair } from '../store/credential-store.js';
import { AuditService } from './audit-service.js';
import { TokenCodec, toEpochSeconds } from './token-codec.js';
import type {
  CredentialRecord,
  RejectionReason,
  SessionState,
  TokenKind,
  TokenPair,
} from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface TokenLifecycleConfig {
  /** Access token lifetime (auth.accessTokenExpirySecs) */
  accessTokenExpirySecs: number;

  /** Refresh token lifetime (auth.refreshTokenExpirySecs) */
  refreshTokenExpirySecs: number;

  /** Deadline for each credential store call (default: 10s) */
  storeTimeoutMs?: number;
}

export interface RefreshResult {
  identity: string;
  pair: TokenPair;
}

const DEFAULT_STORE_TIMEOUT_MS = 10000;
const AUDIT_SOURCE = 'auth:lifecycle';

/**
 * Derive the session state of an identity from its credential record.
 */
export function sessionState(record: CredentialRecord | null): SessionState {
  if (!record) {
    return 'no_session';
  }
  if (record.isLoggedOut) {
    return 'revoked';
  }
  return record.accessToken && record.refreshToken ? 'active' : 'no_session';
}

// ============================================================================
// Token Lifecycle Manager
// ============================================================================

export class TokenLifecycleManager {
  private readonly storeTimeoutMs: number;
  private readonly auditService: AuditService;

  constructor(
    private readonly store: CredentialStore,
    private readonly codec: TokenCodec,
    private readonly config: TokenLifecycleConfig,
    auditService?: AuditService
  ) {
    if (config.accessTokenExpirySecs >= config.refreshTokenExpirySecs) {
      throw new Error('Access token lifetime must be shorter than refresh token lifetime');
    }
    this.storeTimeoutMs = config.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.auditService = auditService ?? new AuditService();
  }

  /**
   * Issue a fresh pair after a successful password check.
   *
   * [no_session | revoked → active]. Overwrites any previous pair and clears the
   * logged-out flag in one row update.
   */
  async issue(identity: string): Promise<TokenPair> {
    const pair = await this.mintPair(identity);

    const stored = await this.storeCall('storeTokenPair', this.store.storeTokenPair(identity, toStored(pair)));
    if (!stored) {
      throw await this.rejection('issue', 'unknown_identity', 'access', identity);
    }

    console.log('[TokenLifecycle] Pair issued:', {
      userId: identity,
      accessExpiresAt: pair.accessExpiresAt.toISOString(),
      refreshExpiresAt: pair.refreshExpiresAt.toISOString(),
    });
    await this.audit('issue', true, identity);
    return pair;
  }

  /**
   * Exchange the current refresh token for a brand-new pair.
   *
   * [active → active (rotated)]. The presented token is single-use.
   *
   * @throws {AuthServiceError} UNAUTHENTICATED when the token fails to decode, the
   *         session is revoked, or the token is not the one on record
   */
  async refresh(presentedRefreshToken: string): Promise<RefreshResult> {
    const decoded = await this.decode(presentedRefreshToken, 'refresh', 'refresh');
    const identity = decoded.identity;

    const record = await this.storeCall('findById', this.store.findById(identity));
    if (!record) {
      throw await this.rejection('refresh', 'unknown_identity', 'refresh', identity);
    }
    if (record.isLoggedOut) {
      throw await this.rejection('refresh', 'revoked', 'refresh', identity);
    }
    if (record.refreshToken !== presentedRefreshToken) {
      throw await this.rejection('refresh', 'superseded', 'refresh', identity);
    }

    const pair = await this.mintPair(identity);
    const rotated = await this.storeCall(
      'rotateTokenPair',
      this.store.rotateTokenPair(identity, presentedRefreshToken, toStored(pair))
    );
    if (!rotated) {
      // Another request rotated or revoked between our read and our write
      throw await this.rejection('refresh', 'superseded', 'refresh', identity);
    }

    console.log('[TokenLifecycle] Pair rotated:', { userId: identity });
    await this.audit('refresh', true, identity);
    return { identity, pair };
  }

  /**
   * Revoke the session of an identity. [active → revoked]
   *
   * Idempotent: revoking a revoked session succeeds.
   */
  async revoke(identity: string): Promise<void> {
    const revoked = await this.storeCall('revoke', this.store.revoke(identity));
    if (!revoked) {
      throw await this.rejection('revoke', 'unknown_identity', 'access', identity);
    }

    console.log('[TokenLifecycle] Session revoked:', { userId: identity });
    await this.audit('revoke', true, identity);
  }

  /**
   * Resolve the identity behind an access token presented on a protected request.
   */
  async validateAccess(accessToken: string): Promise<string> {
    const decoded = await this.decode(accessToken, 'access', 'validate');
    const identity = decoded.identity;

    const record = await this.storeCall('findById', this.store.findById(identity));
    if (!record) {
      throw await this.rejection('validate', 'unknown_identity', 'access', identity);
    }
    if (record.isLoggedOut) {
      throw await this.rejection('validate', 'revoked', 'access', identity);
    }
    if (record.accessToken !== accessToken) {
      throw await this.rejection('validate', 'superseded', 'access', identity);
    }

    return identity;
  }

  /**
   * Revoke the session an access token belongs to.
   *
   * An already logged-out session is a no-op success; a token that was replaced
   * by a newer pair is rejected.
   *
   * @returns The identity whose session was revoked
   */
  async logout(accessToken: string): Promise<string> {
    const decoded = await this.decode(accessToken, 'access', 'logout');
    const identity = decoded.identity;

    const record = await this.storeCall('findById', this.store.findById(identity));
    if (!record) {
      throw await this.rejection('logout', 'unknown_identity', 'access', identity);
    }
    if (record.isLoggedOut) {
      console.log('[TokenLifecycle] Logout on revoked session (no-op):', { userId: identity });
      return identity;
    }
    if (record.accessToken !== accessToken) {
      throw await this.rejection('logout', 'superseded', 'access', identity);
    }

    await this.revoke(identity);
    return identity;
  }

  async getSessionState(identity: string): Promise<SessionState> {
    const record = await this.storeCall('findById', this.store.findById(identity));
    return sessionState(record);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async mintPair(identity: string): Promise<TokenPair> {
    // Whole seconds, matching the precision of iat/exp
    const issuedAt = new Date(toEpochSeconds(this.codec.now()) * 1000);
    const accessExpiresAt = new Date(issuedAt.getTime() + this.config.accessTokenExpirySecs * 1000);
    const refreshExpiresAt = new Date(
      issuedAt.getTime() + this.config.refreshTokenExpirySecs * 1000
    );

    const [accessToken, refreshToken] = await Promise.all([
      this.codec.encode({ identity, kind: 'access', issuedAt, expiresAt: accessExpiresAt }),
      this.codec.encode({ identity, kind: 'refresh', issuedAt, expiresAt: refreshExpiresAt }),
    ]);

    return { accessToken, accessExpiresAt, refreshToken, refreshExpiresAt, issuedAt };
  }

  private async decode(token: string, kind: TokenKind, action: string) {
    try {
      return await this.codec.decode(token, kind);
    } catch (error) {
      if (error instanceof AuthServiceError) {
        const reason = String(error.details?.reason ?? 'malformed');
        console.warn(`[TokenLifecycle] ${action} rejected:`, { kind, reason });
        await this.audit(action, false, undefined, reason, { kind });
      }
      throw error;
    }
  }

  private async rejection(
    action: string,
    reason: RejectionReason,
    kind: TokenKind,
    identity: string
  ): Promise<AuthServiceError> {
    console.warn(`[TokenLifecycle] ${action} rejected:`, { userId: identity, kind, reason });
    await this.audit(action, false, identity, reason, { kind });
    return AuthErrors.UNAUTHENTICATED({ reason, kind, userId: identity });
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

function toStored(pair: TokenPair): StoredTokenPair {
  return { accessToken: pair.accessToken, refreshToken: pair.refreshToken };
}

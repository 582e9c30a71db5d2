/**
 * Core Authentication Types
 *
 * Types shared by the token lifecycle core. These types do NOT depend on the
 * HTTP layer or on a concrete credential store.
 *
 * Architectural Rule: config → store → core → http
 * Files in src/core/ MUST NOT import from src/http/
 */

// ============================================================================
// Credential Record
// ============================================================================

export type PresenceStatus = 'online' | 'offline';

/**
 * One row per user, owned by the credential store and mutated only by the core.
 */
export interface CredentialRecord {
  /** Opaque identity (numeric id rendered as text, or a UUID) */
  id: string;

  /** Login identifier, stored lower-cased */
  email: string;

  fullName: string;

  /** Unique when present */
  phoneNumber: string | null;

  country: string | null;

  /** argon2id PHC string - never logged */
  passwordHash: string;

  /** Currently valid access token, or null */
  accessToken: string | null;

  /** Currently valid refresh token, or null */
  refreshToken: string | null;

  /** True means both stored tokens are invalid regardless of their signature */
  isLoggedOut: boolean;

  /** Informational only, not security relevant */
  status: PresenceStatus;
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind = 'access' | 'refresh';

/**
 * Access/refresh pair returned to the caller for cookie delivery.
 */
export interface TokenPair {
  accessToken: string;
  accessExpiresAt: Date;
  refreshToken: string;
  refreshExpiresAt: Date;
  issuedAt: Date;
}

/**
 * Claims recovered from a verified token.
 */
export interface DecodedToken {
  identity: string;
  kind: TokenKind;
  issuedAt: Date;
  expiresAt: Date;
  tokenId: string;
}

/**
 * Internal rejection reasons. Logged and audited, never sent to clients.
 */
export type RejectionReason =
  | 'malformed'
  | 'expired'
  | 'invalid_signature'
  | 'invalid_claims'
  | 'wrong_kind'
  | 'unknown_identity'
  | 'revoked'
  | 'superseded';

/**
 * Per-identity session state, derived from the credential record.
 */
export type SessionState = 'no_session' | 'active' | 'revoked';

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single security event.
 *
 * All audit entries MUST include a source field (e.g. 'auth:lifecycle', 'auth:service').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Identity associated with the event (if resolved) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Internal reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

/**
 * Core Module Public API
 */

// ============================================================================
// Services
// ============================================================================

export { AuthenticationService, composeFullName, toPublicUser } from './authentication-service.js';
export type {
  AuthenticationServiceConfig,
  RegisterInput,
  PublicUser,
  LoginResult,
} from './authentication-service.js';

export { TokenLifecycleManager, sessionState } from './token-lifecycle.js';
export type { TokenLifecycleConfig, RefreshResult } from './token-lifecycle.js';

export { TokenCodec, toEpochSeconds } from './token-codec.js';
export type { TokenCodecConfig } from './token-codec.js';

export { PasswordHasher } from './password-hasher.js';
export type { PasswordHasherOptions } from './password-hasher.js';

export { SessionPolicy, cookieAttributes } from './session-policy.js';
export type {
  SameSitePolicy,
  CookieAttributes,
  CookiePolicyOptions,
  SessionPolicyConfig,
  CookieDescriptor,
} from './session-policy.js';

export { AuditService, ConsoleAuditStorage, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Types
// ============================================================================

export type {
  PresenceStatus,
  CredentialRecord,
  TokenKind,
  TokenPair,
  DecodedToken,
  RejectionReason,
  SessionState,
  AuditEntry,
} from './types.js';

// ============================================================================
// Context
// ============================================================================

export { buildAuthContext } from './context.js';
export type { AuthContext, AuthContextOptions } from './context.js';

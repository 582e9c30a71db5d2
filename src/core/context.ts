/**
 * Auth Context - the service graph built once from a ConfigSnapshot
 *
 * Construction order: audit → hasher/codec → lifecycle → service → policy.
 * Nothing here reads configuration again after construction.
 */

import type { ConfigSnapshot } from '../config/schemas/index.js';
import type { CredentialStore } from '../store/credential-store.js';
import { AuditService, ConsoleAuditStorage, type AuditStorage } from './audit-service.js';
import { AuthenticationService } from './authentication-service.js';
import { PasswordHasher, type PasswordHasherOptions } from './password-hasher.js';
import { SessionPolicy } from './session-policy.js';
import { TokenCodec } from './token-codec.js';
import { TokenLifecycleManager } from './token-lifecycle.js';

export interface AuthContext {
  config: ConfigSnapshot;
  store: CredentialStore;
  auditService: AuditService;
  hasher: PasswordHasher;
  codec: TokenCodec;
  lifecycle: TokenLifecycleManager;
  authService: AuthenticationService;
  sessionPolicy: SessionPolicy;
}

export interface AuthContextOptions {
  /** Lower argon2 cost in tests */
  hasherOptions?: Partial<PasswordHasherOptions>;

  /** Time source for token issue and expiry checks */
  clock?: () => Date;

  /** Custom audit storage (default: console) */
  auditStorage?: AuditStorage;
}

/**
 * @example
 * ```typescript
 * const config = await new ConfigManager().loadConfig();
 * const store = new PostgresCredentialStore({ ... });
 * const context = buildAuthContext(config, store);
 * const app = createAuthServer(context);
 * ```
 */
export function buildAuthContext(
  config: ConfigSnapshot,
  store: CredentialStore,
  options: AuthContextOptions = {}
): AuthContext {
  const storeTimeoutMs = config.server.requestTimeoutSecs * 1000;

  const auditService = new AuditService({
    enabled: config.auth.audit.enabled,
    logAllAttempts: config.auth.audit.logAllAttempts,
    storage: options.auditStorage ?? new ConsoleAuditStorage(),
  });

  const hasher = new PasswordHasher(options.hasherOptions);
  const codec = new TokenCodec({
    signingSecret: config.auth.signingSecret,
    issuer: config.auth.issuer,
    clock: options.clock,
  });

  const lifecycle = new TokenLifecycleManager(
    store,
    codec,
    {
      accessTokenExpirySecs: config.auth.accessTokenExpirySecs,
      refreshTokenExpirySecs: config.auth.refreshTokenExpirySecs,
      storeTimeoutMs,
    },
    auditService
  );

  const authService = new AuthenticationService(store, hasher, lifecycle, auditService, {
    storeTimeoutMs,
  });

  const sessionPolicy = new SessionPolicy({
    environment: config.app.environment,
    cookie: config.auth.cookie,
    accessTokenExpirySecs: config.auth.accessTokenExpirySecs,
    refreshTokenExpirySecs: config.auth.refreshTokenExpirySecs,
  });

  return {
    config,
    store,
    auditService,
    hasher,
    codec,
    lifecycle,
    authService,
    sessionPolicy,
  } satisfies AuthContext;
}

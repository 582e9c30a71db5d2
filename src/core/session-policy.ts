/**
 * Session Policy - cookie attributes derived from the runtime environment
 *
 * - production: secure cookies, configured domain
 * - anything else: plain-HTTP friendly (secure=false, host-only)
 * - httpOnly is always true; tokens are never readable from script
 */

import type { RuntimeEnvironment } from '../config/schemas/app.js';

export type SameSitePolicy = 'strict' | 'lax' | 'none';

export interface CookieAttributes {
  secure: boolean;
  sameSite: SameSitePolicy;
  httpOnly: true;
  path: string;
  domain?: string;
}

export interface CookiePolicyOptions {
  sameSite?: SameSitePolicy;
  domain?: string;
  path?: string;
}

/**
 * Pure mapping from environment to cookie attributes.
 *
 * Browsers drop `SameSite=None` cookies that are not `Secure`, so outside
 * production 'none' is served as 'lax'.
 */
export function cookieAttributes(
  environment: RuntimeEnvironment,
  options: CookiePolicyOptions = {}
): CookieAttributes {
  const production = environment === 'production';
  const requested = options.sameSite ?? 'lax';

  return {
    secure: production,
    sameSite: !production && requested === 'none' ? 'lax' : requested,
    httpOnly: true,
    path: options.path ?? '/',
    ...(production && options.domain ? { domain: options.domain } : {}),
  };
}

export interface SessionPolicyConfig {
  environment: RuntimeEnvironment;
  cookie: {
    accessName: string;
    refreshName: string;
    sameSite: SameSitePolicy;
    path: string;
    domain?: string;
  };
  accessTokenExpirySecs: number;
  refreshTokenExpirySecs: number;
}

export interface CookieDescriptor {
  name: string;
  /** Attributes plus lifetime in milliseconds (express `maxAge` semantics) */
  options: CookieAttributes & { maxAge: number };
}

/**
 * Cookie delivery for a token pair.
 *
 * Usage:
 * ```typescript
 * const policy = new SessionPolicy({
 *   environment: config.app.environment,
 *   cookie: config.auth.cookie,
 *   accessTokenExpirySecs: config.auth.accessTokenExpirySecs,
 *   refreshTokenExpirySecs: config.auth.refreshTokenExpirySecs,
 * });
 * const { name, options } = policy.refreshCookie();
 * res.cookie(name, pair.refreshToken, options);
 * ```
 */
export class SessionPolicy {
  private readonly attributes: CookieAttributes;

  constructor(private readonly config: SessionPolicyConfig) {
    this.attributes = cookieAttributes(config.environment, {
      sameSite: config.cookie.sameSite,
      domain: config.cookie.domain,
      path: config.cookie.path,
    });
  }

  getAttributes(): CookieAttributes {
    return { ...this.attributes };
  }

  accessCookie(): CookieDescriptor {
    return {
      name: this.config.cookie.accessName,
      options: { ...this.attributes, maxAge: this.config.accessTokenExpirySecs * 1000 },
    };
  }

  refreshCookie(): CookieDescriptor {
    return {
      name: this.config.cookie.refreshName,
      options: { ...this.attributes, maxAge: this.config.refreshTokenExpirySecs * 1000 },
    };
  }

  /**
   * Options for clearing both cookies at logout (must match path/domain)
   */
  clearOptions(): CookieAttributes {
    return { ...this.attributes };
  }

  cookieNames(): { access: string; refresh: string } {
    return { access: this.config.cookie.accessName, refresh: this.config.cookie.refreshName };
  }
}

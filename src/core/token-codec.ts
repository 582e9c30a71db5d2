/**
 * Token Codec - HS256 encode/decode of access and refresh tokens
 *
 * Every token carries `sub` (identity), `kind`, `iat`, `exp` and a random `jti`.
 * decode() verifies signature, issuer, expiry and kind. All failures surface as a
 * single UNAUTHENTICATED error; `details.reason` tells logs which check failed.
 *
 * NOT responsible for:
 * - Comparing tokens with the stored current pair (TokenLifecycleManager)
 * - Cookie delivery (SessionPolicy)
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors } from 'jose';
import type { JWTPayload } from 'jose';
import { AuthErrors } from '../utils/errors.js';
import type { DecodedToken, RejectionReason, TokenKind } from './types.js';

const ALGORITHM = 'HS256';
const TOKEN_KINDS: readonly TokenKind[] = ['access', 'refresh'];

export interface TokenCodecConfig {
  /** Shared HMAC secret (auth.signingSecret) */
  signingSecret: string;

  /** Value of the `iss` claim (auth.issuer) */
  issuer: string;

  /** Time source; drives issuance and expiry checks */
  clock?: () => Date;
}

export interface EncodeInput {
  identity: string;
  kind: TokenKind;
  issuedAt: Date;
  expiresAt: Date;
}

export class TokenCodec {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly clock: () => Date;

  constructor(config: TokenCodecConfig) {
    if (!config.signingSecret) {
      throw new Error('TokenCodec requires a non-empty signing secret');
    }
    this.key = new TextEncoder().encode(config.signingSecret);
    this.issuer = config.issuer;
    this.clock = config.clock ?? (() => new Date());
  }

  now(): Date {
    return this.clock();
  }

  async encode(input: EncodeInput): Promise<string> {
    return new SignJWT({ kind: input.kind })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(input.identity)
      .setIssuer(this.issuer)
      .setIssuedAt(toEpochSeconds(input.issuedAt))
      .setExpirationTime(toEpochSeconds(input.expiresAt))
      .setJti(randomUUID())
      .sign(this.key);
  }

  /**
   * Verify a token and return its claims.
   *
   * @throws {AuthServiceError} UNAUTHENTICATED with details.reason on any failure
   */
  async decode(token: string, expectedKind: TokenKind): Promise<DecodedToken> {
    if (!isWellFormed(token)) {
      throw reject('malformed', expectedKind);
    }

    let payload: JWTPayload;
    try {
      const result = await jwtVerify(token, this.key, {
        issuer: this.issuer,
        algorithms: [ALGORITHM],
        currentDate: this.clock(),
      });
      payload = result.payload;
    } catch (error) {
      throw reject(classifyJoseError(error), expectedKind, error);
    }

    const kind = payload.kind;
    if (
      typeof payload.sub !== 'string' ||
      payload.sub.length === 0 ||
      typeof payload.jti !== 'string' ||
      typeof payload.iat !== 'number' ||
      typeof payload.exp !== 'number' ||
      !isTokenKind(kind)
    ) {
      throw reject('invalid_claims', expectedKind);
    }

    if (kind !== expectedKind) {
      throw reject('wrong_kind', expectedKind);
    }

    return {
      identity: payload.sub,
      kind,
      issuedAt: new Date(payload.iat * 1000),
      expiresAt: new Date(payload.exp * 1000),
      tokenId: payload.jti,
    };
  }
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function isTokenKind(value: unknown): value is TokenKind {
  return TOKEN_KINDS.some((kind) => kind === value);
}

/**
 * Three base64url segments
 */
function isWellFormed(token: string): boolean {
  const parts = token.split('.');
  return parts.length === 3 && parts.every((part) => /^[A-Za-z0-9_-]+$/.test(part));
}

function classifyJoseError(error: unknown): RejectionReason {
  if (error instanceof errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return 'invalid_signature';
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    return 'invalid_claims';
  }
  return 'malformed';
}

function reject(reason: RejectionReason, kind: TokenKind, cause?: unknown) {
  return AuthErrors.UNAUTHENTICATED({
    reason,
    kind,
    ...(cause instanceof Error && { originalError: cause.message }),
  });
}

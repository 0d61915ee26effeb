/**
 * backend/src/modules/auth/session/token-codec.ts
 *
 * WHY:
 * - Stateless encode/decode of signed session tokens (HS256 JWT).
 * - Pure function of the secret key and the clock; no revocation knowledge.
 *   SessionService layers revocation on top and is the only caller allowed to
 *   make trust decisions from decode().
 *
 * WIRE CLAIMS:
 *   sub, org_id, role, type ('access' | 'refresh'), iat, exp, jti
 *
 * RULES:
 * - Expiry is inclusive: a token is dead at the exact `exp` second (now >= exp).
 * - Only HS256 is accepted on decode (no algorithm negotiation).
 * - Never log token values.
 */

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import type { Clock } from '../../../shared/time/clock';
import { systemClock } from '../../../shared/time/clock';
import { USER_ROLES } from '../../users/user.types';
import { AuthErrors } from '../auth.errors';
import type { ClaimsInput, SessionClaims } from '../auth.types';

const ALGORITHM = 'HS256';

const WireClaimsSchema = z.object({
  sub: z.string().min(1),
  org_id: z.string().min(1).nullable(),
  role: z.enum(USER_ROLES).nullable().optional(),
  type: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

type WireClaims = z.infer<typeof WireClaimsSchema>;

export type EncodedToken = {
  token: string;
  claims: SessionClaims;
};

/** What revokeToken() can still read from a signed-but-possibly-expired token. */
export type RevocationTarget = {
  tokenId: string;
  expiresAt: number | null;
};

export type TokenCodecOptions = {
  secret: string;
  defaultTtlSeconds: number;
  clock?: Clock;
};

function toWire(claims: SessionClaims): WireClaims {
  return {
    sub: claims.subject,
    org_id: claims.organizationId,
    role: claims.role,
    type: claims.tokenType,
    iat: claims.issuedAt,
    exp: claims.expiresAt,
    jti: claims.tokenId,
  };
}

function fromWire(wire: WireClaims): SessionClaims {
  return {
    subject: wire.sub,
    organizationId: wire.org_id,
    role: wire.role ?? null,
    tokenType: wire.type,
    issuedAt: wire.iat,
    expiresAt: wire.exp,
    tokenId: wire.jti,
  };
}

export class TokenCodec {
  private readonly secret: string;
  private readonly defaultTtlSeconds: number;
  private readonly clock: Clock;

  constructor(opts: TokenCodecOptions) {
    this.secret = opts.secret;
    this.defaultTtlSeconds = opts.defaultTtlSeconds;
    this.clock = opts.clock ?? systemClock;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Assigns a fresh tokenId when absent, stamps issuedAt and expiresAt, signs.
   * `ttlSeconds` overrides the default lifetime.
   */
  encode(input: ClaimsInput, opts: { ttlSeconds?: number } = {}): EncodedToken {
    const issuedAt = this.clock();
    const claims: SessionClaims = {
      subject: input.subject,
      organizationId: input.organizationId,
      role: input.role,
      tokenType: input.tokenType,
      issuedAt,
      expiresAt: issuedAt + (opts.ttlSeconds ?? this.defaultTtlSeconds),
      tokenId: input.tokenId ?? randomUUID(),
    };

    const token = jwt.sign(toWire(claims), this.secret, { algorithm: ALGORITHM });
    return { token, claims };
  }

  /**
   * Verifies signature, expiry and claim shape.
   * Throws TOKEN_EXPIRED when now >= exp, TOKEN_INVALID for anything else.
   */
  decode(token: string): SessionClaims {
    const payload = this.verifySignature(token, { ignoreExpiration: false });

    const parsed = WireClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw AuthErrors.tokenInvalid('Invalid token.', { reason: 'claims_shape' });
    }

    return fromWire(parsed.data);
  }

  /**
   * Signature-checked read of `jti`/`exp`, tolerating expiry and a missing `exp`.
   * Returns null for anything that does not carry our signature or a tokenId.
   */
  readRevocationTarget(token: string): RevocationTarget | null {
    let payload: jwt.JwtPayload | string;
    try {
      payload = this.verifySignature(token, { ignoreExpiration: true });
    } catch {
      return null;
    }

    if (typeof payload === 'string' || typeof payload.jti !== 'string' || !payload.jti) {
      return null;
    }

    return {
      tokenId: payload.jti,
      expiresAt: typeof payload.exp === 'number' ? payload.exp : null,
    };
  }

  private verifySignature(
    token: string,
    opts: { ignoreExpiration: boolean },
  ): jwt.JwtPayload | string {
    try {
      return jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.clock(),
        ignoreExpiration: opts.ignoreExpiration,
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw AuthErrors.tokenExpired();
      }
      if (err instanceof jwt.JsonWebTokenError) {
        // NotBeforeError extends JsonWebTokenError
        throw AuthErrors.tokenInvalid('Invalid token.', { reason: err.message });
      }
      throw err;
    }
  }
}

// src/libs/jwt.ts
// ============================================================================
// JWT helpers (jose)
// ----------------------------------------------------------------------------
// - HS256 with a shared secret (>= 32 chars); an optional previous secret is
//   still accepted for verification so the active one can be rotated
// - one jti per token (revocation store keys on it)
// - type = "access" | "refresh" inside the signed payload
// - decode() fails closed: every problem is a TokenInvalidError
// ============================================================================

import { randomUUID } from "node:crypto";
import { SignJWT, errors, jwtVerify, type JWTPayload } from "jose";
import {
  TokenClaimsSchema,
  type TokenClaims,
  type TokenPair,
  type TokenType,
} from "./token-claims.js";

export type { TokenClaims, TokenPair, TokenType } from "./token-claims.js";

export const MIN_SECRET_LENGTH = 32;

export type AccessTokenClaims = TokenClaims & { type: "access" };

export type TokenIdentity = {
  userId: string;
  email: string;
  tenantId: string;
  roles: string[];
};

export type TokenServiceConfig = {
  secret: string;
  previousSecret?: string;
  issuer: string;
  audience: string;
  accessTtlSec: number;
  refreshTtlSec: number;
  clockSkewSec: number;
};

export type SignedToken = {
  token: string;
  jti: string;
  exp: number;
};

export class TokenInvalidError extends Error {
  constructor(readonly reason: string) {
    super("token_invalid");
    this.name = "TokenInvalidError";
  }
}

export interface TokenService {
  readonly accessTtlSec: number;
  readonly refreshTtlSec: number;
  sign(identity: TokenIdentity, type: TokenType): Promise<SignedToken>;
  issueTokenPair(identity: TokenIdentity): Promise<TokenPair>;
  decode(token: string, expectedType?: TokenType): Promise<TokenClaims>;
}

function encodeSecret(secret: string, label: string): Uint8Array {
  if (secret.length < MIN_SECRET_LENGTH) {
    throw new Error(`${label} must be at least ${MIN_SECRET_LENGTH} characters long.`);
  }
  return new TextEncoder().encode(secret);
}

function reasonOf(err: unknown): string {
  if (err instanceof errors.JWTExpired) return "expired";
  if (err instanceof errors.JWTClaimValidationFailed) return `claim_${err.claim}`;
  if (err instanceof errors.JWSSignatureVerificationFailed) return "signature";
  if (err instanceof errors.JOSEError) return err.code;
  return "malformed";
}

export function createTokenService(config: TokenServiceConfig): TokenService {
  const activeKey = encodeSecret(config.secret, "JWT secret");
  const previousKey = config.previousSecret
    ? encodeSecret(config.previousSecret, "Previous JWT secret")
    : undefined;

  const verifyOptions = {
    issuer: config.issuer,
    audience: config.audience,
    algorithms: ["HS256"],
    clockTolerance: config.clockSkewSec,
  };

  async function verifyWithRotation(token: string): Promise<JWTPayload> {
    try {
      const { payload } = await jwtVerify(token, activeKey, verifyOptions);
      return payload;
    } catch (activeError) {
      // Only a signature mismatch can be explained by a rotated secret.
      if (!previousKey || !(activeError instanceof errors.JWSSignatureVerificationFailed)) {
        throw activeError;
      }
      const { payload } = await jwtVerify(token, previousKey, verifyOptions);
      return payload;
    }
  }

  async function sign(identity: TokenIdentity, type: TokenType): Promise<SignedToken> {
    const ttlSec = type === "access" ? config.accessTtlSec : config.refreshTtlSec;
    const jti = randomUUID();
    const now = Math.floor(Date.now() / 1000);
    const exp = now + ttlSec;

    const token = await new SignJWT({
      email: identity.email,
      tenant_id: identity.tenantId,
      roles: identity.roles,
      type,
    })
      .setProtectedHeader({ alg: "HS256", typ: "JWT" })
      .setSubject(identity.userId)
      .setJti(jti)
      .setIssuedAt(now)
      .setExpirationTime(exp)
      .setIssuer(config.issuer)
      .setAudience(config.audience)
      .sign(activeKey);

    return { token, jti, exp };
  }

  return {
    accessTtlSec: config.accessTtlSec,
    refreshTtlSec: config.refreshTtlSec,

    sign,

    async issueTokenPair(identity) {
      const [access, refresh] = await Promise.all([
        sign(identity, "access"),
        sign(identity, "refresh"),
      ]);
      return {
        access_token: access.token,
        refresh_token: refresh.token,
        token_type: "bearer",
        expires_in: config.accessTtlSec,
      };
    },

    async decode(token, expectedType) {
      let payload: JWTPayload;
      try {
        payload = await verifyWithRotation(token);
      } catch (err) {
        throw new TokenInvalidError(reasonOf(err));
      }

      const parsed = TokenClaimsSchema.safeParse(payload);
      if (!parsed.success) {
        throw new TokenInvalidError("claims_malformed");
      }

      if (expectedType && parsed.data.type !== expectedType) {
        throw new TokenInvalidError("wrong_type");
      }

      return {
        ...parsed.data,
        tenant_id: parsed.data.tenant_id.toLowerCase(),
      };
    },
  };
}

/** Seconds until `exp`, never below 1 (used as revocation TTL). */
export function remainingLifetimeSec(exp: number, nowMs: number = Date.now()): number {
  return Math.max(1, exp - Math.floor(nowMs / 1000));
}

export function isAccessClaims(claims: TokenClaims): claims is AccessTokenClaims {
  return claims.type === "access";
}

// src/plugins/auth.ts
// ============================================================================
// Auth plugin
// ----------------------------------------------------------------------------
// For routes with config.auth === true:
// - extract the bearer token
// - decode it as an access token (signature, expiry, iss/aud, claim shape)
// - reject revoked tokens
// - set req.user
//
// Not here: tenant header vs token (tenant-guard.ts), transaction (db-context.ts)
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyReply } from "fastify";
import { headerValue, isHealthPath, routeNeedsAuth } from "../libs/http.js";
import { isAccessClaims, TokenInvalidError, type TokenClaims } from "../libs/jwt.js";
import { sendApiError } from "../libs/error-response.js";

export function extractBearerToken(authHeader: string | string[] | undefined): string | null {
  const raw = headerValue(authHeader);
  if (!raw) return null;

  // tolerates "Bearer <token>", "bearer <token>", extra spaces
  const m = raw.match(/^Bearer\s+(\S+)$/i);
  return m?.[1] ?? null;
}

function rejectInvalid(reply: FastifyReply, code: string, message: string) {
  reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
  return sendApiError(reply, 401, code, message);
}

const authPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;
    if (!routeNeedsAuth(req)) return;

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      reply.header("WWW-Authenticate", 'Bearer realm="keystone"');
      return sendApiError(reply, 401, "MISSING_TOKEN", "Missing bearer token.");
    }

    let claims: TokenClaims;
    try {
      claims = await app.services.tokens.decode(token, "access");
    } catch (err) {
      if (!(err instanceof TokenInvalidError)) throw err;
      req.log.info({ reason: err.reason }, "access_token_rejected");
      return rejectInvalid(reply, "INVALID_TOKEN", "Invalid bearer token.");
    }

    if (!isAccessClaims(claims)) {
      return rejectInvalid(reply, "INVALID_TOKEN", "Invalid bearer token.");
    }

    if (await app.services.revocations.isRevoked(claims.jti)) {
      return rejectInvalid(reply, "TOKEN_REVOKED", "Token has been revoked.");
    }

    req.user = claims;
  });
};

export default fp(authPlugin, { name: "auth", dependencies: ["request-context"] });

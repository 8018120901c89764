// src/plugins/rate-limit.ts
// ============================================================================
// Fixed-window rate limit per route + client IP
// - counters in app.services.rateLimits (Redis, or process memory)
// - stricter limit for the credential endpoints under /auth
// - fail-open when the store is unreachable
// ============================================================================
import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { getStablePath, isHealthPath } from "../libs/http.js";
import { normalizedKeyPart } from "../libs/redis.js";
import { apiError } from "../libs/error-response.js";

export type RateLimitOptions = {
  windowSec: number;
  max: number;
  authMax: number;
};

export const CREDENTIAL_ROUTES = new Set<string>([
  "/auth/login",
  "/auth/register",
  "/auth/refresh",
]);

const rateLimitPlugin: FastifyPluginAsync<RateLimitOptions> = async (app, opts) => {
  // The route is not resolved yet in onRequest: key on the raw path.
  app.addHook("onRequest", async (request, reply) => {
    if (isHealthPath(request)) return;

    const route = getStablePath(request);
    const max = CREDENTIAL_ROUTES.has(route) ? opts.authMax : opts.max;
    const key = `${normalizedKeyPart(route)}:${normalizedKeyPart(request.ip)}`;

    let count = 1;
    let ttl = opts.windowSec;
    try {
      ({ count, ttl } = await app.services.rateLimits.hit(key, opts.windowSec));
    } catch (err) {
      request.log.warn({ err }, "rate_limit_store_error");
    }

    const blocked = count > max;
    request.rateLimit = { count, ttl, blocked, max };

    if (blocked) {
      reply
        .header("RateLimit-Limit", String(max))
        .header("RateLimit-Remaining", "0")
        .header("RateLimit-Reset", String(Math.max(1, ttl)))
        .header("Retry-After", String(Math.max(1, ttl)));

      return reply.status(429).send({
        ...apiError(429, "RATE_LIMITED", "Too many requests."),
        reset_in_seconds: ttl,
      });
    }
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const state = request.rateLimit;
    if (state && !state.blocked) {
      reply
        .header("RateLimit-Limit", String(state.max))
        .header("RateLimit-Remaining", String(Math.max(0, state.max - state.count)))
        .header("RateLimit-Reset", String(Math.max(0, state.ttl)));
    }
    return payload;
  });
};

export default fp(rateLimitPlugin, { name: "rate-limit" });

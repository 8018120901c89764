// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP helpers shared by the request pipeline plugins
// ============================================================================
import type { FastifyContextConfig, FastifyRequest } from "fastify";

export const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Client ids end up in audit_logs.request_id (VARCHAR(128)) and in log lines.
const CLIENT_REQUEST_ID_RE = /^[A-Za-z0-9._:-]{1,128}$/;

const HEALTH_PATHS = new Set(["/health", "/ready"]);

/** Path without query string, double slashes collapsed. */
export function getStablePath(req: FastifyRequest): string {
  const raw = (req.raw.url ?? req.url).split("?")[0] ?? "/";
  return raw.replace(/\/{2,}/g, "/");
}

export function isHealthPath(req: FastifyRequest): boolean {
  return HEALTH_PATHS.has(getStablePath(req));
}

export function routeConfig(req: FastifyRequest): FastifyContextConfig {
  return req.routeOptions.config;
}

export function routeNeedsAuth(req: FastifyRequest): boolean {
  return routeConfig(req).auth === true;
}

export function routeNeedsTenant(req: FastifyRequest): boolean {
  const cfg = routeConfig(req);
  return cfg.tenant === true || cfg.auth === true;
}

/** First non-empty value of a header (Fastify gives string | string[] | undefined). */
export function headerValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/** The client's request id when it is short and plain enough to log and store. */
export function acceptedRequestId(value: string | string[] | undefined): string | undefined {
  const id = headerValue(value);
  return id !== undefined && CLIENT_REQUEST_ID_RE.test(id) ? id : undefined;
}

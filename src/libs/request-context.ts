// src/libs/request-context.ts
// ============================================================================
// Request context: who is calling, for which tenant, from where.
// Built on demand from the decorations the plugin chain leaves on the request.
// ============================================================================

import type { FastifyRequest } from "fastify";
import { headerValue } from "./http.js";

export const ADMIN_ROLE = "admin";

export interface RequestContext {
  request_id: string;
  tenant_id: string;
  user_id: string | null;
  email: string | null;
  roles: string[];
  session_id: string | null;
  client_ip: string | null;
  user_agent: string | null;
  hasRole(role: string): boolean;
  isAdmin(): boolean;
}

export class MissingTenantContextError extends Error {
  constructor() {
    super("tenant_context_missing");
    this.name = "MissingTenantContextError";
  }
}

export function requestContext(req: FastifyRequest): RequestContext {
  const tenantId = req.tenantId ?? req.requestedTenantId;
  if (!tenantId) {
    throw new MissingTenantContextError();
  }

  const roles = req.user?.roles ?? [];

  return {
    request_id: req.id,
    tenant_id: tenantId,
    user_id: req.user?.sub ?? null,
    email: req.user?.email ?? null,
    roles,
    // The access token's jti identifies the session it belongs to.
    session_id: req.user?.jti ?? null,
    client_ip: req.ip || null,
    user_agent: headerValue(req.headers["user-agent"]) ?? null,
    hasRole: (role) => roles.includes(role),
    isAdmin: () => roles.includes(ADMIN_ROLE),
  };
}

// src/plugins/request-context.ts
// ============================================================================
// Request context (tenant header intake)
// ----------------------------------------------------------------------------
// - reads X-Tenant-Id; must be a UUID when present
// - without the header the configured default tenant applies
// - stores the value as requestedTenantId only
//
// On auth routes the header is not trusted: tenant-guard compares it with the
// token's tenant_id and sets request.tenantId from the token.
//
// Order: request-context -> auth -> authorization -> tenant-guard -> db-context
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { headerValue, isHealthPath, UUID_RE } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";

export type RequestContextOptions = {
  defaultTenantId: string;
};

export const TENANT_HEADER = "x-tenant-id";

const requestContextPlugin: FastifyPluginAsync<RequestContextOptions> = async (app, opts) => {
  const defaultTenantId = opts.defaultTenantId.toLowerCase();

  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const headerTenant = headerValue(request.headers[TENANT_HEADER]);

    if (headerTenant !== undefined && !UUID_RE.test(headerTenant)) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid X-Tenant-Id header.");
    }

    request.requestedTenantId = headerTenant ? headerTenant.toLowerCase() : defaultTenantId;
  });
};

export default fp(requestContextPlugin, { name: "request-context" });

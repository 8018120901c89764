// src/plugins/tenant-guard.ts
// ============================================================================
// Tenant guard
// ----------------------------------------------------------------------------
// For routes with config.auth === true:
// - an explicit X-Tenant-Id header must equal the token's tenant_id -> else 403
// - request.tenantId is set from the token, never from the raw header
// Routes without auth keep requestedTenantId (header or default tenant).
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { headerValue, isHealthPath, routeNeedsAuth, UUID_RE } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";
import { TENANT_HEADER } from "./request-context.js";

const tenantGuardPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    if (!routeNeedsAuth(request)) {
      request.tenantId = request.requestedTenantId;
      return;
    }

    const user = request.user;
    if (!user) {
      return sendApiError(reply, 401, "INVALID_TOKEN", "Missing auth context.");
    }

    const jwtTenant = user.tenant_id.toLowerCase();
    if (!UUID_RE.test(jwtTenant)) {
      return sendApiError(reply, 401, "INVALID_TOKEN", "Missing tenant claim.");
    }

    // request-context has already rejected malformed values
    const headerTenant = headerValue(request.headers[TENANT_HEADER]);
    if (headerTenant !== undefined && headerTenant.toLowerCase() !== jwtTenant) {
      return sendApiError(reply, 403, "TENANT_MISMATCH", "Tenant mismatch.");
    }

    request.tenantId = jwtTenant;
  });
};

export default fp(tenantGuardPlugin, { name: "tenant-guard", dependencies: ["auth"] });

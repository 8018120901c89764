// src/plugins/authorization.ts
// Role check for routes with config.roles: every listed role must be in the
// access token's roles claim.
import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { isHealthPath, routeConfig } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";

function requiredRoles(roles: string[] | undefined): string[] {
  return (roles ?? []).map((role) => role.trim()).filter(Boolean);
}

const authorizationPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const required = requiredRoles(routeConfig(request).roles);
    if (required.length === 0) return;

    if (!request.user) {
      return sendApiError(reply, 401, "INVALID_TOKEN", "Missing auth context.");
    }

    const granted = new Set(request.user.roles);
    const missing = required.filter((role) => !granted.has(role));

    if (missing.length > 0) {
      request.log.info({ missing }, "authorization_denied");
      return sendApiError(reply, 403, "INSUFFICIENT_ROLE", "Missing required role.");
    }
  });
};

export default fp(authorizationPlugin, { name: "authorization", dependencies: ["auth"] });

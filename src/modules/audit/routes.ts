// src/modules/audit/routes.ts
// GET /audit-logs (admin): the caller's tenant only, newest first.
import type { FastifyInstance } from "fastify";
import { sendApiError } from "../../libs/error-response.js";
import { AuditQuerySchema, toAuditEntryResponse } from "./types.js";

export default async function auditRoutes(app: FastifyInstance) {
  app.get("/", { config: { auth: true, roles: ["admin"] } }, async (req, reply) => {
    const parsed = AuditQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid audit log query.", parsed.error.flatten());
    }

    const tenantId = req.tenantId;
    if (!req.audit || !tenantId) {
      req.log.error({ route: req.url }, "missing_db_context");
      return sendApiError(reply, 500, "INTERNAL", "Database context not available for this request.");
    }

    const q = parsed.data;
    const entries = await req.audit.query({
      tenantId,
      actorId: q.actor_id,
      action: q.action,
      resourceType: q.resource_type,
      resourceId: q.resource_id,
      from: q.from,
      to: q.to,
      skip: q.skip,
      limit: q.limit,
    });

    return reply.send(entries.map(toAuditEntryResponse));
  });
}

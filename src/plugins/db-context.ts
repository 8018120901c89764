// src/plugins/db-context.ts
// ============================================================================
// DB context (one unit of work per request)
// ----------------------------------------------------------------------------
// For routes with config.tenant or config.auth:
// - DataSource.begin(): dedicated client, BEGIN, set_config('app.tenant'),
//   set_config('app.user_id') when authenticated
// - request.uow + request.audit for the handler
// - onSend:     COMMIT (ROLLBACK when the status is >= 500)
// - onError:    ROLLBACK
// - onResponse: ROLLBACK if still open (aborted requests)
// Each unit of work is finalised exactly once.
//
// The tenant always comes from request.tenantId (tenant-guard.ts), i.e. from
// the token on auth routes.
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyInstance, FastifyPluginAsync, FastifyRequest } from "fastify";
import { isHealthPath, routeNeedsTenant } from "../libs/http.js";
import { apiError, sendApiError } from "../libs/error-response.js";
import { DatabaseAuditLogger, LoggingAuditLogger } from "../modules/audit/logger.js";

export type DbContextOptions = {
  /** true: audit rows in audit_logs; false: audit events as log lines only */
  auditLogging: boolean;
};

async function finalize(
  app: FastifyInstance,
  request: FastifyRequest,
  mode: "commit" | "rollback",
): Promise<boolean> {
  const state = request._txState;
  if (!state || state.finalized) return true;
  state.finalized = true;

  const uow = state.uow;
  state.uow = undefined;
  request.uow = undefined;
  if (!uow) return true;

  try {
    await (mode === "commit" ? uow.commit() : uow.rollback());
    return true;
  } catch (err) {
    app.log.error({ err, mode, request_id: request.id }, "db_tx_finalize_failed");
    return false;
  }
}

const dbContextPlugin: FastifyPluginAsync<DbContextOptions> = async (app, opts) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;
    if (!routeNeedsTenant(request)) return;

    const tenantId = request.tenantId;
    if (!tenantId) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Tenant context not set.");
    }

    request._txState = { finalized: false };

    const uow = await app.services.dataSource.begin({
      tenantId,
      userId: request.user?.sub,
    });

    request._txState.uow = uow;
    request.uow = uow;
    request.audit = opts.auditLogging
      ? new DatabaseAuditLogger(uow.auditLogs)
      : new LoggingAuditLogger(request.log);
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const mode = reply.statusCode >= 500 ? "rollback" : "commit";
    const ok = await finalize(app, request, mode);
    if (ok || mode === "rollback") return payload;

    // The change did not persist: do not report success.
    reply.code(500).type("application/json");
    return JSON.stringify(apiError(500, "INTERNAL", "Internal server error."));
  });

  app.addHook("onError", async (request) => {
    await finalize(app, request, "rollback");
  });

  app.addHook("onResponse", async (request) => {
    await finalize(app, request, "rollback");
  });
};

export default fp(dbContextPlugin, { name: "db-context", dependencies: ["tenant-guard"] });

// src/modules/audit/logger.ts
// ============================================================================
// Audit loggers
// ----------------------------------------------------------------------------
// - DatabaseAuditLogger: append-only rows in audit_logs (same transaction as
//   the change it describes)
// - LoggingAuditLogger: structured pino lines, nothing to query
// ============================================================================

import { randomUUID } from "node:crypto";
import type { BaseLogger } from "pino";
import type { RequestContext } from "../../libs/request-context.js";
import { withoutSecrets } from "../../libs/pii.js";
import {
  ANONYMOUS_ACTOR_ID,
  type AuditAction,
  type AuditEntry,
  type AuditFilter,
  type AuditLogger,
  type AuditLogRepository,
  type AuditValues,
  type DataClassification,
  type StoredAuditEntry,
} from "./types.js";

export type AuditFields = {
  action: AuditAction;
  resourceType: string;
  resourceId: string;
  detail?: string;
  success?: boolean;
  errorMessage?: string;
  oldValues?: AuditValues;
  newValues?: AuditValues;
  classification?: DataClassification;
  /** Overrides the actor from the context (e.g. the user who just registered). */
  actorId?: string;
};

/** Fills actor, tenant, request, session and IP from the request context. */
export function auditEntryFromContext(ctx: RequestContext, fields: AuditFields): AuditEntry {
  const actorId = fields.actorId ?? ctx.user_id;

  return {
    actor_id: actorId ?? ANONYMOUS_ACTOR_ID,
    actor_type: actorId ? "user" : "anonymous",
    actor_ip: ctx.client_ip,
    action: fields.action,
    action_detail: fields.detail ?? null,
    resource_type: fields.resourceType,
    resource_id: fields.resourceId,
    tenant_id: ctx.tenant_id,
    request_id: ctx.request_id,
    session_id: ctx.session_id,
    timestamp: new Date(),
    success: fields.success ?? true,
    error_message: fields.errorMessage ?? null,
    old_values: fields.oldValues ? withoutSecrets(fields.oldValues) : null,
    new_values: fields.newValues ? withoutSecrets(fields.newValues) : null,
    data_classification: fields.classification ?? "internal",
  };
}

export class DatabaseAuditLogger implements AuditLogger {
  constructor(private readonly repo: AuditLogRepository) {}

  log(entry: AuditEntry): Promise<string> {
    return this.repo.insert(entry);
  }

  query(filter: AuditFilter): Promise<StoredAuditEntry[]> {
    return this.repo.find(filter);
  }
}

export class LoggingAuditLogger implements AuditLogger {
  constructor(private readonly sink: BaseLogger) {}

  async log(entry: AuditEntry): Promise<string> {
    const id = randomUUID();
    this.sink.info(
      {
        audit: {
          ...entry,
          id,
          timestamp: entry.timestamp.toISOString(),
        },
      },
      "audit_event",
    );
    return id;
  }

  async query(_filter: AuditFilter): Promise<StoredAuditEntry[]> {
    return [];
  }
}

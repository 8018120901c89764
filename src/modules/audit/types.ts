// src/modules/audit/types.ts
// ============================================================================
// Audit log types
// ----------------------------------------------------------------------------
// Who did what, to which resource, under which tenant, when, with which result.
// Rows are append-only: the repository has no update or delete.
// ============================================================================

import { z } from "zod";

export const AUDIT_ACTIONS = [
  "create",
  "read",
  "update",
  "delete",
  "login",
  "logout",
  "login_failed",
  "export",
  "import",
  "grant_access",
  "revoke_access",
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const DATA_CLASSIFICATIONS = ["public", "internal", "confidential", "restricted"] as const;

export type DataClassification = (typeof DATA_CLASSIFICATIONS)[number];

/** Actor id recorded for requests without an authenticated user. */
export const ANONYMOUS_ACTOR_ID = "00000000-0000-0000-0000-000000000000";

export type ActorType = "user" | "anonymous" | "system";

export type AuditValues = Record<string, unknown>;

export interface AuditEntry {
  actor_id: string;
  actor_type: ActorType;
  actor_ip: string | null;
  action: AuditAction;
  action_detail: string | null;
  resource_type: string;
  resource_id: string;
  tenant_id: string;
  request_id: string;
  session_id: string | null;
  timestamp: Date;
  success: boolean;
  error_message: string | null;
  old_values: AuditValues | null;
  new_values: AuditValues | null;
  data_classification: DataClassification;
}

export type StoredAuditEntry = AuditEntry & { id: string };

export type AuditFilter = {
  tenantId: string;
  actorId?: string;
  action?: AuditAction;
  resourceType?: string;
  resourceId?: string;
  from?: Date;
  to?: Date;
  skip: number;
  limit: number;
};

export interface AuditLogRepository {
  insert(entry: AuditEntry): Promise<string>;
  find(filter: AuditFilter): Promise<StoredAuditEntry[]>;
}

export interface AuditLogger {
  log(entry: AuditEntry): Promise<string>;
  query(filter: AuditFilter): Promise<StoredAuditEntry[]>;
}

export const AuditQuerySchema = z
  .object({
    actor_id: z.string().uuid().optional(),
    action: z.enum(AUDIT_ACTIONS).optional(),
    resource_type: z.string().min(1).max(100).optional(),
    resource_id: z.string().min(1).max(255).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(500).default(100),
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, {
    message: "`from` must not be after `to`.",
    path: ["from"],
  });

export type AuditQuery = z.infer<typeof AuditQuerySchema>;

export type AuditEntryResponse = Omit<StoredAuditEntry, "timestamp"> & { timestamp: string };

export function toAuditEntryResponse(entry: StoredAuditEntry): AuditEntryResponse {
  return { ...entry, timestamp: entry.timestamp.toISOString() };
}

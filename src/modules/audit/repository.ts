// src/modules/audit/repository.ts
// ============================================================================
// Audit log repository (Postgres). INSERT and SELECT only; the table carries a
// trigger that rejects UPDATE/DELETE as well.
// ============================================================================

import type { DbClient } from "../../libs/db.js";
import type { AuditFilter, AuditLogRepository, StoredAuditEntry } from "./types.js";

const AUDIT_COLUMNS = `
  id,
  actor_id,
  actor_type,
  actor_ip,
  action,
  action_detail,
  resource_type,
  resource_id,
  tenant_id,
  request_id,
  session_id,
  "timestamp",
  success,
  error_message,
  old_values,
  new_values,
  data_classification
`;

export function pgAuditLogRepository(client: DbClient): AuditLogRepository {
  return {
    async insert(entry) {
      const { rows } = await client.query<{ id: string }>(
        `
          INSERT INTO audit_logs (
            actor_id, actor_type, actor_ip,
            action, action_detail,
            resource_type, resource_id,
            tenant_id, request_id, session_id,
            "timestamp", success, error_message,
            old_values, new_values, data_classification
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14::jsonb, $15::jsonb, $16)
          RETURNING id;
        `,
        [
          entry.actor_id,
          entry.actor_type,
          entry.actor_ip,
          entry.action,
          entry.action_detail,
          entry.resource_type,
          entry.resource_id,
          entry.tenant_id,
          entry.request_id,
          entry.session_id,
          entry.timestamp,
          entry.success,
          entry.error_message,
          entry.old_values === null ? null : JSON.stringify(entry.old_values),
          entry.new_values === null ? null : JSON.stringify(entry.new_values),
          entry.data_classification,
        ],
      );
      const row = rows[0];
      if (!row) throw new Error("INSERT INTO audit_logs returned no row");
      return row.id;
    },

    async find(filter: AuditFilter) {
      const where: string[] = ["tenant_id = $1"];
      const params: unknown[] = [filter.tenantId];

      const add = (sql: string, value: unknown) => {
        params.push(value);
        where.push(sql.replace("?", `$${params.length}`));
      };

      if (filter.actorId) add("actor_id = ?", filter.actorId);
      if (filter.action) add("action = ?", filter.action);
      if (filter.resourceType) add("resource_type = ?", filter.resourceType);
      if (filter.resourceId) add("resource_id = ?", filter.resourceId);
      if (filter.from) add(`"timestamp" >= ?`, filter.from);
      if (filter.to) add(`"timestamp" <= ?`, filter.to);

      params.push(filter.skip, filter.limit);

      const { rows } = await client.query<StoredAuditEntry>(
        `
          SELECT ${AUDIT_COLUMNS}
          FROM audit_logs
          WHERE ${where.join(" AND ")}
          ORDER BY "timestamp" DESC, id DESC
          OFFSET $${params.length - 1}
          LIMIT $${params.length};
        `,
        params,
      );
      return rows;
    },
  };
}

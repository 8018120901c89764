// src/libs/data-source.ts
// ============================================================================
// DataSource / UnitOfWork
// ----------------------------------------------------------------------------
// One UnitOfWork per request: a dedicated client, BEGIN, and the tenant/user
// GUCs for row level security:
//     SELECT set_config('app.tenant', $1, true);
//     SELECT set_config('app.user_id', $2, true);
// Repositories are bound to that client. commit()/rollback() release it.
// ============================================================================

import { createPool, poolHealth, type DbPool, type HealthResult } from "./db.js";
import { pgUserRepository } from "../modules/users/repository.js";
import { pgAuditLogRepository } from "../modules/audit/repository.js";
import type { UserRepository } from "../modules/users/types.js";
import type { AuditLogRepository } from "../modules/audit/types.js";

export type UnitOfWorkContext = {
  tenantId: string;
  userId?: string;
};

export interface UnitOfWork {
  readonly tenantId: string;
  readonly users: UserRepository;
  readonly auditLogs: AuditLogRepository;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface DataSource {
  begin(ctx: UnitOfWorkContext): Promise<UnitOfWork>;
  health(): Promise<HealthResult>;
  close(): Promise<void>;
}

export class PgDataSource implements DataSource {
  constructor(private readonly pool: DbPool) {}

  static fromUrl(connectionString?: string): PgDataSource {
    return new PgDataSource(createPool(connectionString));
  }

  async begin(ctx: UnitOfWorkContext): Promise<UnitOfWork> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      await client.query("SELECT set_config('app.tenant', $1, true);", [ctx.tenantId]);
      if (ctx.userId) {
        await client.query("SELECT set_config('app.user_id', $1, true);", [ctx.userId]);
      }
    } catch (err) {
      // Releasing with an error destroys the connection and its open transaction.
      client.release(err instanceof Error ? err : true);
      throw err;
    }

    let done = false;
    const finish = async (statement: "COMMIT" | "ROLLBACK") => {
      if (done) return;
      done = true;
      try {
        await client.query(statement);
        client.release();
      } catch (err) {
        client.release(err instanceof Error ? err : true);
        throw err;
      }
    };

    return {
      tenantId: ctx.tenantId,
      users: pgUserRepository(client),
      auditLogs: pgAuditLogRepository(client),
      commit: () => finish("COMMIT"),
      rollback: () => finish("ROLLBACK"),
    };
  }

  health(): Promise<HealthResult> {
    return poolHealth(this.pool);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

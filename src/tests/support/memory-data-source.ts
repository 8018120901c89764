// src/tests/support/memory-data-source.ts
// In-process DataSource for HTTP tests. Each unit of work works on a copy of
// the tables; commit() publishes the copy, rollback() drops it.

import { randomUUID } from "node:crypto";
import type { DataSource, UnitOfWork, UnitOfWorkContext } from "../../libs/data-source.js";
import type { HealthResult } from "../../libs/db.js";
import type {
  AuditEntry,
  AuditFilter,
  AuditLogRepository,
  StoredAuditEntry,
} from "../../modules/audit/types.js";
import type { NewUser, UserPatch, UserRepository, UserRow } from "../../modules/users/types.js";

type Tables = {
  users: UserRow[];
  auditLogs: StoredAuditEntry[];
};

class UniqueViolation extends Error {
  readonly code = "23505";
  constructor(constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
  }
}

// Rows leave the repository as copies, like rows read from Postgres.
function cloneUser(user: UserRow): UserRow {
  return { ...user, roles: [...user.roles] };
}

function copyTables(tables: Tables): Tables {
  return {
    users: tables.users.map(cloneUser),
    auditLogs: [...tables.auditLogs],
  };
}

function memoryUserRepository(tables: Tables): UserRepository {
  const rowById = (tenantId: string, id: string) =>
    tables.users.find((u) => u.tenant_id === tenantId && u.id === id);

  const findById = async (tenantId: string, id: string) => {
    const row = rowById(tenantId, id);
    return row ? cloneUser(row) : null;
  };

  const emailTaken = (tenantId: string, email: string, exceptId?: string) =>
    tables.users.some((u) => u.tenant_id === tenantId && u.email === email && u.id !== exceptId);

  return {
    findById,

    async findByEmail(tenantId, email) {
      const wanted = email.toLowerCase();
      const row = tables.users.find((u) => u.tenant_id === tenantId && u.email === wanted);
      return row ? cloneUser(row) : null;
    },

    async list(tenantId, page) {
      return tables.users
        .filter((u) => u.tenant_id === tenantId)
        .slice(page.skip, page.skip + page.limit)
        .map(cloneUser);
    },

    async create(input: NewUser) {
      const email = input.email.toLowerCase();
      if (emailTaken(input.tenantId, email)) throw new UniqueViolation("users_tenant_email_key");
      const now = new Date();
      const row: UserRow = {
        id: randomUUID(),
        tenant_id: input.tenantId,
        email,
        hashed_password: input.hashedPassword,
        full_name: input.fullName,
        roles: [...input.roles],
        is_active: true,
        is_verified: input.isVerified ?? false,
        last_login_at: null,
        created_at: now,
        updated_at: now,
      };
      tables.users.push(row);
      return cloneUser(row);
    },

    async update(tenantId, id, patch: UserPatch) {
      const row = rowById(tenantId, id);
      if (!row) return null;
      if (patch.email !== undefined) {
        const email = patch.email.toLowerCase();
        if (emailTaken(tenantId, email, id)) throw new UniqueViolation("users_tenant_email_key");
        row.email = email;
      }
      if (patch.hashedPassword !== undefined) row.hashed_password = patch.hashedPassword;
      if (patch.fullName !== undefined) row.full_name = patch.fullName;
      if (patch.roles !== undefined) row.roles = [...patch.roles];
      if (patch.isActive !== undefined) row.is_active = patch.isActive;
      row.updated_at = new Date();
      return cloneUser(row);
    },

    async touchLastLogin(tenantId, id, at) {
      const row = rowById(tenantId, id);
      if (row) row.last_login_at = at;
    },
  };
}

function memoryAuditRepository(tables: Tables): AuditLogRepository {
  return {
    async insert(entry: AuditEntry) {
      const id = randomUUID();
      tables.auditLogs.push({ ...entry, id });
      return id;
    },

    async find(filter: AuditFilter) {
      return tables.auditLogs
        .filter(
          (e) =>
            e.tenant_id === filter.tenantId &&
            (!filter.actorId || e.actor_id === filter.actorId) &&
            (!filter.action || e.action === filter.action) &&
            (!filter.resourceType || e.resource_type === filter.resourceType) &&
            (!filter.resourceId || e.resource_id === filter.resourceId) &&
            (!filter.from || e.timestamp >= filter.from) &&
            (!filter.to || e.timestamp <= filter.to),
        )
        .map((entry, index) => ({ entry, index }))
        // newest first; insertion order breaks timestamp ties
        .sort((a, b) => b.entry.timestamp.getTime() - a.entry.timestamp.getTime() || b.index - a.index)
        .map(({ entry }) => entry)
        .slice(filter.skip, filter.skip + filter.limit);
    },
  };
}

export class MemoryDataSource implements DataSource {
  tables: Tables = { users: [], auditLogs: [] };
  healthy = true;
  /** Contexts passed to begin(), in order. */
  readonly begun: UnitOfWorkContext[] = [];

  async begin(ctx: UnitOfWorkContext): Promise<UnitOfWork> {
    this.begun.push(ctx);
    const working = copyTables(this.tables);
    let finished = false;

    const finish = () => {
      if (finished) throw new Error("unit of work already finished");
      finished = true;
    };

    return {
      tenantId: ctx.tenantId,
      users: memoryUserRepository(working),
      auditLogs: memoryAuditRepository(working),
      commit: async () => {
        finish();
        this.tables = working;
      },
      rollback: async () => {
        finish();
      },
    };
  }

  async health(): Promise<HealthResult> {
    return this.healthy ? { ok: true } : { ok: false, error: "connection refused" };
  }

  async close(): Promise<void> {}

  /** Direct insert for fixtures, outside any unit of work. */
  async seedUser(input: NewUser, opts: { isActive?: boolean } = {}): Promise<UserRow> {
    const repo = memoryUserRepository(this.tables);
    const created = await repo.create(input);
    if (opts.isActive === false) {
      return (await repo.update(input.tenantId, created.id, { isActive: false })) ?? created;
    }
    return created;
  }

  userByEmail(email: string): UserRow | undefined {
    return this.tables.users.find((u) => u.email === email);
  }
}

// src/modules/users/repository.ts
// ============================================================================
// Users repository (Postgres)
// ----------------------------------------------------------------------------
// - works only with the per-request DbClient (transaction + app.tenant GUC)
// - every statement is additionally filtered by tenant_id
// - no business logic, data access only
// ============================================================================

import type { DbClient } from "../../libs/db.js";
import type { NewUser, Page, UserPatch, UserRepository, UserRow } from "./types.js";

const USER_COLUMNS = `
  id,
  tenant_id,
  email,
  hashed_password,
  full_name,
  roles,
  is_active,
  is_verified,
  last_login_at,
  created_at,
  updated_at
`;

// UserPatch key -> column
const PATCH_COLUMNS: ReadonlyArray<readonly [keyof UserPatch, string]> = [
  ["email", "email"],
  ["hashedPassword", "hashed_password"],
  ["fullName", "full_name"],
  ["roles", "roles"],
  ["isActive", "is_active"],
];

function patchAssignments(patch: UserPatch, firstParam: number) {
  const sets: string[] = [];
  const values: unknown[] = [];

  for (const [key, column] of PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) continue;
    const param = `$${firstParam + values.length}`;
    if (key === "roles") {
      sets.push(`${column} = ${param}::jsonb`);
      values.push(JSON.stringify(value));
    } else {
      sets.push(`${column} = ${param}`);
      values.push(value);
    }
  }

  return { sets, values };
}

export function pgUserRepository(client: DbClient): UserRepository {
  async function findById(tenantId: string, id: string): Promise<UserRow | null> {
    const { rows } = await client.query<UserRow>(
      `
        SELECT ${USER_COLUMNS}
        FROM users
        WHERE tenant_id = $1
          AND id = $2
        LIMIT 1;
      `,
      [tenantId, id],
    );
    return rows[0] ?? null;
  }

  return {
    findById,

    async findByEmail(tenantId, email) {
      const { rows } = await client.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM users
          WHERE tenant_id = $1
            AND email = $2
          LIMIT 1;
        `,
        [tenantId, email.toLowerCase()],
      );
      return rows[0] ?? null;
    },

    async list(tenantId: string, page: Page) {
      const { rows } = await client.query<UserRow>(
        `
          SELECT ${USER_COLUMNS}
          FROM users
          WHERE tenant_id = $1
          ORDER BY created_at ASC, id ASC
          OFFSET $2
          LIMIT $3;
        `,
        [tenantId, page.skip, page.limit],
      );
      return rows;
    },

    async create(input: NewUser) {
      const { rows } = await client.query<UserRow>(
        `
          INSERT INTO users (tenant_id, email, hashed_password, full_name, roles, is_verified)
          VALUES ($1, $2, $3, $4, $5::jsonb, $6)
          RETURNING ${USER_COLUMNS};
        `,
        [
          input.tenantId,
          input.email.toLowerCase(),
          input.hashedPassword,
          input.fullName,
          JSON.stringify(input.roles),
          input.isVerified ?? false,
        ],
      );
      const row = rows[0];
      if (!row) throw new Error("INSERT INTO users returned no row");
      return row;
    },

    async update(tenantId, id, patch) {
      const { sets, values } = patchAssignments(patch, 3);
      if (sets.length === 0) {
        return findById(tenantId, id);
      }

      const { rows } = await client.query<UserRow>(
        `
          UPDATE users
          SET ${sets.join(", ")}
          WHERE tenant_id = $1
            AND id = $2
          RETURNING ${USER_COLUMNS};
        `,
        [tenantId, id, ...values],
      );
      return rows[0] ?? null;
    },

    async touchLastLogin(tenantId, id, at) {
      await client.query(
        `
          UPDATE users
          SET last_login_at = $3
          WHERE tenant_id = $1
            AND id = $2;
        `,
        [tenantId, id, at],
      );
    },
  };
}

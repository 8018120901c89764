// src/libs/db.ts
// ============================================================================
// PostgreSQL connector
// - one connection pool per process, created on first use
// - typed query<T>() for stateless statements (scripts, health)
// - health checks for /ready
// - graceful shutdown
// ============================================================================

import pg, { type QueryResultRow } from "pg";
import { env } from "./env.js";

const { Pool } = pg;

/**
 * Dedicated client for one unit of work (BEGIN ... COMMIT). Repositories take
 * this instead of the pool so every statement of a request shares the
 * transaction.
 */
export type DbClient = pg.PoolClient;

export type DbPool = pg.Pool;

let pool: DbPool | undefined;

export function createPool(connectionString: string | undefined = env.DATABASE_URL): DbPool {
  if (!connectionString) {
    throw new Error("DATABASE_URL is not configured.");
  }
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 5_000,
  });
}

export function getPool(): DbPool {
  pool ??= createPool();
  return pool;
}

/**
 * Runs a statement on the shared pool and returns the rows.
 *
 * @example
 *   const admins = await query<{ id: string }>(
 *     "SELECT id FROM users WHERE roles ? 'admin'",
 *   );
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params: unknown[] = [],
): Promise<T[]> {
  const res = await getPool().query<T>(sql, params);
  return res.rows;
}

export type HealthResult = { ok: boolean; error?: string };

export async function poolHealth(target: DbPool): Promise<HealthResult> {
  try {
    await target.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      error: err instanceof Error ? err.message : "unknown database error",
    };
  }
}

/** Closes the shared pool if one was ever opened. */
export async function closeDb(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = undefined;
  await current.end();
}

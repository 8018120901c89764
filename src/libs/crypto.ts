// src/libs/crypto.ts
// ============================================================================
// Password hashing & verification (bcrypt)
// ----------------------------------------------------------------------------
// - bcrypt via bcryptjs (pure JS); cost factor from BCRYPT_ROUNDS
// - $2a$/$2b$ hashes both verify, so seeded hashes from init.sql work as-is
// ============================================================================

import bcrypt from "bcryptjs";
import { randomUUID } from "node:crypto";
import { env } from "./env.js";

export async function hashPassword(
  plain: string,
  rounds: number = env.BCRYPT_ROUNDS,
): Promise<string> {
  return bcrypt.hash(plain, rounds);
}

/** False for a wrong password and for a hash that is not bcrypt at all. */
export async function verifyPassword(hash: string, plain: string): Promise<boolean> {
  try {
    return await bcrypt.compare(plain, hash);
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Timing hardening: unknown users still pay for one bcrypt comparison.
// The dummy hash is computed lazily with the configured cost.
// ---------------------------------------------------------------------------

let dummyHash: Promise<string> | undefined;

export function getDummyPasswordHash(): Promise<string> {
  dummyHash ??= hashPassword(randomUUID());
  return dummyHash;
}

// src/libs/pii.ts
// Security logs and audit rows never carry raw credentials; emails and client
// addresses in log lines are hashed.
import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase());
}

export function hashIpForLog(ip: string): string {
  return sha256(ip.trim());
}

const SECRET_KEY_RE = /(pass(word)?|secret|token)/i;

export function isSecretKey(key: string): boolean {
  return SECRET_KEY_RE.test(key);
}

/** Shallow copy without password, secret and token fields. */
export function withoutSecrets(values: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!isSecretKey(key)) out[key] = value;
  }
  return out;
}

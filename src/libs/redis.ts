// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis integration (ioredis v5)
// - one client per app, created from REDIS_URL
// - revocation list and fixed-window rate-limit counters
// - every key is prefixed with REDIS_NAMESPACE
// ============================================================================
import { createHash } from "node:crypto";
import { Redis } from "ioredis";
import type { Logger } from "pino";
import type { RateLimitHit, RateLimitStore, RevocationStore } from "./stores.js";

const KEY_PART_RE = /^[a-z0-9:_/.-]{1,128}$/;

// -----------------------------
// Client
// -----------------------------
export function createRedisClient(url: string, log?: Logger): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    enableReadyCheck: true,
    enableAutoPipelining: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  client.on("ready", () => log?.info("redis_ready"));
  client.on("error", (err) => log?.error({ err }, "redis_error"));
  client.on("end", () => log?.info("redis_end"));

  return client;
}

export async function ensureRedis(client: Redis): Promise<void> {
  if (client.status === "wait") {
    await client.connect();
  }
  await client.ping();
}

export type RedisHealth = { ok: boolean; status: string; error?: string };

export async function redisHealth(client: Redis): Promise<RedisHealth> {
  try {
    const pong = await client.ping();
    return { ok: pong === "PONG", status: client.status };
  } catch (err) {
    return {
      ok: false,
      status: client.status,
      error: err instanceof Error ? err.message : "unknown redis error",
    };
  }
}

export async function quitRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}

// -----------------------------
// Key helpers
// -----------------------------
function hashKeyPart(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/** Short, safe key parts stay readable; anything else is hashed. */
export function normalizedKeyPart(input: string): string {
  const value = input.trim().toLowerCase();
  if (KEY_PART_RE.test(value)) return value;
  return hashKeyPart(input);
}

export function namespacedKey(namespace: string, ...parts: string[]): string {
  return [namespace, ...parts].join(":");
}

// -----------------------------
// Token revocation
// -----------------------------
export class RedisRevocationStore implements RevocationStore {
  constructor(
    private readonly client: Redis,
    private readonly namespace: string,
  ) {}

  private key(jti: string): string {
    return namespacedKey(this.namespace, "revoked", normalizedKeyPart(jti));
  }

  async revoke(jti: string, ttlSec: number): Promise<void> {
    await this.client.set(this.key(jti), "1", "EX", Math.max(1, Math.ceil(ttlSec)));
  }

  async isRevoked(jti: string): Promise<boolean> {
    return (await this.client.exists(this.key(jti))) === 1;
  }
}

// -----------------------------
// Rate-limit counters
// -----------------------------
export class RedisRateLimitStore implements RateLimitStore {
  constructor(
    private readonly client: Redis,
    private readonly namespace: string,
  ) {}

  async hit(key: string, windowSec: number): Promise<RateLimitHit> {
    const rateKey = namespacedKey(this.namespace, "rate", key);
    const count = await this.client.incr(rateKey);
    if (count === 1) await this.client.expire(rateKey, windowSec);
    const ttl = await this.client.ttl(rateKey);
    return { count, ttl: ttl > 0 ? ttl : windowSec };
  }
}

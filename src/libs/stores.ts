// src/libs/stores.ts
// ============================================================================
// Small key/value capabilities the app needs besides Postgres.
// Redis implementations live in redis.ts; the in-process ones below are used
// when REDIS_URL is unset (local development, tests).
// ============================================================================

export interface RevocationStore {
  revoke(jti: string, ttlSec: number): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

export type RateLimitHit = {
  count: number;
  /** Seconds until the current window resets. */
  ttl: number;
};

export interface RateLimitStore {
  hit(key: string, windowSec: number): Promise<RateLimitHit>;
}

type Clock = () => number;

// In-process maps are swept of expired entries on write; past `maxEntries`
// the oldest entries go first.
const DEFAULT_MAX_ENTRIES = 10_000;

function evictOldest<K, V>(map: Map<K, V>, maxEntries: number): void {
  for (const key of map.keys()) {
    if (map.size <= maxEntries) return;
    map.delete(key);
  }
}

export class MemoryRevocationStore implements RevocationStore {
  private readonly entries = new Map<string, number>();

  constructor(
    private readonly now: Clock = Date.now,
    private readonly maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  async revoke(jti: string, ttlSec: number): Promise<void> {
    const now = this.now();
    for (const [key, expiresAt] of this.entries) {
      if (expiresAt <= now) this.entries.delete(key);
    }
    this.entries.delete(jti);
    this.entries.set(jti, now + Math.max(1, ttlSec) * 1000);
    evictOldest(this.entries, this.maxEntries);
  }

  async isRevoked(jti: string): Promise<boolean> {
    const expiresAt = this.entries.get(jti);
    if (expiresAt === undefined) return false;
    if (expiresAt <= this.now()) {
      this.entries.delete(jti);
      return false;
    }
    return true;
  }
}

type Window = { count: number; resetAt: number };

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, Window>();
  private nextSweepAt = 0;

  constructor(
    private readonly now: Clock = Date.now,
    private readonly maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {}

  get size(): number {
    return this.windows.size;
  }

  async hit(key: string, windowSec: number): Promise<RateLimitHit> {
    const now = this.now();
    if (now >= this.nextSweepAt) {
      for (const [k, w] of this.windows) {
        if (w.resetAt <= now) this.windows.delete(k);
      }
      this.nextSweepAt = now + 1000;
    }

    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + windowSec * 1000 };
      this.windows.delete(key);
      this.windows.set(key, window);
      evictOldest(this.windows, this.maxEntries);
    }
    window.count += 1;
    return { count: window.count, ttl: Math.ceil((window.resetAt - now) / 1000) };
  }
}

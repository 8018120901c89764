// src/services.ts
// ============================================================================
// Infrastructure the app runs on, created once per process and handed to
// buildApp(). Tests pass in-process replacements instead.
// ============================================================================

import type { Logger } from "pino";
import { PgDataSource, type DataSource } from "./libs/data-source.js";
import { env, type Env } from "./libs/env.js";
import { createTokenService, type TokenService } from "./libs/jwt.js";
import {
  createRedisClient,
  ensureRedis,
  quitRedis,
  redisHealth,
  RedisRateLimitStore,
  RedisRevocationStore,
  type RedisHealth,
} from "./libs/redis.js";
import type { SecretVault } from "./libs/secret-vault.js";
import { settings as defaultSettings, type Settings } from "./libs/settings.js";
import {
  MemoryRateLimitStore,
  MemoryRevocationStore,
  type RateLimitStore,
  type RevocationStore,
} from "./libs/stores.js";

export interface AppServices {
  dataSource: DataSource;
  tokens: TokenService;
  revocations: RevocationStore;
  rateLimits: RateLimitStore;
  /** Undefined when no Redis is configured. */
  checkRedis?: () => Promise<RedisHealth>;
  close(): Promise<void>;
}

export function tokenServiceFromEnv(secret: string, source: Env = env): TokenService {
  return createTokenService({
    secret,
    previousSecret: source.JWT_SECRET_PREVIOUS,
    issuer: source.JWT_ISSUER,
    audience: source.JWT_AUDIENCE,
    accessTtlSec: source.JWT_ACCESS_TTL,
    refreshTtlSec: source.JWT_REFRESH_TTL,
    clockSkewSec: source.JWT_CLOCK_SKEW_SEC,
  });
}

export function jwtSecretName(cfg: Settings = defaultSettings): string {
  return `${cfg.secrets.prefix}/${cfg.profile}/jwt`;
}

/** JWT_SECRET(_FILE) first, then the `secret` field of <prefix>/<profile>/jwt. */
export async function resolveJwtSecret(
  vault: SecretVault,
  cfg: Settings = defaultSettings,
  source: Env = env,
): Promise<string> {
  if (source.JWT_SECRET) return source.JWT_SECRET;

  const name = jwtSecretName(cfg);
  const stored = await vault.getSecretJson(name);
  const secret = stored?.secret;
  if (typeof secret !== "string" || secret === "") {
    throw new Error(`JWT secret missing: set JWT_SECRET or store { "secret": ... } in ${name}.`);
  }
  return secret;
}

export async function createServices(opts: {
  jwtSecret: string;
  log: Logger;
  source?: Env;
}): Promise<AppServices> {
  const source = opts.source ?? env;
  const dataSource = PgDataSource.fromUrl(source.DATABASE_URL);
  const tokens = tokenServiceFromEnv(opts.jwtSecret, source);

  if (!source.REDIS_URL) {
    opts.log.warn("REDIS_URL unset: revocations and rate limits are kept in process memory");
    return {
      dataSource,
      tokens,
      revocations: new MemoryRevocationStore(),
      rateLimits: new MemoryRateLimitStore(),
      close: () => dataSource.close(),
    };
  }

  const redis = createRedisClient(source.REDIS_URL, opts.log.child({ component: "redis" }));
  await ensureRedis(redis);

  return {
    dataSource,
    tokens,
    revocations: new RedisRevocationStore(redis, source.REDIS_NAMESPACE),
    rateLimits: new RedisRateLimitStore(redis, source.REDIS_NAMESPACE),
    checkRedis: () => redisHealth(redis),
    async close() {
      await quitRedis(redis);
      await dataSource.close();
    },
  };
}

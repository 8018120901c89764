// src/libs/env.ts
// ============================================================================
// Environment handling (Docker + secrets-first) with zod
// ----------------------------------------------------------------------------
// - No .env dependency (no dotenv)
// - Secrets preferably read from *_FILE (Docker secrets)
// - Fail-fast only on a real service start (not on test imports)
// - Never log secret values (only [set]/[unset])
//
// Values that have a profile-level default (LOG_LEVEL, CORS_ORIGIN, feature
// flags, DEFAULT_TENANT_ID) stay optional here; settings.ts merges them with
// config/app.yaml + config/profile.<PROFILE>.yaml.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: read secrets
// ----------------------------------------------------------------------------

/**
 * Reads a secret from a file (Docker secrets: /run/secrets/*).
 * Trailing newlines are stripped; an unreadable or empty file is an error.
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} is not readable: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} is empty: ${filePath}`);

  return trimmed;
}

/** *_FILE wins, the plain variable is the fallback for local development. */
export function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile) return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

export function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// "true"/"1"/"yes" -> true, "false"/"0"/"no" -> false. z.coerce.boolean() would
// turn the string "false" into true.
const envBoolean = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

export const EnvSchema = z.object({
  // Runtime / server
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PROFILE: z.enum(["dev", "prod", "test"]).default("dev"),
  CONFIG_DIR: z.string().default("config"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.string().optional(),

  // HTTP
  CORS_ORIGIN: z.string().optional(),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: envBoolean.default("true"),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),

  // Postgres
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FILE: z.string().optional(),

  // Redis (optional outside production: in-process stores are used instead)
  REDIS_URL: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("keystone"),

  // AWS-compatible services (LocalStack in dev)
  AWS_ENDPOINT_URL: z.string().url().optional(),
  AWS_REGION: z.string().default("us-east-1"),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  SECRETS_BACKEND: z.enum(["auto", "aws", "env"]).default("auto"),

  // JWT
  JWT_SECRET: z.string().optional(),
  JWT_SECRET_FILE: z.string().optional(),
  JWT_SECRET_PREVIOUS: z.string().optional(),
  JWT_SECRET_PREVIOUS_FILE: z.string().optional(),
  JWT_ISSUER: z.string().default("keystone-api"),
  JWT_AUDIENCE: z.string().default("keystone-web"),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(30 * 60),
  JWT_REFRESH_TTL: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(0),

  // Passwords
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

  // Tenancy
  DEFAULT_TENANT_ID: z.string().uuid().optional(),

  // Rate limit
  RATE_LIMIT_ENABLED: envBoolean.optional(),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  RATE_LIMIT_AUTH_MAX: z.coerce.number().int().positive().default(20),

  // Audit
  AUDIT_LOGGING_ENABLED: envBoolean.optional(),

  // Startup validation switch (interpreted below)
  STARTUP_VALIDATE_ENV: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

// ----------------------------------------------------------------------------
// Parse & normalize
// ----------------------------------------------------------------------------

export function parseEnv(source: NodeJS.ProcessEnv) {
  const raw = EnvSchema.parse({
    ...source,
    DATABASE_URL: resolveFromFileOrEnv({
      envValue: source.DATABASE_URL,
      filePath: source.DATABASE_URL_FILE,
      label: "DATABASE_URL_FILE",
    }),
    JWT_SECRET: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET,
      filePath: source.JWT_SECRET_FILE,
      label: "JWT_SECRET_FILE",
    }),
    JWT_SECRET_PREVIOUS: resolveFromFileOrEnv({
      envValue: source.JWT_SECRET_PREVIOUS,
      filePath: source.JWT_SECRET_PREVIOUS_FILE,
      label: "JWT_SECRET_PREVIOUS_FILE",
    }),
  });

  return {
    ...raw,
    REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
  };
}

export type Env = ReturnType<typeof parseEnv>;

export const env: Env = parseEnv(process.env);

// ----------------------------------------------------------------------------
// Fail-fast: only when the service really starts
// ----------------------------------------------------------------------------
//
// Vitest imports modules before setup files run -> do not crash under test.
// - STARTUP_VALIDATE_ENV=1 -> always validate (typical inside the container)
// - otherwise: validate in development/production, not in test
//
export function validateEnv(value: Env): void {
  if (!value.DATABASE_URL) {
    throw new Error("DATABASE_URL missing: set DATABASE_URL or DATABASE_URL_FILE.");
  }

  if (value.NODE_ENV === "production") {
    if (!value.REDIS_URL) {
      throw new Error("REDIS_URL missing: production keeps revocations and rate limits in Redis.");
    }
    if (!value.JWT_SECRET && !value.AWS_ENDPOINT_URL && value.SECRETS_BACKEND === "env") {
      throw new Error("JWT secret missing: set JWT_SECRET, JWT_SECRET_FILE or a secrets backend.");
    }
  }
}

const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  validateEnv(env);
}

/** Safe configuration summary (no secrets), logged once on startup. */
export function envSummary(value: Env = env): Record<string, unknown> {
  return {
    NODE_ENV: value.NODE_ENV,
    PROFILE: value.PROFILE,
    HOST: value.HOST,
    PORT: value.PORT,
    TRUST_PROXY: value.TRUST_PROXY,
    MAX_BODY_BYTES: value.MAX_BODY_BYTES,
    DATABASE_URL: mask(value.DATABASE_URL),
    REDIS_URL: mask(value.REDIS_URL),
    REDIS_NAMESPACE: value.REDIS_NAMESPACE,
    AWS_ENDPOINT_URL: value.AWS_ENDPOINT_URL ?? "[unset]",
    AWS_REGION: value.AWS_REGION,
    AWS_ACCESS_KEY_ID: mask(value.AWS_ACCESS_KEY_ID),
    AWS_SECRET_ACCESS_KEY: mask(value.AWS_SECRET_ACCESS_KEY),
    SECRETS_BACKEND: value.SECRETS_BACKEND,
    JWT_SECRET: mask(value.JWT_SECRET),
    JWT_SECRET_PREVIOUS: mask(value.JWT_SECRET_PREVIOUS),
    JWT_ISSUER: value.JWT_ISSUER,
    JWT_AUDIENCE: value.JWT_AUDIENCE,
    JWT_ACCESS_TTL: value.JWT_ACCESS_TTL,
    JWT_REFRESH_TTL: value.JWT_REFRESH_TTL,
    JWT_CLOCK_SKEW_SEC: value.JWT_CLOCK_SKEW_SEC,
    BCRYPT_ROUNDS: value.BCRYPT_ROUNDS,
  };
}

// src/libs/settings.ts
// ============================================================================
// Profile settings
// ----------------------------------------------------------------------------
// Layering (lowest -> highest):
//   built-in defaults < config/app.yaml < config/profile.<PROFILE>.yaml < env
//
// A missing profile file is fine; a malformed one is a startup error.
// ============================================================================

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import { env, type Env } from "./env.js";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const SettingsSchema = z.object({
  app: z
    .object({
      name: z.string().min(1).default("Keystone"),
      description: z.string().default(""),
      version: z.string().default("0.1.0"),
    })
    .default({}),
  storage: z
    .object({
      uploadsBucket: z.string().min(3).default("keystone-uploads"),
      exportsBucket: z.string().min(3).default("keystone-exports"),
    })
    .default({}),
  secrets: z
    .object({
      prefix: z.string().min(1).default("keystone"),
    })
    .default({}),
  tenancy: z
    .object({
      defaultTenantId: z.string().uuid().default("00000000-0000-4000-8000-000000000001"),
    })
    .default({}),
  cors: z
    .object({
      origins: z.array(z.string()).default([]),
    })
    .default({}),
  features: z
    .object({
      rateLimit: z.boolean().default(false),
      auditLogging: z.boolean().default(true),
    })
    .default({}),
  log: z
    .object({
      level: LogLevelSchema.default("info"),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema> & {
  profile: Env["PROFILE"];
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key, everything else (arrays included) is replaced. */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

function readYamlFile(file: string): PlainObject {
  if (!existsSync(file)) return {};

  let doc: unknown;
  try {
    doc = parse(readFileSync(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid YAML in ${file}: ${reason}`);
  }

  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new Error(`Expected a mapping at the top of ${file}`);
  }
  return doc;
}

export function loadSettings(source: Env = env): Settings {
  const dir = path.resolve(source.CONFIG_DIR);
  const base = readYamlFile(path.join(dir, "app.yaml"));
  const profile = readYamlFile(path.join(dir, `profile.${source.PROFILE}.yaml`));

  const parsed = SettingsSchema.safeParse(deepMerge(base, profile));
  if (!parsed.success) {
    throw new Error(
      `Invalid settings for profile "${source.PROFILE}": ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );
  }

  const fromFiles = parsed.data;

  // Environment overrides
  return {
    ...fromFiles,
    profile: source.PROFILE,
    cors: {
      origins: source.CORS_ORIGIN
        ? source.CORS_ORIGIN.split(",")
            .map((origin) => origin.trim())
            .filter(Boolean)
        : fromFiles.cors.origins,
    },
    tenancy: {
      defaultTenantId: (source.DEFAULT_TENANT_ID ?? fromFiles.tenancy.defaultTenantId).toLowerCase(),
    },
    features: {
      rateLimit: source.RATE_LIMIT_ENABLED ?? fromFiles.features.rateLimit,
      auditLogging: source.AUDIT_LOGGING_ENABLED ?? fromFiles.features.auditLogging,
    },
    log: {
      level: parseLogLevel(source.LOG_LEVEL) ?? fromFiles.log.level,
    },
  };
}

export type LogLevel = z.infer<typeof LogLevelSchema>;

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const parsed = LogLevelSchema.safeParse(value.toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export const settings: Settings = loadSettings();

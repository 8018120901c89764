// src/tests/unit/settings.test.ts
import { describe, expect, it } from "vitest";
import { parseEnv } from "../../libs/env.js";
import { deepMerge, loadSettings } from "../../libs/settings.js";

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const merged = deepMerge(
      { app: { name: "Keystone", version: "0.1.0" }, cors: { origins: ["http://a"] } },
      { app: { name: "Acme" }, cors: { origins: [] } },
    );

    expect(merged).toEqual({
      app: { name: "Acme", version: "0.1.0" },
      cors: { origins: [] },
    });
  });
});

describe("loadSettings", () => {
  it("layers the profile file over app.yaml", () => {
    const cfg = loadSettings(parseEnv({ PROFILE: "prod", CONFIG_DIR: "config" }));

    expect(cfg.profile).toBe("prod");
    expect(cfg.app.name).toBe("Keystone");
    expect(cfg.cors.origins).toEqual([]);
    expect(cfg.features.rateLimit).toBe(true);
    expect(cfg.tenancy.defaultTenantId).toBe("00000000-0000-4000-8000-000000000001");
  });

  it("lets environment variables win over both files", () => {
    const cfg = loadSettings(
      parseEnv({
        PROFILE: "dev",
        CONFIG_DIR: "config",
        CORS_ORIGIN: "https://a.example, https://b.example",
        RATE_LIMIT_ENABLED: "true",
        AUDIT_LOGGING_ENABLED: "false",
        LOG_LEVEL: "WARN",
      }),
    );

    expect(cfg.cors.origins).toEqual(["https://a.example", "https://b.example"]);
    expect(cfg.features).toEqual({ rateLimit: true, auditLogging: false });
    expect(cfg.log.level).toBe("warn");
  });

  it("falls back to built-in defaults without config files", () => {
    const cfg = loadSettings(parseEnv({ PROFILE: "test", CONFIG_DIR: "does-not-exist" }));

    expect(cfg.storage).toEqual({
      uploadsBucket: "keystone-uploads",
      exportsBucket: "keystone-exports",
    });
    expect(cfg.secrets.prefix).toBe("keystone");
  });
});

describe("parseEnv", () => {
  it("reads booleans the way operators write them", () => {
    expect(parseEnv({ TRUST_PROXY: "false" }).TRUST_PROXY).toBe(false);
    expect(parseEnv({ TRUST_PROXY: "1" }).TRUST_PROXY).toBe(true);
  });

  it("lower-cases the request id header", () => {
    expect(parseEnv({ REQUEST_ID_HEADER: "X-Request-ID" }).REQUEST_ID_HEADER).toBe("x-request-id");
  });
});

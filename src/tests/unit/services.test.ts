// src/tests/unit/services.test.ts
import { describe, expect, it } from "vitest";
import { parseEnv } from "../../libs/env.js";
import { EnvSecretVault } from "../../libs/secret-vault.js";
import { loadSettings } from "../../libs/settings.js";
import { jwtSecretName, resolveJwtSecret } from "../../services.js";

const cfg = loadSettings(parseEnv({ PROFILE: "test", CONFIG_DIR: "config" }));

describe("resolveJwtSecret", () => {
  it("prefers JWT_SECRET over the vault", async () => {
    const vault = new EnvSecretVault({ KEYSTONE_TEST_JWT: '{"secret":"test-secret-from-vault"}' });
    const source = parseEnv({ NODE_ENV: "test", JWT_SECRET: "test-secret-from-env" });

    await expect(resolveJwtSecret(vault, cfg, source)).resolves.toBe("test-secret-from-env");
  });

  it("falls back to the secret stored under <prefix>/<profile>/jwt", async () => {
    const vault = new EnvSecretVault({ KEYSTONE_TEST_JWT: '{"secret":"test-secret-from-vault"}' });
    const source = parseEnv({ NODE_ENV: "test" });

    expect(jwtSecretName(cfg)).toBe("keystone/test/jwt");
    await expect(resolveJwtSecret(vault, cfg, source)).resolves.toBe("test-secret-from-vault");
  });

  it("fails when neither source has a secret", async () => {
    const source = parseEnv({ NODE_ENV: "test" });

    await expect(resolveJwtSecret(new EnvSecretVault({}), cfg, source)).rejects.toThrow(
      'JWT secret missing: set JWT_SECRET or store { "secret": ... } in keystone/test/jwt.',
    );
    await expect(
      resolveJwtSecret(new EnvSecretVault({ KEYSTONE_TEST_JWT: '{"secret":""}' }), cfg, source),
    ).rejects.toThrow("JWT secret missing");
  });
});

// src/tests/unit/jwt.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { SignJWT } from "jose";
import {
  createTokenService,
  remainingLifetimeSec,
  TokenInvalidError,
  type TokenIdentity,
} from "../../libs/jwt.js";
import { TEST_SECRET, testTokenService } from "../support/test-app.js";

const identity: TokenIdentity = {
  userId: "6f1c2d3e-4a5b-4c6d-8e7f-8091a2b3c4d5",
  email: "ada@example.com",
  tenantId: "00000000-0000-4000-8000-000000000001",
  roles: ["user"],
};

async function reasonOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TokenInvalidError) return err.reason;
    throw err;
  }
  throw new Error("expected TokenInvalidError");
}

describe("token service", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("round-trips the identity claims of an access token", async () => {
    const tokens = testTokenService();
    const { token, jti, exp } = await tokens.sign(identity, "access");

    const claims = await tokens.decode(token, "access");

    expect(claims).toMatchObject({
      sub: identity.userId,
      email: "ada@example.com",
      tenant_id: identity.tenantId,
      roles: ["user"],
      type: "access",
      jti,
      exp,
    });
  });

  it("issues a pair whose expires_in is the access lifetime", async () => {
    const tokens = testTokenService({ accessTtlSec: 900 });
    const pair = await tokens.issueTokenPair(identity);

    expect(pair.token_type).toBe("bearer");
    expect(pair.expires_in).toBe(900);
    expect((await tokens.decode(pair.access_token)).type).toBe("access");
    expect((await tokens.decode(pair.refresh_token)).type).toBe("refresh");
  });

  it("rejects a token of the other type", async () => {
    const tokens = testTokenService();
    const { token } = await tokens.sign(identity, "refresh");

    expect(await reasonOf(tokens.decode(token, "access"))).toBe("wrong_type");
  });

  it("rejects a token signed with another secret", async () => {
    const other = testTokenService({ secret: "another-test-secret-another-test-secret" });
    const { token } = await other.sign(identity, "access");

    expect(await reasonOf(testTokenService().decode(token))).toBe("signature");
  });

  it("accepts tokens of the previous secret during rotation", async () => {
    const old = testTokenService({ secret: "old-test-secret-old-test-secret-0000" });
    const { token } = await old.sign(identity, "access");

    const rotated = createTokenService({
      secret: TEST_SECRET,
      previousSecret: "old-test-secret-old-test-secret-0000",
      issuer: "keystone-api",
      audience: "keystone-web",
      accessTtlSec: 1800,
      refreshTtlSec: 3600,
      clockSkewSec: 0,
    });

    expect((await rotated.decode(token)).sub).toBe(identity.userId);
  });

  it("rejects an expired token", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const tokens = testTokenService({ accessTtlSec: 60 });
    const { token } = await tokens.sign(identity, "access");

    vi.setSystemTime(new Date("2026-01-01T00:01:01Z"));

    expect(await reasonOf(tokens.decode(token))).toBe("expired");
  });

  it("rejects a signed payload without the identity claims", async () => {
    const token = await new SignJWT({ type: "access" })
      .setProtectedHeader({ alg: "HS256" })
      .setIssuer("keystone-api")
      .setAudience("keystone-web")
      .setExpirationTime("5m")
      .sign(new TextEncoder().encode(TEST_SECRET));

    expect(await reasonOf(testTokenService().decode(token))).toBe("claims_malformed");
  });

  it("rejects a foreign audience", async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: "HS256" })
      .setIssuer("keystone-api")
      .setAudience("someone-else")
      .setExpirationTime("5m")
      .sign(new TextEncoder().encode(TEST_SECRET));

    expect(await reasonOf(testTokenService().decode(token))).toBe("claim_aud");
  });

  it("rejects garbage", async () => {
    await expect(testTokenService().decode("not.a.jwt")).rejects.toBeInstanceOf(TokenInvalidError);
  });

  it("refuses secrets shorter than 32 characters", () => {
    expect(() => testTokenService({ secret: "test-secret" })).toThrow(
      "JWT secret must be at least 32 characters long.",
    );
  });
});

describe("remainingLifetimeSec", () => {
  it("counts down to exp and never goes below one second", () => {
    expect(remainingLifetimeSec(1_000, 400_000)).toBe(600);
    expect(remainingLifetimeSec(1_000, 2_000_000)).toBe(1);
  });
});

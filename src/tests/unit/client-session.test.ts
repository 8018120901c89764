// src/tests/unit/client-session.test.ts
import { describe, expect, it, vi } from "vitest";
import { decodeTokenPayload, isTokenExpired, resolveSession } from "../../client/session.js";
import { TokenStore, tokenStorageKeys } from "../../client/token-store.js";
import { memoryStorage } from "../support/memory-storage.js";
import { testTokenService } from "../support/test-app.js";

const identity = {
  userId: "6f1c2d3e-4a5b-4c6d-8e7f-8091a2b3c4d5",
  email: "ada@example.com",
  tenantId: "00000000-0000-4000-8000-000000000001",
  roles: ["user"],
};

describe("tokenStorageKeys", () => {
  it("derives the keys from the snake-cased project name", () => {
    expect(tokenStorageKeys("Acme Portal")).toEqual({
      accessToken: "acme_portal_access_token",
      refreshToken: "acme_portal_refresh_token",
    });
  });
});

describe("TokenStore", () => {
  it("stores and clears both tokens", () => {
    const storage = memoryStorage();
    const store = new TokenStore(storage, tokenStorageKeys("Keystone"));

    store.setTokens({ access_token: "a", refresh_token: "r" });
    expect(storage.data.get("keystone_access_token")).toBe("a");
    expect(store.getRefreshToken()).toBe("r");

    store.clear();
    expect(storage.data.size).toBe(0);
  });
});

describe("decodeTokenPayload / isTokenExpired", () => {
  it("decodes the claims without verifying", async () => {
    const { token, exp } = await testTokenService().sign(identity, "access");

    expect(decodeTokenPayload(token)).toMatchObject({ sub: identity.userId, exp, type: "access" });
    expect(isTokenExpired(token, exp - 1)).toBe(false);
    expect(isTokenExpired(token, exp)).toBe(true);
  });

  it("treats undecodable tokens as expired", () => {
    expect(decodeTokenPayload("garbage")).toBeNull();
    expect(isTokenExpired("garbage")).toBe(true);
  });
});

describe("resolveSession", () => {
  it("redirects to /login without a token", async () => {
    const store = new TokenStore(memoryStorage(), tokenStorageKeys("Keystone"));
    const refreshSession = vi.fn(async () => true);

    expect(await resolveSession(store, { refreshSession })).toEqual({
      status: "unauthenticated",
      redirectTo: "/login",
    });
    expect(refreshSession).not.toHaveBeenCalled();
  });

  it("returns the payload of a live token", async () => {
    const { token, exp } = await testTokenService().sign(identity, "access");
    const store = new TokenStore(memoryStorage(), tokenStorageKeys("Keystone"));
    store.setAccessToken(token);

    const state = await resolveSession(store, { refreshSession: vi.fn(async () => false) }, exp - 10);

    expect(state.status).toBe("authenticated");
    expect(state.status === "authenticated" && state.user.email).toBe("ada@example.com");
  });

  it("refreshes an expired token before deciding", async () => {
    const tokens = testTokenService();
    const stale = await tokens.sign(identity, "access");
    const fresh = await tokens.sign(identity, "access");
    const store = new TokenStore(memoryStorage(), tokenStorageKeys("Keystone"));
    store.setAccessToken(stale.token);

    const refreshSession = vi.fn(async () => {
      store.setAccessToken(fresh.token);
      return true;
    });

    const state = await resolveSession(store, { refreshSession }, stale.exp + 1);

    expect(refreshSession).toHaveBeenCalledTimes(1);
    expect(state).toMatchObject({ status: "authenticated", user: { jti: fresh.jti } });
  });

  it("redirects when the refresh fails", async () => {
    const { token, exp } = await testTokenService().sign(identity, "access");
    const store = new TokenStore(memoryStorage(), tokenStorageKeys("Keystone"));
    store.setAccessToken(token);

    const state = await resolveSession(store, { refreshSession: vi.fn(async () => false) }, exp);

    expect(state).toEqual({ status: "unauthenticated", redirectTo: "/login" });
  });
});

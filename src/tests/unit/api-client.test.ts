// src/tests/unit/api-client.test.ts
import { describe, expect, it, vi } from "vitest";
import { ApiClient, ApiRequestError, type FetchLike } from "../../client/api-client.js";
import { TokenStore, tokenStorageKeys } from "../../client/token-store.js";
import { memoryStorage } from "../support/memory-storage.js";

const BASE_URL = "http://api.test";

const me = {
  id: "6f1c2d3e-4a5b-4c6d-8e7f-8091a2b3c4d5",
  tenant_id: "00000000-0000-4000-8000-000000000001",
  email: "ada@example.com",
  full_name: "Ada",
  roles: ["user"],
  is_active: true,
  is_verified: false,
  last_login_at: null,
  created_at: "2026-01-01T00:00:00.000Z",
  updated_at: "2026-01-01T00:00:00.000Z",
};

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function pair(access: string, refresh: string) {
  return { access_token: access, refresh_token: refresh, token_type: "bearer", expires_in: 1800 };
}

function apiError(status: number, code: string, message: string) {
  return json(status, { status, error: { code, message } });
}

function authHeader(init: RequestInit): string | null {
  return new Headers(init.headers).get("authorization");
}

function setup(handler: (path: string, init: RequestInit) => Response) {
  const fetchMock = vi.fn<FetchLike>(async (url, init) => handler(url.slice(BASE_URL.length), init));
  const storage = memoryStorage();
  const store = new TokenStore(storage, tokenStorageKeys("Keystone"));
  const onSessionExpired = vi.fn();
  const client = new ApiClient({
    baseUrl: BASE_URL,
    store,
    fetch: fetchMock,
    tenantId: "00000000-0000-4000-8000-000000000001",
    onSessionExpired,
  });
  return { client, store, storage, fetchMock, onSessionExpired };
}

describe("ApiClient", () => {
  it("stores the pair returned by login and sends the tenant header", async () => {
    const { client, store, fetchMock } = setup(() => json(200, pair("access-1", "refresh-1")));

    await client.login("ada@example.com", "correct horse");

    expect(store.getAccessToken()).toBe("access-1");
    expect(store.getRefreshToken()).toBe("refresh-1");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://api.test/auth/login");
    expect(new Headers(init?.headers).get("x-tenant-id")).toBe("00000000-0000-4000-8000-000000000001");
    expect(init?.body).toBe(JSON.stringify({ email: "ada@example.com", password: "correct horse" }));
  });

  it("attaches the bearer token", async () => {
    const { client, store, fetchMock } = setup(() => json(200, me));
    store.setTokens({ access_token: "access-1", refresh_token: "refresh-1" });

    expect(await client.me()).toEqual(me);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init && authHeader(init)).toBe("Bearer access-1");
  });

  it("builds the list query string", async () => {
    const { client, store, fetchMock } = setup(() => json(200, [me]));
    store.setAccessToken("access-1");

    await client.listUsers({ skip: 10, limit: 5 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://api.test/users?skip=10&limit=5");
  });

  it("refreshes once for concurrent 401s and retries with the new token", async () => {
    const { client, store, fetchMock } = setup((path, init) => {
      if (path === "/auth/refresh") return json(200, pair("access-2", "refresh-1"));
      if (authHeader(init) !== "Bearer access-2") {
        return apiError(401, "INVALID_TOKEN", "Invalid bearer token.");
      }
      return path === "/users/me" ? json(200, me) : json(200, []);
    });
    store.setTokens({ access_token: "access-1", refresh_token: "refresh-1" });

    const [user, users] = await Promise.all([client.me(), client.listUsers()]);

    expect(user.email).toBe("ada@example.com");
    expect(users).toEqual([]);
    const refreshCalls = fetchMock.mock.calls.filter(([url]) => url.endsWith("/auth/refresh"));
    expect(refreshCalls).toHaveLength(1);
    expect(refreshCalls[0]?.[1].body).toBe(JSON.stringify({ refresh_token: "refresh-1" }));
    expect(store.getAccessToken()).toBe("access-2");
  });

  it("clears the session and calls onSessionExpired when the refresh fails", async () => {
    const { client, storage, onSessionExpired } = setup((path) =>
      path === "/auth/refresh"
        ? apiError(401, "REFRESH_FAILED", "Invalid refresh token.")
        : apiError(401, "INVALID_TOKEN", "Invalid bearer token."),
    );
    storage.setItem("keystone_access_token", "access-1");
    storage.setItem("keystone_refresh_token", "refresh-1");

    const error = await client.me().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ status: 401, code: "SESSION_EXPIRED" });
    expect(onSessionExpired).toHaveBeenCalledTimes(1);
    expect(storage.data.size).toBe(0);
  });

  it("does not try to refresh after a failed login", async () => {
    const { client, fetchMock, onSessionExpired } = setup(() =>
      apiError(401, "INVALID_CREDENTIALS", "Invalid email or password."),
    );

    await expect(client.login("ada@example.com", "nope")).rejects.toMatchObject({
      status: 401,
      code: "INVALID_CREDENTIALS",
      message: "Invalid email or password.",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(onSessionExpired).not.toHaveBeenCalled();
  });

  it("surfaces the API error code", async () => {
    const { client, store } = setup(() => apiError(409, "EMAIL_ALREADY_REGISTERED", "Email already in use."));
    store.setAccessToken("access-1");

    await expect(client.updateMe({ email: "taken@example.com" })).rejects.toMatchObject({
      status: 409,
      code: "EMAIL_ALREADY_REGISTERED",
    });
  });

  it("falls back to a generic error for non-JSON bodies", async () => {
    const { client, store } = setup(() => new Response("<html>bad gateway</html>", { status: 502 }));
    store.setAccessToken("access-1");

    await expect(client.me()).rejects.toMatchObject({ status: 502, code: "HTTP_ERROR" });
  });

  it("revokes the tokens on the server before clearing them", async () => {
    const { client, store, storage, fetchMock } = setup(() => json(200, { ok: true }));
    store.setTokens({ access_token: "access-1", refresh_token: "refresh-1" });

    await client.logout();

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://api.test/auth/logout");
    expect(init?.method).toBe("POST");
    expect(init && authHeader(init)).toBe("Bearer access-1");
    expect(init?.body).toBe(JSON.stringify({ refresh_token: "refresh-1" }));
    expect(storage.data.size).toBe(0);
  });

  it("clears local tokens even when the server rejects the logout", async () => {
    const { client, store, storage } = setup(() => new Response("", { status: 503 }));
    store.setTokens({ access_token: "access-1", refresh_token: "refresh-1" });

    await expect(client.logout()).rejects.toMatchObject({ status: 503, code: "HTTP_ERROR" });
    expect(storage.data.size).toBe(0);
  });

  it("treats an already rejected token as logged out", async () => {
    const { client, store, storage } = setup(() => apiError(401, "TOKEN_REVOKED", "Token has been revoked."));
    store.setTokens({ access_token: "access-1", refresh_token: "refresh-1" });

    await expect(client.logout()).resolves.toBeUndefined();
    expect(storage.data.size).toBe(0);
  });

  it("does not call the API when there is no session", async () => {
    const { client, fetchMock } = setup(() => json(200, { ok: true }));

    await client.logout();

    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// src/client/api-client.ts
// ============================================================================
// Dashboard API client
// ----------------------------------------------------------------------------
// - Bearer token from the TokenStore on every call except the credential
//   endpoints (login/register/refresh)
// - 401 outside /auth/*: one silent refresh (shared by concurrent callers),
//   then a single retry
// - refresh failure: tokens cleared, onSessionExpired() (redirect to login)
// - every non-2xx becomes an ApiRequestError carrying the API's error code
// - logout revokes both tokens server-side, then clears them locally
// ============================================================================

import { z } from "zod";
import type { UserResponse } from "../modules/users/types.js";
import type { TokenPair } from "../libs/token-claims.js";
import type { SessionRefresher } from "./session.js";
import type { TokenStore } from "./token-store.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ApiClientOptions = {
  baseUrl: string;
  store: TokenStore;
  fetch?: FetchLike;
  /** Sent as X-Tenant-Id on login/register/refresh when set. */
  tenantId?: string;
  onSessionExpired?: () => void;
};

export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

const TokenPairSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal("bearer"),
  expires_in: z.number(),
});

const UserResponseSchema = z.object({
  id: z.string(),
  tenant_id: z.string(),
  email: z.string(),
  full_name: z.string().nullable(),
  roles: z.array(z.string()),
  is_active: z.boolean(),
  is_verified: z.boolean(),
  last_login_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const ErrorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

type HttpMethod = "GET" | "POST" | "PATCH";

const CREDENTIAL_PATHS = new Set(["/auth/login", "/auth/register", "/auth/refresh"]);

function isAuthPath(path: string): boolean {
  return path.startsWith("/auth/");
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Proxies answer with HTML error pages.
    return undefined;
  }
}

async function toRequestError(res: Response): Promise<ApiRequestError> {
  const parsed = ErrorBodySchema.safeParse(await readJson(res));
  if (parsed.success) {
    return new ApiRequestError(res.status, parsed.data.error.code, parsed.data.error.message);
  }
  return new ApiRequestError(res.status, "HTTP_ERROR", `Request failed with status ${res.status}.`);
}

export class ApiClient implements SessionRefresher {
  private readonly fetchFn: FetchLike;
  private refreshing: Promise<boolean> | null = null;

  constructor(private readonly options: ApiClientOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async login(email: string, password: string): Promise<TokenPair> {
    const pair = await this.request("POST", "/auth/login", TokenPairSchema, { email, password });
    this.options.store.setTokens(pair);
    return pair;
  }

  async register(input: { email: string; password: string; full_name?: string }): Promise<TokenPair> {
    const pair = await this.request("POST", "/auth/register", TokenPairSchema, input);
    this.options.store.setTokens(pair);
    return pair;
  }

  me(): Promise<UserResponse> {
    return this.request("GET", "/users/me", UserResponseSchema);
  }

  updateMe(input: { email?: string; full_name?: string | null; password?: string }): Promise<UserResponse> {
    return this.request("PATCH", "/users/me", UserResponseSchema, input);
  }

  listUsers(page: { skip?: number; limit?: number } = {}): Promise<UserResponse[]> {
    const params = new URLSearchParams();
    if (page.skip !== undefined) params.set("skip", String(page.skip));
    if (page.limit !== undefined) params.set("limit", String(page.limit));
    const query = params.toString();
    return this.request("GET", query ? `/users?${query}` : "/users", z.array(UserResponseSchema));
  }

  async logout(): Promise<void> {
    const { store } = this.options;
    const refreshToken = store.getRefreshToken();
    try {
      if (!store.getAccessToken()) return;
      const res = await this.send("POST", "/auth/logout", refreshToken ? { refresh_token: refreshToken } : {});
      // 401: the access token is already expired or revoked.
      if (!res.ok && res.status !== 401) throw await toRequestError(res);
    } finally {
      store.clear();
    }
  }

  /**
   * Exchanges the stored refresh token for a new access token. Concurrent
   * callers share one in-flight request. On failure the tokens are cleared.
   */
  refreshSession(): Promise<boolean> {
    this.refreshing ??= this.doRefresh().finally(() => {
      this.refreshing = null;
    });
    return this.refreshing;
  }

  private async doRefresh(): Promise<boolean> {
    const { store } = this.options;
    const refreshToken = store.getRefreshToken();
    if (!refreshToken) {
      store.clear();
      return false;
    }

    const res = await this.send("POST", "/auth/refresh", { refresh_token: refreshToken });
    const parsed = res.ok ? TokenPairSchema.safeParse(await readJson(res)) : undefined;
    if (!parsed?.success) {
      store.clear();
      return false;
    }

    store.setTokens(parsed.data);
    return true;
  }

  private send(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    const token = this.options.store.getAccessToken();
    const credentialCall = CREDENTIAL_PATHS.has(path);
    if (token && !credentialCall) headers.Authorization = `Bearer ${token}`;
    if (this.options.tenantId && credentialCall) headers["X-Tenant-Id"] = this.options.tenantId;

    return this.fetchFn(`${this.options.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    let res = await this.send(method, path, body);

    if (res.status === 401 && !isAuthPath(path)) {
      if (!(await this.refreshSession())) {
        this.options.onSessionExpired?.();
        throw new ApiRequestError(401, "SESSION_EXPIRED", "Your session has expired.");
      }
      res = await this.send(method, path, body);
    }

    if (!res.ok) throw await toRequestError(res);

    const parsed = schema.safeParse(await readJson(res));
    if (!parsed.success) {
      throw new ApiRequestError(res.status, "INVALID_RESPONSE", "Unexpected response from the API.");
    }
    return parsed.data;
  }
}

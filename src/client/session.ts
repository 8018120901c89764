// src/client/session.ts
// Page guard for the dashboard: decide from the stored tokens whether to
// render or to redirect to /login. Tokens are decoded, not verified; the API
// verifies them on every call.

import { decodeJwt } from "jose";
import { TokenClaimsSchema, type TokenClaims } from "../libs/token-claims.js";
import type { TokenStore } from "./token-store.js";

export type TokenPayload = TokenClaims;

export const LOGIN_PATH = "/login";

export type SessionState =
  | { status: "authenticated"; user: TokenPayload }
  | { status: "unauthenticated"; redirectTo: string };

export interface SessionRefresher {
  /** True when a new access token was stored. */
  refreshSession(): Promise<boolean>;
}

export function decodeTokenPayload(token: string): TokenPayload | null {
  let payload: unknown;
  try {
    payload = decodeJwt(token);
  } catch {
    return null;
  }
  const parsed = TokenClaimsSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function isTokenExpired(token: string, nowSec: number = nowInSeconds()): boolean {
  const payload = decodeTokenPayload(token);
  if (!payload) return true;
  return payload.exp <= nowSec;
}

const unauthenticated: SessionState = { status: "unauthenticated", redirectTo: LOGIN_PATH };

export async function resolveSession(
  store: TokenStore,
  client: SessionRefresher,
  nowSec: number = nowInSeconds(),
): Promise<SessionState> {
  const token = store.getAccessToken();
  if (!token) return unauthenticated;

  const current = decodeTokenPayload(token);
  if (current && current.exp > nowSec) {
    return { status: "authenticated", user: current };
  }

  // Expired or unreadable: one silent refresh before giving up.
  if (!(await client.refreshSession())) return unauthenticated;

  const refreshed = store.getAccessToken();
  const user = refreshed ? decodeTokenPayload(refreshed) : null;
  return user ? { status: "authenticated", user } : unauthenticated;
}

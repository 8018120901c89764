// src/client/token-store.ts
// Access/refresh token persistence for the dashboard. Works on anything that
// looks like window.localStorage, so tests can pass a Map-backed stand-in.

import { toSnakeCase } from "../libs/case.js";

export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export type TokenStorageKeys = {
  accessToken: string;
  refreshToken: string;
};

/** "My App" -> { accessToken: "my_app_access_token", refreshToken: "my_app_refresh_token" } */
export function tokenStorageKeys(projectName: string): TokenStorageKeys {
  const prefix = toSnakeCase(projectName);
  return {
    accessToken: `${prefix}_access_token`,
    refreshToken: `${prefix}_refresh_token`,
  };
}

export class TokenStore {
  constructor(
    private readonly storage: StorageLike,
    readonly keys: TokenStorageKeys,
  ) {}

  getAccessToken(): string | null {
    return this.storage.getItem(this.keys.accessToken);
  }

  getRefreshToken(): string | null {
    return this.storage.getItem(this.keys.refreshToken);
  }

  setTokens(tokens: { access_token: string; refresh_token: string }): void {
    this.storage.setItem(this.keys.accessToken, tokens.access_token);
    this.storage.setItem(this.keys.refreshToken, tokens.refresh_token);
  }

  setAccessToken(token: string): void {
    this.storage.setItem(this.keys.accessToken, token);
  }

  clear(): void {
    this.storage.removeItem(this.keys.accessToken);
    this.storage.removeItem(this.keys.refreshToken);
  }
}

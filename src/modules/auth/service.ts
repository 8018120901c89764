// src/modules/auth/service.ts
// ============================================================================
// Auth service
// ----------------------------------------------------------------------------
// - login: email + password within the request's tenant -> token pair
// - register: new user with roles ["user"] -> token pair
// - refresh: refresh token -> new access token (refresh token is not rotated)
// - logout: revoke the access token (and the caller's refresh token)
//
// All reads/writes go through the request's unit of work; audit rows are
// written through the request's AuditLogger in the same transaction.
// ============================================================================

import { getDummyPasswordHash, hashPassword, verifyPassword } from "../../libs/crypto.js";
import { isUniqueViolation } from "../../libs/error-map.js";
import {
  remainingLifetimeSec,
  TokenInvalidError,
  type AccessTokenClaims,
  type TokenClaims,
  type TokenIdentity,
  type TokenPair,
  type TokenService,
} from "../../libs/jwt.js";
import { hashEmailForLog } from "../../libs/pii.js";
import type { RequestContext } from "../../libs/request-context.js";
import type { RevocationStore } from "../../libs/stores.js";
import { auditEntryFromContext } from "../audit/logger.js";
import type { AuditLogger } from "../audit/types.js";
import { DEFAULT_ROLES, type UserRepository, type UserRow } from "../users/types.js";
import type { LoginBody, RegisterBody } from "./types.js";

export type AuthDeps = {
  users: UserRepository;
  tokens: TokenService;
  revocations: RevocationStore;
  audit: AuditLogger;
  ctx: RequestContext;
};

export class InvalidCredentialsError extends Error {
  constructor() {
    super("invalid_credentials");
    this.name = "InvalidCredentialsError";
  }
}

export class InactiveUserError extends Error {
  constructor() {
    super("account_disabled");
    this.name = "InactiveUserError";
  }
}

export class EmailAlreadyRegisteredError extends Error {
  constructor() {
    super("email_already_registered");
    this.name = "EmailAlreadyRegisteredError";
  }
}

export class RefreshFailedError extends Error {
  constructor(readonly reason: string) {
    super("refresh_failed");
    this.name = "RefreshFailedError";
  }
}

export function identityOf(user: UserRow): TokenIdentity {
  return {
    userId: user.id,
    email: user.email,
    tenantId: user.tenant_id,
    roles: user.roles,
  };
}

// ---------------------------------------------------------------------------
// Login
// ---------------------------------------------------------------------------

export async function login(deps: AuthDeps, input: LoginBody): Promise<TokenPair> {
  const { users, tokens, audit, ctx } = deps;
  const user = await users.findByEmail(ctx.tenant_id, input.email);

  // Timing hardening: unknown emails still pay for one bcrypt comparison.
  const hash = user?.hashed_password ?? (await getDummyPasswordHash());
  const passwordOk = await verifyPassword(hash, input.password);

  if (!user || !passwordOk) {
    await audit.log(
      auditEntryFromContext(ctx, {
        action: "login_failed",
        resourceType: "user",
        resourceId: user?.id ?? hashEmailForLog(input.email),
        success: false,
        errorMessage: "invalid_credentials",
      }),
    );
    throw new InvalidCredentialsError();
  }

  // Only revealed to someone who knows the password.
  if (!user.is_active) {
    await audit.log(
      auditEntryFromContext(ctx, {
        action: "login_failed",
        resourceType: "user",
        resourceId: user.id,
        actorId: user.id,
        success: false,
        errorMessage: "account_disabled",
      }),
    );
    throw new InactiveUserError();
  }

  await users.touchLastLogin(user.tenant_id, user.id, new Date());
  const pair = await tokens.issueTokenPair(identityOf(user));

  await audit.log(
    auditEntryFromContext(ctx, {
      action: "login",
      resourceType: "user",
      resourceId: user.id,
      actorId: user.id,
    }),
  );

  return pair;
}

// ---------------------------------------------------------------------------
// Register
// ---------------------------------------------------------------------------

export async function register(deps: AuthDeps, input: RegisterBody): Promise<TokenPair> {
  const { users, tokens, audit, ctx } = deps;

  if (await users.findByEmail(ctx.tenant_id, input.email)) {
    throw new EmailAlreadyRegisteredError();
  }

  let user: UserRow;
  try {
    user = await users.create({
      tenantId: ctx.tenant_id,
      email: input.email,
      hashedPassword: await hashPassword(input.password),
      fullName: input.full_name ?? null,
      roles: [...DEFAULT_ROLES],
    });
  } catch (err) {
    // concurrent registration of the same email
    if (isUniqueViolation(err)) throw new EmailAlreadyRegisteredError();
    throw err;
  }

  await audit.log(
    auditEntryFromContext(ctx, {
      action: "create",
      resourceType: "user",
      resourceId: user.id,
      actorId: user.id,
      detail: "self_registration",
      newValues: { email: user.email, full_name: user.full_name, roles: user.roles },
    }),
  );

  return tokens.issueTokenPair(identityOf(user));
}

// ---------------------------------------------------------------------------
// Refresh
// ---------------------------------------------------------------------------

export async function refresh(
  deps: Omit<AuthDeps, "audit">,
  refreshToken: string,
): Promise<TokenPair> {
  const { users, tokens, revocations, ctx } = deps;

  let claims: TokenClaims;
  try {
    claims = await tokens.decode(refreshToken, "refresh");
  } catch (err) {
    if (err instanceof TokenInvalidError) throw new RefreshFailedError(err.reason);
    throw err;
  }

  if (await revocations.isRevoked(claims.jti)) {
    throw new RefreshFailedError("revoked");
  }
  if (claims.tenant_id !== ctx.tenant_id) {
    throw new RefreshFailedError("tenant_mismatch");
  }

  const user = await users.findById(claims.tenant_id, claims.sub);
  if (!user || !user.is_active) {
    throw new RefreshFailedError("user_unavailable");
  }

  const access = await tokens.sign(identityOf(user), "access");
  return {
    access_token: access.token,
    refresh_token: refreshToken,
    token_type: "bearer",
    expires_in: tokens.accessTtlSec,
  };
}

// ---------------------------------------------------------------------------
// Logout
// ---------------------------------------------------------------------------

export type LogoutResult = {
  revokedRefresh: boolean;
};

export async function logout(
  deps: AuthDeps,
  user: AccessTokenClaims,
  refreshToken?: string,
): Promise<LogoutResult> {
  const { tokens, revocations, audit, ctx } = deps;

  await revocations.revoke(user.jti, remainingLifetimeSec(user.exp));

  let revokedRefresh = false;
  if (refreshToken) {
    try {
      const claims = await tokens.decode(refreshToken, "refresh");
      if (claims.sub === user.sub) {
        await revocations.revoke(claims.jti, remainingLifetimeSec(claims.exp));
        revokedRefresh = true;
      }
    } catch (err) {
      // An unusable refresh token cannot be used later either.
      if (!(err instanceof TokenInvalidError)) throw err;
    }
  }

  await audit.log(
    auditEntryFromContext(ctx, {
      action: "logout",
      resourceType: "user",
      resourceId: user.sub,
      detail: revokedRefresh ? "access_and_refresh_revoked" : "access_revoked",
    }),
  );

  return { revokedRefresh };
}

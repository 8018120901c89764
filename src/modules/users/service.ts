// src/modules/users/service.ts
// ============================================================================
// Users service (tenant-scoped)
// ----------------------------------------------------------------------------
// Profile and admin operations on users of the request's tenant. Users are
// never hard-deleted; "delete" sets is_active = false.
// Every change is audited with before/after values (passwords excluded).
// ============================================================================

import { hashPassword } from "../../libs/crypto.js";
import { isUniqueViolation } from "../../libs/error-map.js";
import type { AccessTokenClaims } from "../../libs/jwt.js";
import { ADMIN_ROLE, type RequestContext } from "../../libs/request-context.js";
import { auditEntryFromContext } from "../audit/logger.js";
import type { AuditLogger, AuditValues } from "../audit/types.js";
import {
  DEFAULT_ROLES,
  type AdminCreateUserBody,
  type AdminUpdateUserBody,
  type Page,
  type UserPatch,
  type UserRepository,
  type UserRow,
} from "./types.js";

export type UserDeps = {
  users: UserRepository;
  audit: AuditLogger;
  ctx: RequestContext;
};

export class UserNotFoundError extends Error {
  constructor() {
    super("user_not_found");
    this.name = "UserNotFoundError";
  }
}

/** Token is valid but its user is gone or deactivated. */
export class CurrentUserUnavailableError extends Error {
  constructor() {
    super("current_user_unavailable");
    this.name = "CurrentUserUnavailableError";
  }
}

export class EmailInUseError extends Error {
  constructor() {
    super("email_in_use");
    this.name = "EmailInUseError";
  }
}

export class SelfDeactivationError extends Error {
  constructor() {
    super("self_deactivation");
    this.name = "SelfDeactivationError";
  }
}

export class SelfDemotionError extends Error {
  constructor() {
    super("self_demotion");
    this.name = "SelfDemotionError";
  }
}

// Fields that show up in audit old/new values.
function auditView(user: UserRow): AuditValues {
  return {
    email: user.email,
    full_name: user.full_name,
    roles: user.roles,
    is_active: user.is_active,
  };
}

function changedFields(before: AuditValues, after: AuditValues) {
  const oldValues: AuditValues = {};
  const newValues: AuditValues = {};
  for (const key of Object.keys(after)) {
    if (JSON.stringify(before[key]) !== JSON.stringify(after[key])) {
      oldValues[key] = before[key];
      newValues[key] = after[key];
    }
  }
  return { oldValues, newValues };
}

export async function loadCurrentUser(
  users: UserRepository,
  claims: AccessTokenClaims,
): Promise<UserRow> {
  const user = await users.findById(claims.tenant_id, claims.sub);
  if (!user || !user.is_active) {
    throw new CurrentUserUnavailableError();
  }
  return user;
}

export function listUsers(users: UserRepository, tenantId: string, page: Page): Promise<UserRow[]> {
  return users.list(tenantId, page);
}

export async function getUser(users: UserRepository, tenantId: string, id: string): Promise<UserRow> {
  const user = await users.findById(tenantId, id);
  if (!user) throw new UserNotFoundError();
  return user;
}

async function assertEmailAvailable(
  users: UserRepository,
  tenantId: string,
  email: string,
  exceptId?: string,
): Promise<void> {
  const existing = await users.findByEmail(tenantId, email);
  if (existing && existing.id !== exceptId) {
    throw new EmailInUseError();
  }
}

/**
 * Applies a profile/admin update to `target`. Callers decide which fields the
 * body may carry (PATCH /users/me cannot change roles or is_active).
 */
export async function updateUser(
  deps: UserDeps,
  target: UserRow,
  body: AdminUpdateUserBody,
): Promise<UserRow> {
  const { users, audit, ctx } = deps;
  const patch: UserPatch = {};

  // Admins cannot lock themselves out through an update either.
  if (target.id === ctx.user_id) {
    if (body.is_active === false) throw new SelfDeactivationError();
    if (body.roles && target.roles.includes(ADMIN_ROLE) && !body.roles.includes(ADMIN_ROLE)) {
      throw new SelfDemotionError();
    }
  }

  if (body.email !== undefined && body.email !== target.email) {
    await assertEmailAvailable(users, target.tenant_id, body.email, target.id);
    patch.email = body.email;
  }
  if (body.full_name !== undefined) patch.fullName = body.full_name;
  if (body.password !== undefined) patch.hashedPassword = await hashPassword(body.password);
  if (body.roles !== undefined) patch.roles = body.roles;
  if (body.is_active !== undefined) patch.isActive = body.is_active;

  const before = auditView(target);
  let updated: UserRow | null;
  try {
    updated = await users.update(target.tenant_id, target.id, patch);
  } catch (err) {
    if (isUniqueViolation(err)) throw new EmailInUseError();
    throw err;
  }
  if (!updated) throw new UserNotFoundError();

  const { oldValues, newValues } = changedFields(before, auditView(updated));
  await audit.log(
    auditEntryFromContext(ctx, {
      action: "update",
      resourceType: "user",
      resourceId: updated.id,
      detail: patch.hashedPassword ? "password_changed" : undefined,
      oldValues,
      newValues,
      classification: "confidential",
    }),
  );

  return updated;
}

export async function createUser(deps: UserDeps, body: AdminCreateUserBody): Promise<UserRow> {
  const { users, audit, ctx } = deps;
  await assertEmailAvailable(users, ctx.tenant_id, body.email);

  let user: UserRow;
  try {
    user = await users.create({
      tenantId: ctx.tenant_id,
      email: body.email,
      hashedPassword: await hashPassword(body.password),
      fullName: body.full_name ?? null,
      roles: body.roles ?? [...DEFAULT_ROLES],
    });
  } catch (err) {
    if (isUniqueViolation(err)) throw new EmailInUseError();
    throw err;
  }

  await audit.log(
    auditEntryFromContext(ctx, {
      action: "create",
      resourceType: "user",
      resourceId: user.id,
      newValues: auditView(user),
      classification: "confidential",
    }),
  );

  return user;
}

export async function deactivateUser(deps: UserDeps, id: string): Promise<void> {
  const { users, audit, ctx } = deps;

  if (id === ctx.user_id) {
    throw new SelfDeactivationError();
  }

  const target = await getUser(users, ctx.tenant_id, id);
  if (!target.is_active) return;

  const updated = await users.update(ctx.tenant_id, id, { isActive: false });
  if (!updated) throw new UserNotFoundError();

  await audit.log(
    auditEntryFromContext(ctx, {
      action: "delete",
      resourceType: "user",
      resourceId: id,
      detail: "deactivated",
      oldValues: { is_active: true },
      newValues: { is_active: false },
      classification: "confidential",
    }),
  );
}

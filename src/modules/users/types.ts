// src/modules/users/types.ts
// ============================================================================
// User types
// ---------------------------------------------------------------------------
// - UserRow mirrors the users table (pg returns timestamptz as Date)
// - UserResponse is the public shape; it never carries the password hash
// ============================================================================

import { z } from "zod";

export const DEFAULT_ROLES = ["user"] as const;

export interface UserRow {
  id: string;
  tenant_id: string;
  email: string;
  hashed_password: string;
  full_name: string | null;
  roles: string[];
  is_active: boolean;
  is_verified: boolean;
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export type NewUser = {
  tenantId: string;
  email: string;
  hashedPassword: string;
  fullName: string | null;
  roles: string[];
  isVerified?: boolean;
};

/** Only the keys that are present are written. */
export type UserPatch = {
  email?: string;
  hashedPassword?: string;
  fullName?: string | null;
  roles?: string[];
  isActive?: boolean;
};

export type Page = {
  skip: number;
  limit: number;
};

export interface UserRepository {
  findById(tenantId: string, id: string): Promise<UserRow | null>;
  findByEmail(tenantId: string, email: string): Promise<UserRow | null>;
  list(tenantId: string, page: Page): Promise<UserRow[]>;
  create(input: NewUser): Promise<UserRow>;
  update(tenantId: string, id: string, patch: UserPatch): Promise<UserRow | null>;
  touchLastLogin(tenantId: string, id: string, at: Date): Promise<void>;
}

export type UserResponse = {
  id: string;
  tenant_id: string;
  email: string;
  full_name: string | null;
  roles: string[];
  is_active: boolean;
  is_verified: boolean;
  last_login_at: string | null;
  created_at: string;
  updated_at: string;
};

export function toUserResponse(row: UserRow): UserResponse {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    email: row.email,
    full_name: row.full_name,
    roles: row.roles,
    is_active: row.is_active,
    is_verified: row.is_verified,
    last_login_at: row.last_login_at ? row.last_login_at.toISOString() : null,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

// -----------------------------
// Request bodies
// -----------------------------

export const EmailSchema = z.string().trim().toLowerCase().email().max(255);
export const NewPasswordSchema = z.string().min(8, "Password must be at least 8 characters.").max(128);
const RoleSchema = z.string().trim().min(1).max(50);

export const UpdateMeBodySchema = z
  .object({
    email: EmailSchema.optional(),
    full_name: z.string().trim().max(255).nullable().optional(),
    password: NewPasswordSchema.optional(),
  })
  .strict();

export type UpdateMeBody = z.infer<typeof UpdateMeBodySchema>;

export const AdminCreateUserBodySchema = z
  .object({
    email: EmailSchema,
    password: NewPasswordSchema,
    full_name: z.string().trim().max(255).nullable().optional(),
    roles: z.array(RoleSchema).min(1).optional(),
  })
  .strict();

export type AdminCreateUserBody = z.infer<typeof AdminCreateUserBodySchema>;

export const AdminUpdateUserBodySchema = UpdateMeBodySchema.extend({
  roles: z.array(RoleSchema).min(1).optional(),
  is_active: z.boolean().optional(),
}).strict();

export type AdminUpdateUserBody = z.infer<typeof AdminUpdateUserBodySchema>;

export const ListUsersQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const UserIdParamsSchema = z.object({
  id: z.string().uuid(),
});

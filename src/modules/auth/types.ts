// src/modules/auth/types.ts
import { z } from "zod";
import { EmailSchema, NewPasswordSchema } from "../users/types.js";

export const LoginBodySchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, "Password is required.").max(128),
});

export type LoginBody = z.infer<typeof LoginBodySchema>;

export const RegisterBodySchema = z.object({
  email: EmailSchema,
  password: NewPasswordSchema,
  full_name: z.string().trim().max(255).optional(),
});

export type RegisterBody = z.infer<typeof RegisterBodySchema>;

export const RefreshBodySchema = z.object({
  refresh_token: z.string().min(1, "refresh_token is required."),
});

export type RefreshBody = z.infer<typeof RefreshBodySchema>;

export const LogoutBodySchema = z
  .object({
    refresh_token: z.string().min(1).optional(),
  })
  .default({});

export type LogoutBody = z.infer<typeof LogoutBodySchema>;

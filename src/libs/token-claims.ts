// src/libs/token-claims.ts
// Claim shape shared by the API (signing/verification) and the browser
// session library (decode only). Keep free of Node-only imports.
import { z } from "zod";

export const TOKEN_TYPES = ["access", "refresh"] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

export const TokenClaimsSchema = z.object({
  sub: z.string().uuid(),
  email: z.string().min(3),
  tenant_id: z.string().uuid(),
  roles: z.array(z.string()),
  type: z.enum(TOKEN_TYPES),
  exp: z.number().int(),
  iat: z.number().int().optional(),
  jti: z.string().uuid(),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export type TokenPair = {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
  /** Lifetime of the access token in seconds. */
  expires_in: number;
};

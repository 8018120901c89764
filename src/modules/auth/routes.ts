// src/modules/auth/routes.ts
// ============================================================================
// Auth routes (prefix /auth)
// ----------------------------------------------------------------------------
// - POST /login     (tenant)  -> token pair
// - POST /register  (tenant)  -> 201 + token pair
// - POST /refresh   (tenant)  -> new access token, same refresh token
// - POST /logout    (auth)    -> revoke access (+ refresh) token
// ============================================================================

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { sendApiError } from "../../libs/error-response.js";
import { hashEmailForLog, hashIpForLog } from "../../libs/pii.js";
import { requestContext } from "../../libs/request-context.js";
import {
  EmailAlreadyRegisteredError,
  InactiveUserError,
  InvalidCredentialsError,
  login,
  logout,
  refresh,
  RefreshFailedError,
  register,
  type AuthDeps,
} from "./service.js";
import {
  LoginBodySchema,
  LogoutBodySchema,
  RefreshBodySchema,
  RegisterBodySchema,
} from "./types.js";

function requireDeps(app: FastifyInstance, req: FastifyRequest, reply: FastifyReply): AuthDeps | null {
  if (!req.uow || !req.audit) {
    req.log.error({ route: req.url }, "missing_db_context");
    sendApiError(reply, 500, "INTERNAL", "Database context not available for this request.");
    return null;
  }
  return {
    users: req.uow.users,
    audit: req.audit,
    tokens: app.services.tokens,
    revocations: app.services.revocations,
    ctx: requestContext(req),
  };
}

export default async function authRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // POST /auth/login
  // -------------------------------------------------------------------------
  app.post("/login", { config: { tenant: true } }, async (req, reply) => {
    const parsed = LoginBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid login payload.", parsed.error.flatten());
    }

    const deps = requireDeps(app, req, reply);
    if (!deps) return reply;

    try {
      return reply.send(await login(deps, parsed.data));
    } catch (err) {
      if (err instanceof InvalidCredentialsError || err instanceof InactiveUserError) {
        req.log.warn(
          {
            reason: err.message,
            email_hash: hashEmailForLog(parsed.data.email),
            ip_hash: hashIpForLog(req.ip),
          },
          "login_failed",
        );
      }
      if (err instanceof InvalidCredentialsError) {
        reply.header("WWW-Authenticate", "Bearer");
        return sendApiError(reply, 401, "INVALID_CREDENTIALS", "Invalid email or password.");
      }
      if (err instanceof InactiveUserError) {
        return sendApiError(reply, 403, "ACCOUNT_DISABLED", "User account is inactive.");
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/register
  // -------------------------------------------------------------------------
  app.post("/register", { config: { tenant: true } }, async (req, reply) => {
    const parsed = RegisterBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid registration payload.", parsed.error.flatten());
    }

    const deps = requireDeps(app, req, reply);
    if (!deps) return reply;

    try {
      const pair = await register(deps, parsed.data);
      return reply.code(201).send(pair);
    } catch (err) {
      if (err instanceof EmailAlreadyRegisteredError) {
        return sendApiError(reply, 409, "EMAIL_ALREADY_REGISTERED", "Email already registered.");
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/refresh
  // -------------------------------------------------------------------------
  app.post("/refresh", { config: { tenant: true } }, async (req, reply) => {
    const parsed = RefreshBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid refresh payload.", parsed.error.flatten());
    }

    const deps = requireDeps(app, req, reply);
    if (!deps) return reply;

    try {
      return reply.send(await refresh(deps, parsed.data.refresh_token));
    } catch (err) {
      if (err instanceof RefreshFailedError) {
        req.log.info({ reason: err.reason }, "refresh_failed");
        reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
        return sendApiError(reply, 401, "REFRESH_FAILED", "Invalid refresh token.");
      }
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /auth/logout
  // -------------------------------------------------------------------------
  app.post("/logout", { config: { auth: true } }, async (req, reply) => {
    const parsed = LogoutBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid logout payload.", parsed.error.flatten());
    }

    const user = req.user;
    if (!user) {
      return sendApiError(reply, 401, "INVALID_TOKEN", "Missing auth context.");
    }

    const deps = requireDeps(app, req, reply);
    if (!deps) return reply;

    await logout(deps, user, parsed.data.refresh_token);
    return reply.send({ ok: true });
  });
}

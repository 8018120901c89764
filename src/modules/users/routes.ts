// src/modules/users/routes.ts
// ============================================================================
// User routes (prefix /users)
// ----------------------------------------------------------------------------
// - GET    /me    (auth)         current user
// - PATCH  /me    (auth)         email / full_name / password
// - GET    /      (auth, admin)  list the tenant's users
// - POST   /      (auth, admin)  create a user
// - GET    /:id   (auth, admin)
// - PATCH  /:id   (auth, admin)  incl. roles / is_active
// - DELETE /:id   (auth, admin)  deactivate
//
// The token's user is re-loaded on every request: missing or inactive -> 401.
// ============================================================================

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { sendApiError } from "../../libs/error-response.js";
import { requestContext } from "../../libs/request-context.js";
import {
  createUser,
  CurrentUserUnavailableError,
  deactivateUser,
  EmailInUseError,
  getUser,
  listUsers,
  loadCurrentUser,
  SelfDeactivationError,
  SelfDemotionError,
  updateUser,
  UserNotFoundError,
  type UserDeps,
} from "./service.js";
import {
  AdminCreateUserBodySchema,
  AdminUpdateUserBodySchema,
  ListUsersQuerySchema,
  toUserResponse,
  UpdateMeBodySchema,
  UserIdParamsSchema,
  type UserRow,
} from "./types.js";

const ADMIN_ONLY = { auth: true, roles: ["admin"] };

function requireDeps(req: FastifyRequest, reply: FastifyReply): UserDeps | null {
  if (!req.uow || !req.audit) {
    req.log.error({ route: req.url }, "missing_db_context");
    sendApiError(reply, 500, "INTERNAL", "Database context not available for this request.");
    return null;
  }
  return { users: req.uow.users, audit: req.audit, ctx: requestContext(req) };
}

/** Re-loads the caller; replies 401 when the account is gone or inactive. */
async function currentUser(
  deps: UserDeps,
  req: FastifyRequest,
  reply: FastifyReply,
): Promise<UserRow | null> {
  if (!req.user) {
    sendApiError(reply, 401, "INVALID_TOKEN", "Missing auth context.");
    return null;
  }
  try {
    return await loadCurrentUser(deps.users, req.user);
  } catch (err) {
    if (!(err instanceof CurrentUserUnavailableError)) throw err;
    reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
    sendApiError(reply, 401, "INVALID_TOKEN", "User not found or inactive.");
    return null;
  }
}

function sendUserError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof UserNotFoundError) {
    return sendApiError(reply, 404, "USER_NOT_FOUND", "User not found.");
  }
  if (err instanceof EmailInUseError) {
    return sendApiError(reply, 409, "EMAIL_ALREADY_REGISTERED", "Email already in use.");
  }
  if (err instanceof SelfDeactivationError) {
    return sendApiError(reply, 400, "VALIDATION_FAILED", "Cannot deactivate your own account.");
  }
  if (err instanceof SelfDemotionError) {
    return sendApiError(reply, 400, "VALIDATION_FAILED", "Cannot remove your own admin role.");
  }
  throw err;
}

export default async function userRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // GET /users/me
  // -------------------------------------------------------------------------
  app.get("/me", { config: { auth: true } }, async (req, reply) => {
    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    const me = await currentUser(deps, req, reply);
    if (!me) return reply;
    return reply.send(toUserResponse(me));
  });

  // -------------------------------------------------------------------------
  // PATCH /users/me
  // -------------------------------------------------------------------------
  app.patch("/me", { config: { auth: true } }, async (req, reply) => {
    const parsed = UpdateMeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid profile update.", parsed.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    const me = await currentUser(deps, req, reply);
    if (!me) return reply;

    try {
      return reply.send(toUserResponse(await updateUser(deps, me, parsed.data)));
    } catch (err) {
      return sendUserError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /users
  // -------------------------------------------------------------------------
  app.get("/", { config: ADMIN_ONLY }, async (req, reply) => {
    const query = ListUsersQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid pagination.", query.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    if (!(await currentUser(deps, req, reply))) return reply;

    const rows = await listUsers(deps.users, deps.ctx.tenant_id, query.data);
    return reply.send(rows.map(toUserResponse));
  });

  // -------------------------------------------------------------------------
  // POST /users
  // -------------------------------------------------------------------------
  app.post("/", { config: ADMIN_ONLY }, async (req, reply) => {
    const parsed = AdminCreateUserBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid user payload.", parsed.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    if (!(await currentUser(deps, req, reply))) return reply;

    try {
      const created = await createUser(deps, parsed.data);
      return reply.code(201).send(toUserResponse(created));
    } catch (err) {
      return sendUserError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /users/:id
  // -------------------------------------------------------------------------
  app.get("/:id", { config: ADMIN_ONLY }, async (req, reply) => {
    const params = UserIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid user id.", params.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    if (!(await currentUser(deps, req, reply))) return reply;

    try {
      return reply.send(toUserResponse(await getUser(deps.users, deps.ctx.tenant_id, params.data.id)));
    } catch (err) {
      return sendUserError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // PATCH /users/:id
  // -------------------------------------------------------------------------
  app.patch("/:id", { config: ADMIN_ONLY }, async (req, reply) => {
    const params = UserIdParamsSchema.safeParse(req.params);
    const body = AdminUpdateUserBodySchema.safeParse(req.body);
    if (!params.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid user id.", params.error.flatten());
    }
    if (!body.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid user update.", body.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    if (!(await currentUser(deps, req, reply))) return reply;

    try {
      const target = await getUser(deps.users, deps.ctx.tenant_id, params.data.id);
      return reply.send(toUserResponse(await updateUser(deps, target, body.data)));
    } catch (err) {
      return sendUserError(reply, err);
    }
  });

  // -------------------------------------------------------------------------
  // DELETE /users/:id
  // -------------------------------------------------------------------------
  app.delete("/:id", { config: ADMIN_ONLY }, async (req, reply) => {
    const params = UserIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid user id.", params.error.flatten());
    }

    const deps = requireDeps(req, reply);
    if (!deps) return reply;
    if (!(await currentUser(deps, req, reply))) return reply;

    try {
      await deactivateUser(deps, params.data.id);
      return reply.code(204).send();
    } catch (err) {
      return sendUserError(reply, err);
    }
  });
}

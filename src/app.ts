// src/app.ts
// ============================================================================
// Keystone API (Fastify)
// ----------------------------------------------------------------------------
//  - central Fastify setup (logger, timeouts, body limit, CORS, security headers)
//  - /health and /ready
//  - auth/users/audit routes behind the request pipeline:
//      request-context -> auth -> authorization -> tenant-guard -> db-context
//  - uniform error bodies
//  - services are closed with the app (onClose)
// ============================================================================

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import requestContextPlugin from "./plugins/request-context.js";
import authPlugin from "./plugins/auth.js";
import authorizationPlugin from "./plugins/authorization.js";
import tenantGuardPlugin from "./plugins/tenant-guard.js";
import dbContextPlugin from "./plugins/db-context.js";
import rateLimitPlugin from "./plugins/rate-limit.js";

import { env } from "./libs/env.js";
import { settings as defaultSettings, type Settings } from "./libs/settings.js";
import { apiError } from "./libs/error-response.js";
import { mapDbError, pgErrorCode } from "./libs/error-map.js";
import { acceptedRequestId } from "./libs/http.js";
import type { AppServices } from "./services.js";

import authRoutes from "./modules/auth/routes.js";
import userRoutes from "./modules/users/routes.js";
import auditRoutes from "./modules/audit/routes.js";

export type AppOptions = FastifyServerOptions & {
  services: AppServices;
  settings?: Settings;
};

// ---------------------------------------------------------------------------
// Feature routes behind the request pipeline
// ---------------------------------------------------------------------------

async function registerApiModules(app: FastifyInstance, cfg: Settings) {
  await app.register(async (instance) => {
    // Order matters: every hook relies on what the previous one set.
    await instance.register(requestContextPlugin, {
      defaultTenantId: cfg.tenancy.defaultTenantId,
    });
    await instance.register(authPlugin);
    await instance.register(authorizationPlugin);
    await instance.register(tenantGuardPlugin);
    await instance.register(dbContextPlugin, {
      auditLogging: cfg.features.auditLogging,
    });

    // Routes after the hooks
    await instance.register(authRoutes, { prefix: "/auth" });
    await instance.register(userRoutes, { prefix: "/users" });
    await instance.register(auditRoutes, { prefix: "/audit-logs" });
  });
}

// ---------------------------------------------------------------------------
// Health / readiness
// ---------------------------------------------------------------------------

type ComponentStatus = "healthy" | "unhealthy" | "not_configured";

async function registerHealthRoutes(app: FastifyInstance, cfg: Settings) {
  app.get("/health", async () => ({
    status: "healthy",
    version: cfg.app.version,
    profile: cfg.profile,
  }));

  app.get("/ready", async (_req, reply) => {
    const db = await app.services.dataSource.health();
    if (!db.ok) {
      app.log.warn({ error: db.error }, "ready_db_unhealthy");
    }

    let redis: ComponentStatus = "not_configured";
    if (app.services.checkRedis) {
      const rh = await app.services.checkRedis();
      redis = rh.ok ? "healthy" : "unhealthy";
      if (!rh.ok) app.log.warn({ error: rh.error }, "ready_redis_unhealthy");
    }

    const ready = db.ok && redis !== "unhealthy";
    return reply.code(ready ? 200 : 503).send({
      status: ready ? "ready" : "not_ready",
      database: db.ok ? "healthy" : "unhealthy",
      redis,
    });
  });
}

// ---------------------------------------------------------------------------
// Error / not-found handlers
// ---------------------------------------------------------------------------

// Child contexts inherit these only when they are set before registration.
function registerErrorHandlers(app: FastifyInstance) {
  app.setErrorHandler((err, req, reply) => {
    if (!err.statusCode && pgErrorCode(err)) {
      const mapped = mapDbError(err);
      if (mapped.code !== "INTERNAL") {
        req.log.warn({ err }, "db_constraint_error");
        return reply
          .code(mapped.status)
          .type("application/json")
          .send(apiError(mapped.status, mapped.code, mapped.message));
      }
    }

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    if (status >= 500) {
      req.log.error({ err }, "unhandled_error");
    } else {
      req.log.info({ err: { code: err.code, message: err.message } }, "request_rejected");
    }

    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 401
          ? "UNAUTHORIZED"
          : status === 403
            ? "FORBIDDEN"
            : status === 404
              ? "NOT_FOUND"
              : status === 413
                ? "PAYLOAD_TOO_LARGE"
                : status === 429
                  ? "RATE_LIMITED"
                  : status >= 500
                    ? "INTERNAL"
                    : "REQUEST_FAILED";
    const message = status >= 500 ? "Internal server error." : err.message;

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, code, message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const {
    services,
    settings: cfg = defaultSettings,
    logger = { level: cfg.log.level },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    bodyLimit: env.MAX_BODY_BYTES,
    // genReqId decides whether a client-sent id is kept.
    requestIdHeader: false,
    requestIdLogLabel: "request_id",
    genReqId: (req) => acceptedRequestId(req.headers[env.REQUEST_ID_HEADER]) ?? randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  app.decorate("services", services);
  registerErrorHandlers(app);

  app.addHook("onRequest", async (request, reply) => {
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline security headers
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Permissions-Policy", "geolocation=(), microphone=(), camera=()");
    reply.header("Content-Security-Policy", "frame-ancestors 'none'");
    return payload;
  });

  const corsAllowlist = new Set(cfg.cors.origins);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      return cb(null, corsAllowlist.has(origin));
    },
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    exposedHeaders: [env.REQUEST_ID_HEADER],
    credentials: true,
    maxAge: 86_400,
  });

  if (cfg.features.rateLimit) {
    await app.register(rateLimitPlugin, {
      windowSec: env.RATE_LIMIT_WINDOW,
      max: env.RATE_LIMIT_MAX,
      authMax: env.RATE_LIMIT_AUTH_MAX,
    });
  }

  await registerHealthRoutes(app, cfg);
  await registerApiModules(app, cfg);

  app.addHook("onReady", async () => {
    app.log.debug(app.printRoutes());
  });

  // Graceful shutdown: server.ts calls app.close()
  app.addHook("onClose", async () => {
    try {
      await services.close();
      app.log.info("services_closed");
    } catch (err) {
      app.log.warn({ err }, "services_shutdown_failed");
    }
  });

  return app;
}

// src/types/fastify.d.ts
// ============================================================================
// Fastify type augmentation
// ----------------------------------------------------------------------------
// - route config: config.auth / config.tenant / config.roles
// - request decorations set by the plugin chain
//     request-context -> auth -> authorization -> tenant-guard -> db-context
// - app.services: injected infrastructure (data source, tokens, stores)
// Type imports only; this file must not trigger runtime imports.
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Bearer access token required (auth.ts), tenant must match (tenant-guard.ts). */
    auth?: boolean;

    /** Tenant-scoped unit of work without a token (db-context.ts). */
    tenant?: boolean;

    /** Every listed role must be present in the token (authorization.ts). */
    roles?: string[];
  }

  interface FastifyInstance {
    services: import("../services.js").AppServices;
  }

  interface FastifyRequest {
    /** Verified access token claims; only on config.auth routes. */
    user?: import("../libs/jwt.js").AccessTokenClaims;

    /** Tenant from X-Tenant-Id, or the default tenant when no header was sent. */
    requestedTenantId?: string;

    /** Tenant the request is scoped to. From the JWT on authenticated routes. */
    tenantId?: string;

    /** Per-request transaction (db-context.ts). */
    uow?: import("../libs/data-source.js").UnitOfWork;

    /** Audit logger bound to the request's unit of work. */
    audit?: import("../modules/audit/types.js").AuditLogger;

    /** Internal transaction state, db-context.ts only. */
    _txState?: {
      uow?: import("../libs/data-source.js").UnitOfWork;
      finalized: boolean;
    };

    rateLimit?: { count: number; ttl: number; blocked: boolean; max: number };
  }
}

// src/server.ts
// ============================================================================
// Bootstrap for the Keystone API
// ----------------------------------------------------------------------------
//  - resolve the JWT secret (env or secret vault), build services, buildApp()
//  - process-wide error guards (unhandledRejection / uncaughtException)
//  - orderly shutdown with a timeout guard (SIGINT, SIGTERM, SIGUSR2)
//  - low-level Node HTTP timeouts
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp } from "./app.js";
import { env, envSummary } from "./libs/env.js";
import { logger } from "./libs/logger.js";
import { createSecretVault } from "./libs/secret-vault.js";
import { settings } from "./libs/settings.js";
import { createServices, resolveJwtSecret } from "./services.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;
const HEADERS_TIMEOUT_MS = 61_000;
const KEEPALIVE_TIMEOUT_MS = 65_000;

const log = logger.child({ ctx: "server" });

let app: FastifyInstance | undefined;
let shuttingDown = false;

// ============================================================================
// Process-wide guards
// ============================================================================

process.on("unhandledRejection", (reason) => {
  log.error({ reason }, "unhandled_rejection");
});

process.on("uncaughtException", (err) => {
  log.error({ err }, "uncaught_exception");
  void shutdown("uncaughtException");
});

// ============================================================================
// Start & listen
// ============================================================================

async function start(): Promise<void> {
  log.info({ env: envSummary(), profile: settings.profile }, "env_summary");

  const jwtSecret = await resolveJwtSecret(createSecretVault());
  const services = await createServices({ jwtSecret, log });

  app = await buildApp({ services });

  app.server.headersTimeout = HEADERS_TIMEOUT_MS;
  app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

  await app.listen({ host: env.HOST, port: env.PORT });
  app.log.info(
    { address: app.server.address(), pid: process.pid, node: process.version },
    "keystone_api_listening",
  );
}

// ============================================================================
// Orderly shutdown
// ============================================================================

async function shutdown(reason: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  // If anything hangs, exit hard after the timeout.
  const killTimer = setTimeout(() => {
    log.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS, reason }, "shutdown_forced_exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    log.info({ reason }, "shutdown_received");
    // Stops accepting connections, lets open requests finish, runs onClose.
    if (app) await app.close();
    log.info("server_closed");
    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    log.error({ err }, "shutdown_error");
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// SIGINT  = Ctrl+C
// SIGTERM = docker stop / Kubernetes
// SIGUSR2 = nodemon restarts
process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

start().catch((err: unknown) => {
  // Exit non-zero so the orchestrator restarts the container.
  log.fatal({ err }, "server_start_failed");
  process.exitCode = 1;
  setTimeout(() => process.exit(1), 50);
});

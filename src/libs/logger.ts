// src/libs/logger.ts
// Standalone pino logger for code outside a request (scripts, bootstrap).
// Inside handlers use req.log / app.log: same pino, plus the request id.
import pino, { type Logger, type LoggerOptions } from "pino";

function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const opts: LoggerOptions = {
    level: nodeEnv === "test" ? "silent" : (process.env.LOG_LEVEL ?? "info"),
    serializers: pino.stdSerializers,
    base: { service: "keystone-api" },
  };
  return pino(opts);
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

// src/libs/error-response.ts
// ============================================================================
// Uniform error body: { status, error: { code, message }, details? }
// ============================================================================

import type { FastifyReply } from "fastify";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const body: ApiErrorBody = { status, error: { code, message } };
  if (details !== undefined) {
    body.details = details;
  }
  return body;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): FastifyReply {
  return reply.code(status).type("application/json").send(apiError(status, code, message, details));
}

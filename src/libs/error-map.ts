// src/libs/error-map.ts
// Postgres SQLSTATE -> API error. Anything unknown stays a 500.

export type MappedDbError = {
  status: number;
  code: string;
  message: string;
};

export const UNIQUE_VIOLATION = "23505";

export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return pgErrorCode(err) === UNIQUE_VIOLATION;
}

export function mapDbError(err: unknown): MappedDbError {
  switch (pgErrorCode(err)) {
    case UNIQUE_VIOLATION:
      return {
        status: 409,
        code: "CONFLICT",
        message: "Resource already exists.",
      };
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return {
        status: 400,
        code: "VALIDATION_FAILED",
        message: "Invalid input data.",
      };
    default:
      return {
        status: 500,
        code: "INTERNAL",
        message: "Internal server error.",
      };
  }
}

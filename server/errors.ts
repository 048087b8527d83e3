import type { ZodError } from "zod";
import type { ApiErrorCode } from "@shared/contracts/errors";

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: ApiErrorCode,
    readonly details?: Record<string, string[] | undefined>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, string[] | undefined>) {
    super(message, 400, "VALIDATION_ERROR", details);
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(message, error.flatten().fieldErrors);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

const PG_UNIQUE_VIOLATION = "23505";

/** True when Postgres rejected a write on a UNIQUE constraint. */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ("code" in error && error.code === PG_UNIQUE_VIOLATION) return true;
  return isUniqueViolation(error.cause);
}

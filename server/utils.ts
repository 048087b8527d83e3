import type { Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";
import { ApiError, ValidationError } from "./errors";
import { logger } from "./logger";
import type { ApiErrorBody } from "@shared/contracts/errors";

/** Normalize Express route param (string | string[]) to string */
export function param(v: string | string[]): string {
  return Array.isArray(v) ? v[0] : v;
}

/** Parse a positive integer id from a route param; throws ValidationError otherwise */
export function parseIdParam(value: string | string[], label = "id"): number {
  const raw = param(value);
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(n) || n < 1) {
    throw new ValidationError(`Invalid ${label}: must be a positive integer`);
  }
  return n;
}

/** Validate a request body against a zod schema */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, message: string): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZod(message, parsed.error);
  }
  return parsed.data;
}

/**
 * Standard error response handler for route handlers.
 * ApiErrors keep their status and message; anything else is a 500.
 */
export function handleRouteError(res: Response, error: unknown, context?: string): void {
  if (res.headersSent) return;
  if (error instanceof ApiError) {
    const body: ApiErrorBody = { message: error.message, code: error.code };
    if (error.details) body.errors = error.details;
    res.status(error.status).json(body);
    return;
  }
  logger.error(context || "Server", "Server error", error);
  const body: ApiErrorBody = { message: "Internal server error", code: "INTERNAL_ERROR" };
  res.status(500).json(body);
}

import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATABASE_DIR: z.string().min(1).default("./estimation-db"),
  CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Reads and validates the process environment.
 * Throws with the names of every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }
  return parsed.data;
}

/** Splits CORS_ORIGIN into an allow-list; unset means any origin. */
export function corsOrigins(config: AppConfig): string[] | "*" {
  if (!config.CORS_ORIGIN) return "*";
  const origins = config.CORS_ORIGIN.split(",").map((o) => o.trim()).filter(Boolean);
  return origins.length > 0 ? origins : "*";
}

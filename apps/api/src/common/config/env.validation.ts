/**
 * Environment validation
 *
 * Passed to ConfigModule.forRoot({ validate }) so the process refuses to
 * start on a malformed environment.
 *
 * @module common/config
 */

import { z } from "zod";

const booleanString = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Server
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  /** Comma separated list, "*" for any origin */
  CORS_ORIGINS: z.string().default("*"),
  SHUTDOWN_TIMEOUT: z.coerce.number().int().positive().default(30000),

  // Database
  /** SQLite file, ":memory:" for a throwaway database */
  DATABASE_PATH: z.string().min(1).default("tichu.db"),
  DATABASE_LOG_QUERIES: booleanString.default("false"),

  // Stale match cleanup
  MATCH_CLEANUP_ENABLED: booleanString.default("true"),
  MATCH_RETENTION_DAYS: z.coerce.number().int().min(0).default(3),

  // Rate limiting
  THROTTLE_TTL_MS: z.coerce.number().int().positive().default(60000),
  THROTTLE_LIMIT: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof EnvSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Application Configuration
 *
 * Built once from the validated environment and injected wherever a
 * setting is needed. Nothing reads process.env after start-up.
 *
 * @module common/config
 */

import type { ConfigService } from "@nestjs/config";
import type { Env } from "./env.validation";

export interface ServerSettings {
  readonly host: string;
  readonly port: number;
  readonly corsOrigins: readonly string[];
  readonly shutdownTimeoutMs: number;
}

export interface DatabaseSettings {
  readonly path: string;
  readonly logQueries: boolean;
}

export interface CleanupSettings {
  readonly enabled: boolean;
  /** PLAYING matches dated more than this many days ago are deleted */
  readonly retentionDays: number;
}

export interface ThrottleSettings {
  readonly ttlMs: number;
  readonly limit: number;
}

export class AppConfig {
  readonly environment: Env["NODE_ENV"];
  readonly server: ServerSettings;
  readonly database: DatabaseSettings;
  readonly cleanup: CleanupSettings;
  readonly throttle: ThrottleSettings;

  constructor(env: Env) {
    this.environment = env.NODE_ENV;
    this.server = {
      host: env.HOST,
      port: env.PORT,
      corsOrigins: env.CORS_ORIGINS.split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT,
    };
    this.database = {
      path: env.DATABASE_PATH,
      logQueries: env.DATABASE_LOG_QUERIES,
    };
    this.cleanup = {
      enabled: env.MATCH_CLEANUP_ENABLED,
      retentionDays: env.MATCH_RETENTION_DAYS,
    };
    this.throttle = {
      ttlMs: env.THROTTLE_TTL_MS,
      limit: env.THROTTLE_LIMIT,
    };
    Object.freeze(this);
  }

  get isProduction(): boolean {
    return this.environment === "production";
  }

  static fromConfigService(config: ConfigService<Env, true>): AppConfig {
    return new AppConfig({
      NODE_ENV: config.get("NODE_ENV", { infer: true }),
      HOST: config.get("HOST", { infer: true }),
      PORT: config.get("PORT", { infer: true }),
      CORS_ORIGINS: config.get("CORS_ORIGINS", { infer: true }),
      SHUTDOWN_TIMEOUT: config.get("SHUTDOWN_TIMEOUT", { infer: true }),
      DATABASE_PATH: config.get("DATABASE_PATH", { infer: true }),
      DATABASE_LOG_QUERIES: config.get("DATABASE_LOG_QUERIES", { infer: true }),
      MATCH_CLEANUP_ENABLED: config.get("MATCH_CLEANUP_ENABLED", { infer: true }),
      MATCH_RETENTION_DAYS: config.get("MATCH_RETENTION_DAYS", { infer: true }),
      THROTTLE_TTL_MS: config.get("THROTTLE_TTL_MS", { infer: true }),
      THROTTLE_LIMIT: config.get("THROTTLE_LIMIT", { infer: true }),
    });
  }
}

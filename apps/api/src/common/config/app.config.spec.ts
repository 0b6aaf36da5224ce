/**
 * Application Configuration Tests
 */

import { AppConfig } from "./app.config";
import { validateEnv } from "./env.validation";

describe("validateEnv", () => {
  it("should apply defaults to an empty environment", () => {
    const env = validateEnv({});

    expect(env).toEqual({
      NODE_ENV: "development",
      HOST: "0.0.0.0",
      PORT: 8000,
      CORS_ORIGINS: "*",
      SHUTDOWN_TIMEOUT: 30000,
      DATABASE_PATH: "tichu.db",
      DATABASE_LOG_QUERIES: false,
      MATCH_CLEANUP_ENABLED: true,
      MATCH_RETENTION_DAYS: 3,
      THROTTLE_TTL_MS: 60000,
      THROTTLE_LIMIT: 100,
    });
  });

  it("should coerce numeric and boolean strings", () => {
    const env = validateEnv({
      PORT: "9100",
      MATCH_CLEANUP_ENABLED: "false",
      MATCH_RETENTION_DAYS: "7",
    });

    expect(env.PORT).toBe(9100);
    expect(env.MATCH_CLEANUP_ENABLED).toBe(false);
    expect(env.MATCH_RETENTION_DAYS).toBe(7);
  });

  it("should reject an invalid port", () => {
    expect(() => validateEnv({ PORT: "not-a-port" })).toThrow(
      /^Invalid environment configuration: PORT:/,
    );
  });

  it("should reject a boolean that is not true or false", () => {
    expect(() => validateEnv({ MATCH_CLEANUP_ENABLED: "yes" })).toThrow(
      /MATCH_CLEANUP_ENABLED/,
    );
  });
});

describe("AppConfig", () => {
  it("should group settings by concern", () => {
    const config = new AppConfig(
      validateEnv({
        NODE_ENV: "production",
        CORS_ORIGINS: "http://localhost:5173, https://scores.example.com",
        DATABASE_PATH: ":memory:",
        THROTTLE_LIMIT: "20",
      }),
    );

    expect(config.isProduction).toBe(true);
    expect(config.server.corsOrigins).toEqual([
      "http://localhost:5173",
      "https://scores.example.com",
    ]);
    expect(config.database).toEqual({ path: ":memory:", logQueries: false });
    expect(config.cleanup).toEqual({ enabled: true, retentionDays: 3 });
    expect(config.throttle).toEqual({ ttlMs: 60000, limit: 20 });
  });

  it("should be immutable", () => {
    const config = new AppConfig(validateEnv({}));

    expect(Object.isFrozen(config)).toBe(true);
  });
});

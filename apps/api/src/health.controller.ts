/**
 * Health check controller with detailed diagnostics
 *
 * Features:
 * - Basic health check for load balancers
 * - Ready endpoint for container probes
 * - Detailed status including database latency and match cleanup
 */

import { Controller, Get, HttpCode, HttpStatus, Version, VERSION_NEUTRAL } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { AppConfig } from "./common/config";
import { DatabaseService } from "./common/database";
import { MatchCleanupService } from "./modules/match";

interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  service: string;
  environment: string;
  timestamp: string;
  uptime: number;
  version: string;
  checks: {
    database: { status: string; latency?: number };
    cleanup: {
      status: "enabled" | "disabled";
      retentionDays: number;
      totalDeleted: number;
      lastRunAt: string | null;
    };
  };
}

@ApiTags("health")
@Controller()
export class HealthController {
  private readonly startTime = Date.now();

  constructor(
    private readonly config: AppConfig,
    private readonly database: DatabaseService,
    private readonly cleanup: MatchCleanupService,
  ) {}

  @Get("health")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Basic health check for load balancers" })
  @ApiResponse({ status: 200, description: "Service is healthy" })
  @HttpCode(HttpStatus.OK)
  health(): { status: string; timestamp: string } {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
    };
  }

  @Get("health/ready")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Readiness probe - checks if service can accept requests" })
  @ApiResponse({ status: 200, description: "Readiness and per-check results" })
  ready(): { ready: boolean; checks: Record<string, boolean> } {
    const checks: Record<string, boolean> = {
      database: this.pingDatabase() !== undefined,
    };

    const ready = Object.values(checks).every((v) => v);
    return { ready, checks };
  }

  @Get("health/detailed")
  @Version([VERSION_NEUTRAL, "1"])
  @ApiOperation({ summary: "Detailed health status with all components" })
  @ApiResponse({ status: 200, description: "Detailed health information" })
  detailedHealth(): HealthStatus {
    const latency = this.pingDatabase();
    const cleanupStats = this.cleanup.getStats();

    return {
      status: latency === undefined ? "unhealthy" : "healthy",
      service: "tichu-ledger-api",
      environment: this.config.environment,
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      version: process.env.npm_package_version || "0.1.0",
      checks: {
        database:
          latency === undefined ? { status: "unhealthy" } : { status: "healthy", latency },
        cleanup: {
          status: this.config.cleanup.enabled ? "enabled" : "disabled",
          retentionDays: this.config.cleanup.retentionDays,
          totalDeleted: cleanupStats.totalDeleted,
          lastRunAt: cleanupStats.lastRunAt?.toISOString() ?? null,
        },
      },
    };
  }

  @Get()
  @ApiOperation({ summary: "API root - service info" })
  root() {
    return {
      name: "Tichu Ledger API",
      version: "0.1.0",
      description: "Score keeping and statistics for Tichu card game matches",
      documentation: "/docs",
      endpoints: {
        matches: "/v1/matches",
        players: "/v1/players",
        stats: "/v1/stats",
        admin: "/v1/admin",
        health: "/health",
        healthReady: "/health/ready",
        healthDetailed: "/health/detailed",
      },
    };
  }

  /**
   * Latency in milliseconds, undefined when the database does not answer
   */
  private pingDatabase(): number | undefined {
    try {
      return this.database.ping();
    } catch {
      return undefined;
    }
  }
}

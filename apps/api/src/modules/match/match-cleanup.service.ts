/**
 * Match Cleanup Service - Removes abandoned matches
 *
 * A match still in play several days after its play date was abandoned.
 * Deleting it cascades to its stat records. Runs once at start-up and
 * daily at 3 AM when enabled.
 */

import { Injectable, Logger, OnApplicationBootstrap } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import type { IsoDate } from "@tichu/types";
import { AppConfig } from "../../common/config";
import { MatchRepository } from "../../common/database";
import { subtractDays, toIsoDate } from "../../common/utils/date";
import type { CleanupResult } from "./types/match.types";

export interface CleanupStats {
  totalDeleted: number;
  lastRunAt: Date | null;
}

@Injectable()
export class MatchCleanupService implements OnApplicationBootstrap {
  private readonly logger = new Logger(MatchCleanupService.name);
  private stats: CleanupStats = { totalDeleted: 0, lastRunAt: null };

  constructor(
    private readonly config: AppConfig,
    private readonly matches: MatchRepository,
  ) {
    const { enabled, retentionDays } = this.config.cleanup;
    this.logger.log(
      `Match cleanup ${enabled ? "enabled" : "disabled"}, retention: ${retentionDays} days`,
    );
  }

  getStats(): CleanupStats {
    return { ...this.stats };
  }

  onApplicationBootstrap(): void {
    this.runScheduled("start-up");
  }

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  scheduledCleanup(): void {
    this.runScheduled("scheduled");
  }

  /**
   * Delete matches in play whose play date is more than the retention
   * period before `today`
   */
  cleanupStaleMatches(today: IsoDate = toIsoDate()): CleanupResult {
    const cutoff = subtractDays(today, this.config.cleanup.retentionDays);
    const deletedMatchIds = this.matches.deleteStalePlaying(cutoff);

    this.stats = {
      totalDeleted: this.stats.totalDeleted + deletedMatchIds.length,
      lastRunAt: new Date(),
    };
    if (deletedMatchIds.length > 0) {
      this.logger.log(
        `Deleted ${deletedMatchIds.length} stale match(es) before ${cutoff}: ${deletedMatchIds.join(", ")}`,
      );
    }
    return { cutoff, deletedMatchIds };
  }

  private runScheduled(trigger: string): void {
    if (!this.config.cleanup.enabled) {
      return;
    }

    this.logger.log(`Starting ${trigger} match cleanup`);
    try {
      this.cleanupStaleMatches();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Match cleanup failed: ${message}`);
    }
  }
}

/**
 * Stats Service - Player and team statistics on demand
 *
 * Nothing is cached or stored: every call reads the match and stat record
 * history and recomputes. A storage failure aborts the whole computation,
 * so no partial leaderboard is ever returned.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { PlayerRow } from "@tichu/db";
import type { MatchRecord, PlayerId } from "@tichu/types";
import { MatchRepository, PlayerRepository, StatRecordRepository } from "../../common/database";
import {
  InvalidInputError,
  NotFoundError,
  err,
  ok,
  type Result,
} from "../../common/errors";
import { currentYear, yearRange } from "../../common/utils/date";
import {
  calculatePlayerStats,
  calculateTeamStats,
  enumeratePairs,
  rankPlayers,
  rankTeams,
  toPairRecord,
} from "./calculators";
import type { PairRecord, PlayerStats, Ranked, StatsPlayer, TeamStats } from "./types/stats.types";

@Injectable()
export class StatsService {
  private readonly logger = new Logger(StatsService.name);

  constructor(
    private readonly players: PlayerRepository,
    private readonly matches: MatchRepository,
    private readonly statRecords: StatRecordRepository,
  ) {}

  /**
   * One player's stats, optionally limited to one year
   */
  getPlayerStats(playerId: PlayerId, year?: number): Result<PlayerStats, NotFoundError> {
    const player = this.players.findById(playerId);
    if (!player) {
      return err(new NotFoundError("player", playerId));
    }

    const matches = this.finishedMatches(year);
    const records = this.statRecords.findForPlayer(playerId, year);
    return ok(calculatePlayerStats(toStatsPlayer(player), matches, records));
  }

  /**
   * Every registered player's stats for the current year, by ascending id
   */
  getCurrentYearStats(): PlayerStats[] {
    return this.allPlayerStats(currentYear());
  }

  /**
   * A pair's stats as partners, optionally limited to one year
   */
  getTeamStats(
    firstId: PlayerId,
    secondId: PlayerId,
    year?: number,
  ): Result<TeamStats, NotFoundError | InvalidInputError> {
    if (firstId === secondId) {
      return err(new InvalidInputError("A team needs two different players"));
    }

    const first = this.players.findById(firstId);
    if (!first) return err(new NotFoundError("player", firstId));
    const second = this.players.findById(secondId);
    if (!second) return err(new NotFoundError("player", secondId));

    const matches = this.finishedMatches(year);
    const records = this.statRecords.findForMatches(
      matches.map((m) => m.id),
      [firstId, secondId],
    );
    return ok(calculateTeamStats(toStatsPlayer(first), toStatsPlayer(second), matches, records));
  }

  /**
   * All-time games and wins of a pair; zeros when either player is unknown
   */
  getPairRecord(firstId: PlayerId, secondId: PlayerId): PairRecord {
    const result = this.getTeamStats(firstId, secondId);
    return result.success
      ? toPairRecord(result.data)
      : { totalGames: 0, wins: 0, winRate: 0 };
  }

  getLeaderboard(year?: number): Ranked<PlayerStats>[] {
    const ranked = rankPlayers(this.allPlayerStats(year));
    this.logger.debug(`Player leaderboard${yearLabel(year)}: ${ranked.length} ranked`);
    return ranked;
  }

  getTeamLeaderboard(year?: number): Ranked<TeamStats>[] {
    const players = this.players.findAll().map(toStatsPlayer);
    const matches = this.finishedMatches(year);
    const records = this.statRecords.findAll(year);

    const stats = enumeratePairs(players).map(([first, second]) =>
      calculateTeamStats(first, second, matches, records),
    );
    const ranked = rankTeams(stats);
    this.logger.debug(
      `Team leaderboard${yearLabel(year)}: ${ranked.length} of ${stats.length} pairs ranked`,
    );
    return ranked;
  }

  private allPlayerStats(year?: number): PlayerStats[] {
    const players = this.players.findAll();
    const matches = this.finishedMatches(year);
    const records = this.statRecords.findAll(year);
    return players.map((player) => calculatePlayerStats(toStatsPlayer(player), matches, records));
  }

  private finishedMatches(year?: number): MatchRecord[] {
    return this.matches.list({
      status: "FINISHED",
      ...(year !== undefined ? yearRange(year) : {}),
      order: "playDate",
    });
  }
}

function toStatsPlayer(player: PlayerRow): StatsPlayer {
  return { id: player.id, name: player.name, profileUrl: player.profileUrl };
}

function yearLabel(year?: number): string {
  return year !== undefined ? ` (${year})` : "";
}

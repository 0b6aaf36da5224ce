/**
 * Admin Service - Data maintenance
 */

import { Injectable, Logger } from "@nestjs/common";
import type { IsoDate, MatchStatus, PlayerId, TeamSide } from "@tichu/types";
import {
  DatabaseService,
  MatchRepository,
  PlayerRepository,
  StatRecordRepository,
} from "../../common/database";
import { NotFoundError } from "../../common/errors";
import { MatchCleanupService, type CleanupResult } from "../match";
import { toPlayerAdminView, type PlayerAdminView } from "../player";

const DEFAULT_RECENT_LIMIT = 10;

export interface AdminMatchSummary {
  id: number;
  playDate: IsoDate;
  teamAIds: PlayerId[];
  teamBIds: PlayerId[];
  scoreA: number;
  scoreB: number;
  status: MatchStatus;
  winnerTeam: TeamSide | null;
  roundCount: number;
}

export interface ResetSummary {
  players: number;
  matches: number;
  statRecords: number;
}

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly players: PlayerRepository,
    private readonly matches: MatchRepository,
    private readonly statRecords: StatRecordRepository,
    private readonly cleanup: MatchCleanupService,
  ) {}

  /**
   * Every player with their access code, newest first
   */
  listUsers(): PlayerAdminView[] {
    const users = this.players.findAll("newest").map(toPlayerAdminView);
    this.logger.log(`Admin: listed ${users.length} users`);
    return users;
  }

  deleteUser(playerId: PlayerId): void {
    const player = this.players.findById(playerId);
    if (!player || !this.players.delete(playerId)) {
      throw new NotFoundError("player", playerId);
    }
    this.logger.log(`Admin: deleted user ${player.name} (${playerId})`);
  }

  /**
   * Latest matches by play date, in play or finished
   */
  recentMatches(limit = DEFAULT_RECENT_LIMIT): AdminMatchSummary[] {
    return this.matches.list({ order: "playDate", limit }).map((match) => ({
      id: match.id,
      playDate: match.playDate,
      teamAIds: [...match.teamAIds],
      teamBIds: [...match.teamBIds],
      scoreA: match.scoreA,
      scoreB: match.scoreB,
      status: match.status,
      winnerTeam: match.winnerTeam,
      roundCount: match.rounds.length,
    }));
  }

  deleteMatch(matchId: number): void {
    if (!this.matches.delete(matchId)) {
      throw new NotFoundError("match", matchId);
    }
    this.logger.log(`Admin: deleted match ${matchId}`);
  }

  /**
   * Delete every player, match and stat record
   */
  resetAll(): ResetSummary {
    const summary = this.database.transaction("reset all data", () => ({
      statRecords: this.statRecords.deleteAll(),
      matches: this.matches.deleteAll(),
      players: this.players.deleteAll(),
    }));

    this.logger.warn(
      `Admin: all data reset, ${summary.players} players, ${summary.matches} matches, ` +
        `${summary.statRecords} stat records deleted`,
    );
    return summary;
  }

  runCleanup(): CleanupResult {
    return this.cleanup.cleanupStaleMatches();
  }
}

/**
 * Stat Record Repository - Per-round bonus call records
 */

import { Injectable } from "@nestjs/common";
import { and, asc, between, eq, inArray, type SQL } from "drizzle-orm";
import { matchStats, matches } from "@tichu/db";
import type { PlayerId, StatRecord } from "@tichu/types";
import { yearRange } from "../../utils/date";
import { DatabaseService } from "../database.service";

const STAT_COLUMNS = {
  matchId: matchStats.matchId,
  playerId: matchStats.playerId,
  roundNumber: matchStats.roundNumber,
  isTichuTry: matchStats.isTichuTry,
  isTichuSuccess: matchStats.isTichuSuccess,
  isGrandTry: matchStats.isGrandTry,
  isGrandSuccess: matchStats.isGrandSuccess,
};

@Injectable()
export class StatRecordRepository {
  constructor(private readonly database: DatabaseService) {}

  deleteFor(matchId: number, roundNumber: number): number {
    return this.database.run("delete round stats", () =>
      this.database.db
        .delete(matchStats)
        .where(and(eq(matchStats.matchId, matchId), eq(matchStats.roundNumber, roundNumber)))
        .run(),
    ).changes;
  }

  deleteForMatch(matchId: number): number {
    return this.database.run("delete match stats", () =>
      this.database.db.delete(matchStats).where(eq(matchStats.matchId, matchId)).run(),
    ).changes;
  }

  insertMany(records: readonly StatRecord[]): void {
    if (records.length === 0) return;
    this.database.run("insert stats", () =>
      this.database.db
        .insert(matchStats)
        .values(records.map((record) => ({ ...record })))
        .run(),
    );
  }

  findForMatch(matchId: number): StatRecord[] {
    return this.database.run("find match stats", () =>
      this.database.db
        .select(STAT_COLUMNS)
        .from(matchStats)
        .where(eq(matchStats.matchId, matchId))
        .orderBy(asc(matchStats.id))
        .all(),
    );
  }

  /**
   * A player's records, optionally limited to matches played in `year`
   */
  findForPlayer(playerId: PlayerId, year?: number): StatRecord[] {
    return this.findWhere("find player stats", eq(matchStats.playerId, playerId), year);
  }

  /**
   * Records of any of `playerIds` in any of `matchIds`
   */
  findForMatches(matchIds: readonly number[], playerIds: readonly PlayerId[]): StatRecord[] {
    if (matchIds.length === 0 || playerIds.length === 0) return [];
    return this.findWhere(
      "find stats for matches",
      and(inArray(matchStats.matchId, [...matchIds]), inArray(matchStats.playerId, [...playerIds])),
    );
  }

  /**
   * Every record, optionally limited to matches played in `year`
   */
  findAll(year?: number): StatRecord[] {
    return this.findWhere("list stats", undefined, year);
  }

  deleteAll(): number {
    return this.database.run("delete all stats", () =>
      this.database.db.delete(matchStats).run(),
    ).changes;
  }

  private findWhere(operation: string, condition: SQL | undefined, year?: number): StatRecord[] {
    return this.database.run(operation, () =>
      this.database.db
        .select(STAT_COLUMNS)
        .from(matchStats)
        .innerJoin(matches, eq(matchStats.matchId, matches.id))
        .where(and(condition, year !== undefined ? playedIn(year) : undefined))
        .orderBy(asc(matchStats.id))
        .all(),
    );
  }
}

function playedIn(year: number): SQL {
  const { from, to } = yearRange(year);
  return between(matches.playDate, from, to);
}

/**
 * Match Repository - Match rows and their stored round lists
 *
 * Rounds are kept as a JSON column and converted to typed RoundRecords here,
 * so nothing past this class sees the raw JSON.
 */

import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, gte, lt, lte, sql, type SQL } from "drizzle-orm";
import { matches, type MatchRow } from "@tichu/db";
import {
  parseStoredRounds,
  serializeRounds,
  type IsoDate,
  type MatchRecord,
  type MatchStatus,
  type PlayerId,
} from "@tichu/types";
import { DatabaseService } from "../database.service";

export interface NewMatch {
  playDate: IsoDate;
  teamAIds: readonly PlayerId[];
  teamBIds: readonly PlayerId[];
}

export interface MatchListFilter {
  status?: MatchStatus | undefined;
  /** Inclusive lower bound on play date */
  from?: IsoDate | undefined;
  /** Inclusive upper bound on play date */
  to?: IsoDate | undefined;
  /** Only matches with this player on either roster */
  playerId?: PlayerId | undefined;
  /** "id": newest id first; "playDate": newest play date first, then id */
  order?: "id" | "playDate" | undefined;
  limit?: number | undefined;
}

@Injectable()
export class MatchRepository {
  private readonly logger = new Logger(MatchRepository.name);

  constructor(private readonly database: DatabaseService) {}

  findById(id: number): MatchRecord | undefined {
    const row = this.database.run("find match", () =>
      this.database.db.select().from(matches).where(eq(matches.id, id)).get(),
    );
    return row ? this.toRecord(row) : undefined;
  }

  create(input: NewMatch): MatchRecord {
    const row = this.database.run("create match", () =>
      this.database.db
        .insert(matches)
        .values({
          playDate: input.playDate,
          teamAIds: [...input.teamAIds],
          teamBIds: [...input.teamBIds],
          rounds: serializeRounds([]),
          scoreA: 0,
          scoreB: 0,
          status: "PLAYING",
          winnerTeam: null,
        })
        .returning()
        .get(),
    );
    return this.toRecord(row);
  }

  /**
   * Persist rounds, totals, status and winner. Rosters and play date are
   * fixed at creation and never written again.
   */
  save(match: MatchRecord): void {
    this.database.run("save match", () =>
      this.database.db
        .update(matches)
        .set({
          rounds: serializeRounds(match.rounds),
          scoreA: match.scoreA,
          scoreB: match.scoreB,
          status: match.status,
          winnerTeam: match.winnerTeam,
        })
        .where(eq(matches.id, match.id))
        .run(),
    );
  }

  /**
   * Delete a match. Its stat records go with it.
   */
  delete(id: number): boolean {
    const result = this.database.run("delete match", () =>
      this.database.db.delete(matches).where(eq(matches.id, id)).run(),
    );
    return result.changes > 0;
  }

  list(filter: MatchListFilter = {}): MatchRecord[] {
    const conditions: SQL[] = [];
    if (filter.status) conditions.push(eq(matches.status, filter.status));
    if (filter.from) conditions.push(gte(matches.playDate, filter.from));
    if (filter.to) conditions.push(lte(matches.playDate, filter.to));
    if (filter.playerId !== undefined) conditions.push(hasPlayer(filter.playerId));

    const ordering =
      filter.order === "playDate"
        ? [desc(matches.playDate), desc(matches.id)]
        : [desc(matches.id)];

    const rows = this.database.run("list matches", () => {
      const query = this.database.db
        .select()
        .from(matches)
        .where(and(...conditions))
        .orderBy(...ordering);
      return filter.limit !== undefined ? query.limit(filter.limit).all() : query.all();
    });

    return rows.map((row) => this.toRecord(row));
  }

  /**
   * Most recently created match
   */
  findLatest(): MatchRecord | undefined {
    return this.list({ limit: 1 })[0];
  }

  /**
   * Delete PLAYING matches dated strictly before `cutoff`
   *
   * @returns ids of the deleted matches
   */
  deleteStalePlaying(cutoff: IsoDate): number[] {
    const rows = this.database.run("delete stale matches", () =>
      this.database.db
        .delete(matches)
        .where(and(eq(matches.status, "PLAYING"), lt(matches.playDate, cutoff)))
        .returning({ id: matches.id })
        .all(),
    );
    return rows.map((row) => row.id);
  }

  deleteAll(): number {
    return this.database.run("delete all matches", () =>
      this.database.db.delete(matches).run(),
    ).changes;
  }

  private toRecord(row: MatchRow): MatchRecord {
    const { rounds, droppedEvents } = parseStoredRounds(row.rounds);
    if (droppedEvents > 0) {
      this.logger.debug(`Match ${row.id}: ignored ${droppedEvents} unknown round event(s)`);
    }
    return {
      id: row.id,
      playDate: row.playDate,
      teamAIds: row.teamAIds,
      teamBIds: row.teamBIds,
      rounds,
      scoreA: row.scoreA,
      scoreB: row.scoreB,
      status: row.status,
      winnerTeam: row.winnerTeam,
    };
  }
}

function hasPlayer(playerId: PlayerId): SQL {
  return sql`(exists (select 1 from json_each(${matches.teamAIds}) where value = ${playerId})
    or exists (select 1 from json_each(${matches.teamBIds}) where value = ${playerId}))`;
}

import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { MatchStatus, TeamSide } from "@tichu/types";
import { players } from "./players.js";

/**
 * A match between two fixed 2-player rosters.
 */
export const matches = sqliteTable(
  "matches",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    /** YYYY-MM-DD */
    playDate: text("play_date").notNull(),
    /** Player IDs as a JSON array [id1, id2] */
    teamAIds: text("team_a_ids", { mode: "json" }).$type<number[]>().notNull(),
    teamBIds: text("team_b_ids", { mode: "json" }).$type<number[]>().notNull(),
    scoreA: integer("score_a").notNull().default(0),
    scoreB: integer("score_b").notNull().default(0),
    /** Round list as JSON; parsed with RoundRecordSchema from @tichu/types */
    rounds: text("rounds").notNull().default("[]"),
    /** 'A' | 'B', set only while FINISHED */
    winnerTeam: text("winner_team").$type<TeamSide>(),
    /** PLAYING | FINISHED */
    status: text("status").$type<MatchStatus>().notNull().default("PLAYING"),
  },
  (table) => ({
    statusPlayDateIdx: index("matches_status_play_date_idx").on(
      table.status,
      table.playDate,
    ),
  }),
);

/**
 * A player's bonus call attempt in one round of a match.
 * Rows for a (match, round) pair are replaced whenever that round is saved.
 */
export const matchStats = sqliteTable(
  "match_stats",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    matchId: integer("match_id")
      .notNull()
      .references(() => matches.id, { onDelete: "cascade" }),
    playerId: integer("player_id")
      .notNull()
      .references(() => players.id, { onDelete: "cascade" }),
    roundNumber: integer("round_number").notNull(),
    isTichuTry: integer("is_tichu_try", { mode: "boolean" }).notNull().default(false),
    isTichuSuccess: integer("is_tichu_succ", { mode: "boolean" }).notNull().default(false),
    isGrandTry: integer("is_grand_try", { mode: "boolean" }).notNull().default(false),
    isGrandSuccess: integer("is_grand_succ", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    matchRoundIdx: index("match_stats_match_round_idx").on(
      table.matchId,
      table.roundNumber,
    ),
    playerIdx: index("match_stats_player_idx").on(table.playerId),
  }),
);

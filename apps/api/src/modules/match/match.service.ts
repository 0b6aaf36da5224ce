/**
 * Match Service - Match lifecycle and round scoring
 *
 * Every write runs in one transaction: the round list, the recomputed
 * totals and the round's stat records commit together or not at all.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { PlayerRow } from "@tichu/db";
import {
  RoundEventSchema,
  RoundRecordSchema,
  isBonusCall,
  type IsoDate,
  type MatchRecord,
  type PlayerId,
  type RoundEvent,
  type RoundRecord,
} from "@tichu/types";
import type { ZodError } from "zod";
import { DatabaseService, MatchRepository, PlayerRepository } from "../../common/database";
import { InvalidRoundError, NotFoundError, RosterConflictError } from "../../common/errors";
import { currentYear, toIsoDate } from "../../common/utils/date";
import {
  RoundStatsRecorder,
  removeRound,
  resetMatch,
  summarizeRounds,
  upsertRound,
} from "../scoring";
import { StatsService, type PairRecord } from "../stats";
import type { CreateMatchDto, ReplaceRoundDto, SubmitRoundDto } from "./dto/match.dto";
import type {
  FinishedMatchView,
  HeadToHeadRecord,
  MatchDetail,
  MatchView,
  RosterPlayer,
  RosterPlayerWithForm,
  TeamRoster,
} from "./types/match.types";

const DEFAULT_FINISHED_LIMIT = 10;

@Injectable()
export class MatchService {
  private readonly logger = new Logger(MatchService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly matches: MatchRepository,
    private readonly players: PlayerRepository,
    private readonly recorder: RoundStatsRecorder,
    private readonly stats: StatsService,
  ) {}

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  create(dto: CreateMatchDto): MatchView {
    const overlap = dto.teamAIds.filter((id) => dto.teamBIds.includes(id));
    if (overlap.length > 0) {
      throw new RosterConflictError("A player cannot be on both teams", overlap);
    }

    const match = this.database.transaction("create match", () => {
      this.requirePlayers([...dto.teamAIds, ...dto.teamBIds]);
      return this.matches.create({
        playDate: dto.playDate ?? toIsoDate(),
        teamAIds: dto.teamAIds,
        teamBIds: dto.teamBIds,
      });
    });

    this.logger.log(
      `Match ${match.id} created: [${match.teamAIds.join(", ")}] vs [${match.teamBIds.join(", ")}]`,
    );
    return toMatchView(match);
  }

  /**
   * Full computed view: rosters with current-year form, all-time pair
   * records and the per-round breakdown
   */
  getDetail(matchId: number): MatchDetail {
    const match = this.requireMatch(matchId);
    const names = this.playerIndex([...match.teamAIds, ...match.teamBIds]);
    const year = currentYear();

    const withForm = (ids: readonly PlayerId[]): TeamRoster<RosterPlayerWithForm> => ({
      players: ids.map((id) => {
        const form = this.stats.getPlayerStats(id, year);
        return { ...toRosterPlayer(id, names), form: form.success ? form.data : null };
      }),
      record: this.pairRecord(ids),
    });

    return {
      ...toMatchView(match),
      teamA: withForm(match.teamAIds),
      teamB: withForm(match.teamBIds),
    };
  }

  /**
   * Newest finished matches first
   */
  listFinished(limit = DEFAULT_FINISHED_LIMIT): FinishedMatchView[] {
    const finished = this.matches.list({ status: "FINISHED", limit });
    const names = this.playerIndex(finished.flatMap((m) => [...m.teamAIds, ...m.teamBIds]));

    return finished.map((match) => ({
      id: match.id,
      playDate: match.playDate,
      scoreA: match.scoreA,
      scoreB: match.scoreB,
      winnerTeam: match.winnerTeam,
      teamA: match.teamAIds.map((id) => toRosterPlayer(id, names)),
      teamB: match.teamBIds.map((id) => toRosterPlayer(id, names)),
    }));
  }

  /**
   * The newest match, if it is still being played and the player is in it
   */
  findOngoing(playerId: PlayerId): MatchView | null {
    const latest = this.matches.findLatest();
    if (!latest || latest.status !== "PLAYING" || !isOnRoster(latest, playerId)) {
      return null;
    }
    return toMatchView(latest);
  }

  /**
   * Today's finished games between two rosters, whichever side each sat on
   */
  getTodayRecord(
    teamA: readonly PlayerId[],
    teamB: readonly PlayerId[],
    today: IsoDate = toIsoDate(),
  ): HeadToHeadRecord {
    const played = this.matches.list({ status: "FINISHED", from: today, to: today });

    let totalGames = 0;
    let teamAWins = 0;
    for (const match of played) {
      let sideOfA: "A" | "B";
      if (sameRoster(match.teamAIds, teamA) && sameRoster(match.teamBIds, teamB)) {
        sideOfA = "A";
      } else if (sameRoster(match.teamAIds, teamB) && sameRoster(match.teamBIds, teamA)) {
        sideOfA = "B";
      } else {
        continue;
      }
      totalGames++;
      if (match.winnerTeam === sideOfA) teamAWins++;
    }

    return { date: today, totalGames, teamAWins, teamBWins: totalGames - teamAWins };
  }

  // ===========================================================================
  // Rounds
  // ===========================================================================

  /**
   * Add a round, or replace the stored round with the same number
   */
  submitRound(matchId: number, dto: SubmitRoundDto): MatchView {
    return this.writeRound(matchId, dto.roundNumber, dto);
  }

  replaceRound(matchId: number, roundNumber: number, dto: ReplaceRoundDto): MatchView {
    return this.writeRound(matchId, roundNumber, dto);
  }

  deleteRound(matchId: number, roundNumber: number): MatchView {
    const updated = this.database.transaction("delete round", () => {
      const match = this.requireMatch(matchId);
      const next = removeRound(match, roundNumber);
      this.matches.save(next);
      this.recorder.clear(matchId, roundNumber);
      return next;
    });

    this.logStatusChange(updated);
    return toMatchView(updated);
  }

  /**
   * Drop every round and stat record, back to an empty match in play
   */
  reset(matchId: number): MatchView {
    const updated = this.database.transaction("reset match", () => {
      const next = resetMatch(this.requireMatch(matchId));
      this.matches.save(next);
      this.recorder.clearMatch(matchId);
      return next;
    });

    this.logger.log(`Match ${matchId} reset`);
    return toMatchView(updated);
  }

  private writeRound(matchId: number, roundNumber: number, dto: ReplaceRoundDto): MatchView {
    const updated = this.database.transaction("save round", () => {
      const match = this.requireMatch(matchId);
      const round = toRoundRecord(match, roundNumber, dto);

      const next = upsertRound(match, round);
      this.matches.save(next);
      this.recorder.record(matchId, roundNumber, round.events);
      return next;
    });

    this.logStatusChange(updated);
    return toMatchView(updated);
  }

  private logStatusChange(match: MatchRecord): void {
    if (match.status === "FINISHED") {
      this.logger.log(
        `Match ${match.id} finished: team ${match.winnerTeam ?? "?"} wins ${match.scoreA}-${match.scoreB}`,
      );
    } else {
      this.logger.debug(`Match ${match.id} in play: ${match.scoreA}-${match.scoreB}`);
    }
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  private requireMatch(matchId: number): MatchRecord {
    const match = this.matches.findById(matchId);
    if (!match) throw new NotFoundError("match", matchId);
    return match;
  }

  private requirePlayers(ids: readonly PlayerId[]): void {
    const found = new Set(this.players.findByIds(ids).map((p) => p.id));
    const missing = ids.find((id) => !found.has(id));
    if (missing !== undefined) throw new NotFoundError("player", missing);
  }

  private playerIndex(ids: readonly PlayerId[]): Map<PlayerId, PlayerRow> {
    const unique = [...new Set(ids)];
    return new Map(this.players.findByIds(unique).map((p) => [p.id, p]));
  }

  private pairRecord(ids: readonly PlayerId[]): PairRecord {
    const [first, second] = ids;
    if (first === undefined || second === undefined) {
      return { totalGames: 0, wins: 0, winRate: 0 };
    }
    return this.stats.getPairRecord(first, second);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function toMatchView(match: MatchRecord): MatchView {
  return {
    id: match.id,
    playDate: match.playDate,
    teamAIds: [...match.teamAIds],
    teamBIds: [...match.teamBIds],
    scoreA: match.scoreA,
    scoreB: match.scoreB,
    status: match.status,
    winnerTeam: match.winnerTeam,
    rounds: summarizeRounds(match),
  };
}

function toRosterPlayer(id: PlayerId, index: Map<PlayerId, PlayerRow>): RosterPlayer {
  const row = index.get(id);
  return { id, name: row?.name ?? null, profileUrl: row?.profileUrl ?? null };
}

function isOnRoster(match: MatchRecord, playerId: PlayerId): boolean {
  return match.teamAIds.includes(playerId) || match.teamBIds.includes(playerId);
}

function sameRoster(stored: readonly PlayerId[], given: readonly PlayerId[]): boolean {
  return stored.length === given.length && given.every((id) => stored.includes(id));
}

function toRoundRecord(match: MatchRecord, roundNumber: number, dto: ReplaceRoundDto): RoundRecord {
  const parsed = RoundRecordSchema.safeParse({
    roundNumber,
    teamABase: dto.teamABase,
    teamBBase: dto.teamBBase,
    events: parseRoundEvents(match, roundNumber, dto.events ?? []),
  });
  if (!parsed.success) {
    throw new InvalidRoundError(roundNumber, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Parse submitted events, rejecting calls by players outside the match
 */
function parseRoundEvents(
  match: MatchRecord,
  roundNumber: number,
  raw: readonly object[],
): RoundEvent[] {
  return raw.map((candidate, index) => {
    const parsed = RoundEventSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new InvalidRoundError(roundNumber, `event ${index}: ${formatIssues(parsed.error)}`);
    }

    const event = parsed.data;
    if (isBonusCall(event) && !isOnRoster(match, event.playerId)) {
      throw new RosterConflictError(`Player ${event.playerId} is not in match ${match.id}`, [
        event.playerId,
      ]);
    }
    return event;
  });
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

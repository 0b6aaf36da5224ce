/**
 * Match Types - Views returned by the match endpoints
 *
 * @module match/types
 */

import type { IsoDate, MatchStatus, PlayerId, TeamSide } from "@tichu/types";
import type { RoundSummary } from "../../scoring";
import type { PairRecord, PlayerStats } from "../../stats";

/**
 * A roster entry; name and profile are null once the player is deleted
 */
export interface RosterPlayer {
  id: PlayerId;
  name: string | null;
  profileUrl: string | null;
}

export interface RosterPlayerWithForm extends RosterPlayer {
  /** Current-year stats, null for a deleted player */
  form: PlayerStats | null;
}

export interface TeamRoster<P extends RosterPlayer = RosterPlayer> {
  players: P[];
  /** All-time games and wins of this pair as partners */
  record: PairRecord;
}

/**
 * Totals and state of a match after a write
 */
export interface MatchView {
  id: number;
  playDate: IsoDate;
  teamAIds: PlayerId[];
  teamBIds: PlayerId[];
  scoreA: number;
  scoreB: number;
  status: MatchStatus;
  winnerTeam: TeamSide | null;
  rounds: RoundSummary[];
}

export interface MatchDetail extends MatchView {
  teamA: TeamRoster<RosterPlayerWithForm>;
  teamB: TeamRoster<RosterPlayerWithForm>;
}

export interface FinishedMatchView {
  id: number;
  playDate: IsoDate;
  scoreA: number;
  scoreB: number;
  winnerTeam: TeamSide | null;
  teamA: RosterPlayer[];
  teamB: RosterPlayer[];
}

export interface TeamAssignment {
  teamA: TeamRoster;
  teamB: TeamRoster;
}

/**
 * Today's finished games between two rosters, from the first roster's side
 */
export interface HeadToHeadRecord {
  date: IsoDate;
  totalGames: number;
  teamAWins: number;
  teamBWins: number;
}

export interface CleanupResult {
  cutoff: IsoDate;
  deletedMatchIds: number[];
}

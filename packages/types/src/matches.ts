/**
 * Match and per-round statistic record types.
 */

import type { IsoDate, MatchStatus, PlayerId, TeamSide } from "./common.js";
import type { RoundRecord } from "./rounds.js";

// ============================================================================
// Match
// ============================================================================

export interface MatchRecord {
  readonly id: number;
  readonly playDate: IsoDate;
  readonly teamAIds: readonly PlayerId[];
  readonly teamBIds: readonly PlayerId[];
  readonly rounds: readonly RoundRecord[];
  readonly scoreA: number;
  readonly scoreB: number;
  readonly status: MatchStatus;
  readonly winnerTeam: TeamSide | null;
}

// ============================================================================
// Stat Record
// ============================================================================

/**
 * One player's bonus call attempt in one round.
 * Both tiers are tracked independently.
 */
export interface StatRecord {
  readonly matchId: number;
  readonly playerId: PlayerId;
  readonly roundNumber: number;
  readonly isTichuTry: boolean;
  readonly isTichuSuccess: boolean;
  readonly isGrandTry: boolean;
  readonly isGrandSuccess: boolean;
}

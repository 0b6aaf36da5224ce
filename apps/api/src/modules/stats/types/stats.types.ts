/**
 * Stats Types - Derived player and team records
 *
 * Never stored: recomputed from match and stat record history on every
 * request.
 *
 * @module stats/types
 */

import type { PlayerId } from "@tichu/types";

/**
 * The player fields the calculators read
 */
export interface StatsPlayer {
  readonly id: PlayerId;
  readonly name: string;
  readonly profileUrl: string | null;
}

/**
 * Bonus call attempts and successes per tier
 */
export interface BonusCallTally {
  readonly tichuTry: number;
  readonly tichuSuccess: number;
  readonly grandTry: number;
  readonly grandSuccess: number;
}

export interface BonusCallRates extends BonusCallTally {
  readonly tichuSuccessRate: number;
  readonly grandSuccessRate: number;
}

export interface WinLossRecord {
  readonly totalGames: number;
  readonly wins: number;
  readonly losses: number;
  readonly winRate: number;
}

export interface PlayerStats extends WinLossRecord, BonusCallRates {
  readonly playerId: PlayerId;
  readonly playerName: string;
  readonly profileUrl: string | null;
  readonly recentGames: number;
  readonly recentWins: number;
  readonly recentWinRate: number;
}

export interface TeamStats extends WinLossRecord, BonusCallRates {
  /** The smaller of the two ids */
  readonly player1Id: PlayerId;
  readonly player2Id: PlayerId;
  readonly player1Name: string;
  readonly player2Name: string;
  /** Both names in lexicographic order, "Ana/Ben" */
  readonly teamName: string;
}

export interface Ranked<T> {
  /** 1-based */
  readonly rank: number;
  readonly stats: T;
}

/**
 * Games and wins of a pair, as shown next to a roster
 */
export interface PairRecord {
  readonly totalGames: number;
  readonly wins: number;
  readonly winRate: number;
}

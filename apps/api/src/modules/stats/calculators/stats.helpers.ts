/**
 * Stats Helpers - Shared primitives of the stats calculators
 *
 * @module stats/calculators/helpers
 */

import type { MatchRecord, PlayerId, StatRecord, TeamSide } from "@tichu/types";
import type { BonusCallTally } from "../types/stats.types";

/**
 * Calculate percentage safely (0 when the denominator is 0)
 */
export function safePercentage(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return (numerator / denominator) * 100;
}

/**
 * Round to `decimals` places, exact halves going to the even neighbour
 * (6.25 -> 6.2, 18.75 -> 18.8)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor !== 0.5) return Math.round(scaled) / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

/**
 * Side the player is on, if any
 */
export function sideOf(match: MatchRecord, playerId: PlayerId): TeamSide | undefined {
  if (match.teamAIds.includes(playerId)) return "A";
  if (match.teamBIds.includes(playerId)) return "B";
  return undefined;
}

/**
 * Side both players share, if they are partners in this match
 */
export function sharedSide(
  match: MatchRecord,
  first: PlayerId,
  second: PlayerId,
): TeamSide | undefined {
  if (match.teamAIds.includes(first) && match.teamAIds.includes(second)) return "A";
  if (match.teamBIds.includes(first) && match.teamBIds.includes(second)) return "B";
  return undefined;
}

export function isFinished(match: MatchRecord): boolean {
  return match.status === "FINISHED";
}

/**
 * Newest play date first, newest id first within a day
 */
export function byRecency(a: MatchRecord, b: MatchRecord): number {
  if (a.playDate !== b.playDate) return a.playDate < b.playDate ? 1 : -1;
  return b.id - a.id;
}

/**
 * Sum attempt and success flags per tier
 */
export function tallyBonusCalls(records: readonly StatRecord[]): BonusCallTally {
  let tichuTry = 0;
  let tichuSuccess = 0;
  let grandTry = 0;
  let grandSuccess = 0;

  for (const record of records) {
    if (record.isTichuTry) tichuTry++;
    if (record.isTichuSuccess) tichuSuccess++;
    if (record.isGrandTry) grandTry++;
    if (record.isGrandSuccess) grandSuccess++;
  }

  return { tichuTry, tichuSuccess, grandTry, grandSuccess };
}

/**
 * Scoring Types - Inputs and outputs of the round and match calculators
 *
 * @module scoring/types/scoring
 */

import type { PlayerId, RoundEvent, RoundRecord } from "@tichu/types";

/**
 * Raw inputs of one round
 */
export interface RoundScoreInput {
  readonly teamABase: number;
  readonly teamBBase: number;
  readonly events: readonly RoundEvent[];
  readonly teamAIds: readonly PlayerId[];
  readonly teamBIds: readonly PlayerId[];
}

/**
 * Final points of one round
 *
 * Bonus is the part of the total that does not come from card points or
 * from the 1-2 finish seed.
 */
export interface RoundScore {
  readonly teamATotal: number;
  readonly teamBTotal: number;
  readonly teamABonus: number;
  readonly teamBBonus: number;
}

/**
 * A stored round together with its computed score
 */
export interface RoundSummary extends RoundScore {
  readonly roundNumber: number;
  readonly teamABase: number;
  readonly teamBBase: number;
  readonly events: readonly RoundEvent[];
}

/**
 * Rosters and rounds needed to recompute match totals
 */
export interface ScorableMatch {
  readonly teamAIds: readonly PlayerId[];
  readonly teamBIds: readonly PlayerId[];
  readonly rounds: readonly RoundRecord[];
}

/**
 * Scoring Calculators - Barrel exports
 *
 * Pure functions: no I/O, no state.
 *
 * @module scoring/calculators
 */

export {
  calculateRoundScore,
  calculateBonusPoints,
  findOneTwoFinish,
} from "./score.calculator";

export {
  recomputeMatchTotals,
  determineOutcome,
  upsertRound,
  removeRound,
  resetMatch,
  summarizeRounds,
  type MatchTotals,
} from "./match.aggregator";

export { buildRoundStatRecords } from "./round-stats.calculator";

/**
 * Stats Calculators - Barrel exports
 *
 * @module stats/calculators
 */

export { calculatePlayerStats } from "./player-stats.calculator";
export { calculateTeamStats, toPairRecord, formatTeamName } from "./team-stats.calculator";
export { rankPlayers, rankTeams, enumeratePairs } from "./leaderboard.ranker";
export {
  safePercentage,
  roundTo,
  sideOf,
  sharedSide,
  isFinished,
  byRecency,
  tallyBonusCalls,
} from "./stats.helpers";

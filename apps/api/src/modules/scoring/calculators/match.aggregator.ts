/**
 * Match Aggregator - Cumulative totals and completion of a match
 *
 * Totals are always recomputed from the full round list rather than
 * patched: a round can be replaced or removed at any time, and a match can
 * go back from FINISHED to PLAYING when an edit drops both totals below the
 * target score.
 *
 * @module scoring/calculators/match-aggregator
 */

import type { MatchStatus, RoundRecord, TeamSide } from "@tichu/types";
import type { RoundSummary, ScorableMatch } from "../types/scoring.types";
import { calculateRoundScore } from "./score.calculator";
import { TARGET_SCORE } from "../types/constants";

/**
 * Result of a recomputation
 */
export interface MatchTotals {
  readonly scoreA: number;
  readonly scoreB: number;
  readonly status: MatchStatus;
  readonly winnerTeam: TeamSide | null;
}

/**
 * Recompute cumulative scores, status and winner from the round list
 *
 * Rounds are summed in stored order.
 */
export function recomputeMatchTotals(match: ScorableMatch): MatchTotals {
  let scoreA = 0;
  let scoreB = 0;

  for (const round of match.rounds) {
    const score = calculateRoundScore({
      teamABase: round.teamABase,
      teamBBase: round.teamBBase,
      events: round.events,
      teamAIds: match.teamAIds,
      teamBIds: match.teamBIds,
    });
    scoreA += score.teamATotal;
    scoreB += score.teamBTotal;
  }

  return { scoreA, scoreB, ...determineOutcome(scoreA, scoreB) };
}

/**
 * Completion rule
 *
 * FINISHED once either total reaches the target. The higher total wins;
 * a tie at or above the target goes to team A.
 */
export function determineOutcome(
  scoreA: number,
  scoreB: number,
): Pick<MatchTotals, "status" | "winnerTeam"> {
  if (scoreA < TARGET_SCORE && scoreB < TARGET_SCORE) {
    return { status: "PLAYING", winnerTeam: null };
  }
  return { status: "FINISHED", winnerTeam: scoreB > scoreA ? "B" : "A" };
}

/**
 * Replace the round with the same number, or append it
 *
 * Replacement is total: base scores and events of the old round are dropped.
 */
export function upsertRound<T extends ScorableMatch>(
  match: T,
  round: RoundRecord,
): T & MatchTotals {
  const index = match.rounds.findIndex((r) => r.roundNumber === round.roundNumber);
  const rounds =
    index === -1
      ? [...match.rounds, round]
      : match.rounds.map((r, i) => (i === index ? round : r));

  return withTotals(match, rounds);
}

/**
 * Remove a round by number
 */
export function removeRound<T extends ScorableMatch>(
  match: T,
  roundNumber: number,
): T & MatchTotals {
  const rounds = match.rounds.filter((r) => r.roundNumber !== roundNumber);
  return withTotals(match, rounds);
}

/**
 * Back to an empty, unfinished match. Rosters are kept.
 */
export function resetMatch<T extends ScorableMatch>(match: T): T & MatchTotals {
  return withTotals(match, []);
}

/**
 * Per-round breakdown in stored order
 */
export function summarizeRounds(match: ScorableMatch): RoundSummary[] {
  return match.rounds.map((round) => ({
    roundNumber: round.roundNumber,
    teamABase: round.teamABase,
    teamBBase: round.teamBBase,
    events: round.events,
    ...calculateRoundScore({
      teamABase: round.teamABase,
      teamBBase: round.teamBBase,
      events: round.events,
      teamAIds: match.teamAIds,
      teamBIds: match.teamBIds,
    }),
  }));
}

function withTotals<T extends ScorableMatch>(
  match: T,
  rounds: readonly RoundRecord[],
): T & MatchTotals {
  const next = { ...match, rounds };
  return { ...next, ...recomputeMatchTotals(next) };
}

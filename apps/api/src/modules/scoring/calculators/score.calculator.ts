/**
 * Score Calculator - Final points of a single round
 *
 * A round is scored from the card points each team collected plus the
 * bonus calls made by its players:
 * - tichu call: +100 on success, -100 on failure
 * - grand call: +200 on success, -200 on failure
 *
 * A 1-2 finish replaces the card points entirely: the finishing team is
 * seeded with 200, the other team with 0, and bonus calls still apply.
 *
 * @module scoring/calculators/score
 */

import type { OneTwoFinishEvent, PlayerId, RoundEvent, TeamSide } from "@tichu/types";
import type { RoundScore, RoundScoreInput } from "../types/scoring.types";
import { BONUS_CALL_POINTS, ONE_TWO_POINTS } from "../types/constants";

/**
 * Calculate the final points of a round
 *
 * Pure and idempotent. When several 1-2 finish events are present only the
 * first one counts.
 *
 * @example
 * ```typescript
 * const score = calculateRoundScore({
 *   teamABase: 100,
 *   teamBBase: 0,
 *   events: [{ type: "tichu", playerId: 1, success: true }],
 *   teamAIds: [1, 2],
 *   teamBIds: [3, 4],
 * });
 * // score.teamATotal === 200
 * ```
 */
export function calculateRoundScore(input: RoundScoreInput): RoundScore {
  const { teamABase, teamBBase, events, teamAIds } = input;

  const bonus = calculateBonusPoints(events, teamAIds);
  const oneTwo = findOneTwoFinish(events);

  if (!oneTwo) {
    return {
      teamATotal: teamABase + bonus.A,
      teamBTotal: teamBBase + bonus.B,
      teamABonus: bonus.A,
      teamBBonus: bonus.B,
    };
  }

  const seed = oneTwoSeed(oneTwo.team);
  const teamATotal = seed.A + bonus.A;
  const teamBTotal = seed.B + bonus.B;

  // Only the finishing team has its seed taken back out of the reported
  // bonus; the other side reports its whole total as bonus.
  return {
    teamATotal,
    teamBTotal,
    teamABonus: teamATotal - (oneTwo.team === "A" ? ONE_TWO_POINTS : 0),
    teamBBonus: teamBTotal - (oneTwo.team === "B" ? ONE_TWO_POINTS : 0),
  };
}

/**
 * Sum bonus call points per team
 *
 * A caller counts for team A when listed on team A's roster, otherwise for
 * team B. Repeated calls by the same player are all counted.
 */
export function calculateBonusPoints(
  events: readonly RoundEvent[],
  teamAIds: readonly PlayerId[],
): Record<TeamSide, number> {
  const bonus: Record<TeamSide, number> = { A: 0, B: 0 };

  for (const event of events) {
    switch (event.type) {
      case "tichu":
      case "grand": {
        const points = BONUS_CALL_POINTS[event.type];
        const side = resolveSide(event.playerId, teamAIds);
        bonus[side] += event.success ? points : -points;
        break;
      }
      case "one_two":
        break;
      default:
        assertNever(event);
    }
  }

  return bonus;
}

/**
 * First 1-2 finish of the round, if any
 */
export function findOneTwoFinish(
  events: readonly RoundEvent[],
): OneTwoFinishEvent | undefined {
  for (const event of events) {
    if (event.type === "one_two") return event;
  }
  return undefined;
}

function oneTwoSeed(team: TeamSide): Record<TeamSide, number> {
  return team === "A"
    ? { A: ONE_TWO_POINTS, B: 0 }
    : { A: 0, B: ONE_TWO_POINTS };
}

function resolveSide(playerId: PlayerId, teamAIds: readonly PlayerId[]): TeamSide {
  return teamAIds.includes(playerId) ? "A" : "B";
}

function assertNever(value: never): never {
  throw new Error(`Unhandled round event: ${JSON.stringify(value)}`);
}

/**
 * Score Calculator Unit Tests
 */

import type { RoundEvent } from "@tichu/types";
import { calculateRoundScore, calculateBonusPoints, findOneTwoFinish } from "./score.calculator";
import type { RoundScoreInput } from "../types/scoring.types";

const teamAIds = [1, 2];
const teamBIds = [3, 4];

function createInput(overrides: Partial<RoundScoreInput> = {}): RoundScoreInput {
  return {
    teamABase: 0,
    teamBBase: 0,
    events: [],
    teamAIds,
    teamBIds,
    ...overrides,
  };
}

describe("Score Calculator", () => {
  describe("calculateRoundScore", () => {
    it("should return base scores when there are no events", () => {
      const result = calculateRoundScore(createInput({ teamABase: 60, teamBBase: 40 }));

      expect(result).toEqual({
        teamATotal: 60,
        teamBTotal: 40,
        teamABonus: 0,
        teamBBonus: 0,
      });
    });

    it("should stack bonus calls on top of base scores", () => {
      const result = calculateRoundScore(
        createInput({
          teamABase: 100,
          teamBBase: 0,
          events: [
            { type: "tichu", playerId: 1, success: true },
            { type: "grand", playerId: 3, success: false },
          ],
        }),
      );

      expect(result).toEqual({
        teamATotal: 200,
        teamBTotal: -200,
        teamABonus: 100,
        teamBBonus: -200,
      });
    });

    it("should ignore base scores on a 1-2 finish", () => {
      const result = calculateRoundScore(
        createInput({
          teamABase: 50,
          teamBBase: 30,
          events: [{ type: "one_two", team: "A" }],
        }),
      );

      expect(result.teamATotal).toBe(200);
      expect(result.teamBTotal).toBe(0);
      expect(result.teamABonus).toBe(0);
      expect(result.teamBBonus).toBe(0);
    });

    it("should seed team B when team B finishes 1-2", () => {
      const result = calculateRoundScore(
        createInput({
          teamABase: 75,
          teamBBase: 25,
          events: [{ type: "one_two", team: "B" }],
        }),
      );

      expect(result.teamATotal).toBe(0);
      expect(result.teamBTotal).toBe(200);
    });

    it("should apply bonus calls on a 1-2 finish", () => {
      const result = calculateRoundScore(
        createInput({
          events: [
            { type: "one_two", team: "A" },
            { type: "tichu", playerId: 2, success: true },
            { type: "tichu", playerId: 4, success: false },
          ],
        }),
      );

      expect(result.teamATotal).toBe(300);
      expect(result.teamBTotal).toBe(-100);
    });

    // The reported bonus on a 1-2 finish subtracts the seed only for the
    // finishing team. Kept as-is from the scoreboard's historical output.
    it("should report bonus as total minus seed for the finishing team only", () => {
      const result = calculateRoundScore(
        createInput({
          events: [
            { type: "one_two", team: "B" },
            { type: "grand", playerId: 3, success: true },
            { type: "tichu", playerId: 1, success: false },
          ],
        }),
      );

      expect(result.teamBTotal).toBe(400);
      expect(result.teamBBonus).toBe(200);
      expect(result.teamATotal).toBe(-100);
      expect(result.teamABonus).toBe(-100);
    });

    it("should use the first 1-2 finish when several are present", () => {
      const result = calculateRoundScore(
        createInput({
          events: [
            { type: "one_two", team: "B" },
            { type: "one_two", team: "A" },
          ],
        }),
      );

      expect(result.teamATotal).toBe(0);
      expect(result.teamBTotal).toBe(200);
    });

    it("should attribute a caller outside team A's roster to team B", () => {
      const result = calculateRoundScore(
        createInput({ events: [{ type: "tichu", playerId: 99, success: true }] }),
      );

      expect(result.teamATotal).toBe(0);
      expect(result.teamBTotal).toBe(100);
    });

    it("should count repeated calls by the same player independently", () => {
      const result = calculateRoundScore(
        createInput({
          events: [
            { type: "tichu", playerId: 1, success: true },
            { type: "tichu", playerId: 1, success: true },
          ],
        }),
      );

      expect(result.teamABonus).toBe(200);
    });

    it("should return identical output for identical input", () => {
      const input = createInput({
        teamABase: 35,
        teamBBase: 65,
        events: [
          { type: "grand", playerId: 2, success: true },
          { type: "tichu", playerId: 4, success: false },
        ],
      });

      const first = calculateRoundScore(input);
      const second = calculateRoundScore(input);

      expect(second).toEqual(first);
      expect(first).toEqual({
        teamATotal: 235,
        teamBTotal: -35,
        teamABonus: 200,
        teamBBonus: -100,
      });
    });
  });

  describe("calculateBonusPoints", () => {
    it("should return zero for both teams without calls", () => {
      const events: RoundEvent[] = [{ type: "one_two", team: "A" }];

      expect(calculateBonusPoints(events, teamAIds)).toEqual({ A: 0, B: 0 });
    });

    it("should weigh grand calls twice as much as tichu calls", () => {
      const events: RoundEvent[] = [
        { type: "grand", playerId: 1, success: false },
        { type: "tichu", playerId: 3, success: true },
      ];

      expect(calculateBonusPoints(events, teamAIds)).toEqual({ A: -200, B: 100 });
    });
  });

  describe("findOneTwoFinish", () => {
    it("should return undefined when there is no 1-2 finish", () => {
      expect(findOneTwoFinish([{ type: "tichu", playerId: 1, success: true }])).toBeUndefined();
    });

    it("should return the first 1-2 finish", () => {
      const events: RoundEvent[] = [
        { type: "tichu", playerId: 1, success: true },
        { type: "one_two", team: "A" },
        { type: "one_two", team: "B" },
      ];

      expect(findOneTwoFinish(events)).toEqual({ type: "one_two", team: "A" });
    });
  });
});

/**
 * Match Aggregator Unit Tests
 */

import type { RoundRecord } from "@tichu/types";
import {
  recomputeMatchTotals,
  determineOutcome,
  upsertRound,
  removeRound,
  resetMatch,
  summarizeRounds,
} from "./match.aggregator";
import type { ScorableMatch } from "../types/scoring.types";

function createRound(
  roundNumber: number,
  teamABase: number,
  teamBBase: number,
  events: RoundRecord["events"] = [],
): RoundRecord {
  return { roundNumber, teamABase, teamBBase, events };
}

function createMatch(rounds: RoundRecord[] = []): ScorableMatch {
  return { teamAIds: [1, 2], teamBIds: [3, 4], rounds };
}

describe("Match Aggregator", () => {
  describe("recomputeMatchTotals", () => {
    it("should return zero totals for a match without rounds", () => {
      expect(recomputeMatchTotals(createMatch())).toEqual({
        scoreA: 0,
        scoreB: 0,
        status: "PLAYING",
        winnerTeam: null,
      });
    });

    it("should sum round totals including bonuses", () => {
      const match = createMatch([
        createRound(1, 70, 30, [{ type: "tichu", playerId: 1, success: true }]),
        createRound(2, 20, 80, [{ type: "grand", playerId: 4, success: false }]),
      ]);

      expect(recomputeMatchTotals(match)).toEqual({
        scoreA: 190,
        scoreB: -90,
        status: "PLAYING",
        winnerTeam: null,
      });
    });

    it("should finish the match on the round that reaches the target", () => {
      const rounds = [
        createRound(1, 100, 0, [{ type: "one_two", team: "A" }]),
        createRound(2, 60, 40, [{ type: "grand", playerId: 2, success: true }]),
        createRound(3, 50, 50, [{ type: "one_two", team: "A" }]),
        createRound(4, 55, 45, [{ type: "tichu", playerId: 1, success: true }]),
      ];

      // after round 3: A = 200 + 260 + 200 = 660, B = 40
      expect(recomputeMatchTotals(createMatch(rounds.slice(0, 3))).status).toBe("PLAYING");

      const finished = createMatch([
        ...rounds,
        createRound(5, 100, 0, [{ type: "grand", playerId: 1, success: true }]),
      ]);
      // A = 660 + 155 + 300 = 1115, B = 40 + 45 + 0 = 85
      expect(recomputeMatchTotals(finished)).toEqual({
        scoreA: 1115,
        scoreB: 85,
        status: "FINISHED",
        winnerTeam: "A",
      });
    });

    it("should pick team B when team B has the higher total", () => {
      const match = createMatch([
        createRound(1, 400, 1000),
      ]);

      expect(recomputeMatchTotals(match).winnerTeam).toBe("B");
    });

    it("should sum rounds in stored order regardless of round numbers", () => {
      const match = createMatch([createRound(3, 10, 90), createRound(1, 40, 60)]);

      expect(recomputeMatchTotals(match)).toMatchObject({ scoreA: 50, scoreB: 150 });
    });
  });

  describe("determineOutcome", () => {
    it("should keep playing below the target", () => {
      expect(determineOutcome(999, 995)).toEqual({ status: "PLAYING", winnerTeam: null });
    });

    it("should finish at exactly the target", () => {
      expect(determineOutcome(1000, 400)).toEqual({ status: "FINISHED", winnerTeam: "A" });
    });

    it("should finish when only the losing side is over the target", () => {
      expect(determineOutcome(1010, 1050)).toEqual({ status: "FINISHED", winnerTeam: "B" });
    });

    it("should give a tie at the target to team A", () => {
      expect(determineOutcome(1000, 1000)).toEqual({ status: "FINISHED", winnerTeam: "A" });
    });
  });

  describe("upsertRound", () => {
    it("should append a round with a new number", () => {
      const match = upsertRound(createMatch([createRound(1, 50, 50)]), createRound(2, 30, 70));

      expect(match.rounds.map((r) => r.roundNumber)).toEqual([1, 2]);
      expect(match.scoreA).toBe(80);
      expect(match.scoreB).toBe(120);
    });

    it("should replace a round with an existing number in place", () => {
      const original = createMatch([
        createRound(1, 50, 50, [{ type: "tichu", playerId: 1, success: true }]),
        createRound(2, 30, 70),
      ]);

      const match = upsertRound(original, createRound(1, 10, 90));

      expect(match.rounds).toEqual([createRound(1, 10, 90), createRound(2, 30, 70)]);
      expect(match.scoreA).toBe(40);
      expect(match.scoreB).toBe(160);
    });

    it("should keep exactly one round per number after saving it twice", () => {
      let match = upsertRound(createMatch(), createRound(1, 60, 40));
      match = upsertRound(match, createRound(1, 25, 75));

      expect(match.rounds).toHaveLength(1);
      expect(match.rounds[0]).toEqual(createRound(1, 25, 75));
    });

    it("should not mutate the given match", () => {
      const original = createMatch([createRound(1, 50, 50)]);

      upsertRound(original, createRound(1, 0, 100));

      expect(original.rounds[0]).toEqual(createRound(1, 50, 50));
    });

    it("should un-finish a match when an edit drops both totals below the target", () => {
      const finished = upsertRound(
        createMatch([createRound(1, 600, 0), createRound(2, 500, 0)]),
        createRound(3, 0, 0),
      );
      expect(finished.status).toBe("FINISHED");
      expect(finished.winnerTeam).toBe("A");

      const edited = upsertRound(finished, createRound(1, 100, 0));

      expect(edited.scoreA).toBe(600);
      expect(edited.status).toBe("PLAYING");
      expect(edited.winnerTeam).toBeNull();
    });
  });

  describe("removeRound", () => {
    it("should drop the round and recompute totals", () => {
      const match = removeRound(
        createMatch([createRound(1, 900, 100), createRound(2, 200, 0)]),
        2,
      );

      expect(match.rounds.map((r) => r.roundNumber)).toEqual([1]);
      expect(match).toMatchObject({ scoreA: 900, scoreB: 100, status: "PLAYING", winnerTeam: null });
    });

    it("should leave the match unchanged when the round does not exist", () => {
      const match = removeRound(createMatch([createRound(1, 40, 60)]), 7);

      expect(match.rounds).toHaveLength(1);
      expect(match.scoreB).toBe(60);
    });
  });

  describe("resetMatch", () => {
    it("should clear rounds, totals and the winner but keep rosters", () => {
      const finished = upsertRound(createMatch(), createRound(1, 1000, 0));

      const reset = resetMatch(finished);

      expect(reset).toEqual({
        teamAIds: [1, 2],
        teamBIds: [3, 4],
        rounds: [],
        scoreA: 0,
        scoreB: 0,
        status: "PLAYING",
        winnerTeam: null,
      });
    });
  });

  describe("summarizeRounds", () => {
    it("should pair every stored round with its computed score", () => {
      const summary = summarizeRounds(
        createMatch([
          createRound(1, 50, 30, [{ type: "one_two", team: "A" }]),
          createRound(2, 45, 55),
        ]),
      );

      expect(summary).toEqual([
        {
          roundNumber: 1,
          teamABase: 50,
          teamBBase: 30,
          events: [{ type: "one_two", team: "A" }],
          teamATotal: 200,
          teamBTotal: 0,
          teamABonus: 0,
          teamBBonus: 0,
        },
        {
          roundNumber: 2,
          teamABase: 45,
          teamBBase: 55,
          events: [],
          teamATotal: 45,
          teamBTotal: 55,
          teamABonus: 0,
          teamBBonus: 0,
        },
      ]);
    });
  });
});

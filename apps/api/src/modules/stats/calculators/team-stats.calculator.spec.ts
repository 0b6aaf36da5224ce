/**
 * Team Stats Calculator Unit Tests
 */

import { calculateTeamStats, formatTeamName } from "./team-stats.calculator";
import type { StatsPlayer } from "../types/stats.types";
import { createMatchRecord, grandCall, tichuCall } from "../../../../test/fixtures/matches";

const cho: StatsPlayer = { id: 1, name: "Cho", profileUrl: null };
const ana: StatsPlayer = { id: 2, name: "Ana", profileUrl: null };

describe("Team Stats Calculator", () => {
  const together = createMatchRecord({ id: 1, teamAIds: [1, 2], teamBIds: [3, 4], winnerTeam: "A" });
  const togetherLost = createMatchRecord({ id: 2, teamAIds: [3, 4], teamBIds: [2, 1], winnerTeam: "A" });
  const opponents = createMatchRecord({ id: 3, teamAIds: [1, 3], teamBIds: [2, 4], winnerTeam: "A" });
  const unfinished = createMatchRecord({
    id: 4,
    teamAIds: [1, 2],
    status: "PLAYING",
    winnerTeam: null,
    scoreA: 400,
  });
  const matches = [together, togetherLost, opponents, unfinished];

  it("should count only finished matches where both share a roster", () => {
    const stats = calculateTeamStats(cho, ana, matches, []);

    expect(stats.totalGames).toBe(2);
    expect(stats.wins).toBe(1);
    expect(stats.losses).toBe(1);
    expect(stats.winRate).toBe(50);
  });

  it("should report the smaller id as player1 in either argument order", () => {
    const forward = calculateTeamStats(cho, ana, matches, []);
    const reverse = calculateTeamStats(ana, cho, matches, []);

    expect(reverse).toEqual(forward);
    expect(forward.player1Id).toBe(1);
    expect(forward.player1Name).toBe("Cho");
    expect(forward.player2Id).toBe(2);
    expect(forward.teamName).toBe("Ana/Cho");
  });

  it("should restrict bonus stats to both players in counted matches", () => {
    const records = [
      tichuCall(1, 1, true),
      grandCall(2, 2, true),
      tichuCall(2, 3, false),
      tichuCall(3, 2, false),
      tichuCall(4, 1, false),
    ];

    const stats = calculateTeamStats(cho, ana, matches, records);

    expect(stats).toMatchObject({
      tichuTry: 1,
      tichuSuccess: 1,
      tichuSuccessRate: 100,
      grandTry: 1,
      grandSuccess: 1,
      grandSuccessRate: 100,
    });
  });

  it("should round team bonus rates to one decimal", () => {
    const records = [tichuCall(1, 1, true), tichuCall(1, 2, false), tichuCall(2, 2, false)];

    const stats = calculateTeamStats(cho, ana, matches, records);

    expect(stats.tichuSuccessRate).toBe(33.3);
  });

  it("should return zero games for partners who never played together", () => {
    const stats = calculateTeamStats(cho, ana, [opponents], []);

    expect(stats.totalGames).toBe(0);
    expect(stats.winRate).toBe(0);
  });

  describe("formatTeamName", () => {
    it("should sort names lexicographically", () => {
      expect(formatTeamName("Mina", "Joon")).toBe("Joon/Mina");
      expect(formatTeamName("Joon", "Mina")).toBe("Joon/Mina");
    });
  });
});

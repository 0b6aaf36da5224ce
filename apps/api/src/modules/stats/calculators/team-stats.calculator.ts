/**
 * Team Stats Calculator - Record of two players as partners
 *
 * A match counts only when both players sit on the same roster. Matches
 * where they faced each other are ignored.
 *
 * @module stats/calculators/team-stats
 */

import type { MatchRecord, StatRecord } from "@tichu/types";
import type { PairRecord, StatsPlayer, TeamStats } from "../types/stats.types";
import { RATE_PRECISION } from "../stats.config";
import { isFinished, roundTo, safePercentage, sharedSide, tallyBonusCalls } from "./stats.helpers";

/**
 * Calculate a pair's statistics
 *
 * Order independent: the player with the smaller id is reported as
 * player1. The two players must be different.
 *
 * @param statRecords - Bonus call records; only both players' records in
 *   the counted matches are used
 */
export function calculateTeamStats(
  playerA: StatsPlayer,
  playerB: StatsPlayer,
  matches: readonly MatchRecord[],
  statRecords: readonly StatRecord[],
): TeamStats {
  const [first, second] = playerA.id <= playerB.id ? [playerA, playerB] : [playerB, playerA];

  const countedMatchIds = new Set<number>();
  let wins = 0;
  for (const match of matches) {
    if (!isFinished(match)) continue;
    const side = sharedSide(match, first.id, second.id);
    if (side === undefined) continue;
    countedMatchIds.add(match.id);
    if (match.winnerTeam === side) wins++;
  }

  const totalGames = countedMatchIds.size;
  const bonus = tallyBonusCalls(
    statRecords.filter(
      (r) =>
        countedMatchIds.has(r.matchId) && (r.playerId === first.id || r.playerId === second.id),
    ),
  );

  return {
    player1Id: first.id,
    player2Id: second.id,
    player1Name: first.name,
    player2Name: second.name,
    teamName: formatTeamName(first.name, second.name),
    totalGames,
    wins,
    losses: totalGames - wins,
    winRate: roundTo(safePercentage(wins, totalGames), RATE_PRECISION.WIN_RATE),
    ...bonus,
    tichuSuccessRate: roundTo(
      safePercentage(bonus.tichuSuccess, bonus.tichuTry),
      RATE_PRECISION.TEAM_BONUS_RATE,
    ),
    grandSuccessRate: roundTo(
      safePercentage(bonus.grandSuccess, bonus.grandTry),
      RATE_PRECISION.TEAM_BONUS_RATE,
    ),
  };
}

/**
 * Games, wins and win rate only, for roster badges
 */
export function toPairRecord(stats: TeamStats): PairRecord {
  return { totalGames: stats.totalGames, wins: stats.wins, winRate: stats.winRate };
}

export function formatTeamName(nameA: string, nameB: string): string {
  const [first, second] = [nameA, nameB].sort();
  return `${first ?? nameA}/${second ?? nameB}`;
}

/**
 * Player Stats Calculator - Win/loss record, recent form and bonus rates
 *
 * Only FINISHED matches count towards the record. The caller narrows
 * `matches` and `statRecords` to the period of interest (e.g. one year).
 *
 * Recent form scans the most recent FINISHED matches overall (not only the
 * player's) and stops once the player has enough participations, so a
 * player who sat out most recent games has fewer than the limit.
 *
 * @module stats/calculators/player-stats
 */

import type { MatchRecord, StatRecord } from "@tichu/types";
import type { PlayerStats, StatsPlayer } from "../types/stats.types";
import { RATE_PRECISION, RECENT_FORM } from "../stats.config";
import {
  byRecency,
  isFinished,
  roundTo,
  safePercentage,
  sideOf,
  tallyBonusCalls,
} from "./stats.helpers";

/**
 * Calculate one player's statistics
 *
 * @param statRecords - Bonus call records; records of other players are ignored
 */
export function calculatePlayerStats(
  player: StatsPlayer,
  matches: readonly MatchRecord[],
  statRecords: readonly StatRecord[],
): PlayerStats {
  const finished = matches.filter(isFinished);

  let totalGames = 0;
  let wins = 0;
  for (const match of finished) {
    const side = sideOf(match, player.id);
    if (side === undefined) continue;
    totalGames++;
    if (match.winnerTeam === side) wins++;
  }

  const recent = calculateRecentForm(player, finished);
  const bonus = tallyBonusCalls(statRecords.filter((r) => r.playerId === player.id));

  return {
    playerId: player.id,
    playerName: player.name,
    profileUrl: player.profileUrl,
    totalGames,
    wins,
    losses: totalGames - wins,
    winRate: roundTo(safePercentage(wins, totalGames), RATE_PRECISION.WIN_RATE),
    recentGames: recent.games,
    recentWins: recent.wins,
    recentWinRate: roundTo(safePercentage(recent.wins, recent.games), RATE_PRECISION.WIN_RATE),
    ...bonus,
    tichuSuccessRate: roundTo(
      safePercentage(bonus.tichuSuccess, bonus.tichuTry),
      RATE_PRECISION.PLAYER_BONUS_RATE,
    ),
    grandSuccessRate: roundTo(
      safePercentage(bonus.grandSuccess, bonus.grandTry),
      RATE_PRECISION.PLAYER_BONUS_RATE,
    ),
  };
}

function calculateRecentForm(
  player: StatsPlayer,
  finished: readonly MatchRecord[],
): { games: number; wins: number } {
  const window = [...finished].sort(byRecency).slice(0, RECENT_FORM.MATCH_WINDOW);

  let games = 0;
  let wins = 0;
  for (const match of window) {
    if (games >= RECENT_FORM.GAMES_LIMIT) break;
    const side = sideOf(match, player.id);
    if (side === undefined) continue;
    games++;
    if (match.winnerTeam === side) wins++;
  }

  return { games, wins };
}

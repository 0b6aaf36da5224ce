/**
 * Leaderboard Ranker - Multi-key ordering of player and team stats
 *
 * Entries with no counted games are dropped. Sorting is stable, so entries
 * tied on every key keep their input order and still get distinct ranks.
 *
 * @module stats/calculators/leaderboard
 */

import type { PlayerStats, Ranked, TeamStats } from "../types/stats.types";

type Comparator<T> = (a: T, b: T) => number;

function descending<T>(key: (value: T) => number): Comparator<T> {
  return (a, b) => key(b) - key(a);
}

function compareBy<T>(...comparators: Comparator<T>[]): Comparator<T> {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };
}

const PLAYER_ORDER = compareBy<PlayerStats>(
  descending((s) => s.wins),
  descending((s) => s.winRate),
  descending((s) => s.tichuSuccessRate),
  descending((s) => s.grandSuccessRate),
);

const TEAM_ORDER = compareBy<TeamStats>(
  descending((s) => s.wins),
  descending((s) => s.winRate),
);

function rank<T extends { totalGames: number }>(
  stats: readonly T[],
  order: Comparator<T>,
): Ranked<T>[] {
  return stats
    .filter((s) => s.totalGames > 0)
    .sort(order)
    .map((s, index) => ({ rank: index + 1, stats: s }));
}

/**
 * Order by wins, win rate, tichu success rate, grand success rate
 */
export function rankPlayers(stats: readonly PlayerStats[]): Ranked<PlayerStats>[] {
  return rank(stats, PLAYER_ORDER);
}

/**
 * Order by wins, then win rate
 */
export function rankTeams(stats: readonly TeamStats[]): Ranked<TeamStats>[] {
  return rank(stats, TEAM_ORDER);
}

/**
 * Every unordered pair, following the order of the given list
 */
export function enumeratePairs<T>(items: readonly T[]): [T, T][] {
  const pairs: [T, T][] = [];
  items.forEach((first, i) => {
    for (const second of items.slice(i + 1)) {
      pairs.push([first, second]);
    }
  });
  return pairs;
}

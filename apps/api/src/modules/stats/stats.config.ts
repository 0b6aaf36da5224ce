/**
 * Stats Configuration
 *
 * @module stats/config
 */

export const RECENT_FORM = {
  /** Most recent FINISHED matches scanned for recent form */
  MATCH_WINDOW: 20,

  /** Counting stops once the player has this many participations */
  GAMES_LIMIT: 10,
} as const;

/** Decimal places of reported rates */
export const RATE_PRECISION = {
  WIN_RATE: 1,
  PLAYER_BONUS_RATE: 2,
  TEAM_BONUS_RATE: 1,
} as const;

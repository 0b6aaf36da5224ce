/**
 * Scoring Constants
 *
 * Point values of the game and the threshold that ends a match.
 *
 * @module scoring/types/constants
 */

/**
 * Bonus call values, added on success and subtracted on failure
 */
export const BONUS_CALL_POINTS = {
  /** Small call ("Tichu") */
  tichu: 100,

  /** Grand call ("Grand Tichu"), announced before all cards are seen */
  grand: 200,
} as const;

/**
 * Points for a 1-2 finish. The finishing team takes this flat amount,
 * the other team scores nothing, and card points are not counted.
 */
export const ONE_TWO_POINTS = 200;

/**
 * A match ends once either team's cumulative total reaches this score
 */
export const TARGET_SCORE = 1000;

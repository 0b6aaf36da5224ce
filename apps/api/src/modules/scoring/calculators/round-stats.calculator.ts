/**
 * Round Stats Calculator - Per-player bonus call records of a round
 *
 * Every tichu or grand call becomes one record with the attempt flag of
 * its tier set. 1-2 finishes are team outcomes and produce no record.
 *
 * @module scoring/calculators/round-stats
 */

import type { RoundEvent, StatRecord } from "@tichu/types";

/**
 * Build the stat records implied by a round's events
 */
export function buildRoundStatRecords(
  matchId: number,
  roundNumber: number,
  events: readonly RoundEvent[],
): StatRecord[] {
  const records: StatRecord[] = [];

  for (const event of events) {
    switch (event.type) {
      case "tichu":
        records.push({
          matchId,
          playerId: event.playerId,
          roundNumber,
          isTichuTry: true,
          isTichuSuccess: event.success,
          isGrandTry: false,
          isGrandSuccess: false,
        });
        break;
      case "grand":
        records.push({
          matchId,
          playerId: event.playerId,
          roundNumber,
          isTichuTry: false,
          isTichuSuccess: false,
          isGrandTry: true,
          isGrandSuccess: event.success,
        });
        break;
      case "one_two":
        break;
    }
  }

  return records;
}

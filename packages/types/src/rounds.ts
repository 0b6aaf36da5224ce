/**
 * Round record type definitions and Zod schemas.
 *
 * Rounds live as a JSON array on the match row. The schemas here are the
 * only place that array is (de)serialized.
 */

import { z } from "zod";
import { RoundEventSchema, type RoundEvent } from "./events.js";

// ============================================================================
// Round Record
// ============================================================================

export const RoundRecordSchema = z.object({
  roundNumber: z.number().int().min(1),
  teamABase: z.number().int(),
  teamBBase: z.number().int(),
  events: z.array(RoundEventSchema).default([]),
});
export type RoundRecord = z.infer<typeof RoundRecordSchema>;

/**
 * Stored shape before event filtering. Events are kept as unknown so a
 * single unrecognised event does not invalidate the whole round.
 */
const StoredRoundSchema = z.object({
  roundNumber: z.number().int(),
  teamABase: z.number().int().default(0),
  teamBBase: z.number().int().default(0),
  events: z.array(z.unknown()).default([]),
});

export interface ParsedRounds {
  rounds: RoundRecord[];
  /** Number of stored events dropped because their type is not known */
  droppedEvents: number;
}

/**
 * Parse the stored JSON rounds column.
 * Unknown event types are ignored; malformed rounds throw a ZodError.
 */
export function parseStoredRounds(raw: string): ParsedRounds {
  const stored = z.array(StoredRoundSchema).parse(JSON.parse(raw));
  let droppedEvents = 0;

  const rounds = stored.map((round) => {
    const events: RoundEvent[] = [];
    for (const candidate of round.events) {
      const parsed = RoundEventSchema.safeParse(candidate);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        droppedEvents++;
      }
    }
    return {
      roundNumber: round.roundNumber,
      teamABase: round.teamABase,
      teamBBase: round.teamBBase,
      events,
    };
  });

  return { rounds, droppedEvents };
}

export function serializeRounds(rounds: readonly RoundRecord[]): string {
  return JSON.stringify(rounds);
}

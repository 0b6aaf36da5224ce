/**
 * Round event type definitions and Zod schemas.
 *
 * A round carries zero or more events on top of the base card points:
 * - tichu:   a player's small bonus call (+/-100)
 * - grand:   a player's grand bonus call (+/-200)
 * - one_two: a team finished first and second, winning the round outright
 */

import { z } from "zod";
import { PlayerIdSchema, TeamSideSchema } from "./common.js";

// ============================================================================
// Bonus Calls
// ============================================================================

export const TichuCallEventSchema = z.object({
  type: z.literal("tichu"),
  playerId: PlayerIdSchema,
  success: z.boolean(),
});
export type TichuCallEvent = z.infer<typeof TichuCallEventSchema>;

export const GrandTichuCallEventSchema = z.object({
  type: z.literal("grand"),
  playerId: PlayerIdSchema,
  success: z.boolean(),
});
export type GrandTichuCallEvent = z.infer<typeof GrandTichuCallEventSchema>;

// ============================================================================
// Round Outcome
// ============================================================================

export const OneTwoFinishEventSchema = z.object({
  type: z.literal("one_two"),
  team: TeamSideSchema,
});
export type OneTwoFinishEvent = z.infer<typeof OneTwoFinishEventSchema>;

// ============================================================================
// Union
// ============================================================================

export const RoundEventSchema = z.discriminatedUnion("type", [
  TichuCallEventSchema,
  GrandTichuCallEventSchema,
  OneTwoFinishEventSchema,
]);
export type RoundEvent = z.infer<typeof RoundEventSchema>;
export type RoundEventType = RoundEvent["type"];

export type BonusCallEvent = TichuCallEvent | GrandTichuCallEvent;

export const ROUND_EVENT_TYPES = ["tichu", "grand", "one_two"] as const satisfies readonly RoundEventType[];

export function isBonusCall(event: RoundEvent): event is BonusCallEvent {
  return event.type === "tichu" || event.type === "grand";
}

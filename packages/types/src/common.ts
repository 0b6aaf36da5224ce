/**
 * Common types and enums used across the platform.
 */

import { z } from "zod";

// ============================================================================
// Enums
// ============================================================================

export const TeamSideSchema = z.enum(["A", "B"]);
export type TeamSide = z.infer<typeof TeamSideSchema>;

export const MatchStatusSchema = z.enum(["PLAYING", "FINISHED"]);
export type MatchStatus = z.infer<typeof MatchStatusSchema>;

// ============================================================================
// Primitives
// ============================================================================

export const PlayerIdSchema = z.number().int().positive();
export type PlayerId = z.infer<typeof PlayerIdSchema>;

/** Calendar date without time, e.g. "2026-03-14" */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date");
export type IsoDate = z.infer<typeof IsoDateSchema>;

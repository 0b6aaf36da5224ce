/**
 * Row types inferred from the Drizzle schema.
 */

import type { matches, matchStats, players } from "./schema/index.js";

export type PlayerRow = typeof players.$inferSelect;
export type NewPlayerRow = typeof players.$inferInsert;

export type MatchRow = typeof matches.$inferSelect;
export type NewMatchRow = typeof matches.$inferInsert;

export type MatchStatRow = typeof matchStats.$inferSelect;
export type NewMatchStatRow = typeof matchStats.$inferInsert;

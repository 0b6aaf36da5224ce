import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * A registered player.
 */
export const players = sqliteTable("players", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  /** Display name, unique */
  name: text("name").notNull().unique(),
  /** Personal access code, unique, no whitespace */
  code: text("code").notNull().unique(),
  profileUrl: text("profile_url"),
  isAdmin: integer("is_admin", { mode: "boolean" }).notNull().default(false),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

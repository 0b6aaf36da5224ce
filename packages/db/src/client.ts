/**
 * SQLite client for database access.
 *
 * better-sqlite3 is synchronous: every query and transaction runs to
 * completion before control returns to the event loop.
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { readFileSync } from "fs";
import { join } from "path";
import * as schema from "./schema/index.js";

export type TichuDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  readonly db: TichuDatabase;
  readonly sqlite: Database.Database;
  close(): void;
}

export interface OpenDatabaseOptions {
  /** Log every SQL statement through the given sink */
  logQuery?: ((query: string) => void) | undefined;
}

const SCHEMA_PATH = join(__dirname, "..", "sql", "schema.sql");

let schemaSql: string | undefined;

function loadSchemaSql(): string {
  schemaSql ??= readFileSync(SCHEMA_PATH, "utf8");
  return schemaSql;
}

/**
 * Open (or create) a database file and make sure the schema exists.
 * Pass ":memory:" for a throwaway in-process database.
 */
export function openDatabase(
  filename: string,
  options: OpenDatabaseOptions = {},
): DatabaseConnection {
  const sqlite = new Database(filename);
  sqlite.pragma("foreign_keys = ON");
  if (filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(loadSchemaSql());

  const { logQuery } = options;
  const db = drizzle(sqlite, {
    schema,
    logger: logQuery
      ? { logQuery: (query: string) => logQuery(query) }
      : false,
  });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}

export { schema };

/**
 * Tichu Ledger Database Package
 *
 * Exports the Drizzle schema, row types and the SQLite client factory.
 */

export * from "./client.js";
export * from "./schema/index.js";
export * from "./types.js";

/**
 * Tichu Ledger - Shared Types
 *
 * This package contains the shared domain types and Zod schemas
 * used by the database package and the API.
 */

export * from "./common.js";
export * from "./events.js";
export * from "./rounds.js";
export * from "./matches.js";

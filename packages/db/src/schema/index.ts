export * from "./players.js";
export * from "./matches.js";

export * from "./domain.errors";

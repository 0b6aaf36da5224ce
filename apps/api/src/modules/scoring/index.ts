export * from "./calculators";
export * from "./types/constants";
export type { RoundScoreInput, RoundScore, RoundSummary, ScorableMatch } from "./types/scoring.types";
export { RoundStatsRecorder } from "./round-stats.recorder";
export { ScoringModule } from "./scoring.module";

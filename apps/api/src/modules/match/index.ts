export { MatchModule } from "./match.module";
export { MatchService } from "./match.service";
export { MatchCleanupService, type CleanupStats } from "./match-cleanup.service";
export { TeamAssignmentService, shuffle, type RandomIndex } from "./team-assignment.service";
export type {
  CleanupResult,
  FinishedMatchView,
  HeadToHeadRecord,
  MatchDetail,
  MatchView,
  TeamAssignment,
} from "./types/match.types";

export { StatsModule } from "./stats.module";
export { StatsService } from "./stats.service";
export type {
  PlayerStats,
  TeamStats,
  Ranked,
  PairRecord,
  StatsPlayer,
} from "./types/stats.types";

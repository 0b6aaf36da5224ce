export { MatchRepository, type MatchListFilter, type NewMatch } from "./match.repository";
export {
  PlayerRepository,
  type CreatePlayerInput,
  type UpdatePlayerInput,
  type PlayerOrder,
} from "./player.repository";
export { StatRecordRepository } from "./stat-record.repository";

export { PlayerModule } from "./player.module";
export { PlayerService, defaultAvatarUrl } from "./player.service";
export * from "./types/player.types";

/**
 * Player Service - Player registration and profile management
 */

import { Injectable, Logger } from "@nestjs/common";
import type { PlayerRow } from "@tichu/db";
import type { PlayerId } from "@tichu/types";
import { DatabaseService, PlayerRepository, type UpdatePlayerInput } from "../../common/database";
import { NotFoundError, PlayerTakenError } from "../../common/errors";
import type { CreatePlayerDto, UpdatePlayerDto } from "./dto/player.dto";
import { toPlayerView, type PlayerView } from "./types/player.types";

/**
 * Generated initials avatar for players without a profile image
 */
export function defaultAvatarUrl(name: string): string {
  return `https://ui-avatars.com/api/?name=${encodeURIComponent(name)}&size=150&background=9ca3af&color=fff`;
}

@Injectable()
export class PlayerService {
  private readonly logger = new Logger(PlayerService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly players: PlayerRepository,
  ) {}

  create(dto: CreatePlayerDto): PlayerView {
    const row = this.database.transaction("create player", () => {
      this.assertAvailable(dto);
      return this.players.create({
        name: dto.name,
        code: dto.code,
        profileUrl: dto.profileUrl ?? defaultAvatarUrl(dto.name),
      });
    });

    this.logger.log(`Player registered: ${row.name} (${row.id})`);
    return toPlayerView(row);
  }

  list(): PlayerView[] {
    return this.players.findAll().map(toPlayerView);
  }

  get(id: PlayerId): PlayerView {
    return toPlayerView(this.require(id));
  }

  update(id: PlayerId, dto: UpdatePlayerDto): PlayerView {
    const row = this.database.transaction("update player", () => {
      this.require(id);
      this.assertAvailable(dto, id);

      const changes: UpdatePlayerInput = {};
      if (dto.name !== undefined) changes.name = dto.name;
      if (dto.code !== undefined) changes.code = dto.code;
      if (dto.profileUrl !== undefined) changes.profileUrl = dto.profileUrl;

      const updated = this.players.update(id, changes);
      if (!updated) throw new NotFoundError("player", id);
      return updated;
    });

    return toPlayerView(row);
  }

  /**
   * Replace the profile image with the generated avatar
   */
  resetProfile(id: PlayerId): PlayerView {
    const row = this.database.transaction("reset profile", () => {
      const player = this.require(id);
      const updated = this.players.update(id, { profileUrl: defaultAvatarUrl(player.name) });
      if (!updated) throw new NotFoundError("player", id);
      return updated;
    });
    return toPlayerView(row);
  }

  /**
   * Remove a player and their bonus call records. Matches keep their rosters.
   */
  delete(id: PlayerId): { deleted: true; id: PlayerId } {
    if (!this.players.delete(id)) {
      throw new NotFoundError("player", id);
    }
    this.logger.log(`Player deleted: ${id}`);
    return { deleted: true, id };
  }

  private require(id: PlayerId): PlayerRow {
    const row = this.players.findById(id);
    if (!row) throw new NotFoundError("player", id);
    return row;
  }

  private assertAvailable(fields: { name?: string; code?: string }, selfId?: PlayerId): void {
    if (fields.name !== undefined) {
      const holder = this.players.findByName(fields.name);
      if (holder && holder.id !== selfId) {
        throw new PlayerTakenError("name", fields.name);
      }
    }
    if (fields.code !== undefined) {
      const holder = this.players.findByCode(fields.code);
      if (holder && holder.id !== selfId) {
        throw new PlayerTakenError("code", fields.code);
      }
    }
  }
}

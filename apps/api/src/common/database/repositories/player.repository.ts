/**
 * Player Repository - Player rows
 */

import { Injectable } from "@nestjs/common";
import { asc, desc, eq, inArray } from "drizzle-orm";
import { players, type PlayerRow } from "@tichu/db";
import type { PlayerId } from "@tichu/types";
import { DatabaseService } from "../database.service";

export interface CreatePlayerInput {
  name: string;
  code: string;
  profileUrl: string | null;
  isAdmin?: boolean;
}

export type UpdatePlayerInput = Partial<Pick<PlayerRow, "name" | "code" | "profileUrl">>;

export type PlayerOrder = "id" | "newest";

@Injectable()
export class PlayerRepository {
  constructor(private readonly database: DatabaseService) {}

  findById(id: PlayerId): PlayerRow | undefined {
    return this.database.run("find player", () =>
      this.database.db.select().from(players).where(eq(players.id, id)).get(),
    );
  }

  findByIds(ids: readonly PlayerId[]): PlayerRow[] {
    if (ids.length === 0) return [];
    return this.database.run("find players", () =>
      this.database.db
        .select()
        .from(players)
        .where(inArray(players.id, [...ids]))
        .orderBy(asc(players.id))
        .all(),
    );
  }

  /**
   * All players, by ascending id or newest first
   */
  findAll(order: PlayerOrder = "id"): PlayerRow[] {
    return this.database.run("list players", () =>
      this.database.db
        .select()
        .from(players)
        .orderBy(
          ...(order === "newest"
            ? [desc(players.createdAt), desc(players.id)]
            : [asc(players.id)]),
        )
        .all(),
    );
  }

  findByName(name: string): PlayerRow | undefined {
    return this.database.run("find player by name", () =>
      this.database.db.select().from(players).where(eq(players.name, name)).get(),
    );
  }

  findByCode(code: string): PlayerRow | undefined {
    return this.database.run("find player by code", () =>
      this.database.db.select().from(players).where(eq(players.code, code)).get(),
    );
  }

  create(input: CreatePlayerInput): PlayerRow {
    return this.database.run("create player", () =>
      this.database.db
        .insert(players)
        .values({
          name: input.name,
          code: input.code,
          profileUrl: input.profileUrl,
          isAdmin: input.isAdmin ?? false,
          createdAt: new Date(),
        })
        .returning()
        .get(),
    );
  }

  update(id: PlayerId, changes: UpdatePlayerInput): PlayerRow | undefined {
    if (Object.keys(changes).length === 0) return this.findById(id);
    this.database.run("update player", () =>
      this.database.db.update(players).set(changes).where(eq(players.id, id)).run(),
    );
    return this.findById(id);
  }

  /**
   * Delete a player. Their stat records go with them.
   */
  delete(id: PlayerId): boolean {
    const result = this.database.run("delete player", () =>
      this.database.db.delete(players).where(eq(players.id, id)).run(),
    );
    return result.changes > 0;
  }

  deleteAll(): number {
    return this.database.run("delete all players", () =>
      this.database.db.delete(players).run(),
    ).changes;
  }
}

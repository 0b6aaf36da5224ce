/**
 * Player views returned by the API
 *
 * @module player/types
 */

import type { PlayerRow } from "@tichu/db";
import type { PlayerId } from "@tichu/types";

export interface PlayerView {
  id: PlayerId;
  name: string;
  profileUrl: string | null;
  isAdmin: boolean;
  createdAt: string;
}

/**
 * Admin listing; carries the access code
 */
export interface PlayerAdminView extends PlayerView {
  code: string;
}

export function toPlayerView(row: PlayerRow): PlayerView {
  return {
    id: row.id,
    name: row.name,
    profileUrl: row.profileUrl,
    isAdmin: row.isAdmin,
    createdAt: row.createdAt.toISOString(),
  };
}

export function toPlayerAdminView(row: PlayerRow): PlayerAdminView {
  return { ...toPlayerView(row), code: row.code };
}

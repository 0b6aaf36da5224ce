/**
 * Team Assignment Service - Random 2:2 split of four players
 */

import { Injectable } from "@nestjs/common";
import { randomInt } from "crypto";
import type { PlayerId } from "@tichu/types";
import { PlayerRepository } from "../../common/database";
import { InvalidInputError, NotFoundError } from "../../common/errors";
import { StatsService } from "../stats";
import type { TeamAssignment, TeamRoster } from "./types/match.types";

/** Returns an integer in [0, maxExclusive) */
export type RandomIndex = (maxExclusive: number) => number;

const secureRandomIndex: RandomIndex = (maxExclusive) => randomInt(maxExclusive);

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], randomIndex: RandomIndex = secureRandomIndex): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1);
    const current = result[i];
    const swapped = result[j];
    if (current === undefined || swapped === undefined) continue;
    result[i] = swapped;
    result[j] = current;
  }
  return result;
}

@Injectable()
export class TeamAssignmentService {
  constructor(
    private readonly players: PlayerRepository,
    private readonly stats: StatsService,
  ) {}

  assign(playerIds: readonly PlayerId[], randomIndex?: RandomIndex): TeamAssignment {
    if (playerIds.length !== 4 || new Set(playerIds).size !== 4) {
      throw new InvalidInputError("Team assignment needs four different players");
    }

    const rows = new Map(this.players.findByIds(playerIds).map((p) => [p.id, p]));
    const missing = playerIds.find((id) => !rows.has(id));
    if (missing !== undefined) throw new NotFoundError("player", missing);

    const shuffled = shuffle(playerIds, randomIndex);
    const toRoster = (ids: PlayerId[]): TeamRoster => {
      const [first, second] = ids;
      return {
        players: ids.map((id) => ({
          id,
          name: rows.get(id)?.name ?? null,
          profileUrl: rows.get(id)?.profileUrl ?? null,
        })),
        record:
          first !== undefined && second !== undefined
            ? this.stats.getPairRecord(first, second)
            : { totalGames: 0, wins: 0, winRate: 0 },
      };
    };

    return { teamA: toRoster(shuffled.slice(0, 2)), teamB: toRoster(shuffled.slice(2)) };
  }
}

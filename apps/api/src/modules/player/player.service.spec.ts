/**
 * Player Service Tests
 */

import { NotFoundError, PlayerTakenError } from "../../common/errors";
import { PlayerService, defaultAvatarUrl } from "./player.service";
import { createTestDatabase, seedMatch, type TestDatabase } from "../../../test/helpers/database";
import { tichuCall } from "../../../test/fixtures/matches";

describe("PlayerService", () => {
  let fixture: TestDatabase;
  let service: PlayerService;

  beforeEach(() => {
    fixture = createTestDatabase();
    service = new PlayerService(fixture.database, fixture.players);
  });

  afterEach(() => {
    fixture.close();
  });

  describe("create", () => {
    it("should register a player with a generated avatar", () => {
      const player = service.create({ name: "Ana Lee", code: "ana42" });

      expect(player).toMatchObject({ id: 1, name: "Ana Lee", isAdmin: false });
      expect(player.profileUrl).toBe(
        "https://ui-avatars.com/api/?name=Ana%20Lee&size=150&background=9ca3af&color=fff",
      );
      expect(player).not.toHaveProperty("code");
    });

    it("should keep a given profile URL", () => {
      const player = service.create({
        name: "Ben",
        code: "ben",
        profileUrl: "https://example.com/ben.png",
      });

      expect(player.profileUrl).toBe("https://example.com/ben.png");
    });

    it("should reject a taken name", () => {
      service.create({ name: "Ana", code: "one" });

      expect(() => service.create({ name: "Ana", code: "two" })).toThrow(PlayerTakenError);
      expect(fixture.players.findAll()).toHaveLength(1);
    });

    it("should reject a taken code", () => {
      service.create({ name: "Ana", code: "same" });

      expect(() => service.create({ name: "Ben", code: "same" })).toThrow(
        "Player code is already taken",
      );
    });
  });

  describe("update", () => {
    it("should change only the given fields", () => {
      const ana = service.create({ name: "Ana", code: "ana" });

      const updated = service.update(ana.id, { name: "Anna" });

      expect(updated.name).toBe("Anna");
      expect(updated.profileUrl).toBe(defaultAvatarUrl("Ana"));
      expect(fixture.players.findById(ana.id)?.code).toBe("ana");
    });

    it("should allow a player to keep their own name", () => {
      const ana = service.create({ name: "Ana", code: "ana" });

      expect(service.update(ana.id, { name: "Ana", code: "ana2" }).name).toBe("Ana");
    });

    it("should reject another player's code", () => {
      service.create({ name: "Ana", code: "ana" });
      const ben = service.create({ name: "Ben", code: "ben" });

      expect(() => service.update(ben.id, { code: "ana" })).toThrow(PlayerTakenError);
    });

    it("should fail for an unknown player", () => {
      expect(() => service.update(42, { name: "Nobody" })).toThrow(NotFoundError);
    });
  });

  describe("resetProfile", () => {
    it("should restore the generated avatar", () => {
      const ana = service.create({ name: "Ana", code: "ana", profileUrl: "https://example.com/a.png" });

      expect(service.resetProfile(ana.id).profileUrl).toBe(defaultAvatarUrl("Ana"));
    });
  });

  describe("get and list", () => {
    it("should list players by id", () => {
      service.create({ name: "Ben", code: "ben" });
      service.create({ name: "Ana", code: "ana" });

      expect(service.list().map((p) => p.name)).toEqual(["Ben", "Ana"]);
    });

    it("should fail for an unknown player", () => {
      expect(() => service.get(7)).toThrow("Player 7 not found");
    });
  });

  describe("delete", () => {
    it("should remove the player and their bonus call records", () => {
      const players = ["Ana", "Ben", "Cho", "Dev"].map((name) =>
        service.create({ name, code: name.toLowerCase() }),
      );
      const match = seedMatch(fixture.matches, [1, 2], [3, 4], "2026-05-01");
      fixture.statRecords.insertMany([tichuCall(match.id, 1, true), tichuCall(match.id, 3, false)]);

      expect(service.delete(players[0]?.id ?? 0)).toEqual({ deleted: true, id: 1 });
      expect(fixture.players.findById(1)).toBeUndefined();
      expect(fixture.statRecords.findForMatch(match.id).map((r) => r.playerId)).toEqual([3]);
    });

    it("should fail for an unknown player", () => {
      expect(() => service.delete(3)).toThrow(NotFoundError);
    });
  });
});

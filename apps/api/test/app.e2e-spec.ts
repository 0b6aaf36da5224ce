import { Test, TestingModule } from "@nestjs/testing";
import { ValidationPipe, VersioningType } from "@nestjs/common";
import {
  FastifyAdapter,
  NestFastifyApplication,
} from "@nestjs/platform-fastify";
import { AppModule } from "../src/app.module";
import { GlobalExceptionFilter } from "../src/common/filters";
import { toIsoDate } from "../src/common/utils/date";

describe("App (e2e)", () => {
  let app: NestFastifyApplication;
  const today = toIsoDate();

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter(),
    );

    app.enableVersioning({ type: VersioningType.URI, defaultVersion: "1" });
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
        forbidNonWhitelisted: true,
      }),
    );
    app.useGlobalFilters(new GlobalExceptionFilter());

    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const get = (url: string) => app.inject({ method: "GET", url });
  const send = (method: "POST" | "PUT" | "DELETE", url: string, payload?: object) =>
    app.inject({ method, url, ...(payload ? { payload } : {}) });

  describe("Health Check", () => {
    it("/health (GET) should return health status", async () => {
      const response = await get("/health");

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok" });
    });

    it("/health/ready (GET) should report the database", async () => {
      const response = await get("/health/ready");

      expect(response.json()).toEqual({ ready: true, checks: { database: true } });
    });
  });

  // The steps below share one in-memory database and run in order.
  describe("Match flow", () => {
    it("should register four players", async () => {
      for (const name of ["Ana", "Ben", "Cho", "Dev"]) {
        const response = await send("POST", "/v1/players", { name, code: `${name.toLowerCase()}-1` });
        expect(response.statusCode).toBe(201);
      }

      const list = await get("/v1/players");
      expect(list.json().map((p: { id: number }) => p.id)).toEqual([1, 2, 3, 4]);
    });

    it("should reject a taken player name", async () => {
      const response = await send("POST", "/v1/players", { name: "Ana", code: "other" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        statusCode: 400,
        error: "PLAYER_TAKEN",
        message: 'Player name "Ana" is already taken',
        path: "/v1/players",
      });
    });

    it("should reject a code with whitespace", async () => {
      const response = await send("POST", "/v1/players", { name: "Eve", code: "e v e" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "BAD_REQUEST",
        message: "Validation failed",
        details: ["code must not contain whitespace"],
      });
    });

    it("should start a match", async () => {
      const response = await send("POST", "/v1/matches", {
        teamAIds: [1, 2],
        teamBIds: [3, 4],
        playDate: today,
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({ id: 1, status: "PLAYING", scoreA: 0, scoreB: 0 });
    });

    it("should score a round with a 1-2 finish and a tichu", async () => {
      const response = await send("POST", "/v1/matches/1/rounds", {
        roundNumber: 1,
        teamABase: 100,
        teamBBase: 0,
        events: [
          { type: "one_two", team: "A" },
          { type: "tichu", playerId: 1, success: true },
        ],
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ scoreA: 300, scoreB: 0, status: "PLAYING" });
    });

    it("should reject a call by a player outside the match", async () => {
      const response = await send("POST", "/v1/matches/1/rounds", {
        roundNumber: 2,
        teamABase: 50,
        teamBBase: 50,
        events: [{ type: "grand", playerId: 9, success: true }],
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "ROSTER_CONFLICT",
        message: "Player 9 is not in match 1",
      });
    });

    it("should reject a round number below 1 in the path", async () => {
      const response = await send("PUT", "/v1/matches/1/rounds/0", {
        teamABase: 50,
        teamBBase: 50,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "INVALID_ROUND",
        message: "Round 0: roundNumber: Number must be greater than or equal to 1",
      });
    });

    it("should finish the match when a replaced round crosses 1000", async () => {
      const response = await send("PUT", "/v1/matches/1/rounds/2", {
        teamABase: 750,
        teamBBase: -50,
        events: [],
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        scoreA: 1050,
        scoreB: -50,
        status: "FINISHED",
        winnerTeam: "A",
      });
    });

    it("should report a missing match with the caller's correlation id", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/v1/matches/999",
        headers: { "x-correlation-id": "test-correlation" },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Match 999 not found",
        correlationId: "test-correlation",
      });
    });

    it("should show player stats", async () => {
      const response = await get("/v1/stats/player/1");

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        playerName: "Ana",
        totalGames: 1,
        wins: 1,
        winRate: 100,
        tichuTry: 1,
        tichuSuccessRate: 100,
      });
    });

    it("should rank players", async () => {
      const response = await get("/v1/stats/leaderboard");

      expect(
        response.json().map((entry: { rank: number; stats: { playerId: number } }) => [
          entry.rank,
          entry.stats.playerId,
        ]),
      ).toEqual([
        [1, 1],
        [2, 2],
        [3, 3],
        [4, 4],
      ]);
    });

    it("should show team stats in either player order", async () => {
      const response = await get("/v1/stats/team?player1=2&player2=1");

      expect(response.json()).toMatchObject({ teamName: "Ana/Ben", totalGames: 1, wins: 1 });
    });

    it("should reject the same player twice as a team", async () => {
      const response = await get("/v1/stats/team?player1=1&player2=1");

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("INVALID_INPUT");
    });

    it("should reject a non-numeric year", async () => {
      const response = await get("/v1/stats/leaderboard?year=abc");

      expect(response.statusCode).toBe(400);
    });

    it("should list the finished match and today's record", async () => {
      const finished = await get("/v1/matches/finished");
      expect(finished.json()).toHaveLength(1);
      expect(finished.json()[0].teamA).toEqual([
        { id: 1, name: "Ana", profileUrl: expect.stringContaining("name=Ana") },
        { id: 2, name: "Ben", profileUrl: expect.stringContaining("name=Ben") },
      ]);

      const record = await get("/v1/matches/today-record?teamA=2,1&teamB=3,4");
      expect(record.json()).toEqual({ date: today, totalGames: 1, teamAWins: 1, teamBWins: 0 });
    });

    it("should reset the match and its stats", async () => {
      const reset = await send("POST", "/v1/matches/1/reset");
      expect(reset.json()).toMatchObject({ status: "PLAYING", scoreA: 0, rounds: [] });

      const stats = await get("/v1/stats/player/1");
      expect(stats.json()).toMatchObject({ totalGames: 0, tichuTry: 0 });

      const ongoing = await get("/v1/matches/ongoing/3");
      expect(ongoing.json().match).toMatchObject({ id: 1, status: "PLAYING" });
    });

    it("should let an admin list users and delete the match", async () => {
      const users = await get("/v1/admin/users");
      expect(users.json()).toHaveLength(4);
      expect(users.json()[0]).toHaveProperty("code");

      const deleted = await send("DELETE", "/v1/admin/matches/1");
      expect(deleted.statusCode).toBe(204);

      const again = await send("DELETE", "/v1/admin/matches/1");
      expect(again.statusCode).toBe(404);
    });
  });
});

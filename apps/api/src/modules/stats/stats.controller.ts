/**
 * Stats Controller - Player and team statistics, leaderboards
 */

import { Controller, Get, Param, ParseIntPipe, Query } from "@nestjs/common";
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import { unwrap } from "../../common/errors";
import { StatsService } from "./stats.service";
import { TeamStatsQueryDto, YearQueryDto } from "./dto/stats.dto";

@ApiTags("stats")
@Controller({ path: "stats", version: "1" })
export class StatsController {
  constructor(private readonly statsService: StatsService) {}

  @Get("player/:playerId")
  @ApiOperation({ summary: "Get one player's statistics" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  @ApiResponse({ status: 404, description: "Player not found" })
  getPlayerStats(
    @Param("playerId", ParseIntPipe) playerId: number,
    @Query() query: YearQueryDto,
  ) {
    return unwrap(this.statsService.getPlayerStats(playerId, query.year));
  }

  @Get("players/current-year")
  @ApiOperation({ summary: "Get every player's statistics for the current year" })
  getCurrentYearStats() {
    return this.statsService.getCurrentYearStats();
  }

  @Get("team")
  @ApiOperation({ summary: "Get a pair's statistics as partners" })
  @ApiResponse({ status: 400, description: "Same player given twice" })
  @ApiResponse({ status: 404, description: "Player not found" })
  getTeamStats(@Query() query: TeamStatsQueryDto) {
    return unwrap(this.statsService.getTeamStats(query.player1, query.player2, query.year));
  }

  @Get("leaderboard")
  @ApiOperation({
    summary: "Player leaderboard",
    description: "Ordered by wins, win rate, tichu success rate, grand success rate",
  })
  getLeaderboard(@Query() query: YearQueryDto) {
    return this.statsService.getLeaderboard(query.year);
  }

  @Get("leaderboard/teams")
  @ApiOperation({
    summary: "Team leaderboard",
    description: "Ordered by wins, then win rate",
  })
  getTeamLeaderboard(@Query() query: YearQueryDto) {
    return this.statsService.getTeamLeaderboard(query.year);
  }
}

/**
 * Match Controller - Match lifecycle and round scoring
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from "@nestjs/common";
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import { MatchService } from "./match.service";
import { TeamAssignmentService } from "./team-assignment.service";
import {
  AssignTeamsDto,
  CreateMatchDto,
  FinishedMatchesQueryDto,
  ReplaceRoundDto,
  SubmitRoundDto,
  TodayRecordQueryDto,
} from "./dto/match.dto";

@ApiTags("matches")
@Controller({ path: "matches", version: "1" })
export class MatchController {
  constructor(
    private readonly matchService: MatchService,
    private readonly teamAssignment: TeamAssignmentService,
  ) {}

  @Post("assign-teams")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Randomly split four players into two teams" })
  assignTeams(@Body() dto: AssignTeamsDto) {
    return this.teamAssignment.assign(dto.playerIds);
  }

  @Post()
  @ApiOperation({ summary: "Start a match" })
  @ApiResponse({ status: 400, description: "Invalid or overlapping rosters" })
  @ApiResponse({ status: 404, description: "Player not found" })
  create(@Body() dto: CreateMatchDto) {
    return this.matchService.create(dto);
  }

  @Get("finished")
  @ApiOperation({ summary: "Most recent finished matches" })
  listFinished(@Query() query: FinishedMatchesQueryDto) {
    return this.matchService.listFinished(query.limit);
  }

  @Get("ongoing/:playerId")
  @ApiOperation({ summary: "The newest match, if it is in play and includes the player" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  findOngoing(@Param("playerId", ParseIntPipe) playerId: number) {
    return { match: this.matchService.findOngoing(playerId) };
  }

  @Get("today-record")
  @ApiOperation({ summary: "Today's head-to-head record of two rosters" })
  getTodayRecord(@Query() query: TodayRecordQueryDto) {
    return this.matchService.getTodayRecord(query.teamA, query.teamB);
  }

  @Get(":matchId")
  @ApiOperation({ summary: "Match detail with rosters, form and round breakdown" })
  @ApiParam({ name: "matchId", description: "Match ID" })
  @ApiResponse({ status: 404, description: "Match not found" })
  getDetail(@Param("matchId", ParseIntPipe) matchId: number) {
    return this.matchService.getDetail(matchId);
  }

  @Post(":matchId/rounds")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Submit a round",
    description: "Replaces the stored round with the same number, if any",
  })
  @ApiParam({ name: "matchId", description: "Match ID" })
  submitRound(@Param("matchId", ParseIntPipe) matchId: number, @Body() dto: SubmitRoundDto) {
    return this.matchService.submitRound(matchId, dto);
  }

  @Put(":matchId/rounds/:roundNumber")
  @ApiOperation({ summary: "Replace a round" })
  @ApiParam({ name: "matchId", description: "Match ID" })
  @ApiParam({ name: "roundNumber", description: "Round number" })
  replaceRound(
    @Param("matchId", ParseIntPipe) matchId: number,
    @Param("roundNumber", ParseIntPipe) roundNumber: number,
    @Body() dto: ReplaceRoundDto,
  ) {
    return this.matchService.replaceRound(matchId, roundNumber, dto);
  }

  @Delete(":matchId/rounds/:roundNumber")
  @ApiOperation({ summary: "Delete a round" })
  @ApiParam({ name: "matchId", description: "Match ID" })
  @ApiParam({ name: "roundNumber", description: "Round number" })
  deleteRound(
    @Param("matchId", ParseIntPipe) matchId: number,
    @Param("roundNumber", ParseIntPipe) roundNumber: number,
  ) {
    return this.matchService.deleteRound(matchId, roundNumber);
  }

  @Post(":matchId/reset")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Clear every round of a match" })
  @ApiParam({ name: "matchId", description: "Match ID" })
  reset(@Param("matchId", ParseIntPipe) matchId: number) {
    return this.matchService.reset(matchId);
  }
}

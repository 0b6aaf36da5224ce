/**
 * Admin Controller - Data maintenance endpoints
 */

import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from "@nestjs/common";
import { ApiOperation, ApiParam, ApiTags } from "@nestjs/swagger";
import { AdminService } from "./admin.service";
import { RecentMatchesQueryDto } from "./dto/admin.dto";

@ApiTags("admin")
@Controller({ path: "admin", version: "1" })
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get("users")
  @ApiOperation({ summary: "List every player with their access code, newest first" })
  listUsers() {
    return this.adminService.listUsers();
  }

  @Delete("users/:playerId")
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Delete a player" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  deleteUser(@Param("playerId", ParseIntPipe) playerId: number): void {
    this.adminService.deleteUser(playerId);
  }

  @Get("matches/recent")
  @ApiOperation({ summary: "Latest matches by play date" })
  recentMatches(@Query() query: RecentMatchesQueryDto) {
    return this.adminService.recentMatches(query.limit);
  }

  @Delete("matches/:matchId")
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Delete a match and its stat records" })
  @ApiParam({ name: "matchId", description: "Match ID" })
  deleteMatch(@Param("matchId", ParseIntPipe) matchId: number): void {
    this.adminService.deleteMatch(matchId);
  }

  @Delete("reset-all")
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Delete every player, match and stat record" })
  resetAll(): void {
    this.adminService.resetAll();
  }

  @Post("matches/cleanup")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Delete stale matches in play now" })
  runCleanup() {
    return this.adminService.runCleanup();
  }
}

/**
 * Player Controller - Player registration and profiles
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
} from "@nestjs/common";
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import { PlayerService } from "./player.service";
import { CreatePlayerDto, UpdatePlayerDto } from "./dto/player.dto";

@ApiTags("players")
@Controller({ path: "players", version: "1" })
export class PlayerController {
  constructor(private readonly playerService: PlayerService) {}

  @Post()
  @ApiOperation({ summary: "Register a player" })
  @ApiResponse({ status: 400, description: "Name or code already taken" })
  create(@Body() dto: CreatePlayerDto) {
    return this.playerService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: "List players by id" })
  list() {
    return this.playerService.list();
  }

  @Get(":playerId")
  @ApiOperation({ summary: "Get a player" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  get(@Param("playerId", ParseIntPipe) playerId: number) {
    return this.playerService.get(playerId);
  }

  @Put(":playerId")
  @ApiOperation({ summary: "Update a player's name, code or profile image" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  update(@Param("playerId", ParseIntPipe) playerId: number, @Body() dto: UpdatePlayerDto) {
    return this.playerService.update(playerId, dto);
  }

  @Post(":playerId/reset-profile")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Reset the profile image to the generated avatar" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  resetProfile(@Param("playerId", ParseIntPipe) playerId: number) {
    return this.playerService.resetProfile(playerId);
  }

  @Delete(":playerId")
  @ApiOperation({ summary: "Delete a player" })
  @ApiParam({ name: "playerId", description: "Player ID" })
  delete(@Param("playerId", ParseIntPipe) playerId: number) {
    return this.playerService.delete(playerId);
  }
}

/**
 * Match DTOs - Request bodies and queries of the match endpoints
 *
 * Round events are only shape-checked here; the service parses them into
 * typed RoundEvents and checks players against the match rosters.
 */

import { ApiProperty, ApiPropertyOptional, OmitType } from "@nestjs/swagger";
import { Transform, Type } from "class-transformer";
import {
  ArrayMaxSize,
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  Matches,
  Max,
  Min,
  ValidateNested,
} from "class-validator";
import { ROUND_EVENT_TYPES, type RoundEventType, type TeamSide } from "@tichu/types";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * "1,2" -> [1, 2]; anything else is left for the validators to reject
 */
function parseIdList({ value }: { value: unknown }): unknown {
  if (typeof value !== "string") return value;
  return value.split(",").map((part) => Number(part.trim()));
}

export class CreateMatchDto {
  @ApiProperty({ description: "Team A player IDs", example: [1, 2], type: [Number] })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ArrayUnique()
  @IsInt({ each: true })
  @Min(1, { each: true })
  teamAIds!: number[];

  @ApiProperty({ description: "Team B player IDs", example: [3, 4], type: [Number] })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ArrayUnique()
  @IsInt({ each: true })
  @Min(1, { each: true })
  teamBIds!: number[];

  @ApiPropertyOptional({ description: "Play date (YYYY-MM-DD), today when omitted" })
  @Matches(ISO_DATE, { message: "playDate must be YYYY-MM-DD" })
  @IsOptional()
  playDate?: string;
}

export class RoundEventDto {
  @ApiProperty({ enum: [...ROUND_EVENT_TYPES] })
  @IsIn(ROUND_EVENT_TYPES)
  type!: RoundEventType;

  @ApiPropertyOptional({ description: "Caller of a tichu or grand" })
  @IsInt()
  @IsOptional()
  playerId?: number;

  @ApiPropertyOptional({ description: "Whether the call succeeded" })
  @IsBoolean()
  @IsOptional()
  success?: boolean;

  @ApiPropertyOptional({ description: "Team of a 1-2 finish", enum: ["A", "B"] })
  @IsIn(["A", "B"])
  @IsOptional()
  team?: TeamSide;
}

export class SubmitRoundDto {
  @ApiProperty({ description: "Round number, starting at 1", example: 1 })
  @IsInt()
  @Min(1)
  roundNumber!: number;

  @ApiProperty({ description: "Team A card points", example: 60 })
  @IsInt()
  teamABase!: number;

  @ApiProperty({ description: "Team B card points", example: 40 })
  @IsInt()
  teamBBase!: number;

  @ApiPropertyOptional({ type: [RoundEventDto], default: [] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RoundEventDto)
  @IsOptional()
  events?: RoundEventDto[];
}

export class ReplaceRoundDto extends OmitType(SubmitRoundDto, ["roundNumber"] as const) {}

export class AssignTeamsDto {
  @ApiProperty({ description: "Exactly four player IDs", example: [1, 2, 3, 4], type: [Number] })
  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4)
  @ArrayUnique()
  @IsInt({ each: true })
  @Min(1, { each: true })
  playerIds!: number[];
}

export class FinishedMatchesQueryDto {
  @ApiPropertyOptional({ default: 10, minimum: 1, maximum: 50 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  @IsOptional()
  limit?: number;
}

export class TodayRecordQueryDto {
  @ApiProperty({ description: "Comma separated team A player IDs", example: "1,2" })
  @Transform(parseIdList)
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsInt({ each: true })
  teamA!: number[];

  @ApiProperty({ description: "Comma separated team B player IDs", example: "3,4" })
  @Transform(parseIdList)
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsInt({ each: true })
  teamB!: number[];
}

/**
 * Stats DTOs - Query parameters of the stats endpoints
 */

import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsInt, IsOptional, Max, Min } from "class-validator";

export class YearQueryDto {
  @ApiPropertyOptional({
    description: "Only matches played in this year; all years when omitted",
    example: 2026,
  })
  @Type(() => Number)
  @IsInt()
  @Min(2000)
  @Max(9999)
  @IsOptional()
  year?: number;
}

export class TeamStatsQueryDto extends YearQueryDto {
  @ApiProperty({ description: "First player ID", example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  player1!: number;

  @ApiProperty({ description: "Second player ID", example: 2 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  player2!: number;
}

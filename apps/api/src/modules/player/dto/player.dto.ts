/**
 * Player DTOs - Request bodies of the player endpoints
 */

import { ApiProperty, ApiPropertyOptional, PartialType } from "@nestjs/swagger";
import { Transform } from "class-transformer";
import { IsOptional, IsString, IsUrl, Length, Matches, MaxLength } from "class-validator";

const trim = ({ value }: { value: unknown }) =>
  typeof value === "string" ? value.trim() : value;

export class CreatePlayerDto {
  @ApiProperty({ description: "Display name, unique", example: "Ana" })
  @Transform(trim)
  @IsString()
  @Length(1, 50)
  name!: string;

  @ApiProperty({ description: "Personal access code, unique, no whitespace", example: "ana42" })
  @IsString()
  @Length(1, 50)
  @Matches(/^\S+$/, { message: "code must not contain whitespace" })
  code!: string;

  @ApiPropertyOptional({ description: "Profile image URL; a generated avatar when omitted" })
  @IsUrl()
  @MaxLength(500)
  @IsOptional()
  profileUrl?: string;
}

export class UpdatePlayerDto extends PartialType(CreatePlayerDto) {}

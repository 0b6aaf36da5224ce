/**
 * Match Module - Match lifecycle, round scoring and stale match cleanup
 */

import { Module } from "@nestjs/common";
import { ScoringModule } from "../scoring";
import { StatsModule } from "../stats";
import { MatchController } from "./match.controller";
import { MatchService } from "./match.service";
import { TeamAssignmentService } from "./team-assignment.service";
import { MatchCleanupService } from "./match-cleanup.service";

@Module({
  imports: [ScoringModule, StatsModule],
  controllers: [MatchController],
  providers: [MatchService, TeamAssignmentService, MatchCleanupService],
  exports: [MatchService, MatchCleanupService],
})
export class MatchModule {}

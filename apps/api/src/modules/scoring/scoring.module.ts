/**
 * Scoring Module - Round scoring and per-round stat recording
 */

import { Module } from "@nestjs/common";
import { RoundStatsRecorder } from "./round-stats.recorder";

@Module({
  providers: [RoundStatsRecorder],
  exports: [RoundStatsRecorder],
})
export class ScoringModule {}

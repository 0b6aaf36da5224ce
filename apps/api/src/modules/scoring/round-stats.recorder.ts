/**
 * Round Stats Recorder - Keeps stat records in step with saved rounds
 *
 * Replace-on-write: recording a round first deletes every record of that
 * (match, round) pair, so an edited round never leaves stale rows behind.
 * Callers run this inside the same transaction that saves the match.
 */

import { Injectable, Logger } from "@nestjs/common";
import type { RoundEvent, StatRecord } from "@tichu/types";
import { StatRecordRepository } from "../../common/database";
import { buildRoundStatRecords } from "./calculators";

@Injectable()
export class RoundStatsRecorder {
  private readonly logger = new Logger(RoundStatsRecorder.name);

  constructor(private readonly statRecords: StatRecordRepository) {}

  record(matchId: number, roundNumber: number, events: readonly RoundEvent[]): StatRecord[] {
    const records = buildRoundStatRecords(matchId, roundNumber, events);
    const removed = this.statRecords.deleteFor(matchId, roundNumber);
    this.statRecords.insertMany(records);

    this.logger.debug(
      `Match ${matchId} round ${roundNumber}: replaced ${removed} stat record(s) with ${records.length}`,
    );
    return records;
  }

  clear(matchId: number, roundNumber: number): number {
    return this.statRecords.deleteFor(matchId, roundNumber);
  }

  clearMatch(matchId: number): number {
    return this.statRecords.deleteForMatch(matchId);
  }
}

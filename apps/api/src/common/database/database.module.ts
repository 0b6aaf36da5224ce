/**
 * Database Module - Global SQLite connection and repositories
 */

import { Global, Module } from "@nestjs/common";
import { DatabaseService } from "./database.service";
import { MatchRepository, PlayerRepository, StatRecordRepository } from "./repositories";

@Global()
@Module({
  providers: [DatabaseService, MatchRepository, PlayerRepository, StatRecordRepository],
  exports: [DatabaseService, MatchRepository, PlayerRepository, StatRecordRepository],
})
export class DatabaseModule {}

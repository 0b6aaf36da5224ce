/**
 * Database Service - SQLite connection management
 *
 * better-sqlite3 runs every statement synchronously, so a transaction body
 * executes start to finish without yielding to the event loop. Mutations of
 * one match are therefore serialized within the process.
 */

import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { openDatabase, type DatabaseConnection, type TichuDatabase } from "@tichu/db";
import { AppConfig } from "../config";
import { withStorage } from "./storage";

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly connection: DatabaseConnection;

  constructor(config: AppConfig) {
    const { path, logQueries } = config.database;
    this.connection = withStorage("open database", () =>
      openDatabase(path, {
        logQuery: logQueries ? (query) => this.logger.debug(query) : undefined,
      }),
    );
    this.logger.log(`Connected to database ${path}`);
  }

  get db(): TichuDatabase {
    return this.connection.db;
  }

  /**
   * Run a read or a single write, mapping driver errors to StorageFailureError
   */
  run<T>(operation: string, work: () => T): T {
    return withStorage(operation, work);
  }

  /**
   * Run `work` inside one IMMEDIATE transaction
   *
   * Any error rolls back every write made by `work`. Driver errors surface
   * as StorageFailureError, domain errors are rethrown unchanged.
   */
  transaction<T>(operation: string, work: () => T): T {
    return withStorage(operation, () =>
      this.connection.sqlite.transaction(work).immediate(),
    );
  }

  /**
   * Round-trip latency check, in milliseconds
   */
  ping(): number {
    const start = Date.now();
    this.run("ping", () => this.connection.sqlite.prepare("SELECT 1").get());
    return Date.now() - start;
  }

  onModuleDestroy(): void {
    this.connection.close();
    this.logger.log("Disconnected from database");
  }
}

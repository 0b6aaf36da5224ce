/**
 * Ledger errors, thrown by the services and mapped to HTTP by the global
 * exception filter.
 *
 * @module common/errors
 */

import type { PlayerId } from "@tichu/types";

export abstract class LedgerError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ResourceKind = "match" | "player";

export class NotFoundError extends LedgerError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;

  constructor(
    readonly resource: ResourceKind,
    readonly id: number,
  ) {
    super(`${resource === "match" ? "Match" : "Player"} ${id} not found`);
  }
}

export class InvalidInputError extends LedgerError {
  readonly code = "INVALID_INPUT";
  readonly statusCode = 400;
}

/**
 * A player named where the rosters do not allow it: on both teams, or
 * calling in a match they are not playing
 */
export class RosterConflictError extends LedgerError {
  readonly code = "ROSTER_CONFLICT";
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly playerIds: readonly PlayerId[],
  ) {
    super(message);
  }
}

/**
 * A submitted round that cannot be stored as given
 */
export class InvalidRoundError extends LedgerError {
  readonly code = "INVALID_ROUND";
  readonly statusCode = 400;

  constructor(
    readonly roundNumber: number,
    detail: string,
  ) {
    super(`Round ${roundNumber}: ${detail}`);
  }
}

export class PlayerTakenError extends LedgerError {
  readonly code = "PLAYER_TAKEN";
  readonly statusCode = 400;

  constructor(
    readonly field: "name" | "code",
    value: string,
  ) {
    super(
      field === "name" ? `Player name "${value}" is already taken` : "Player code is already taken",
    );
  }
}

/**
 * The database rejected a read or write. Any open transaction has already
 * been rolled back.
 */
export class StorageFailureError extends LedgerError {
  readonly code = "STORAGE_FAILURE";
  readonly statusCode = 500;

  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`Storage operation failed: ${operation}`);
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${cause.stack}`;
    }
  }
}

// =============================================================================
// Result
// =============================================================================

export type Result<T, E extends LedgerError = LedgerError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E extends LedgerError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * The data of a success, or the error thrown for the filter to map
 */
export function unwrap<T, E extends LedgerError>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}

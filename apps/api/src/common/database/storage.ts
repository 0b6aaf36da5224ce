/**
 * Storage guard - wraps driver failures as StorageFailureError
 *
 * @module common/database
 */

import { LedgerError, StorageFailureError } from "../errors";

export function withStorage<T>(operation: string, work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (error instanceof LedgerError) {
      throw error;
    }
    throw new StorageFailureError(operation, error);
  }
}

export class StorageIOFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageIOFailureError";
  }
}

export class MalformedPersistedRecordError extends Error {
  readonly table: string;
  readonly key: string;

  constructor(table: string, key: string | number, reason: string) {
    super(`Malformed record in ${table} (${key}): ${reason}`);
    this.name = "MalformedPersistedRecordError";
    this.table = table;
    this.key = String(key);
  }
}

/**
 * Runs a driver call and rethrows anything it raises as a StorageIOFailureError.
 * Errors already classified by this package pass through untouched.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (
      error instanceof StorageIOFailureError ||
      error instanceof MalformedPersistedRecordError
    ) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageIOFailureError(`${operation} failed: ${reason}`, {
      cause: error
    });
  }
}

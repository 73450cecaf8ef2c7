/**
 * Storage-layer failure raised by table operations
 */

export type StorageOperation = "insert" | "update" | "findById" | "findAll" | "delete";

export class StorageError extends Error {
  constructor(
    public readonly operation: StorageOperation,
    public readonly table: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} on ${table} failed: ${reason}`, { cause });
    this.name = "StorageError";
  }
}

/**
 * Run a storage call, converting any thrown error into a StorageError
 */
export const withStorageError = async <T>(
  operation: StorageOperation,
  table: string,
  fn: () => Promise<T>,
): Promise<T> => {
  try {
    return await fn();
  } catch (error) {
    throw error instanceof StorageError ? error : new StorageError(operation, table, error);
  }
};

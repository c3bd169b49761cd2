/**
 * Base error class for snapshot persistence
 */
export class StateStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateStoreError";
    Object.setPrototypeOf(this, StateStoreError.prototype);
  }
}

/**
 * A stored snapshot could not be read back. Reported, never thrown from
 * `load`: the file is treated as absent.
 */
export class SnapshotCorruptError extends StateStoreError {
  public readonly fileId: string;

  constructor(fileId: string, reason: string) {
    super(`SnapshotCorrupt: ${fileId}: ${reason}`);
    this.name = "SnapshotCorruptError";
    this.fileId = fileId;
    Object.setPrototypeOf(this, SnapshotCorruptError.prototype);
  }
}

export function isStateStoreError(error: unknown): error is StateStoreError {
  return error instanceof StateStoreError;
}

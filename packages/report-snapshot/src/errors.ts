/**
 * Snapshot errors
 *
 * All three abort a load before the target report is touched.
 */

export type SnapshotErrorCode =
  | 'SNAPSHOT_DECODE_FAILED'
  | 'SNAPSHOT_INCOMPATIBLE_FORMAT'
  | 'SNAPSHOT_DATASET_MISMATCH';

export class SnapshotError extends Error {
  public readonly code: SnapshotErrorCode;

  constructor(code: SnapshotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnapshotError';
    this.code = code;
  }
}

/**
 * Bytes could not be decoded into a snapshot envelope
 */
export class DeserializationError extends SnapshotError {
  constructor(cause: unknown) {
    super(
      'SNAPSHOT_DECODE_FAILED',
      `Failed to load data: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'DeserializationError';
  }
}

/**
 * Decoded snapshot has the wrong shape (damaged, or written by another format revision)
 */
export class IncompatibleFormatError extends SnapshotError {
  public readonly failures: string[];

  constructor(failures: string[]) {
    super(
      'SNAPSHOT_INCOMPATIBLE_FORMAT',
      'Failed to load data: file may be damaged or from an incompatible version'
    );
    this.name = 'IncompatibleFormatError';
    this.failures = failures;
  }
}

/**
 * Snapshot describes a different dataset than the target report
 */
export class DatasetMismatchError extends SnapshotError {
  public readonly loadedHash: string | null;
  public readonly currentHash: string | null;

  constructor(loadedHash: string | null, currentHash: string | null) {
    super('SNAPSHOT_DATASET_MISMATCH', 'Dataset does not match with the current report');
    this.name = 'DatasetMismatchError';
    this.loadedHash = loadedHash;
    this.currentHash = currentHash;
  }
}

export function isSnapshotError(error: unknown): error is SnapshotError {
  return error instanceof SnapshotError;
}

/**
 * Error taxonomy
 *
 * Duplicates are not errors (see IngestResult) and lookups that miss
 * return null, so neither has a class here.
 */

import type { ZodIssue } from "zod";

export type ErrorCode =
  | "ENCODING_ERROR"
  | "DIMENSION_MISMATCH"
  | "INGESTION_FAILED"
  | "CORRUPT_INDEX"
  | "INVALID_RECORD"
  | "STORE_CLOSED";

export class MemoryStoreError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad input to an encoder: the caller skips the unit */
export class EncodingError extends MemoryStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODING_ERROR", message, options);
  }
}

export class DimensionMismatchError extends MemoryStoreError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, indexKey?: string) {
    super(
      "DIMENSION_MISMATCH",
      `Vector dimension ${actual} does not match ${indexKey ? `index ${indexKey} ` : ""}dimension ${expected}`
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/** Every write of the item was rolled back; the whole item may be retried */
export class IngestionFailed extends MemoryStoreError {
  readonly reason: string;
  readonly itemId?: string;

  constructor(reason: string, itemId?: string, options?: { cause?: unknown }) {
    super("INGESTION_FAILED", `Ingestion failed${itemId ? ` for ${itemId}` : ""}: ${reason}`, options);
    this.reason = reason;
    this.itemId = itemId;
  }
}

/** Index and mapping files are out of sync; rebuild from the metadata store */
export class CorruptIndexError extends MemoryStoreError {
  readonly indexKey: string;

  constructor(indexKey: string, detail: string) {
    super(
      "CORRUPT_INDEX",
      `Vector index ${indexKey} is corrupt: ${detail}. Run rebuild_indices to reconcile it with the metadata store.`
    );
    this.indexKey = indexKey;
  }
}

export class RecordValidationError extends MemoryStoreError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super("INVALID_RECORD", message);
    this.issues = issues;
  }
}

export class StoreClosedError extends MemoryStoreError {
  constructor() {
    super("STORE_CLOSED", "Storage manager is closed");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error types for recordbox operations
 *
 * Invariants:
 * - Every error carries a stable `code` and a taxonomy `kind` for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Persistence errors include the absolute target path in the message
 */

/**
 * Error taxonomy shared by every recordbox error
 */
export type ErrorKind =
  | "NotFound"
  | "InvalidInput"
  | "ValidationFailed"
  | "AmbiguousKey"
  | "KeyExtractionFailed"
  | "IOError";

/**
 * Base class for all recordbox errors
 */
export abstract class RecordStoreError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a schema or record is absent
 */
export class NotFoundError extends RecordStoreError {
  readonly code = "NOT_FOUND";
  readonly kind = "NotFound";
}

export class SchemaNotFoundError extends NotFoundError {
  constructor(
    public readonly schema: string,
    options?: ErrorOptions
  ) {
    super(`Schema '${schema}' does not exist`, options);
  }
}

export class RecordNotFoundError extends NotFoundError {
  constructor(
    public readonly schema: string,
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Record with key '${key}' does not exist in schema '${schema}'`, options);
  }
}

/**
 * Thrown for malformed JSON, schema tokens rejected by policy, or unusable names
 */
export class InvalidInputError extends RecordStoreError {
  readonly code = "INVALID_INPUT";
  readonly kind = "InvalidInput";
}

/**
 * Thrown when a record field does not match its declared type
 */
export class ValidationFailedError extends RecordStoreError {
  readonly code = "VALIDATION_FAILED";
  readonly kind = "ValidationFailed";

  constructor(
    public readonly field: string,
    public readonly expectedType: string,
    public readonly actualValue: unknown,
    options?: ErrorOptions
  ) {
    super(
      `Field '${field}' type validation failed: expected ${expectedType}, got ${JSON.stringify(actualValue)}`,
      options
    );
  }
}

/**
 * Thrown when a partial key matches more than one record
 */
export class AmbiguousKeyError extends RecordStoreError {
  readonly code = "AMBIGUOUS_KEY";
  readonly kind = "AmbiguousKey";

  constructor(
    public readonly schema: string,
    public readonly partialKey: string,
    public readonly candidates: string[],
    options?: ErrorOptions
  ) {
    super(
      `Multiple records match partial key '${partialKey}' in schema '${schema}': ${candidates.join(", ")}`,
      options
    );
  }
}

/**
 * Thrown when a new record yields no usable identity
 */
export class KeyExtractionError extends RecordStoreError {
  readonly code = "KEY_EXTRACTION_FAILED";
  readonly kind = "KeyExtractionFailed";

  constructor(
    public readonly input: string,
    options?: ErrorOptions
  ) {
    super(`Could not extract a valid key from record data: ${input}`, options);
  }
}

/**
 * Base class for snapshot storage failures
 */
export abstract class PersistenceError extends RecordStoreError {
  readonly kind = "IOError";
}

/**
 * Thrown when a snapshot file exists but cannot be read or decoded
 */
export class SnapshotReadError extends PersistenceError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown when a snapshot cannot be written
 */
export class SnapshotWriteError extends PersistenceError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends PersistenceError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when the database root cannot be listed
 */
export class ListDatabasesError extends PersistenceError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list databases in directory: ${dirPath}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a recordbox error
 */
export function isRecordStoreError(err: unknown): err is RecordStoreError {
  return err instanceof RecordStoreError;
}

/**
 * recordbox SDK
 *
 * Schema-validated record store with partial-key lookup and one snapshot file per database
 */

// Re-export types
export type {
  JsonValue,
  JsonObject,
  StoredRecord,
  FieldType,
  FieldDescriptor,
  SchemaDef,
  SchemaPolicy,
  Snapshot,
  Persistence,
  Clock,
  EngineOptions,
  Engine,
} from "./types.js";

// Engine
export {
  StorageEngine,
  openEngine,
  DEFAULT_DATABASE,
  SNAPSHOT_FILE_NAME,
  CREATED_AT_FIELD,
  UPDATED_AT_FIELD,
} from "./engine.js";
export { DatabaseState } from "./database-state.js";
export { ReadWriteLock } from "./lock.js";

// Records, keys and schemas
export type { RecordValue, RecordObject } from "./record.js";
export { decodeRecord, decodeValue, encodeRecord, encodeValue, parseRecord } from "./record.js";
export { extractKey, KEY_FIELDS } from "./key.js";
export {
  defineSchema,
  parseFieldToken,
  resolveFieldType,
  DEFAULT_SCHEMA_POLICY,
  STRICT_SCHEMA_POLICY,
} from "./schema/definition.js";
export type { ValidationResult } from "./schema/validator.js";
export { validateRecord, assertValidRecord, matchesType } from "./schema/validator.js";
export { PartialKeyIndex, PARTIAL_KEY_LENGTH, prefixOf } from "./partial-key-index.js";
export { validateDatabaseName, validateSchemaName, RESERVED_SCHEMA_ENTRY } from "./validation.js";

// Persistence
export { JsonFilePersistence, encodeSnapshotFile, decodeSnapshotFile } from "./persistence/json-file.js";
export { MemoryPersistence } from "./persistence/memory.js";
export { atomicWrite, readTextFile, ensureDirectory, listDirectories } from "./io.js";
export { stableStringify } from "./format.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { DatabaseMetrics, LookupOutcome } from "./observability/metrics.js";

// Errors
export type { ErrorKind } from "./errors.js";
export {
  RecordStoreError,
  NotFoundError,
  SchemaNotFoundError,
  RecordNotFoundError,
  InvalidInputError,
  ValidationFailedError,
  AmbiguousKeyError,
  KeyExtractionError,
  PersistenceError,
  SnapshotReadError,
  SnapshotWriteError,
  DirectoryError,
  ListDatabasesError,
  isRecordStoreError,
} from "./errors.js";

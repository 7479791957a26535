/**
 * Core types for recordbox
 */

/**
 * Any value JSON can carry
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object (a record as callers see it)
 */
export interface JsonObject {
  [field: string]: JsonValue;
}

/**
 * A record together with the key it is stored under
 */
export interface StoredRecord {
  /** Derived identity of the record within its schema */
  key: string;
  /** Record contents, including the created_at/updated_at stamps */
  value: JsonObject;
}

/**
 * Field types a schema definition can declare.
 * `unknown` marks a type name the parser did not recognise.
 */
export type FieldType = "string" | "integer" | "float" | "boolean" | "object" | "unknown";

/**
 * One `field:type` declaration
 */
export interface FieldDescriptor {
  name: string;
  type: FieldType;
  /** Type name exactly as written in the definition */
  declaredType: string;
}

/**
 * Parsed schema definition
 */
export interface SchemaDef {
  name: string;
  /** Definition string exactly as supplied */
  definition: string;
  /** Fields in declaration order */
  fields: FieldDescriptor[];
}

/**
 * How the schema parser treats input it cannot interpret.
 *
 * The defaults are the permissive ones: tokens without a `name:type` shape are
 * dropped and unrecognised type names accept any value.
 */
export interface SchemaPolicy {
  malformedTokens: "skip" | "reject";
  unknownTypes: "accept" | "reject";
}

/**
 * Complete serialisable state of one database
 */
export interface Snapshot {
  /** schema name → (key → record) */
  records: Record<string, Record<string, JsonObject>>;
  /** schema name → definition string */
  schemas: Record<string, string>;
}

/**
 * Boundary between the engine and whatever stores snapshots.
 *
 * `save` must replace the previous contents atomically or fail leaving them intact.
 * `load` returns an empty snapshot when nothing has been saved at `path`.
 * `list` names the databases stored under a root.
 */
export interface Persistence {
  load(path: string): Promise<Snapshot>;
  save(path: string, snapshot: Snapshot): Promise<void>;
  list(root: string): Promise<string[]>;
}

/**
 * Source of the current time for record timestamps
 */
export type Clock = () => Date;

/**
 * Options for opening a storage engine
 */
export interface EngineOptions {
  /** Root directory; each database lives in `<root>/<database>/` */
  root: string;
  /** Snapshot adapter (default: JSON files on disk) */
  persistence?: Persistence;
  /** Schema parsing policy (default: skip malformed tokens, accept unknown types) */
  schemaPolicy?: Partial<SchemaPolicy>;
  /** Time source for created_at/updated_at (default: system clock) */
  clock?: Clock;
  /** Database selected when the engine opens (default: "default") */
  defaultDatabase?: string;
}

/**
 * Public surface of the storage engine
 */
export interface Engine {
  /** Name of the current database */
  readonly currentDatabase: string;

  /** Create or replace a schema in the current database */
  createSchema(name: string, definition: string): Promise<SchemaDef>;

  /** Definition string of a schema */
  getSchema(name: string): Promise<string>;

  /** Sorted schema names of the current database */
  listSchemas(): Promise<string[]>;

  /** Validate, stamp and store a record given as JSON text */
  addRecord(schema: string, json: string): Promise<StoredRecord>;

  /** Fetch a record by exact key, falling back to a unique prefix match */
  getRecord(schema: string, key: string): Promise<StoredRecord>;

  /** Delete a record by exact key */
  deleteRecord(schema: string, key: string): Promise<void>;

  /** All records of a schema, sorted by key */
  listRecords(schema: string): Promise<StoredRecord[]>;

  /** Make another database current, flushing the outgoing one */
  useDatabase(name: string): Promise<void>;

  /** Sorted names of the stored databases plus the current one */
  listDatabases(): Promise<string[]>;

  /** Drop every schema and record of the current database */
  wipeDatabase(): Promise<void>;

  /** Persist the current database again */
  flush(): Promise<void>;

  /** Flush databases left dirty by failed writes and refuse further calls */
  close(): Promise<void>;
}

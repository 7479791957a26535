/**
 * In-memory state of one database: schemas, records and their partial-key indexes
 *
 * Invariants:
 * - Every defined schema has a (possibly empty) record map and an index
 * - Each schema's index holds exactly the keys of its record map
 */

import { decodeRecord, encodeRecord, type RecordObject } from "./record.js";
import { DEFAULT_SCHEMA_POLICY, defineSchema } from "./schema/definition.js";
import { PartialKeyIndex } from "./partial-key-index.js";
import { compareKeys } from "./format.js";
import { logger } from "./observability/logs.js";
import type { SnapshotReadError } from "./errors.js";
import type { SchemaDef, Snapshot } from "./types.js";

export class DatabaseState {
  readonly name: string;
  #schemas = new Map<string, SchemaDef>();
  #records = new Map<string, Map<string, RecordObject>>();
  #indexes = new Map<string, PartialKeyIndex>();

  /**
   * True while memory holds changes the last flush failed to persist
   */
  dirty = false;

  /**
   * Why the snapshot on disk could not be loaded. While set, this state is an
   * empty stand-in and must never be written over that file.
   */
  readError: SnapshotReadError | undefined;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Empty state for a database whose snapshot exists but could not be read
   */
  static unreadable(name: string, error: SnapshotReadError): DatabaseState {
    const state = new DatabaseState(name);
    state.readError = error;
    return state;
  }

  /**
   * Rebuild state from a snapshot.
   *
   * Stored definitions are parsed permissively: they were accepted when they
   * were created and are never rejected retroactively.
   */
  static fromSnapshot(name: string, snapshot: Snapshot): DatabaseState {
    const state = new DatabaseState(name);

    for (const [schema, definition] of Object.entries(snapshot.schemas)) {
      state.#schemas.set(schema, defineSchema(schema, definition, DEFAULT_SCHEMA_POLICY));
    }

    for (const [schema, records] of Object.entries(snapshot.records)) {
      state.#records.set(
        schema,
        new Map(Object.entries(records).map(([key, value]) => [key, decodeRecord(value)]))
      );
    }

    for (const schema of state.#schemas.keys()) {
      if (!state.#records.has(schema)) {
        state.#records.set(schema, new Map());
      }
    }

    state.rebuildIndexes();
    return state;
  }

  /**
   * Serialisable copy of the whole state
   */
  toSnapshot(): Snapshot {
    return {
      records: Object.fromEntries(
        [...this.#records].map(([schema, records]) => [
          schema,
          Object.fromEntries([...records].map(([key, record]) => [key, encodeRecord(record)])),
        ])
      ),
      schemas: Object.fromEntries([...this.#schemas].map(([schema, def]) => [schema, def.definition])),
    };
  }

  /**
   * Recreate every index from the record maps
   */
  rebuildIndexes(): void {
    this.#indexes.clear();
    for (const [schema, records] of this.#records) {
      this.#indexes.set(schema, PartialKeyIndex.rebuild(records.keys()));
      logger.debug("index.rebuild", { database: this.name, schema, details: { keys: records.size } });
    }
  }

  getSchema(name: string): SchemaDef | undefined {
    return this.#schemas.get(name);
  }

  /**
   * Create or replace a schema; existing records are kept and not revalidated
   */
  setSchema(def: SchemaDef): void {
    this.#schemas.set(def.name, def);
    if (!this.#records.has(def.name)) {
      this.#records.set(def.name, new Map());
      this.#indexes.set(def.name, new PartialKeyIndex());
    }
  }

  schemaNames(): string[] {
    return [...this.#schemas.keys()].sort(compareKeys);
  }

  getRecord(schema: string, key: string): RecordObject | undefined {
    return this.#records.get(schema)?.get(key);
  }

  /**
   * Records of a schema sorted by key
   */
  listRecords(schema: string): Array<[string, RecordObject]> {
    return [...(this.#records.get(schema) ?? [])].sort(([a], [b]) => compareKeys(a, b));
  }

  /**
   * Store a record under a key, replacing any previous one
   */
  putRecord(schema: string, key: string, record: RecordObject): void {
    let records = this.#records.get(schema);
    if (!records) {
      records = new Map();
      this.#records.set(schema, records);
    }
    records.set(key, record);
    this.index(schema).insert(key);
  }

  /**
   * Remove a record by exact key
   * @returns Whether a record was removed
   */
  deleteRecord(schema: string, key: string): boolean {
    const removed = this.#records.get(schema)?.delete(key) ?? false;
    if (removed) {
      this.index(schema).remove(key);
    }
    return removed;
  }

  /**
   * Keys of a schema starting with `partial`
   */
  lookup(schema: string, partial: string): string[] {
    return this.#indexes.get(schema)?.lookup(partial) ?? [];
  }

  /**
   * Index of a schema, created empty on first use
   */
  index(schema: string): PartialKeyIndex {
    let index = this.#indexes.get(schema);
    if (!index) {
      index = new PartialKeyIndex();
      this.#indexes.set(schema, index);
    }
    return index;
  }

  /**
   * Drop every schema, record and index
   */
  clear(): void {
    this.#schemas.clear();
    this.#records.clear();
    this.#indexes.clear();
  }
}

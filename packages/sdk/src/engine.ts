/**
 * Storage engine: owns every database state and the current-database pointer
 *
 * Invariants:
 * - Exactly one database is current; it is always resident in memory
 * - Every operation runs under one reader/writer lock; mutations hold it
 *   exclusively through their flush, so no caller sees a half-applied change
 * - A mutation is flushed before it returns; a failed flush is reported but the
 *   in-memory change stays (memory may be ahead of disk) and the state is
 *   marked dirty until a later flush succeeds
 * - Switching away from a database flushes it first; only states whose flush
 *   failed stay resident after they stop being current
 * - A database whose snapshot could not be read is never flushed over that
 *   snapshot, except by an explicit wipe
 */

import * as path from "node:path";
import { DatabaseState } from "./database-state.js";
import {
  AmbiguousKeyError,
  InvalidInputError,
  RecordNotFoundError,
  RecordStoreError,
  SchemaNotFoundError,
  SnapshotReadError,
  SnapshotWriteError,
  ListDatabasesError,
} from "./errors.js";
import { extractKey } from "./key.js";
import { encodeRecord, parseRecord, withField, type RecordObject } from "./record.js";
import { DEFAULT_SCHEMA_POLICY, defineSchema } from "./schema/definition.js";
import { assertValidRecord } from "./schema/validator.js";
import { ReadWriteLock } from "./lock.js";
import { JsonFilePersistence } from "./persistence/json-file.js";
import { validateDatabaseName, validateSchemaName } from "./validation.js";
import { compareKeys } from "./format.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  Clock,
  Engine,
  EngineOptions,
  Persistence,
  SchemaDef,
  SchemaPolicy,
  StoredRecord,
} from "./types.js";

/** Database selected when no other is configured */
export const DEFAULT_DATABASE = "default";

/** Snapshot file name inside each database directory */
export const SNAPSHOT_FILE_NAME = "store.json";

/** Fields stamped on every stored record */
export const CREATED_AT_FIELD = "created_at";
export const UPDATED_AT_FIELD = "updated_at";

interface ResolvedOptions {
  root: string;
  persistence: Persistence;
  schemaPolicy: SchemaPolicy;
  clock: Clock;
  defaultDatabase: string;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Schema-validated record store with partial-key lookup
 *
 * @example
 * ```typescript
 * const engine = await openEngine({ root: './dbs' });
 *
 * await engine.createSchema('User', 'name:string age:int');
 * await engine.addRecord('User', '{"name":"Alice","age":30}');
 *
 * const { key, value } = await engine.getRecord('User', 'Ali');
 * ```
 */
export class StorageEngine implements Engine {
  #options: ResolvedOptions;
  #lock = new ReadWriteLock();
  #states = new Map<string, DatabaseState>();
  #current: string;
  #closed = false;

  constructor(options: EngineOptions) {
    const defaultDatabase = options.defaultDatabase ?? DEFAULT_DATABASE;
    validateDatabaseName(defaultDatabase);

    this.#options = {
      root: path.resolve(options.root),
      persistence: options.persistence ?? new JsonFilePersistence(),
      schemaPolicy: { ...DEFAULT_SCHEMA_POLICY, ...options.schemaPolicy },
      clock: options.clock ?? (() => new Date()),
      defaultDatabase,
    };
    this.#current = defaultDatabase;
  }

  get options(): Readonly<ResolvedOptions> {
    return this.#options;
  }

  get currentDatabase(): string {
    return this.#current;
  }

  /**
   * Path of a database's snapshot file
   */
  snapshotPath(database: string): string {
    return path.join(this.#options.root, database, SNAPSHOT_FILE_NAME);
  }

  /**
   * Load the default database. Called once by openEngine().
   * Like useDatabase(), this never fails on an unreadable snapshot.
   */
  async open(): Promise<this> {
    await this.#lock.withWrite(async () => {
      this.#assertNotClosed();
      if (!this.#states.has(this.#current)) {
        await this.#activate(this.#current);
      }
    });
    return this;
  }

  async createSchema(name: string, definition: string): Promise<SchemaDef> {
    validateSchemaName(name);
    const def = defineSchema(name, definition, this.#options.schemaPolicy);

    return this.#lock.withWrite(async () => {
      const state = this.#currentState();
      state.setSchema(def);
      await this.#flush(state);
      return def;
    });
  }

  async getSchema(name: string): Promise<string> {
    return this.#lock.withRead(() => {
      const def = this.#currentState().getSchema(name);
      if (!def) {
        throw new SchemaNotFoundError(name);
      }
      return def.definition;
    });
  }

  async listSchemas(): Promise<string[]> {
    return this.#lock.withRead(() => this.#currentState().schemaNames());
  }

  /**
   * Parse, stamp, validate and store a record
   *
   * Re-adding a record whose key already exists replaces it; the replacement
   * keeps the original created_at.
   *
   * @throws SchemaNotFoundError, InvalidInputError, ValidationFailedError, KeyExtractionError
   * @throws PersistenceError if the flush fails (the record stays in memory)
   */
  async addRecord(schema: string, json: string): Promise<StoredRecord> {
    return this.#lock.withWrite(async () => {
      const state = this.#currentState();
      const def = state.getSchema(schema);
      if (!def) {
        throw new SchemaNotFoundError(schema);
      }

      const submitted = parseRecord(json);
      const now = this.#options.clock().toISOString();
      let record = this.#stamp(submitted, now);
      assertValidRecord(def, record);

      const key = extractKey(submitted, json);
      const createdAt = state.getRecord(schema, key)?.fields.get(CREATED_AT_FIELD);
      if (createdAt?.kind === "string") {
        record = withField(record, CREATED_AT_FIELD, createdAt);
      }

      state.putRecord(schema, key, record);
      await this.#flush(state);
      return { key, value: encodeRecord(record) };
    });
  }

  /**
   * Fetch a record: an exact key wins, otherwise the key is treated as a prefix
   * @throws RecordNotFoundError when nothing matches
   * @throws AmbiguousKeyError when the prefix matches several records
   */
  async getRecord(schema: string, key: string): Promise<StoredRecord> {
    return this.#lock.withRead(() => {
      const state = this.#currentState();
      if (!state.getSchema(schema)) {
        throw new SchemaNotFoundError(schema);
      }

      const exact = state.getRecord(schema, key);
      if (exact) {
        metrics.recordLookup(state.name, "exact");
        return { key, value: encodeRecord(exact) };
      }

      const candidates = state.lookup(schema, key);
      if (candidates.length > 1) {
        metrics.recordLookup(state.name, "ambiguous");
        throw new AmbiguousKeyError(schema, key, candidates);
      }

      const [only] = candidates;
      const match = only === undefined ? undefined : state.getRecord(schema, only);
      if (only === undefined || !match) {
        metrics.recordLookup(state.name, "miss");
        throw new RecordNotFoundError(schema, key);
      }

      metrics.recordLookup(state.name, "partial");
      return { key: only, value: encodeRecord(match) };
    });
  }

  /**
   * Delete a record by exact key; prefixes are never expanded here
   */
  async deleteRecord(schema: string, key: string): Promise<void> {
    await this.#lock.withWrite(async () => {
      const state = this.#currentState();
      if (!state.getSchema(schema)) {
        throw new SchemaNotFoundError(schema);
      }

      if (!state.deleteRecord(schema, key)) {
        throw new RecordNotFoundError(schema, key);
      }

      await this.#flush(state);
    });
  }

  async listRecords(schema: string): Promise<StoredRecord[]> {
    return this.#lock.withRead(() => {
      const state = this.#currentState();
      if (!state.getSchema(schema)) {
        throw new SchemaNotFoundError(schema);
      }

      return state.listRecords(schema).map(([key, record]) => ({ key, value: encodeRecord(record) }));
    });
  }

  /**
   * Make another database current
   *
   * Always switches. The outgoing database is flushed first; if that flush
   * fails the outgoing state stays resident and dirty, so nothing is lost and
   * close() retries it. A target whose snapshot cannot be read becomes current
   * as an empty database that refuses writes until it is wiped.
   */
  async useDatabase(name: string): Promise<void> {
    validateDatabaseName(name);

    await this.#lock.withWrite(async () => {
      const outgoing = this.#currentState();

      let flushed = true;
      if (!outgoing.readError) {
        try {
          await this.#flush(outgoing);
        } catch (err) {
          flushed = false;
          logger.warn("engine.use", {
            database: outgoing.name,
            message: `switching away with unsaved changes: ${describeError(err)}`,
          });
        }
      }

      if (name === outgoing.name) {
        return;
      }

      await this.#activate(name);

      if (flushed) {
        this.#states.delete(outgoing.name);
      }

      logger.debug("engine.use", { database: name, details: { from: outgoing.name } });
    });
  }

  /**
   * Stored databases plus the current one, sorted
   */
  async listDatabases(): Promise<string[]> {
    return this.#lock.withRead(async () => {
      this.#assertNotClosed();

      let stored: string[];
      try {
        stored = await this.#options.persistence.list(this.#options.root);
      } catch (err) {
        if (err instanceof RecordStoreError) throw err;
        throw new ListDatabasesError(this.#options.root, { cause: err });
      }

      return [...new Set([...stored, this.#current])].sort(compareKeys);
    });
  }

  async wipeDatabase(): Promise<void> {
    await this.#lock.withWrite(async () => {
      const state = this.#currentState();
      state.clear();
      // Wiping discards the unreadable snapshot on purpose
      state.readError = undefined;
      logger.debug("engine.wipe", { database: state.name });
      await this.#flush(state);
    });
  }

  async flush(): Promise<void> {
    await this.#lock.withWrite(() => this.#flush(this.#currentState()));
  }

  /**
   * Flush every state a failed write left dirty, then refuse further calls.
   * If a flush fails the engine stays open so close() can be retried.
   */
  async close(): Promise<void> {
    await this.#lock.withWrite(async () => {
      if (this.#closed) return;

      for (const state of this.#states.values()) {
        if (state.dirty) {
          await this.#flush(state);
        }
      }

      this.#states.clear();
      this.#closed = true;
    });
  }

  #assertNotClosed(): void {
    if (this.#closed) {
      throw new InvalidInputError("engine is closed");
    }
  }

  #currentState(): DatabaseState {
    this.#assertNotClosed();
    const state = this.#states.get(this.#current);
    if (!state) {
      throw new InvalidInputError("engine is not open; use openEngine()");
    }
    return state;
  }

  #stamp(record: RecordObject, now: string): RecordObject {
    const created = withField(record, CREATED_AT_FIELD, { kind: "string", value: now });
    return withField(created, UPDATED_AT_FIELD, { kind: "string", value: now });
  }

  /**
   * Make `name` current, loading it unless it is already resident.
   * An unreadable snapshot activates an empty state that refuses flushes.
   */
  async #activate(name: string): Promise<void> {
    let state = this.#states.get(name);

    if (!state) {
      const snapshotPath = this.snapshotPath(name);
      try {
        const snapshot = await this.#options.persistence.load(snapshotPath);
        state = DatabaseState.fromSnapshot(name, snapshot);
      } catch (err) {
        const readError = err instanceof SnapshotReadError ? err : new SnapshotReadError(snapshotPath, { cause: err });
        logger.warn("engine.load.failed", {
          database: name,
          message: `${readError.message}; using an empty database, writes refused until wiped`,
        });
        state = DatabaseState.unreadable(name, readError);
      }

      this.#states.set(name, state);
      logger.debug("engine.load", {
        database: name,
        details: { schemas: state.schemaNames().length },
      });
    }

    this.#current = name;
  }

  /**
   * Persist a whole database state
   * @throws the adapter's PersistenceError, or SnapshotWriteError wrapping anything else.
   *   A state loaded as unreadable is refused with a SnapshotWriteError and is not marked dirty.
   */
  async #flush(state: DatabaseState): Promise<void> {
    const snapshotPath = this.snapshotPath(state.name);
    if (state.readError) {
      logger.warn("engine.flush.refused", { database: state.name, message: state.readError.message });
      throw new SnapshotWriteError(snapshotPath, { cause: state.readError });
    }

    const start = performance.now();

    try {
      await this.#options.persistence.save(snapshotPath, state.toSnapshot());
    } catch (err) {
      state.dirty = true;
      metrics.recordFlushFailure(state.name);
      logger.warn("engine.flush.failed", { database: state.name, message: describeError(err) });

      if (err instanceof RecordStoreError) throw err;
      throw new SnapshotWriteError(snapshotPath, { cause: err });
    }

    state.dirty = false;
    const duration = performance.now() - start;
    metrics.recordFlush(state.name, duration);
    logger.debug("engine.flush", {
      database: state.name,
      details: { durationMs: duration.toFixed(2) },
    });
  }
}

/**
 * Open a storage engine and load its default database
 *
 * @example
 * ```typescript
 * const engine = await openEngine({ root: './dbs' });
 * await engine.useDatabase('inventory');
 * ```
 */
export async function openEngine(options: EngineOptions): Promise<StorageEngine> {
  return new StorageEngine(options).open();
}

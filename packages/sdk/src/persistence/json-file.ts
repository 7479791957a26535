/**
 * Snapshot persistence as one canonical JSON file per database
 *
 * File layout: a JSON object mapping schema name → (key → record), plus the
 * reserved entry `"__schemas__": { "definition": "<JSON of name → definition>" }`.
 *
 * Invariants:
 * - Writes go through atomicWrite: a failed save leaves the previous file intact
 * - A missing file loads as the empty snapshot
 * - A file that does not parse or does not match the layout is a SnapshotReadError
 */

import { Ajv } from "ajv";
import { InvalidInputError, SnapshotReadError } from "../errors.js";
import { atomicWrite, listDirectories, readTextFile } from "../io.js";
import { compareKeys, stableStringify } from "../format.js";
import { RESERVED_SCHEMA_ENTRY } from "../validation.js";
import type { JsonObject, JsonValue, Persistence, Snapshot } from "../types.js";

type SnapshotFile = Record<string, Record<string, JsonValue>>;

const ajv = new Ajv({ strict: true });

const validateSnapshotFile = ajv.compile<SnapshotFile>({
  type: "object",
  properties: {
    [RESERVED_SCHEMA_ENTRY]: {
      type: "object",
      properties: { definition: { type: "string" } },
      required: ["definition"],
      additionalProperties: false,
    },
  },
  additionalProperties: {
    type: "object",
    additionalProperties: { type: "object" },
  },
});

const validateSchemaMap = ajv.compile<Record<string, string>>({
  type: "object",
  additionalProperties: { type: "string" },
});

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Render a snapshot as file contents
 * @throws InvalidInputError if a record map uses the reserved entry name
 */
export function encodeSnapshotFile(snapshot: Snapshot): string {
  if (Object.hasOwn(snapshot.records, RESERVED_SCHEMA_ENTRY)) {
    throw new InvalidInputError(`schema name "${RESERVED_SCHEMA_ENTRY}" is reserved`);
  }

  return stableStringify({
    ...snapshot.records,
    [RESERVED_SCHEMA_ENTRY]: { definition: encodeSchemaMap(snapshot.schemas) },
  });
}

function encodeSchemaMap(schemas: Record<string, string>): string {
  return JSON.stringify(
    Object.fromEntries(Object.entries(schemas).sort(([a], [b]) => compareKeys(a, b)))
  );
}

/**
 * Parse file contents back into a snapshot
 * @throws SnapshotReadError if the contents are not a valid snapshot file
 */
export function decodeSnapshotFile(content: string, filePath: string): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SnapshotReadError(filePath, { cause: err });
  }

  if (!validateSnapshotFile(parsed)) {
    throw new SnapshotReadError(filePath, { cause: new Error(ajv.errorsText(validateSnapshotFile.errors)) });
  }

  const schemaEntry = parsed[RESERVED_SCHEMA_ENTRY];

  // fromEntries defines own properties, so a "__proto__" key stays an ordinary entry
  const records = Object.fromEntries(
    Object.entries(parsed)
      .filter(([entry]) => entry !== RESERVED_SCHEMA_ENTRY)
      .map(([entry, value]) => [
        entry,
        Object.fromEntries(
          Object.entries(value).filter((pair): pair is [string, JsonObject] => isJsonObject(pair[1]))
        ),
      ])
  );

  return {
    records,
    schemas: schemaEntry ? decodeSchemaEntry(schemaEntry, filePath) : {},
  };
}

function decodeSchemaEntry(entry: Record<string, JsonValue>, filePath: string): Record<string, string> {
  const definition = entry.definition;
  if (typeof definition !== "string") {
    throw new SnapshotReadError(filePath, { cause: new Error("schema entry has no definition") });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(definition);
  } catch (err) {
    throw new SnapshotReadError(filePath, { cause: err });
  }

  if (!validateSchemaMap(parsed)) {
    throw new SnapshotReadError(filePath, { cause: new Error(ajv.errorsText(validateSchemaMap.errors)) });
  }
  return parsed;
}

/**
 * Persistence backed by `<root>/<database>/store.json` files
 */
export class JsonFilePersistence implements Persistence {
  async load(path: string): Promise<Snapshot> {
    const content = await readTextFile(path);
    if (content === null) {
      return { records: {}, schemas: {} };
    }
    return decodeSnapshotFile(content, path);
  }

  async save(path: string, snapshot: Snapshot): Promise<void> {
    await atomicWrite(path, encodeSnapshotFile(snapshot));
  }

  async list(root: string): Promise<string[]> {
    return listDirectories(root);
  }
}

/**
 * Record value model
 *
 * Records are held as a tagged value tree so validation can match on `kind`
 * instead of probing dynamic JSON. JSON numbers split into `integer` and
 * `float` at decode time.
 */

import { InvalidInputError } from "./errors.js";
import type { JsonObject, JsonValue } from "./types.js";

export type RecordValue =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "array"; items: RecordValue[] }
  | RecordObject;

export interface RecordObject {
  kind: "object";
  /** Fields in insertion order */
  fields: Map<string, RecordValue>;
}

/**
 * Convert a JSON value into the tagged representation
 * @throws InvalidInputError for values JSON cannot represent
 */
export function decodeValue(input: unknown): RecordValue {
  if (input === null) {
    return { kind: "null" };
  }

  switch (typeof input) {
    case "string":
      return { kind: "string", value: input };
    case "boolean":
      return { kind: "boolean", value: input };
    case "number":
      if (!Number.isFinite(input)) {
        throw new InvalidInputError(`Non-finite number is not a valid record value: ${input}`);
      }
      return Number.isInteger(input) ? { kind: "integer", value: input } : { kind: "float", value: input };
    case "object":
      if (Array.isArray(input)) {
        return { kind: "array", items: input.map(decodeValue) };
      }
      return {
        kind: "object",
        fields: new Map(Object.entries(input).map(([name, value]: [string, unknown]) => [name, decodeValue(value)])),
      };
    default:
      throw new InvalidInputError(`Unsupported record value of type ${typeof input}`);
  }
}

/**
 * Convert a parsed JSON document into a record
 * @throws InvalidInputError unless the document is a JSON object
 */
export function decodeRecord(input: unknown): RecordObject {
  const value = decodeValue(input);
  if (value.kind !== "object") {
    throw new InvalidInputError(`Record must be a JSON object, got ${describeKind(value)}`);
  }
  return value;
}

/**
 * Parse record JSON text
 * @throws InvalidInputError for malformed JSON or a non-object document
 */
export function parseRecord(text: string): RecordObject {
  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Invalid JSON format: ${reason}`, { cause: err });
  }

  return decodeRecord(parsed);
}

/**
 * Convert a tagged value back to plain JSON
 */
export function encodeValue(value: RecordValue): JsonValue {
  switch (value.kind) {
    case "string":
    case "integer":
    case "float":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "array":
      return value.items.map(encodeValue);
    case "object":
      return encodeRecord(value);
  }
}

/**
 * Convert a record back to a plain JSON object
 */
export function encodeRecord(record: RecordObject): JsonObject {
  return Object.fromEntries([...record.fields].map(([name, value]) => [name, encodeValue(value)]));
}

/**
 * Human-readable name of a value's kind
 */
export function describeKind(value: RecordValue): string {
  return value.kind;
}

/**
 * Copy a record with one field set (appended if new, replaced in place otherwise)
 */
export function withField(record: RecordObject, name: string, value: RecordValue): RecordObject {
  const fields = new Map(record.fields);
  fields.set(name, value);
  return { kind: "object", fields };
}

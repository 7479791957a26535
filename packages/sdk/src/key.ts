/**
 * Record identity derivation
 *
 * Priority:
 * 1. `id`, 2. `name`, 3. `key` (non-string values are stringified)
 * 4. value of the first textual field
 * 5. name of the first field
 * 6. the raw input text, for a record with no fields
 *
 * Steps 4 and 5 scan field names in code-unit order so the result never
 * depends on how the JSON happened to be written.
 */

import { KeyExtractionError } from "./errors.js";
import { compareKeys } from "./format.js";
import { encodeValue, type RecordObject, type RecordValue } from "./record.js";

/** Fields consulted before the fallback scan, in priority order */
export const KEY_FIELDS = ["id", "name", "key"] as const;

/**
 * Default textual representation of a value chosen as a key
 */
export function stringifyKeyValue(value: RecordValue): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "integer":
    case "float":
    case "boolean":
      return String(value.value);
    case "null":
      return "null";
    case "array":
    case "object":
      return JSON.stringify(encodeValue(value));
  }
}

/**
 * Derive the key a record is stored under
 * @param record - Record as submitted, before timestamps are added
 * @param rawInput - The unparsed text the record came from
 * @throws KeyExtractionError when the derived key is empty
 */
export function extractKey(record: RecordObject, rawInput: string): string {
  const key = deriveKey(record, rawInput);
  if (key === "") {
    throw new KeyExtractionError(rawInput);
  }
  return key;
}

function deriveKey(record: RecordObject, rawInput: string): string {
  for (const field of KEY_FIELDS) {
    const value = record.fields.get(field);
    if (value !== undefined) {
      return stringifyKeyValue(value);
    }
  }

  const names = [...record.fields.keys()].sort(compareKeys);

  for (const name of names) {
    const value = record.fields.get(name);
    if (value?.kind === "string") {
      return value.value;
    }
  }

  return names[0] ?? rawInput;
}

/**
 * Record validation against a parsed schema
 *
 * Only fields present in both the schema and the record are checked; missing
 * fields and fields of unknown type pass. The first mismatch, in declaration
 * order, is reported.
 */

import { ValidationFailedError } from "../errors.js";
import { encodeValue, type RecordObject, type RecordValue } from "../record.js";
import type { FieldType, SchemaDef } from "../types.js";

export type ValidationResult = { ok: true } | { ok: false; error: ValidationFailedError };

/**
 * Whether a value satisfies a declared field type
 */
export function matchesType(value: RecordValue, type: FieldType): boolean {
  switch (type) {
    case "string":
      return value.kind === "string";
    case "integer":
      return value.kind === "integer";
    case "float":
      return value.kind === "integer" || value.kind === "float";
    case "boolean":
      return value.kind === "boolean";
    case "object":
    case "unknown":
      return true;
  }
}

/**
 * Validate a record against a schema
 */
export function validateRecord(schema: SchemaDef, record: RecordObject): ValidationResult {
  for (const field of schema.fields) {
    const value = record.fields.get(field.name);
    if (value === undefined) continue;

    if (!matchesType(value, field.type)) {
      return {
        ok: false,
        error: new ValidationFailedError(field.name, field.declaredType, encodeValue(value)),
      };
    }
  }

  return { ok: true };
}

/**
 * Validate a record and throw on the first mismatch
 * @throws ValidationFailedError
 */
export function assertValidRecord(schema: SchemaDef, record: RecordObject): void {
  const result = validateRecord(schema, record);
  if (!result.ok) {
    throw result.error;
  }
}

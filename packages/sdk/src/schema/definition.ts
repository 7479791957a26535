/**
 * Schema definition parsing
 *
 * A definition is a whitespace-separated list of `field:type` tokens, e.g.
 * `name:string age:int`. What happens to tokens that do not fit that shape,
 * and to type names outside the known set, is governed by a SchemaPolicy.
 */

import { InvalidInputError } from "../errors.js";
import type { FieldDescriptor, FieldType, SchemaDef, SchemaPolicy } from "../types.js";

/**
 * Permissive defaults: malformed tokens are dropped, unknown types accept anything
 */
export const DEFAULT_SCHEMA_POLICY: Readonly<SchemaPolicy> = Object.freeze({
  malformedTokens: "skip",
  unknownTypes: "accept",
});

/**
 * Strict policy: both kinds of unrecognised input are InvalidInput
 */
export const STRICT_SCHEMA_POLICY: Readonly<SchemaPolicy> = Object.freeze({
  malformedTokens: "reject",
  unknownTypes: "reject",
});

/**
 * Type names accepted in definitions, including aliases
 */
const TYPE_ALIASES: ReadonlyMap<string, Exclude<FieldType, "unknown">> = new Map([
  ["string", "string"],
  ["int", "integer"],
  ["integer", "integer"],
  ["float", "float"],
  ["double", "float"],
  ["bool", "boolean"],
  ["boolean", "boolean"],
  ["object", "object"],
  ["json", "object"],
]);

/**
 * Resolve a declared type name
 */
export function resolveFieldType(declared: string): FieldType {
  return TYPE_ALIASES.get(declared) ?? "unknown";
}

/**
 * Split one token into a field descriptor
 * @returns null when the token is not exactly `name:type` with both parts non-empty
 */
export function parseFieldToken(token: string): FieldDescriptor | null {
  const parts = token.split(":");
  if (parts.length !== 2) {
    return null;
  }

  const [name = "", declaredType = ""] = parts.map((part) => part.trim());
  if (!name || !declaredType) {
    return null;
  }

  return { name, declaredType, type: resolveFieldType(declaredType) };
}

/**
 * Parse a schema definition string
 *
 * A field declared twice keeps its first position and its last type.
 *
 * @throws InvalidInputError when the policy rejects a token
 */
export function defineSchema(
  name: string,
  definition: string,
  policy: SchemaPolicy = DEFAULT_SCHEMA_POLICY
): SchemaDef {
  const fields = new Map<string, FieldDescriptor>();

  for (const token of definition.split(/\s+/)) {
    if (!token) continue;

    const field = parseFieldToken(token);
    if (!field) {
      if (policy.malformedTokens === "reject") {
        throw new InvalidInputError(
          `Malformed field declaration '${token}' in schema '${name}': expected name:type`
        );
      }
      continue;
    }

    if (field.type === "unknown" && policy.unknownTypes === "reject") {
      throw new InvalidInputError(
        `Unknown type '${field.declaredType}' for field '${field.name}' in schema '${name}'`
      );
    }

    fields.set(field.name, field);
  }

  return { name, definition, fields: [...fields.values()] };
}

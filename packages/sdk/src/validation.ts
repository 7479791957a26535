/**
 * Validation of names that reach the filesystem or the snapshot layout
 */

import { InvalidInputError } from "./errors.js";

/**
 * Snapshot entry that holds schema definitions next to the record maps.
 * No user schema may take this name.
 */
export const RESERVED_SCHEMA_ENTRY = "__schemas__";

/**
 * Valid characters for database names: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Validate a database name, which becomes a directory under the root
 * @throws InvalidInputError if invalid
 */
export function validateDatabaseName(value: string): void {
  if (!value) {
    throw new InvalidInputError("database name must be a non-empty string");
  }

  if (!VALID_NAME_PATTERN.test(value)) {
    throw new InvalidInputError(
      `database name contains invalid characters: "${value}". ` +
        `Only alphanumeric, underscore, dash, and dot are allowed.`
    );
  }

  if (value.startsWith(".") || value.startsWith("-")) {
    throw new InvalidInputError(`database name cannot start with "." or "-": "${value}"`);
  }

  if (value.includes("..")) {
    throw new InvalidInputError(`database name cannot contain "..": "${value}"`);
  }
}

/**
 * Validate a schema name
 * @throws InvalidInputError if empty or reserved
 */
export function validateSchemaName(value: string): void {
  if (!value) {
    throw new InvalidInputError("schema name must be a non-empty string");
  }

  if (value === RESERVED_SCHEMA_ENTRY) {
    throw new InvalidInputError(`schema name "${value}" is reserved`);
  }
}

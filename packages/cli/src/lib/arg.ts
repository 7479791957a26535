/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/** Upper bound for --limit */
const MAX_LIMIT = 10000;

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > MAX_LIMIT) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_LIMIT}`);
  }

  return parsed;
}

/**
 * Join `field:type` arguments back into one definition string
 */
export function joinDefinition(fields: string[]): string {
  return fields.map((field) => field.trim()).filter(Boolean).join(" ");
}

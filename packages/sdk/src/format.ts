/**
 * Deterministic JSON formatting for snapshot files
 */

/**
 * Code-unit key comparison, independent of locale
 */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Stable, deterministic JSON stringification with sorted object keys
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 * @throws Error if circular references detected
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (input === null || typeof input !== "object") {
      return input;
    }

    if (seen.has(input)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(input);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(input)) {
        return input.map(normalize);
      }

      // Object.fromEntries defines own properties, so "__proto__" stays a plain key
      return Object.fromEntries(
        Object.entries(input)
          .sort(([a], [b]) => compareKeys(a, b))
          .map(([key, child]: [string, unknown]) => [key, normalize(child)])
      );
    } finally {
      seen.delete(input);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

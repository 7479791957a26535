/**
 * Output rendering helpers
 */

import type { CliOutput } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Serialize data as pretty or compact JSON
 */
export function formatJson(data: unknown, options?: { raw?: boolean }): string {
  return options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
}

/**
 * Print JSON to stdout
 */
export function printJson(output: CliOutput, data: unknown, options?: { raw?: boolean }): void {
  output.stdout(formatJson(data, options) + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: CliOutput, lines: string[]): void {
  for (const line of lines) {
    output.stdout(line + "\n");
  }
}

/**
 * Render a titled list, or a fallback line when it is empty
 */
export function formatList(
  title: string,
  empty: string,
  items: string[],
  marker?: (item: string) => boolean
): string[] {
  if (items.length === 0) {
    return [empty];
  }
  return [title, ...items.map((item) => `${marker?.(item) ? "*" : " "} ${item}`)];
}

/**
 * Apply ANSI color only when the target is a terminal
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

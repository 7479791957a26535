/**
 * Deterministic clocks for record timestamps
 */

import type { Clock } from "@recordbox/sdk";

/**
 * Clock that always returns the same instant
 */
export function fixedClock(iso: string): Clock {
  const at = Date.parse(iso);
  return () => new Date(at);
}

/**
 * Clock that starts at `iso` and advances `stepMs` on every call
 */
export function steppingClock(iso: string, stepMs = 1000): Clock {
  let next = Date.parse(iso);
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

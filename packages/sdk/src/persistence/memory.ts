/**
 * In-process snapshot persistence keyed by path
 *
 * Snapshots are deep-copied on the way in and out, so callers never share
 * structure with what is "on disk".
 */

import { basename, dirname, resolve } from "node:path";
import { compareKeys } from "../format.js";
import type { Persistence, Snapshot } from "../types.js";

export class MemoryPersistence implements Persistence {
  #files = new Map<string, Snapshot>();

  async load(path: string): Promise<Snapshot> {
    const stored = this.#files.get(resolve(path));
    return stored ? structuredClone(stored) : { records: {}, schemas: {} };
  }

  async save(path: string, snapshot: Snapshot): Promise<void> {
    this.#files.set(resolve(path), structuredClone(snapshot));
  }

  /**
   * Databases with a snapshot directly below `root/<database>/`
   */
  async list(root: string): Promise<string[]> {
    const base = resolve(root);
    const names = new Set<string>();
    for (const path of this.#files.keys()) {
      const dir = dirname(path);
      if (dirname(dir) === base) {
        names.add(basename(dir));
      }
    }
    return [...names].sort(compareKeys);
  }

  /**
   * Whether anything has been saved at `path`
   */
  has(path: string): boolean {
    return this.#files.has(resolve(path));
  }
}

/**
 * Temporary roots and engines for tests
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openEngine } from "@recordbox/sdk";
import type { EngineOptions, StorageEngine } from "@recordbox/sdk";

/**
 * Create an empty directory to use as a database root
 * @returns Absolute path under the OS temp directory
 */
export async function createTempRoot(prefix = "recordbox-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory tree; a missing directory is not an error
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Run `fn` against an engine opened on a fresh root.
 *
 * openEngine() is async because it loads the default database before
 * resolving, so `fn` starts with that database current and empty. Every
 * mutation has already been flushed by the time it resolves, which lets `fn`
 * point a second reader (the CLI, a new engine) at `root`.
 *
 * Afterwards the engine is closed, writing any database a failed flush left
 * dirty, and the root is deleted. A close or removal failure is rethrown only
 * when `fn` itself succeeded.
 *
 * @param options - Engine options; `root` is always the temp root
 */
export async function withTempEngine<T>(
  fn: (engine: StorageEngine, root: string) => Promise<T>,
  options?: Partial<EngineOptions>
): Promise<T> {
  const root = await createTempRoot();

  const engine = await openEngine({ ...options, root }).catch(async (err: unknown) => {
    await removeDir(root);
    throw err;
  });

  const teardown = async (): Promise<unknown> => {
    const failures: unknown[] = [];
    await engine.close().catch((err: unknown) => failures.push(err));
    await removeDir(root).catch((err: unknown) => failures.push(err));
    return failures[0];
  };

  let result: T;
  try {
    result = await fn(engine, root);
  } catch (err) {
    // The test's own failure is the one worth reporting
    await teardown();
    throw err;
  }

  const teardownError = await teardown();
  if (teardownError !== undefined) {
    throw teardownError;
  }
  return result;
}

/**
 * Run `fn` with a fresh temp directory, removed afterwards
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Database selection that persists between CLI invocations
 *
 * `use <db>` writes the name to `<root>/.current`. Every later command opens
 * that database unless --db or RECORDBOX_DB says otherwise.
 */

import { join } from "node:path";
import { DEFAULT_DATABASE, atomicWrite, readTextFile } from "@recordbox/sdk";
import { CliError } from "./errors.js";
import type { CliEnv } from "./env.js";

/** File under the root holding the selected database name */
export const CURRENT_DATABASE_FILE = ".current";

/**
 * Name stored by the last `use`, if any
 */
export async function readCurrentDatabase(root: string): Promise<string | undefined> {
  const file = join(root, CURRENT_DATABASE_FILE);

  let content: string | null;
  try {
    content = await readTextFile(file);
  } catch (err) {
    throw new CliError(`Failed to read database selection: ${file}`, { cause: err });
  }

  const name = content?.trim();
  return name ? name : undefined;
}

/**
 * Remember a database as the current one
 */
export async function writeCurrentDatabase(root: string, name: string): Promise<void> {
  await atomicWrite(join(root, CURRENT_DATABASE_FILE), `${name}\n`);
}

/**
 * Database a command should open
 * Priority: --db > RECORDBOX_DB > stored selection > "default"
 */
export async function resolveDatabase(root: string, cliDb: string | undefined, env: CliEnv): Promise<string> {
  return cliDb ?? env.RECORDBOX_DB ?? (await readCurrentDatabase(root)) ?? DEFAULT_DATABASE;
}

/**
 * Engine lifecycle for a single CLI command
 */

import { logger, openEngine, type StorageEngine } from "@recordbox/sdk";

export interface CliEngineOptions {
  root: string;
  database: string;
}

/**
 * Open the engine on the selected database, run one command, then close it.
 *
 * close() retries any flush the command left pending. If the command itself
 * failed, that error wins over a second failure from close().
 */
export async function withEngine<T>(
  options: CliEngineOptions,
  fn: (engine: StorageEngine) => Promise<T>
): Promise<T> {
  const engine = await openEngine({ root: options.root, defaultDatabase: options.database });

  let result: T;
  try {
    result = await fn(engine);
  } catch (err) {
    await engine.close().catch((closeErr: unknown) => {
      logger.debug("cli.close.failed", { database: engine.currentDatabase, message: String(closeErr) });
    });
    throw err;
  }

  await engine.close();
  return result;
}

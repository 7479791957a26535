/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { CliError } from "./errors.js";

/** Root used when neither --root nor RECORDBOX_ROOT is given */
export const DEFAULT_ROOT = "./dbs";

/** Unset and empty variables both read as absent */
const optionalString = z.preprocess((value) => (value === "" ? undefined : value), z.string().optional());

export const cliEnvSchema = z.object({
  RECORDBOX_ROOT: optionalString,
  RECORDBOX_DB: optionalString,
  RECORDBOX_CLI_DEBUG: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.enum(["0", "1"], { errorMap: () => ({ message: "must be 0 or 1" }) }).optional()
  ),
});

export type CliEnv = z.infer<typeof cliEnvSchema>;

/**
 * Parse the variables the CLI reads
 * @throws CliError naming each invalid variable
 */
export function readCliEnv(env: Record<string, string | undefined>): CliEnv {
  const parsed = cliEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new CliError(`Invalid environment: ${problems.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" forms are left alone
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Resolve the database root directory
 * Priority: --root > RECORDBOX_ROOT > "./dbs"
 */
export function resolveRoot(cliRoot: string | undefined, env: CliEnv): string {
  const root = cliRoot ?? env.RECORDBOX_ROOT ?? DEFAULT_ROOT;
  return path.resolve(expandTilde(root));
}

/**
 * Check if timing metrics should be emitted
 */
export function isVerbose(env: CliEnv): boolean {
  return env.RECORDBOX_CLI_DEBUG === "1";
}

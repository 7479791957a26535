/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables, added to the current environment */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Execute the CLI's bin script with node, the way an installed command runs
 * @param binPath - Path to the bin script
 * @param args - Command arguments
 * @returns stdout, stderr and exit code; a non-zero exit does not reject
 */
export async function runCliProcess(
  binPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input, timeout = 15000 } = options;

  const result = await execa(process.execPath, [binPath, ...args], {
    cwd,
    env,
    input,
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}

/**
 * In-process stand-in for stdout/stderr that records what is written
 */
export interface OutputBuffer {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
  readonly out: string;
  readonly err: string;
  clear(): void;
}

export function createOutputBuffer(): OutputBuffer {
  let out = "";
  let err = "";
  return {
    stdout(chunk) {
      out += chunk;
    },
    stderr(chunk) {
      err += chunk;
    },
    get out() {
      return out;
    },
    get err() {
      return err;
    },
    clear() {
      out = "";
      err = "";
    },
  };
}

/**
 * Stdin stand-in that delivers `text`, or behaves as an interactive terminal when omitted
 */
export function createInput(text?: string): { isTTY: boolean; read(): Promise<string> } {
  return {
    isTTY: text === undefined,
    read: async () => text ?? "",
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}

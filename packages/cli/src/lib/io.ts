/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";

/**
 * Where command output goes. Chunks are written as given; callers add newlines.
 */
export interface CliOutput {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}

/**
 * Where piped input comes from
 */
export interface CliInput {
  isTTY: boolean;
  read(): Promise<string>;
}

/** Largest record accepted on stdin */
const MAX_STDIN_BYTES = 10 * 1024 * 1024;

/**
 * Read from stdin with a size limit
 * @throws Error if input exceeds the limit
 */
export async function readStdin(maxBytes = MAX_STDIN_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit while streaming
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Output bound to the process streams
 */
export const processOutput: CliOutput = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

/**
 * Input bound to the process stdin
 */
export const processInput: CliInput = {
  isTTY: process.stdin.isTTY ?? false,
  read: () => readStdin(),
};

/**
 * Read a record's JSON text from a file
 */
export async function readRecordFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Failed to read record file: ${filePath}`, { cause: err });
  }
}

/**
 * Collect record text from exactly one of: the argument, --file, or piped stdin
 */
export async function readRecordSource(
  json: string | undefined,
  file: string | undefined,
  input: CliInput
): Promise<string> {
  if (json !== undefined && file !== undefined) {
    throw new CliError("Cannot use both a JSON argument and --file; choose one");
  }

  if (json !== undefined) {
    return json;
  }

  if (file !== undefined) {
    return readRecordFile(file);
  }

  if (input.isTTY) {
    throw new CliError("No record provided. Pass JSON, use --file, or pipe JSON to stdin");
  }

  let text: string;
  try {
    text = await input.read();
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", { cause: err });
  }

  if (!text.trim()) {
    throw new CliError("stdin is empty");
  }
  return text;
}

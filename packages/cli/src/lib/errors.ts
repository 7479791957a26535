/**
 * CLI error handling and exit code mapping
 */

import { CommanderError, InvalidArgumentError } from "commander";

/** Longest error message printed before truncation */
const MAX_MESSAGE_LENGTH = 2000;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map an error to a process exit code
 * - 0: success (help and version output)
 * - 1: every reported error, engine or usage
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  // Engine errors (NotFound, InvalidInput, IOError, ...) and anything unexpected
  return 1;
}

/**
 * Whether commander has already printed this error itself.
 * An InvalidArgumentError thrown from an action reaches us unprinted.
 */
export function isReportedByCommander(error: unknown): boolean {
  return error instanceof CommanderError && !(error instanceof InvalidArgumentError);
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads (a rejected record echoes its input)
    if (message.length > MAX_MESSAGE_LENGTH) {
      message = message.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)";
    }

    if (verbose && error.cause) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}

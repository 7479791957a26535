import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { RecordNotFoundError } from "@recordbox/sdk";
import { CliError, formatCliError, isReportedByCommander, mapErrorToExitCode } from "../src/lib/errors.js";

describe("CliError", () => {
  it("should default to exit code 1", () => {
    const err = new CliError("boom");
    expect(err.name).toBe("CliError");
    expect(err.exitCode).toBe(1);
  });

  it("should keep a custom exit code and cause", () => {
    const cause = new Error("inner");
    const err = new CliError("boom", { exitCode: 3, cause });
    expect(err.exitCode).toBe(3);
    expect(err.cause).toBe(cause);
  });
});

describe("mapErrorToExitCode", () => {
  it("should use the exit code of CLI and commander errors", () => {
    expect(mapErrorToExitCode(new CliError("x", { exitCode: 3 }))).toBe(3);
    expect(mapErrorToExitCode(new CommanderError(0, "commander.version", "0.1.0"))).toBe(0);
    expect(mapErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
  });

  it("should map engine and unknown errors to 1", () => {
    expect(mapErrorToExitCode(new RecordNotFoundError("User", "bob"))).toBe(1);
    expect(mapErrorToExitCode(new Error("unexpected"))).toBe(1);
    expect(mapErrorToExitCode("string error")).toBe(1);
  });
});

describe("isReportedByCommander", () => {
  it("should be true for commander's own errors", () => {
    expect(isReportedByCommander(new CommanderError(1, "commander.unknownCommand", "unknown"))).toBe(true);
  });

  it("should be false for argument errors and everything else", () => {
    expect(isReportedByCommander(new InvalidArgumentError("bad"))).toBe(false);
    expect(isReportedByCommander(new CliError("x"))).toBe(false);
  });
});

describe("formatCliError", () => {
  it("should return the message", () => {
    expect(formatCliError(new RecordNotFoundError("User", "bob"))).toBe(
      "Record with key 'bob' does not exist in schema 'User'"
    );
    expect(formatCliError("plain")).toBe("plain");
  });

  it("should truncate long messages", () => {
    const message = formatCliError(new Error("x".repeat(2500)));
    expect(message).toBe("x".repeat(2000) + "... (truncated)");
  });

  it("should add the cause and stack when verbose", () => {
    const err = new CliError("outer", { cause: new Error("inner") });
    const message = formatCliError(err, true);
    expect(message).toMatch(/^outer\n {2}Cause: inner\n\w*Error: outer\n/);
  });

  it("should omit the cause when not verbose", () => {
    expect(formatCliError(new CliError("outer", { cause: new Error("inner") }))).toBe("outer");
  });
});

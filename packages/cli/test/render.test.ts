import { describe, it, expect } from "vitest";
import { createOutputBuffer } from "@recordbox/testkit";
import { colorize, formatJson, formatList, printJson, printLines } from "../src/lib/render.js";

describe("formatJson", () => {
  it("should pretty-print by default", () => {
    expect(formatJson({ a: 1, b: [true] })).toBe('{\n  "a": 1,\n  "b": [\n    true\n  ]\n}');
  });

  it("should print compact JSON when raw", () => {
    expect(formatJson({ a: 1, b: [true] }, { raw: true })).toBe('{"a":1,"b":[true]}');
  });
});

describe("printJson and printLines", () => {
  it("should end every write with a newline", () => {
    const output = createOutputBuffer();
    printJson(output, [1], { raw: true });
    printLines(output, ["a", "b"]);
    expect(output.out).toBe("[1]\na\nb\n");
    expect(output.err).toBe("");
  });
});

describe("formatList", () => {
  it("should indent items under the title", () => {
    expect(formatList("Defined schemas:", "No schemas defined", ["Order", "User"])).toEqual([
      "Defined schemas:",
      "  Order",
      "  User",
    ]);
  });

  it("should star marked items", () => {
    expect(formatList("Available databases:", "No databases found", ["a", "b"], (name) => name === "b")).toEqual([
      "Available databases:",
      "  a",
      "* b",
    ]);
  });

  it("should print the empty line for no items", () => {
    expect(formatList("Defined schemas:", "No schemas defined", [])).toEqual(["No schemas defined"]);
  });
});

describe("colorize", () => {
  it("should wrap text in ANSI codes when enabled", () => {
    expect(colorize("oops", "red", true)).toBe("\x1b[31moops\x1b[0m");
  });

  it("should leave text alone when disabled", () => {
    expect(colorize("oops", "red", false)).toBe("oops");
  });
});

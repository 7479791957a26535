/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  createInput,
  createOutputBuffer,
  createTempRoot,
  fixedClock,
  steppingClock,
  parseJsonOutput,
  removeDir,
  withTempEngine,
  type OutputBuffer,
} from "@recordbox/testkit";
import { runCli } from "../src/program.js";

describe("CLI", () => {
  let root: string;
  let output: OutputBuffer;
  let env: Record<string, string | undefined>;
  let stdin: string | undefined;

  beforeEach(async () => {
    root = await createTempRoot("recordbox-cli-");
    output = createOutputBuffer();
    env = { RECORDBOX_ROOT: root };
    stdin = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  /**
   * Run one command with fresh output
   */
  async function cli(...args: string[]): Promise<number> {
    output.clear();
    return runCli(args, { env, output, input: createInput(stdin), colors: false });
  }

  async function seedUsers(): Promise<void> {
    await cli("schema", "User", "name:string", "age:int");
    await cli("add", "User", '{"name":"Alice","age":30}');
    await cli("add", "User", '{"name":"Alicia","age":25}');
    await cli("add", "User", '{"name":"Bob","age":41}');
  }

  describe("schema", () => {
    it("should report when no schemas exist", async () => {
      expect(await cli("schema")).toBe(0);
      expect(output.out).toBe("No schemas defined\n");
    });

    it("should create, show and list schemas", async () => {
      expect(await cli("schema", "User", "name:string", "age:int")).toBe(0);
      expect(output.out).toBe("Schema 'User' created successfully\n");

      expect(await cli("schema", "User")).toBe(0);
      expect(output.out).toBe("Schema 'User': name:string age:int\n");

      await cli("schema", "Order", "total:float");
      expect(await cli("schema")).toBe(0);
      expect(output.out).toBe("Defined schemas:\n  Order\n  User\n");
    });

    it("should report a missing schema", async () => {
      expect(await cli("schema", "Ghost")).toBe(1);
      expect(output.out).toBe("Error: Schema 'Ghost' does not exist\n");
    });

    it("should stay quiet with --quiet", async () => {
      expect(await cli("--quiet", "schema", "T", "a:string")).toBe(0);
      expect(output.out).toBe("");
    });
  });

  describe("add", () => {
    beforeEach(async () => {
      await cli("schema", "User", "name:string", "age:int");
    });

    it("should report the derived key", async () => {
      expect(await cli("add", "User", '{"name":"Alice","age":30}')).toBe(0);
      expect(output.out).toBe("Record 'Alice' added to User\n");
    });

    it("should persist the record on disk", async () => {
      await cli("add", "User", '{"id":"u-1","name":"Alice"}');

      const content = await readFile(join(root, "default", "store.json"), "utf-8");
      expect(content).toContain('"u-1": {');
    });

    it("should print validation failures", async () => {
      expect(await cli("add", "User", '{"name":"Bob","age":"x"}')).toBe(1);
      expect(output.out).toBe("Error: Field 'age' type validation failed: expected int, got \"x\"\n");
    });

    it("should print JSON errors", async () => {
      expect(await cli("add", "User", "{bad")).toBe(1);
      expect(output.out).toMatch(/^Error: Invalid JSON format: .+\n$/);
    });

    it("should read the record from a file", async () => {
      const file = join(root, "carol.json");
      await writeFile(file, '{"name":"Carol","age":52}');

      expect(await cli("add", "User", "--file", file)).toBe(0);
      expect(output.out).toBe("Record 'Carol' added to User\n");
    });

    it("should refuse two record sources", async () => {
      expect(await cli("add", "User", '{"name":"A"}', "--file", join(root, "x.json"))).toBe(1);
      expect(output.out).toBe("Error: Cannot use both a JSON argument and --file; choose one\n");
    });

    it("should read piped stdin", async () => {
      stdin = '{"name":"Piped"}\n';
      expect(await cli("add", "User")).toBe(0);
      expect(output.out).toBe("Record 'Piped' added to User\n");
    });

    it("should ask for a record on an interactive terminal", async () => {
      expect(await cli("add", "User")).toBe(1);
      expect(output.out).toBe("Error: No record provided. Pass JSON, use --file, or pipe JSON to stdin\n");
    });

    it("should reject empty stdin", async () => {
      stdin = "  \n";
      expect(await cli("add", "User")).toBe(1);
      expect(output.out).toBe("Error: stdin is empty\n");
    });
  });

  describe("get", () => {
    beforeEach(seedUsers);

    it("should resolve a unique prefix", async () => {
      expect(await cli("get", "User", "Bo")).toBe(0);

      const record = parseJsonOutput(output.out);
      expect(record).toMatchObject({ name: "Bob", age: 41 });
      expect(record).toHaveProperty("created_at", expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
    });

    it("should print compact JSON with --raw", async () => {
      await cli("get", "User", "Alicia", "--raw");
      expect(output.out.trimEnd().split("\n")).toHaveLength(1);
      expect(parseJsonOutput(output.out)).toMatchObject({ name: "Alicia" });
    });

    it("should accept view as an alias", async () => {
      expect(await cli("view", "User", "Alice")).toBe(0);
      expect(parseJsonOutput(output.out)).toMatchObject({ name: "Alice", age: 30 });
    });

    it("should list candidates for an ambiguous prefix", async () => {
      expect(await cli("get", "User", "Ali")).toBe(1);
      expect(output.out).toBe("Error: Multiple records match partial key 'Ali' in schema 'User': Alice, Alicia\n");
    });

    it("should report a miss", async () => {
      expect(await cli("get", "User", "Zed")).toBe(1);
      expect(output.out).toBe("Error: Record with key 'Zed' does not exist in schema 'User'\n");
    });
  });

  describe("get with a fixed clock", () => {
    it("should print the stored record exactly", async () => {
      await withTempEngine(
        async (engine, engineRoot) => {
          await engine.createSchema("User", "name:string age:int");
          await engine.addRecord("User", '{"name":"Bob","age":41}');

          env = { RECORDBOX_ROOT: engineRoot };
          expect(await cli("get", "User", "Bob")).toBe(0);
        },
        { clock: fixedClock("2024-05-01T09:30:00.000Z") }
      );

      expect(output.out).toBe(
        [
          "{",
          '  "age": 41,',
          '  "created_at": "2024-05-01T09:30:00.000Z",',
          '  "name": "Bob",',
          '  "updated_at": "2024-05-01T09:30:00.000Z"',
          "}",
          "",
        ].join("\n")
      );
    });
  });

  describe("replacing with a stepping clock", () => {
    it("should keep created_at when a record is replaced", async () => {
      await withTempEngine(
        async (engine, engineRoot) => {
          await engine.createSchema("User", "name:string age:int");

          await engine.addRecord("User", '{"name":"Bob","age":41}');
          await engine.addRecord("User", '{"name":"Bob","age":42}');

          env = { RECORDBOX_ROOT: engineRoot };
          expect(await cli("get", "User", "Bob", "--raw")).toBe(0);
        },
        { clock: steppingClock("2024-05-01T09:30:00.000Z") }
      );

      expect(output.out).toBe(
        '{"age":42,"created_at":"2024-05-01T09:30:00.000Z","name":"Bob","updated_at":"2024-05-01T09:30:01.000Z"}\n'
      );
    });
  });

  describe("delete", () => {
    beforeEach(seedUsers);

    it("should delete by exact key", async () => {
      expect(await cli("delete", "User", "Alice")).toBe(0);
      expect(output.out).toBe("Record 'Alice' deleted from User\n");

      await cli("list", "User");
      expect(output.out.trimEnd().split("\n")).toHaveLength(2);
    });

    it("should not expand a prefix", async () => {
      expect(await cli("delete", "User", "Ali")).toBe(1);
      expect(output.out).toBe("Error: Record with key 'Ali' does not exist in schema 'User'\n");
    });
  });

  describe("list", () => {
    beforeEach(seedUsers);

    it("should print one compact record per line in key order", async () => {
      expect(await cli("list", "User")).toBe(0);

      const names = output.out
        .trimEnd()
        .split("\n")
        .map((line) => parseJsonOutput(line))
        .map((record) => (typeof record === "object" && record !== null && "name" in record ? record.name : null));
      expect(names).toEqual(["Alice", "Alicia", "Bob"]);
    });

    it("should print a JSON array with --json", async () => {
      await cli("list", "User", "--json");
      const records = parseJsonOutput(output.out);
      expect(Array.isArray(records) && records.length).toBe(3);
    });

    it("should honour --limit", async () => {
      await cli("list", "User", "--limit", "1");
      expect(output.out.trimEnd().split("\n")).toHaveLength(1);
    });

    it("should reject a bad --limit", async () => {
      expect(await cli("list", "User", "--limit", "many")).toBe(1);
      expect(output.out).toContain("--limit must be a non-negative integer");
    });

    it("should print nothing for an empty schema", async () => {
      await cli("schema", "Empty", "a:string");
      expect(await cli("list", "Empty")).toBe(0);
      expect(output.out).toBe("");
    });
  });

  describe("databases", () => {
    it("should switch databases and remember the choice", async () => {
      await cli("schema", "User", "name:string");

      expect(await cli("use", "inventory")).toBe(0);
      expect(output.out).toBe("Switched to database 'inventory'\n");
      expect(await readFile(join(root, ".current"), "utf-8")).toBe("inventory\n");

      await cli("schema");
      expect(output.out).toBe("No schemas defined\n");

      await cli("dbs");
      expect(output.out).toBe("Available databases:\n  default\n* inventory\n");
    });

    it("should let --db override the stored choice", async () => {
      await cli("schema", "User", "name:string");
      await cli("use", "inventory");

      await cli("--db", "default", "schema");
      expect(output.out).toBe("Defined schemas:\n  User\n");
    });

    it("should let RECORDBOX_DB override the stored choice", async () => {
      await cli("schema", "User", "name:string");
      await cli("use", "inventory");

      env = { ...env, RECORDBOX_DB: "default" };
      await cli("schema");
      expect(output.out).toBe("Defined schemas:\n  User\n");
    });

    it("should list the current database even before it is saved", async () => {
      expect(await cli("dbs")).toBe(0);
      expect(output.out).toBe("Available databases:\n* default\n");
    });

    it("should reject an unsafe database name", async () => {
      expect(await cli("use", "../escape")).toBe(1);
      expect(output.out).toBe(
        'Error: database name contains invalid characters: "../escape". ' +
          "Only alphanumeric, underscore, dash, and dot are allowed.\n"
      );
    });

    it("should take the root from --root", async () => {
      const other = join(root, "elsewhere");
      await cli("--root", other, "schema", "T", "a:string");

      expect(await readFile(join(other, "default", "store.json"), "utf-8")).toContain('"__schemas__"');
    });
  });

  describe("wipe", () => {
    it("should empty the current database", async () => {
      await seedUsers();

      expect(await cli("wipe")).toBe(0);
      expect(output.out).toBe("Database 'default' wiped successfully\n");

      await cli("schema");
      expect(output.out).toBe("No schemas defined\n");
    });

    it("should accept drop as an alias", async () => {
      await cli("use", "scratch");
      expect(await cli("drop")).toBe(0);
      expect(output.out).toBe("Database 'scratch' wiped successfully\n");
    });
  });

  describe("errors and diagnostics", () => {
    it("should print the version", async () => {
      expect(await cli("--version")).toBe(0);
      expect(output.out).toBe("0.1.0\n");
    });

    it("should report a missing argument", async () => {
      expect(await cli("add")).toBe(1);
      expect(output.out).toContain("missing required argument 'schema'");
    });

    it("should report an unknown command", async () => {
      expect(await cli("frobnicate")).toBe(1);
      expect(output.out).toContain("unknown command 'frobnicate'");
    });

    it("should reject an invalid environment", async () => {
      env = { ...env, RECORDBOX_CLI_DEBUG: "yes" };
      expect(await cli("schema")).toBe(1);
      expect(output.out).toBe("Error: Invalid environment: RECORDBOX_CLI_DEBUG must be 0 or 1\n");
    });

    it("should emit timing metrics when RECORDBOX_CLI_DEBUG=1", async () => {
      env = { ...env, RECORDBOX_CLI_DEBUG: "1" };
      await cli("schema");
      expect(output.err).toMatch(/^metric cli\.schema duration_ms=\d+ success=true\n$/);
    });

    it("should add the cause with --verbose", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const file = join(root, "default", "store.json");
      await mkdir(join(root, "default"));
      await writeFile(file, "{truncated");

      expect(await cli("--verbose", "schema", "T", "a:string")).toBe(1);
      expect(
        output.out.startsWith(`Error: Failed to write snapshot: ${file}\n  Cause: Failed to read snapshot: ${file}\n`)
      ).toBe(true);
    });

    it("should keep working next to an unreadable database", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const file = join(root, "broken", "store.json");
      await mkdir(join(root, "broken"));
      await writeFile(file, "{truncated");

      expect(await cli("use", "broken")).toBe(0);
      expect(await cli("schema")).toBe(0);
      expect(output.out).toBe("No schemas defined\n");

      expect(await cli("use", "default")).toBe(0);
      expect(await readFile(file, "utf-8")).toBe("{truncated");
    });
  });
});

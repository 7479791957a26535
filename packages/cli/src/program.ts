/**
 * recordbox command-line program
 *
 * Each invocation opens the engine on the selected database, runs one
 * command and closes it again. Results go to stdout; errors are printed as
 * `Error: <message>` on stdout with exit code 1.
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import type { StorageEngine } from "@recordbox/sdk";
import { withEngine } from "./lib/engine.js";
import { readCliEnv, resolveRoot, isVerbose, type CliEnv } from "./lib/env.js";
import { resolveDatabase, writeCurrentDatabase } from "./lib/session.js";
import { joinDefinition, parseNonNegativeInt } from "./lib/arg.js";
import { processInput, processOutput, readRecordSource, type CliInput, type CliOutput } from "./lib/io.js";
import { colorize, formatList, printJson, printLines } from "./lib/render.js";
import { formatCliError, isReportedByCommander, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming, type MetricSink } from "./lib/telemetry.js";

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

/**
 * Everything a run needs from its surroundings
 */
export interface CliContext {
  env: Record<string, string | undefined>;
  output: CliOutput;
  input: CliInput;
  /** Color error output */
  colors: boolean;
}

type GlobalOptions = {
  root?: string;
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Context bound to the current process
 */
export function processContext(): CliContext {
  return {
    env: process.env,
    output: processOutput,
    input: processInput,
    colors: process.stdout.isTTY ?? false,
  };
}

/**
 * Build the commander program for one run
 */
export function createProgram(context: CliContext, cliEnv: CliEnv): Command {
  const { output } = context;
  const program = new Command();

  const metricSink: MetricSink = {
    enabled: isVerbose(cliEnv),
    write: (line) => output.stderr(line),
  };

  /**
   * Resolve root and database from flags, environment and the stored selection
   */
  async function target(): Promise<{ root: string; database: string; quiet: boolean }> {
    const opts = program.opts<GlobalOptions>();
    const root = resolveRoot(opts.root, cliEnv);
    const database = await resolveDatabase(root, opts.db, cliEnv);
    return { root, database, quiet: Boolean(opts.quiet) };
  }

  /**
   * Run a command body against an open engine, timed
   */
  async function run(
    label: string,
    fn: (engine: StorageEngine, quiet: boolean) => Promise<void>
  ): Promise<void> {
    await withTiming(metricSink, label, async () => {
      const { root, database, quiet } = await target();
      await withEngine({ root, database }, (engine) => fn(engine, quiet));
    });
  }

  function say(quiet: boolean, line: string): void {
    if (!quiet) {
      output.stdout(line + "\n");
    }
  }

  // Settings are inherited by every subcommand defined below
  program
    .configureOutput({
      writeOut: (str) => output.stdout(str),
      writeErr: (str) => output.stderr(str),
      // Usage errors are reported on stdout like every other error
      outputError: (str) => output.stdout(colorize(str, "red", context.colors)),
    })
    .exitOverride();

  // Global options
  program
    .name("recordbox")
    .description("Schema-validated record store with partial-key lookup")
    .version(packageJson.version)
    .option("--root <path>", "Database root directory")
    .option("--db <name>", "Database to use for this command")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  // Schema command
  program
    .command("schema [name] [fields...]")
    .description("List schemas, show one, or create/replace it from name:type fields")
    .action(async (name: string | undefined, fields: string[]) => {
      await run("cli.schema", async (engine, quiet) => {
        if (name === undefined) {
          const names = await engine.listSchemas();
          printLines(output, formatList("Defined schemas:", "No schemas defined", names));
          return;
        }

        if (fields.length === 0) {
          const definition = await engine.getSchema(name);
          output.stdout(`Schema '${name}': ${definition}\n`);
          return;
        }

        await engine.createSchema(name, joinDefinition(fields));
        say(quiet, `Schema '${name}' created successfully`);
      });
    });

  // Add command
  program
    .command("add <schema> [json]")
    .description("Add a record, replacing any record with the same key")
    .option("--file <path>", "Read the record from a JSON file")
    .action(async (schema: string, json: string | undefined, options: { file?: string }) => {
      await run("cli.add", async (engine, quiet) => {
        const text = await readRecordSource(json, options.file, context.input);
        const { key } = await engine.addRecord(schema, text);
        say(quiet, `Record '${key}' added to ${schema}`);
      });
    });

  // Get command
  program
    .command("get <schema> <key>")
    .alias("view")
    .description("Show a record by key or unique key prefix")
    .option("--raw", "Output compact JSON")
    .action(async (schema: string, key: string, options: { raw?: boolean }) => {
      await run("cli.get", async (engine) => {
        const record = await engine.getRecord(schema, key);
        printJson(output, record.value, { raw: options.raw });
      });
    });

  // Delete command
  program
    .command("delete <schema> <key>")
    .description("Delete a record by exact key")
    .action(async (schema: string, key: string) => {
      await run("cli.delete", async (engine, quiet) => {
        await engine.deleteRecord(schema, key);
        say(quiet, `Record '${key}' deleted from ${schema}`);
      });
    });

  // List command
  program
    .command("list <schema>")
    .description("List the records of a schema, sorted by key")
    .option("--json", "Output as one JSON array")
    .option("--limit <n>", "Maximum number of records", (val: string) => parseNonNegativeInt(val, "--limit"))
    .action(async (schema: string, options: { json?: boolean; limit?: number }) => {
      await run("cli.list", async (engine) => {
        let records = await engine.listRecords(schema);

        if (options.limit !== undefined) {
          records = records.slice(0, options.limit);
        }

        const values = records.map((record) => record.value);
        if (options.json) {
          printJson(output, values);
        } else {
          printLines(output, values.map((value) => JSON.stringify(value)));
        }
      });
    });

  // Use command
  program
    .command("use <db>")
    .description("Switch to another database for this and later commands")
    .action(async (db: string) => {
      await run("cli.use", async (engine, quiet) => {
        await engine.useDatabase(db);
        await writeCurrentDatabase(engine.options.root, db);
        say(quiet, `Switched to database '${db}'`);
      });
    });

  // Databases command
  program
    .command("dbs")
    .description("List databases; the current one is marked with *")
    .action(async () => {
      await run("cli.dbs", async (engine) => {
        const names = await engine.listDatabases();
        const current = engine.currentDatabase;
        printLines(
          output,
          formatList("Available databases:", "No databases found", names, (name) => name === current)
        );
      });
    });

  // Wipe command
  program
    .command("wipe")
    .alias("drop")
    .description("Delete every schema and record in the current database")
    .action(async () => {
      await run("cli.wipe", async (engine, quiet) => {
        await engine.wipeDatabase();
        say(quiet, `Database '${engine.currentDatabase}' wiped successfully`);
      });
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix)
 * @returns Process exit code
 */
export async function runCli(args: string[], context: CliContext = processContext()): Promise<number> {
  let program: Command | undefined;

  try {
    program = createProgram(context, readCliEnv(context.env));
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    if (!isReportedByCommander(err)) {
      const verbose = Boolean(program?.opts<GlobalOptions>().verbose);
      context.output.stdout(`Error: ${formatCliError(err, verbose)}\n`);
    }
    return mapErrorToExitCode(err);
  }
}

/**
 * recordbox CLI entry point, loaded by bin/recordbox.js
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2));

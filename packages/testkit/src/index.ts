export { createTempRoot, removeDir, withTempEngine, withTempDir } from "./fs.js";
export { fixedClock, steppingClock } from "./timers.js";
export { runCliProcess, createOutputBuffer, createInput, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions, OutputBuffer } from "./cli.js";

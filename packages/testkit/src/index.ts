export { createTempRoot, removeDir, withTempDatabases } from "./fs.js";
export type { TempDatabases } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { makeHost, makePassive, openPort } from "./records.js";

/**
 * CLI testing utilities
 */

import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import { execa } from "execa";

const resolveFromHere = createRequire(import.meta.url).resolve;

/**
 * Loader that lets node run the CLI from its TypeScript sources
 */
const TSX_LOADER = pathToFileURL(resolveFromHere("tsx")).href;

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  stdout: string;
  stderr: string;
  /** Exit code (undefined if the process was killed by a signal) */
  exitCode: number | undefined;
  /** Terminating signal when the process didn't exit normally */
  signal: string | undefined;
}

export interface CliExecOptions {
  cwd?: string;
  /** Added to the current environment */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
}

/**
 * Run the CLI entry point in a child node process. Failures are returned,
 * not thrown.
 * @param cliPath - Path to the CLI's TypeScript entry point
 */
export async function runCli(cliPath: string, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, input } = options;
  const result = await execa(process.execPath, ["--import", TSX_LOADER, cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    reject: false,
  });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    signal: result.signal,
  };
}

/**
 * Parse JSON output from the CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}

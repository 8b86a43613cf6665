/**
 * Settings the CLI reads from its environment
 */

import * as path from "node:path";

export const ROOT_VAR = "SCANVAULT_ROOT";
export const DEBUG_VAR = "SCANVAULT_CLI_DEBUG";

const DEFAULT_ROOT = "./data";

/**
 * Data directory: --root, then SCANVAULT_ROOT, then ./data, made absolute
 */
export function resolveRoot(cliRoot?: string): string {
  return path.resolve(cliRoot ?? process.env[ROOT_VAR] ?? DEFAULT_ROOT);
}

/**
 * Command metrics go to stderr while SCANVAULT_CLI_DEBUG=1
 */
export function isVerbose(): boolean {
  return process.env[DEBUG_VAR] === "1";
}

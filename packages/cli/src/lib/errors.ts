/**
 * CLI error handling and exit code mapping
 */

import { ScanVaultError } from "@scanvault/sdk";

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

const STORAGE_CODES: ReadonlySet<string> = new Set(["READ_ERROR", "WRITE_ERROR"]);

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage, argument, validation or unknown error
 * - 2: no record found
 * - 3: data directory unreadable or unwritable
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof ScanVaultError && STORAGE_CODES.has(error.code)) {
    return 3;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}

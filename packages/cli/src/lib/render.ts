/**
 * Output rendering helpers
 */

import { stableStringify } from "@scanvault/sdk";

type Color = "red" | "yellow";

/**
 * Print JSON to stdout with sorted keys. Dates print as ISO text and binary
 * values as base64.
 */
export function printJson(data: unknown): void {
  process.stdout.write(stableStringify(data));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

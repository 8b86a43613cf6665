/**
 * Command metrics, written to stderr when SCANVAULT_CLI_DEBUG=1
 */

import { performance } from "node:perf_hooks";
import { ScanVaultError } from "@scanvault/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit one "metric <key> field=value ..." line
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    if (v !== undefined) {
      parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
    }
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Run a command body and emit its duration, outcome and SDK error code
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;
  let code: string | undefined;

  try {
    const result = await fn();
    success = true;
    return result;
  } catch (err) {
    code = err instanceof ScanVaultError ? err.code : undefined;
    throw err;
  } finally {
    emitMetric(label, {
      duration_ms: (performance.now() - start).toFixed(2),
      success,
      code,
    });
  }
}

/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { Sort, SortDirection } from "@scanvault/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse a port number (0-65535)
 */
export function parsePort(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!(parsed >= 0 && parsed <= 65535)) {
    throw new InvalidArgumentError(`${name} must be a port number between 0 and 65535`);
  }
  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a comma-separated list, dropping empty items
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Parse "field[:asc|:desc],..." into sort keys
 */
export function parseSort(value: string): Sort {
  return parseList(value).map((item): [string, SortDirection] => {
    const [field = "", direction = "asc"] = item.split(":");
    if (field === "" || (direction !== "asc" && direction !== "desc")) {
      throw new InvalidArgumentError(`Invalid sort key "${item}" (expected field, field:asc or field:desc)`);
    }
    return [field, direction === "asc" ? 1 : -1];
  });
}

/**
 * Parse an address range given as "start-stop"
 */
export function parseRange(value: string): [start: string, stop: string] {
  const parts = value.split("-").map((part) => part.trim());
  const [start, stop] = parts;
  if (parts.length !== 2 || !start || !stop) {
    throw new InvalidArgumentError(`Invalid range "${value}" (expected start-stop)`);
  }
  return [start, stop];
}

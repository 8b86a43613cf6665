/**
 * Deterministic JSON formatting utilities
 */

const BIGINT_TAG = "$bigint";

/**
 * Normalize a value into plain JSON data with sorted object keys.
 * bigint becomes a tagged object, Date its ISO text, binary its base64 text.
 */
function normalize(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === "bigint") {
    return { [BIGINT_TAG]: value.toString() };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("base64");
  }
  if (value && typeof value === "object") {
    // Detect cycles
    if (seen.has(value)) {
      throw new TypeError("Circular reference detected in object");
    }
    seen.add(value);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(value)) {
        return value.map((item: unknown) => normalize(item, seen));
      }

      // Objects: sort keys and normalize values
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (v !== undefined) {
          out[k] = normalize(v, seen);
        }
      }
      return out;
    } finally {
      seen.delete(value);
    }
  }
  return value;
}

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param indent - Spaces of indentation; 0 gives compact output without a trailing newline
 */
export function stableStringify(value: unknown, indent = 2): string {
  const text = JSON.stringify(normalize(value, new WeakSet()), null, indent || undefined);
  return indent ? `${text}\n` : text;
}

/**
 * Canonical identity of a value: two values get the same key exactly when
 * they are structurally equal
 */
export function canonicalKey(value: unknown): string {
  return value === undefined ? "undefined" : stableStringify(value, 0);
}

function isBigIntTag(value: unknown): value is { [BIGINT_TAG]: string } {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return (
    keys.length === 1 &&
    keys[0] === BIGINT_TAG &&
    typeof Reflect.get(value, BIGINT_TAG) === "string"
  );
}

/**
 * Serialize collection contents, tagging bigint values as {"$bigint": "<decimal>"}
 */
export function serializeRecords(records: unknown, indent = 2): string {
  const text = JSON.stringify(
    records,
    (_key, value: unknown) => (typeof value === "bigint" ? { [BIGINT_TAG]: value.toString() } : value),
    indent || undefined
  );
  return `${text}\n`;
}

/**
 * Parse collection contents written by `serializeRecords`
 */
export function parseRecords(text: string): unknown {
  return JSON.parse(text, (_key, value: unknown) =>
    isBigIntTag(value) ? BigInt(value[BIGINT_TAG]) : value
  );
}

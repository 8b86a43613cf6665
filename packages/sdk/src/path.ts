/**
 * Dotted-path resolution over nested records
 *
 * Invariants:
 * - Every segment whose full path is a registry list field is traversed
 *   element by element
 * - A missing intermediate or terminal field contributes nothing; it is
 *   never an error
 * - Generators are single pass
 */

import { joinPath, type FieldRegistry } from "./schema/fields.js";

/**
 * Narrow a value to a plain record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function hasField(value: Record<string, unknown>, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, field);
}

/**
 * Get a nested value using dot-path notation, without array traversal
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  return path.split(".").reduce<unknown>((o, k) => (isRecord(o) ? o[k] : undefined), obj);
}

/**
 * Resolve a path to the raw values found at its end. List fields crossed on
 * the way are expanded; a list at the terminal segment is yielded whole.
 *
 * @param base - Full path of `record` inside its top-level document
 */
export function* resolvePath(
  record: unknown,
  path: string,
  registry: FieldRegistry,
  base = ""
): Generator<unknown> {
  yield* descend(record, path.split("."), 0, base, registry);
}

function* descend(
  value: unknown,
  segments: readonly string[],
  index: number,
  base: string,
  registry: FieldRegistry
): Generator<unknown> {
  const segment = segments[index];
  if (segment === undefined) {
    yield value;
    return;
  }
  if (!isRecord(value) || !hasField(value, segment)) {
    return;
  }
  const next = value[segment];
  const full = joinPath(base, segment);
  if (index < segments.length - 1 && registry.isList(full) && Array.isArray(next)) {
    for (const element of next) {
      yield* descend(element, segments, index + 1, full, registry);
    }
    return;
  }
  yield* descend(next, segments, index + 1, full, registry);
}

/**
 * Lazily yield every value found at `path`, expanding all list levels
 * including the terminal one
 */
export function* fieldValues(
  record: unknown,
  path: string,
  registry: FieldRegistry,
  base = ""
): Generator<unknown> {
  const terminalIsList = registry.isList(joinPath(base, path));
  for (const value of resolvePath(record, path, registry, base)) {
    if (terminalIsList && Array.isArray(value)) {
      yield* value;
    } else {
      yield value;
    }
  }
}

export interface WeightOptions {
  /** Path of the count field, relative to the record */
  countField?: string;
  /** Fixed weight, overriding any count field */
  weight?: number;
}

function weightOf(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return 1;
}

/**
 * Like `fieldValues`, pairing each value with a weight. The count field is
 * resolved on the element being iterated when it lives under that list,
 * otherwise on the enclosing record; it defaults to 1.
 */
export function* weightedFieldValues(
  record: unknown,
  path: string,
  registry: FieldRegistry,
  options: WeightOptions = {}
): Generator<[value: unknown, weight: number]> {
  yield* descendWeighted(record, path.split("."), 0, "", registry, options.countField, options.weight);
}

function* descendWeighted(
  record: unknown,
  segments: readonly string[],
  index: number,
  base: string,
  registry: FieldRegistry,
  countField: string | undefined,
  weight: number | undefined
): Generator<[unknown, number]> {
  const segment = segments[index];
  if (segment === undefined || !isRecord(record) || !hasField(record, segment)) {
    return;
  }
  const value = record[segment];
  const full = joinPath(base, segment);

  if (index === segments.length - 1) {
    const resolved =
      weight ?? (countField === undefined ? 1 : weightOf(getPath(record, countField)));
    if (registry.isList(full) && Array.isArray(value)) {
      for (const element of value) {
        yield [element, resolved];
      }
    } else {
      yield [value, resolved];
    }
    return;
  }

  let nextField = countField;
  let nextWeight = weight;
  if (countField !== undefined) {
    if (countField.startsWith(`${segment}.`)) {
      nextField = countField.slice(segment.length + 1);
    } else {
      nextWeight = weight ?? weightOf(getPath(record, countField));
      nextField = undefined;
    }
  }

  if (registry.isList(full) && Array.isArray(value)) {
    for (const element of value) {
      yield* descendWeighted(element, segments, index + 1, full, registry, nextField, nextWeight);
    }
    return;
  }
  yield* descendWeighted(value, segments, index + 1, full, registry, nextField, nextWeight);
}

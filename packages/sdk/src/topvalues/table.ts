/**
 * Pseudo-field registration table for `topvalues()`
 *
 * Each entry matches a field name and builds a plan: the pre-filter to
 * conjoin with the caller's, the paths to fetch, and how to pull countable
 * values out of every fetched record. Names no entry matches are plain
 * dotted paths.
 */

import type { Document, Filter } from "../types.js";
import type { FieldRegistry } from "../schema/fields.js";
import { exists } from "../filter.js";
import { isRecord, weightedFieldValues } from "../path.js";
import { InvalidPseudoFieldError } from "../errors.js";

/**
 * A value with the weight it adds to its count
 */
export type Counted = readonly [value: unknown, weight: number];

export type Extractor = (rec: Document) => Iterable<Counted>;

export interface FieldPlan {
  filter: Filter;
  /** Paths fetched for extraction */
  fields: readonly string[];
  extract: Extractor;
  /** Post-processing of each emitted value */
  output?: (value: unknown) => unknown;
}

export interface TableContext {
  registry: FieldRegistry;
  /** Per-record count field; every value weighs 1 when absent */
  countField?: string;
}

export interface PseudoField {
  /** Must match the whole field name */
  pattern: RegExp;
  build(match: RegExpExecArray, context: TableContext): FieldPlan;
}

/**
 * Extractor that gives every value a weight of 1
 */
export function once(values: (rec: Document) => Iterable<unknown>): Extractor {
  return function* (rec) {
    for (const value of values(rec)) {
      yield [value, 1];
    }
  };
}

/**
 * Plan counting the raw values at a dotted path
 */
export function directField(path: string, context: TableContext, filter: Filter = exists(path)): FieldPlan {
  const { registry, countField } = context;
  return {
    filter,
    fields: [path],
    extract: (rec) => weightedFieldValues(rec, path, registry, { countField }),
  };
}

/**
 * Records found in the array at `field` of `rec`
 */
export function recordsAt(rec: unknown, field: string): Record<string, unknown>[] {
  if (!isRecord(rec)) return [];
  const value = rec[field];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Record found at `field` of `rec`, or an empty one
 */
export function recordAt(rec: unknown, field: string): Record<string, unknown> {
  if (!isRecord(rec)) return {};
  const value = rec[field];
  return isRecord(value) ? value : {};
}

/**
 * Value of `field`, with undefined turned into null so tuples keep their shape
 */
export function valueAt(rec: Record<string, unknown>, field: string): unknown {
  return rec[field] ?? null;
}

/**
 * Parse a non-negative integer argument of a pseudo-field
 * @throws {InvalidPseudoFieldError} If the text is not an integer
 */
export function intArgument(field: string, text: string | undefined): number {
  if (text === undefined || !/^-?\d+$/.test(text)) {
    throw new InvalidPseudoFieldError(field, `"${text ?? ""}" is not an integer`);
  }
  return Number(text);
}

export class PseudoFieldTable {
  readonly #entries: readonly PseudoField[];

  constructor(entries: readonly PseudoField[]) {
    this.#entries = entries;
  }

  /**
   * Plan for a field name: the first matching entry, or direct path
   * resolution with an `exists` pre-filter
   */
  resolve(field: string, context: TableContext): FieldPlan {
    for (const entry of this.#entries) {
      const match = entry.pattern.exec(field);
      if (match) {
        return entry.build(match, context);
      }
    }
    return directField(field, context);
  }
}

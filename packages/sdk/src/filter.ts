/**
 * Filter algebra: builders for the serializable filter tree
 *
 * Invariants:
 * - `and()` is the always-true filter and `or()` the always-false one
 * - `not(not(p))` returns `p`
 * - Builders never mutate their arguments
 */

import type { CompareOperator, Filter } from "./types.js";
import { InvalidOperatorError } from "./errors.js";

const TRUE: Filter = { kind: "true" };
const FALSE: Filter = { kind: "false" };
const OPERATORS: readonly string[] = ["<", "<=", ">", ">="];

/**
 * Constant filter matching every record
 */
export function matchAll(): Filter {
  return TRUE;
}

/**
 * Constant filter matching no record
 */
export function matchNone(): Filter {
  return FALSE;
}

export function eq(path: string, value: unknown): Filter {
  return { kind: "eq", path, value };
}

/**
 * Inequality; false when the field is missing
 */
export function ne(path: string, value: unknown): Filter {
  return { kind: "ne", path, value };
}

function isOperator(op: string): op is CompareOperator {
  return OPERATORS.includes(op);
}

/**
 * Ordered comparison
 * @throws {InvalidOperatorError} If `op` is not one of <, <=, >, >=
 */
export function cmp(path: string, op: string, value: number | bigint | string): Filter {
  if (!isOperator(op)) {
    throw new InvalidOperatorError(op, path);
  }
  return { kind: "cmp", path, op, value };
}

export function oneOf(path: string, values: readonly unknown[]): Filter {
  return { kind: "in", path, values: [...values] };
}

/**
 * Regular-expression search on text values. Global and sticky flags are
 * dropped: a leaf tests, it never iterates.
 */
export function regex(path: string, pattern: RegExp | string, flags = ""): Filter {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const allFlags = typeof pattern === "string" ? flags : pattern.flags + flags;
  const kept = [...new Set(allFlags.replace(/[gy]/g, ""))].sort().join("");
  return { kind: "regex", path, pattern: source, flags: kept };
}

export function exists(path: string): Filter {
  return { kind: "exists", path };
}

/**
 * Membership in an array field: true if the array holds any of `values`
 */
export function contains(path: string, values: readonly unknown[]): Filter {
  return { kind: "contains", path, values: [...values] };
}

/**
 * True if some element of the array at `path` satisfies `filter`, whose
 * paths are relative to the element
 */
export function any(path: string, filter: Filter): Filter {
  return { kind: "any", path, filter };
}

/**
 * True if the array at `path` exists and every element satisfies `filter`
 */
export function all(path: string, filter: Filter): Filter {
  return { kind: "all", path, filter };
}

/**
 * Conjunction. Nested conjunctions are flattened and always-true operands
 * dropped.
 */
export function and(...filters: readonly Filter[]): Filter {
  const operands: Filter[] = [];
  for (const filter of filters) {
    if (filter.kind === "false") return FALSE;
    if (filter.kind === "true") continue;
    if (filter.kind === "and") operands.push(...filter.filters);
    else operands.push(filter);
  }
  if (operands.length === 0) return TRUE;
  if (operands.length === 1 && operands[0]) return operands[0];
  return { kind: "and", filters: operands };
}

/**
 * Disjunction. Nested disjunctions are flattened and always-false operands
 * dropped.
 */
export function or(...filters: readonly Filter[]): Filter {
  const operands: Filter[] = [];
  for (const filter of filters) {
    if (filter.kind === "true") return TRUE;
    if (filter.kind === "false") continue;
    if (filter.kind === "or") operands.push(...filter.filters);
    else operands.push(filter);
  }
  if (operands.length === 0) return FALSE;
  if (operands.length === 1 && operands[0]) return operands[0];
  return { kind: "or", filters: operands };
}

export function not(filter: Filter): Filter {
  if (filter.kind === "not") return filter.filter;
  if (filter.kind === "true") return FALSE;
  if (filter.kind === "false") return TRUE;
  return { kind: "not", filter };
}

/**
 * Negate `filter` when `neg` is set
 */
export function negateIf(filter: Filter, neg: boolean): Filter {
  return neg ? not(filter) : filter;
}

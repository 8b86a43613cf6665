/**
 * Filter evaluation, projection, sorting and pagination
 */

import type { Document, Filter, FilterLeaf, Sort } from "./types.js";
import { joinPath, type FieldRegistry } from "./schema/fields.js";
import { getPath, isRecord, resolvePath } from "./path.js";
import { canonicalKey } from "./format.js";

/**
 * Structural equality over stored values
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }
  return canonicalKey(a) === canonicalKey(b);
}

const patternCache = new Map<string, RegExp>();

function compilePattern(pattern: string, flags: string): RegExp {
  const key = `${flags}/${pattern}`;
  let compiled = patternCache.get(key);
  if (!compiled) {
    compiled = new RegExp(pattern, flags);
    patternCache.set(key, compiled);
  }
  return compiled;
}

function compareOrdered(actual: unknown, op: string, rhs: number | bigint | string): boolean {
  const numeric =
    (typeof actual === "number" || typeof actual === "bigint") &&
    (typeof rhs === "number" || typeof rhs === "bigint");
  const textual = typeof actual === "string" && typeof rhs === "string";
  if (!numeric && !textual) {
    return false;
  }
  const cmp = compareValues(actual, rhs);
  switch (op) {
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    case ">":
      return cmp > 0;
    default:
      return cmp >= 0;
  }
}

/**
 * Test one candidate value against a leaf. Arrays match if the whole array
 * does or any element does.
 */
function matchValue(actual: unknown, leaf: FilterLeaf): boolean {
  if (leaf.kind === "exists") return true;
  if (Array.isArray(actual) && leaf.kind !== "contains") {
    if (leaf.kind === "eq" && valuesEqual(actual, leaf.value)) return true;
    if (leaf.kind === "ne") {
      return !valuesEqual(actual, leaf.value) && actual.some((item) => !valuesEqual(item, leaf.value));
    }
    return actual.some((item) => matchValue(item, leaf));
  }

  switch (leaf.kind) {
    case "eq":
      return valuesEqual(actual, leaf.value);
    case "ne":
      return !valuesEqual(actual, leaf.value);
    case "cmp":
      return compareOrdered(actual, leaf.op, leaf.value);
    case "in":
      return leaf.values.some((value) => valuesEqual(actual, value));
    case "regex":
      return typeof actual === "string" && actual.search(compilePattern(leaf.pattern, leaf.flags)) !== -1;
    case "contains": {
      const items: readonly unknown[] = Array.isArray(actual) ? actual : [actual];
      return items.some((item) => leaf.values.some((value) => valuesEqual(item, value)));
    }
  }
}

function elementsAt(
  doc: unknown,
  path: string,
  registry: FieldRegistry,
  base: string
): unknown[] | undefined {
  let found = false;
  const elements: unknown[] = [];
  for (const value of resolvePath(doc, path, registry, base)) {
    found = true;
    if (Array.isArray(value)) {
      elements.push(...value);
    } else {
      elements.push(value);
    }
  }
  return found ? elements : undefined;
}

/**
 * Test if a record matches a filter
 * @param base - Full path of `doc` in its top-level record (set under quantifiers)
 */
export function matches(doc: unknown, filter: Filter, registry: FieldRegistry, base = ""): boolean {
  switch (filter.kind) {
    case "true":
      return true;
    case "false":
      return false;
    case "and":
      return filter.filters.every((f) => matches(doc, f, registry, base));
    case "or":
      return filter.filters.some((f) => matches(doc, f, registry, base));
    case "not":
      return !matches(doc, filter.filter, registry, base);
    case "any": {
      const full = joinPath(base, filter.path);
      const elements = elementsAt(doc, filter.path, registry, base) ?? [];
      return elements.some((element) => matches(element, filter.filter, registry, full));
    }
    case "all": {
      const full = joinPath(base, filter.path);
      const elements = elementsAt(doc, filter.path, registry, base);
      return (
        elements !== undefined &&
        elements.every((element) => matches(element, filter.filter, registry, full))
      );
    }
    default:
      for (const value of resolvePath(doc, filter.path, registry, base)) {
        if (matchValue(value, filter)) {
          return true;
        }
      }
      return false;
  }
}

type ProjectionTree = Map<string, ProjectionTree | true>;

function buildProjectionTree(paths: readonly string[]): ProjectionTree {
  const root: ProjectionTree = new Map();
  for (const path of paths) {
    const segments = path.split(".");
    const last = segments.pop();
    if (last === undefined || last === "") continue;
    let node: ProjectionTree | true = root;
    for (const segment of segments) {
      const current: ProjectionTree | true | undefined = node.get(segment);
      if (current === true) {
        // Already requested as a whole subtree
        node = true;
        break;
      }
      const child: ProjectionTree = current ?? new Map();
      node.set(segment, child);
      node = child;
    }
    if (node !== true) {
      node.set(last, true);
    }
  }
  return root;
}

function projectTree(
  rec: Record<string, unknown>,
  tree: ProjectionTree,
  registry: FieldRegistry,
  base: string
): Document {
  const result: Document = {};
  for (const [field, wanted] of tree) {
    if (!Object.prototype.hasOwnProperty.call(rec, field)) continue;
    const value = rec[field];
    if (wanted === true) {
      result[field] = value;
      continue;
    }
    const full = joinPath(base, field);
    if (registry.isList(full) && Array.isArray(value)) {
      result[field] = value
        .filter(isRecord)
        .map((element) => projectTree(element, wanted, registry, full));
    } else if (isRecord(value)) {
      result[field] = projectTree(value, wanted, registry, full);
    }
  }
  return result;
}

/**
 * Keep only the requested dotted paths of a record. The `_id` is always
 * kept; absent fields are omitted, never defaulted.
 */
export function project(doc: Document, paths: readonly string[] | undefined, registry: FieldRegistry): Document {
  if (paths === undefined) {
    return doc;
  }
  const result: Document = projectTree(doc, buildProjectionTree(paths), registry, "");
  if (doc._id !== undefined) {
    result._id = doc._id;
  }
  return result;
}

const TYPE_PRECEDENCE: Record<string, number> = {
  undefined: 0,
  boolean: 1,
  number: 2,
  bigint: 2,
  string: 3,
  object: 4,
};

/**
 * Compare two values for sorting
 * Handles mixed types by type precedence: null < boolean < number < string < object
 * @returns negative, zero or positive
 */
export function compareValues(a: unknown, b: unknown): number {
  // Handle undefined/null
  if (a == null && b == null) return 0;
  if (a == null) return -1;
  if (b == null) return 1;

  if ((typeof a === "number" || typeof a === "bigint") && (typeof b === "number" || typeof b === "bigint")) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  return (TYPE_PRECEDENCE[typeof a] ?? 5) - (TYPE_PRECEDENCE[typeof b] ?? 5);
}

/**
 * Lexicographic comparison of tuples; a shorter prefix ranks first
 */
export function compareTuples(a: readonly unknown[], b: readonly unknown[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const cmp = compareValues(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

/**
 * Compare two records key by key. A missing or null value ranks before
 * anything in ascending order and after anything in descending order.
 */
export function compareRecords(a: Document, b: Document, sort: Sort): number {
  for (const [field, direction] of sort) {
    const cmp = compareValues(getPath(a, field), getPath(b, field));
    if (cmp !== 0) {
      return direction === 1 ? cmp : -cmp;
    }
  }
  return 0;
}

/**
 * Sort documents according to sort specification (stable, mutates array)
 */
export function sortDocuments<T extends Document>(docs: T[], sort?: Sort): void {
  if (!sort || sort.length === 0) {
    return;
  }
  docs.sort((a, b) => compareRecords(a, b, sort));
}

/**
 * Apply pagination to documents
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return (default: unlimited)
 */
export function paginate<T>(docs: T[], skip = 0, limit?: number): T[] {
  const end = limit !== undefined ? skip + limit : undefined;
  return docs.slice(skip, end);
}

/**
 * Evaluate a complete query against an array of documents
 * Pure orchestrator that composes filter → sort → paginate → project
 */
export function evaluateQuery(
  docs: Document[],
  spec: {
    filter: Filter;
    registry: FieldRegistry;
    sort?: Sort;
    skip?: number;
    limit?: number;
    fields?: readonly string[];
  }
): Document[] {
  // 1. Filter
  const filtered = docs.filter((d) => matches(d, spec.filter, spec.registry));

  // 2. Sort (if specified)
  sortDocuments(filtered, spec.sort);

  // 3. Paginate
  const sliced = paginate(filtered, spec.skip ?? 0, spec.limit);

  // 4. Project (last to minimize work and keep sorting stable)
  return spec.fields ? sliced.map((d) => project(d, spec.fields, spec.registry)) : sliced;
}

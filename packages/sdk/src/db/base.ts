/**
 * Shared engine of the host and passive databases
 *
 * Records are stored in their internal form (bigint addresses, epoch-second
 * timestamps) and handed to callers in their external form. Collection
 * handles open lazily and are dropped by `invalidateCache()`.
 */

import type {
  DistinctOptions,
  Document,
  Filter,
  GetOptions,
  RecordId,
  TopValue,
  TopValuesOptions,
} from "../types.js";
import type { Collection } from "../storage/collection.js";
import type { FieldRegistry } from "../schema/fields.js";
import { MemoryCollection } from "../storage/memory.js";
import { FileCollection } from "../storage/file.js";
import { RecordValidator } from "../schema/records.js";
import { resolveOptions, type DatabaseOptions, type ResolvedOptions } from "../config.js";
import { and, exists, matchAll } from "../filter.js";
import { compareTuples, paginate, project, sortDocuments } from "../query.js";
import { fieldValues } from "../path.js";
import { canonicalKey } from "../format.js";
import { AddressDecodeError } from "../errors.js";
import { internalToIp, ipToInternal } from "../codec.js";
import { logger } from "../observability/logs.js";
import type { PseudoFieldTable, TableContext } from "../topvalues/table.js";
import { topCounts } from "../topvalues/counter.js";

/**
 * Internal form of an address, or the value itself when it does not parse
 */
export function addrToInternal(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  try {
    return ipToInternal(value);
  } catch (err) {
    if (err instanceof AddressDecodeError) {
      return value;
    }
    throw err;
  }
}

/**
 * Text form of an internal address; other values are returned as they are
 */
export function addrToText(value: unknown): unknown {
  return typeof value === "bigint" ? internalToIp(value) : value;
}

export interface PortListOptions {
  /** Return the tuples in discovery order instead of sorted */
  yieldAll?: boolean;
  useService?: boolean;
  useProduct?: boolean;
  useVersion?: boolean;
}

/**
 * Tuple of the features of a port, as far as requested
 */
function portFeatures(port: Record<string, unknown>, options: PortListOptions): unknown[] {
  const tuple: unknown[] = [port["port"] ?? null];
  if (options.useService) {
    tuple.push(port["service_name"] ?? null);
    if (options.useProduct) {
      tuple.push(port["service_product"] ?? null);
      if (options.useVersion) {
        tuple.push(port["service_version"] ?? null);
      }
    }
  }
  return tuple;
}

/**
 * Distinct feature tuples, sorted with missing values first unless
 * `yieldAll` is set
 */
export function collectFeatures(rows: Iterable<Record<string, unknown>>, options: PortListOptions): unknown[][] {
  const seen = new Map<string, unknown[]>();
  for (const row of rows) {
    const tuple = portFeatures(row, options);
    const key = canonicalKey(tuple);
    if (!seen.has(key)) seen.set(key, tuple);
  }
  const result = [...seen.values()];
  return options.yieldAll ? result : result.sort(compareTuples);
}

function startTimer(): number {
  return process.env.SCANVAULT_DEBUG ? performance.now() : 0;
}

export abstract class RecordDb {
  protected readonly options: ResolvedOptions;
  protected readonly validator: RecordValidator;
  protected abstract readonly registry: FieldRegistry;
  protected abstract readonly pseudoFields: PseudoFieldTable;
  /** Name of the collection holding the records */
  protected abstract readonly primary: string;
  #collections = new Map<string, Collection>();

  constructor(options: DatabaseOptions = {}) {
    this.options = resolveOptions(options);
    this.validator = new RecordValidator(this.options.validation);
  }

  /**
   * Convert a stored record to the form handed to callers
   */
  protected abstract toExternal(doc: Document): Document;

  /**
   * Collection handle, opened on first access
   */
  protected collection(name: string = this.primary): Collection {
    let collection = this.#collections.get(name);
    if (!collection) {
      collection =
        this.options.storage === "file" && this.options.root !== undefined
          ? new FileCollection(this.options.root, name, this.registry, { indent: this.options.indent })
          : new MemoryCollection(name, this.registry);
      this.#collections.set(name, collection);
    }
    return collection;
  }

  /**
   * Close every open handle; the next access reopens a fresh one
   */
  async invalidateCache(): Promise<void> {
    const open = [...this.#collections.values()];
    this.#collections.clear();
    await Promise.all(open.map((collection) => collection.close()));
  }

  /**
   * Matching records in internal form, sorted, paginated and projected
   */
  protected async fetch(filter: Filter, options: GetOptions = {}): Promise<Document[]> {
    const start = startTimer();
    const docs = await this.collection().search(filter);
    sortDocuments(docs, options.sort);
    const page = paginate(docs, options.skip ?? 0, options.limit);
    const result = options.fields ? page.map((doc) => project(doc, options.fields, this.registry)) : page;
    if (process.env.SCANVAULT_DEBUG) {
      logger.debug("query.executed", {
        collection: this.primary,
        details: { results: result.length, durationMs: Number((performance.now() - start).toFixed(2)) },
      });
    }
    return result;
  }

  /**
   * Records matching `filter`, in external form
   */
  async get(filter: Filter = matchAll(), options: GetOptions = {}): Promise<Document[]> {
    const docs = await this.fetch(filter, options);
    return docs.map((doc) => this.toExternal(doc));
  }

  /**
   * First record matching `filter`, or undefined
   */
  async getOne(filter: Filter = matchAll(), options: GetOptions = {}): Promise<Document | undefined> {
    const [first] = await this.get(filter, { ...options, limit: 1 });
    return first;
  }

  async count(filter: Filter = matchAll()): Promise<number> {
    return this.collection().count(filter);
  }

  /**
   * Distinct values found at `field` over the matching records, in
   * first-seen order
   */
  async distinct(field: string, options: DistinctOptions = {}): Promise<unknown[]> {
    const { filter = matchAll(), ...query } = options;
    const docs = await this.get(and(filter, exists(field)), { ...query, fields: [field] });
    const seen = new Map<string, unknown>();
    for (const doc of docs) {
      for (const value of fieldValues(doc, field, this.registry)) {
        const key = canonicalKey(value);
        if (!seen.has(key)) {
          seen.set(key, value);
        }
      }
    }
    return [...seen.values()];
  }

  /**
   * Most frequent values of a field or pseudo-field
   * @throws {InvalidPseudoFieldError} If a pseudo-field argument is unusable
   */
  async topvalues(field: string, options: TopValuesOptions = {}): Promise<TopValue[]> {
    return this.aggregate(field, options, { registry: this.registry });
  }

  protected async aggregate(
    field: string,
    options: TopValuesOptions,
    context: TableContext
  ): Promise<TopValue[]> {
    const { filter = matchAll(), topnbr = 10, ...query } = options;
    const plan = this.pseudoFields.resolve(field, context);
    logger.debug("topvalues.resolved", {
      collection: this.primary,
      details: { field, fields: plan.fields, weighted: context.countField !== undefined },
    });
    const fields =
      context.countField === undefined ? plan.fields : [...plan.fields, context.countField];
    const docs = await this.get(and(filter, plan.filter), { ...query, fields });
    function* items() {
      for (const doc of docs) {
        yield* plan.extract(doc);
      }
    }
    return topCounts(items(), topnbr, plan.output);
  }

  /**
   * Remove every record of every collection
   */
  async init(): Promise<void> {
    await this.collection().purge();
  }

  /**
   * Remove records by id, or those matching a filter
   * @returns Number of removed records
   */
  async remove(target: RecordId | Filter): Promise<number> {
    if (typeof target === "string" || typeof target === "number") {
      return this.collection().remove([target]);
    }
    return this.collection().remove(target);
  }
}

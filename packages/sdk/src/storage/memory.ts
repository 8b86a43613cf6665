/**
 * In-memory collection
 */

import type { Document, Filter, RecordId } from "../types.js";
import type { Collection, Transform } from "./collection.js";
import type { FieldRegistry } from "../schema/fields.js";
import { matches } from "../query.js";
import { InvalidArgumentError } from "../errors.js";

function build(doc: Document | (() => Document)): Document {
  return typeof doc === "function" ? doc() : doc;
}

function isIdList(target: Filter | readonly RecordId[]): target is readonly RecordId[] {
  return Array.isArray(target);
}

/**
 * Collection kept in process memory. Subclasses add persistence through
 * the `load()` and `persist()` hooks.
 */
export class MemoryCollection implements Collection {
  readonly name: string;
  protected readonly registry: FieldRegistry;
  #docs: Document[] = [];
  #nextId = 1;
  #ready: Promise<void> | undefined;
  #closed = false;
  #tail: Promise<unknown> = Promise.resolve();

  constructor(name: string, registry: FieldRegistry) {
    this.name = name;
    this.registry = registry;
  }

  /**
   * Initial contents of the collection
   */
  protected async load(): Promise<Document[]> {
    return [];
  }

  /**
   * Called after every write with the complete contents
   */
  protected async persist(_docs: readonly Document[]): Promise<void> {}

  async #open(): Promise<void> {
    if (this.#closed) {
      throw new InvalidArgumentError(`Collection "${this.name}" is closed`);
    }
    this.#ready ??= this.load().then((docs) => {
      this.#docs = docs;
      this.#nextId =
        docs.reduce((max, doc) => (typeof doc._id === "number" && doc._id > max ? doc._id : max), 0) + 1;
    });
    await this.#ready;
  }

  /**
   * Run an operation after every previously queued one
   */
  #serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.#tail.then(operation, operation);
    this.#tail = run.catch(() => undefined);
    return run;
  }

  #read<T>(reader: (docs: readonly Document[]) => T): Promise<T> {
    return this.#serialize(async () => {
      await this.#open();
      return reader(this.#docs);
    });
  }

  /**
   * Run a writer and persist the result. The writer registers an undo step
   * for each change it makes; they run in reverse when persisting fails.
   */
  #write<T>(writer: (docs: Document[], undo: (step: () => void) => void) => T): Promise<T> {
    return this.#serialize(async () => {
      await this.#open();
      const steps: (() => void)[] = [];
      const previousNextId = this.#nextId;
      try {
        const result = writer(this.#docs, (step) => steps.push(step));
        await this.persist(this.#docs);
        return result;
      } catch (err) {
        // Keep memory consistent with what was last persisted
        for (const step of steps.reverse()) {
          step();
        }
        this.#nextId = previousNextId;
        throw err;
      }
    });
  }

  #assignId(doc: Document, docs: readonly Document[]): RecordId {
    const id = doc._id ?? this.#nextId;
    if (docs.some((existing) => existing._id === id)) {
      throw new InvalidArgumentError(`Duplicate id ${JSON.stringify(String(id))} in "${this.name}"`);
    }
    if (typeof id === "number" && id >= this.#nextId) {
      this.#nextId = id + 1;
    }
    return id;
  }

  search(filter: Filter): Promise<Document[]> {
    return this.#read((docs) =>
      docs.filter((doc) => matches(doc, filter, this.registry)).map((doc) => structuredClone(doc))
    );
  }

  get(filter: Filter): Promise<Document | undefined> {
    return this.#read((docs) => {
      const found = docs.find((doc) => matches(doc, filter, this.registry));
      return found === undefined ? undefined : structuredClone(found);
    });
  }

  count(filter: Filter): Promise<number> {
    return this.#read((docs) => docs.filter((doc) => matches(doc, filter, this.registry)).length);
  }

  insert(doc: Document): Promise<RecordId> {
    return this.#write((docs, undo) => {
      const id = this.#assignId(doc, docs);
      docs.push({ ...structuredClone(doc), _id: id });
      undo(() => docs.pop());
      return id;
    });
  }

  remove(target: Filter | readonly RecordId[]): Promise<number> {
    return this.#write((docs, undo) => {
      const doomed = isIdList(target)
        ? (doc: Document) => doc._id !== undefined && target.includes(doc._id)
        : (doc: Document) => matches(doc, target, this.registry);
      const previous = docs.slice();
      const kept = docs.filter((doc) => !doomed(doc));
      docs.splice(0, docs.length, ...kept);
      undo(() => docs.splice(0, docs.length, ...previous));
      return previous.length - kept.length;
    });
  }

  update(transform: Transform, ids: readonly RecordId[]): Promise<number> {
    return this.#write((docs, undo) => {
      let updated = 0;
      for (const doc of docs) {
        if (doc._id !== undefined && ids.includes(doc._id)) {
          this.#modify(doc, transform, undo);
          updated++;
        }
      }
      return updated;
    });
  }

  upsert(doc: Document | (() => Document), filter: Filter, fold?: Transform): Promise<RecordId[]> {
    return this.#write((docs, undo) => {
      const ids: RecordId[] = [];
      for (const existing of docs) {
        if (existing._id !== undefined && matches(existing, filter, this.registry)) {
          this.#modify(existing, fold ?? ((target) => Object.assign(target, structuredClone(build(doc)))), undo);
          ids.push(existing._id);
        }
      }
      if (ids.length === 0) {
        const created = build(doc);
        const id = this.#assignId(created, docs);
        docs.push({ ...structuredClone(created), _id: id });
        undo(() => docs.pop());
        ids.push(id);
      }
      return ids;
    });
  }

  /**
   * Transform one stored record in place, keeping its id
   */
  #modify(doc: Document, transform: Transform, undo: (step: () => void) => void): void {
    const saved = structuredClone(doc);
    undo(() => {
      for (const key of Object.keys(doc)) {
        delete doc[key];
      }
      Object.assign(doc, saved);
    });
    const id = doc._id;
    transform(doc);
    doc._id = id;
  }

  purge(): Promise<void> {
    return this.#write((docs, undo) => {
      const previous = docs.splice(0, docs.length);
      undo(() => docs.push(...previous));
      this.#nextId = 1;
    });
  }

  async close(): Promise<void> {
    await this.#serialize(async () => {
      this.#closed = true;
      this.#docs = [];
      this.#ready = undefined;
    });
  }
}

/**
 * Storage collaborator contract
 *
 * A collection holds the internal form of one record family. It evaluates
 * filters itself, applies each write atomically with respect to its own
 * state, and hands out copies: mutating a returned record never changes
 * the stored one.
 */

import type { Document, Filter, RecordId } from "../types.js";

/**
 * In-place modification applied by `update()`
 */
export type Transform = (doc: Document) => void;

export interface Collection {
  /** Collection name (also the file stem for file-backed collections) */
  readonly name: string;

  /**
   * All records matching the filter, in insertion order
   */
  search(filter: Filter): Promise<Document[]>;

  /**
   * First record matching the filter
   */
  get(filter: Filter): Promise<Document | undefined>;

  count(filter: Filter): Promise<number>;

  /**
   * Insert a record. A record without `_id` gets the next integer id.
   * @returns The record's id
   * @throws {InvalidArgumentError} If the id is already taken
   */
  insert(doc: Document): Promise<RecordId>;

  /**
   * Remove matching records, or records by id
   * @returns Number of removed records
   */
  remove(target: Filter | readonly RecordId[]): Promise<number>;

  /**
   * Apply a transform to the records with the given ids
   * @returns Number of updated records
   */
  update(transform: Transform, ids: readonly RecordId[]): Promise<number>;

  /**
   * Replace the fields of every record matching the filter with those of
   * `doc`, or insert `doc` when none matches. With `fold`, matching records
   * are transformed by it instead. Finding and changing the records is one
   * write: no other operation runs in between.
   *
   * @param doc - The record, or a function building it, called only when it is needed
   * @returns Ids of the updated or inserted records
   */
  upsert(doc: Document | (() => Document), filter: Filter, fold?: Transform): Promise<RecordId[]>;

  /**
   * Remove every record
   */
  purge(): Promise<void>;

  /**
   * Release the handle; a closed collection must not be used again
   */
  close(): Promise<void>;
}

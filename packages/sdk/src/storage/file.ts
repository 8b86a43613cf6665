/**
 * File-backed collection: one JSON array per collection, `<root>/<name>.json`
 *
 * Invariants:
 * - Every write rewrites the whole file atomically (write → fsync → rename)
 * - bigint values are stored as {"$bigint": "<decimal>"}
 * - A missing file is an empty collection
 */

import * as path from "node:path";
import type { Document } from "../types.js";
import type { FieldRegistry } from "../schema/fields.js";
import { MemoryCollection } from "./memory.js";
import { atomicWrite, readOptionalFile } from "../io.js";
import { parseRecords, serializeRecords } from "../format.js";
import { isRecord } from "../path.js";
import { CollectionReadError } from "../errors.js";
import { logger } from "../observability/logs.js";

export interface FileCollectionOptions {
  /** Spaces of indentation in the written file (default: 2) */
  indent?: number;
}

export class FileCollection extends MemoryCollection {
  readonly filePath: string;
  readonly #indent: number;

  constructor(root: string, name: string, registry: FieldRegistry, options: FileCollectionOptions = {}) {
    super(name, registry);
    this.filePath = path.join(root, `${name}.json`);
    this.#indent = options.indent ?? 2;
  }

  protected override async load(): Promise<Document[]> {
    const text = await readOptionalFile(this.filePath);
    if (text === undefined || text.trim() === "") {
      logger.debug("collection.opened", { collection: this.name, details: { records: 0 } });
      return [];
    }

    let parsed: unknown;
    try {
      parsed = parseRecords(text);
    } catch (err) {
      throw new CollectionReadError(this.filePath, { cause: err });
    }
    if (!Array.isArray(parsed) || !parsed.every(isRecord)) {
      throw new CollectionReadError(this.filePath, {
        cause: new TypeError("Collection file must hold a JSON array of objects"),
      });
    }
    logger.debug("collection.opened", { collection: this.name, details: { records: parsed.length } });
    return parsed;
  }

  protected override async persist(docs: readonly Document[]): Promise<void> {
    await atomicWrite(this.filePath, serializeRecords(docs, this.#indent));
  }

  override async close(): Promise<void> {
    await super.close();
    logger.debug("collection.closed", { collection: this.name });
  }
}

/**
 * Passive database: deduplicated network observations
 *
 * Repeated sightings of one observation fold into a single record that
 * carries a `count` and the first and last times it was seen.
 */

import type {
  Document,
  Filter,
  InfoResolver,
  PassiveRecord,
  PassiveTopValuesOptions,
  RecordId,
  TimestampInput,
  TopValue,
} from "../types.js";
import type { Transform } from "../storage/collection.js";
import { PASSIVE_FIELDS } from "../schema/fields.js";
import { and, eq, exists, matchAll } from "../filter.js";
import { fromBinary, fromTimestamp, toBinary, toTimestamp } from "../codec.js";
import { isRecord } from "../path.js";
import { logger } from "../observability/logs.js";
import type { DatabaseOptions } from "../config.js";
import { PASSIVE_TOPVALUES } from "../topvalues/passive-fields.js";
import { addrToInternal, addrToText, collectFeatures, RecordDb, type PortListOptions } from "./base.js";

const TIME_FIELDS = ["firstseen", "lastseen"] as const;

/**
 * Fields left out of the identity of an observation
 */
const NON_KEY_FIELDS = ["infos", "count", "firstseen", "lastseen", "_id"] as const;

/**
 * Fold one more sighting into an existing record
 */
function foldSighting(count: number, firstseen: number, lastseen: number): Transform {
  return (doc) => {
    const current = doc["count"];
    doc["count"] = (typeof current === "number" ? current : 0) + count;
    const first = doc["firstseen"];
    doc["firstseen"] = typeof first === "number" ? Math.min(first, firstseen) : firstseen;
    const last = doc["lastseen"];
    doc["lastseen"] = typeof last === "number" ? Math.max(last, lastseen) : lastseen;
  };
}

export class PassiveDb extends RecordDb {
  protected readonly registry = PASSIVE_FIELDS;
  protected readonly pseudoFields = PASSIVE_TOPVALUES;
  protected readonly primary = "passive";

  /**
   * Internal form of a passive record; the `_id` is dropped
   */
  static toInternal(record: PassiveRecord): Document {
    const doc: Document = structuredClone(record);
    delete doc._id;
    if ("addr" in doc) {
      doc["addr"] = addrToInternal(doc["addr"]);
    }
    for (const field of TIME_FIELDS) {
      const value = doc[field];
      if (typeof value === "number" || typeof value === "string" || value instanceof Date) {
        doc[field] = toTimestamp(value);
      }
    }
    const value = doc["value"];
    if (value instanceof Uint8Array) {
      doc["value"] = toBinary(value);
    }
    return doc;
  }

  protected toExternal(doc: Document): Document {
    const rec: Document = structuredClone(doc);
    if ("addr" in rec) {
      rec["addr"] = addrToText(rec["addr"]);
    }
    for (const field of TIME_FIELDS) {
      const value = rec[field];
      if (typeof value === "number") {
        rec[field] = fromTimestamp(value);
      }
    }
    const value = rec["value"];
    if (rec["recontype"] === "SSL_SERVER" && rec["source"] === "cert" && typeof value === "string") {
      rec["value"] = fromBinary(value);
    }
    return rec;
  }

  /**
   * Insert a record as is, after merging the fields `getInfos` derives
   * from it
   * @returns The new record's id
   */
  async insert(record: PassiveRecord, getInfos?: InfoResolver): Promise<RecordId> {
    const merged: PassiveRecord = { ...record, ...getInfos?.(record) };
    this.validator.assertValid("passive", merged);
    const id = await this.collection().insert(PassiveDb.toInternal(merged));
    logger.debug("passive.inserted", { collection: this.primary, id });
    return id;
  }

  /**
   * Record one sighting of an observation at `timestamp`
   *
   * A record with the same identity (every field but infos, count,
   * firstseen, lastseen and _id) gets its count raised and its time bounds
   * widened; otherwise a new record is created with the record's infos, or
   * with those `getInfos` derives when given.
   *
   * @param lastseen - End of the sighting, when it spans a period
   * @returns The id of the updated or created record; undefined for a null record
   */
  async insertOrUpdate(
    timestamp: TimestampInput,
    record: PassiveRecord | null,
    getInfos?: InfoResolver,
    lastseen?: TimestampInput
  ): Promise<RecordId | undefined> {
    if (record === null) {
      return undefined;
    }
    this.validator.assertValid("passive", record);
    const identity = PassiveDb.toInternal(record);
    const given = identity["count"];
    const count = typeof given === "number" ? given : 1;
    for (const field of NON_KEY_FIELDS) {
      delete identity[field];
    }
    const key = and(...Object.entries(identity).map(([field, value]) => eq(field, value)));
    const firstseen = toTimestamp(timestamp);
    const last = lastseen === undefined ? firstseen : toTimestamp(lastseen);

    let merged = false;
    const fold = foldSighting(count, firstseen, last);
    const [id] = await this.collection().upsert(
      () => {
        const doc: Document = { ...identity, count, firstseen, lastseen: last };
        const infos = getInfos ? { ...record, ...getInfos(record) }["infos"] : record.infos;
        if (infos !== undefined) {
          doc["infos"] = structuredClone(infos);
        }
        return doc;
      },
      key,
      (doc) => {
        merged = true;
        fold(doc);
      }
    );
    if (merged) {
      logger.debug("passive.merged", { collection: this.primary, id, details: { count } });
    } else {
      logger.debug("passive.inserted", { collection: this.primary, id });
    }
    return id;
  }

  /**
   * Most frequent values of a field; with `distinct: false` each record
   * weighs its own `count`
   */
  override async topvalues(field: string, options: PassiveTopValuesOptions = {}): Promise<TopValue[]> {
    const { distinct = true, ...rest } = options;
    return this.aggregate(field, rest, {
      registry: this.registry,
      countField: distinct ? undefined : "count",
    });
  }

  /**
   * Distinct (port, service, product, version) tuples of the matching records
   */
  async featuresPortList(filter: Filter = matchAll(), options: PortListOptions = {}): Promise<unknown[][]> {
    const fields = ["port"];
    if (options.useService) {
      fields.push("infos.service_name");
      if (options.useProduct) {
        fields.push("infos.service_product");
        if (options.useVersion) fields.push("infos.service_version");
      }
    }
    const docs = await this.get(and(filter, exists("port")), { fields });
    const rows = docs.map((doc) => {
      const infos = isRecord(doc["infos"]) ? doc["infos"] : {};
      return {
        port: doc["port"],
        service_name: infos["service_name"],
        service_product: infos["service_product"],
        service_version: infos["service_version"],
      };
    });
    return collectFeatures(rows, options);
  }
}

/**
 * Open a passive database
 * @throws {ConfigError} If the options are invalid
 */
export function openPassiveDb(options: DatabaseOptions = {}): PassiveDb {
  return new PassiveDb(options);
}

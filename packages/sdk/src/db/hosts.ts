/**
 * Host database: active scan results and the scan documents they came from
 */

import { randomUUID } from "node:crypto";
import type { Document, Filter, HostRecord, QueryOptions, RecordId, ScanDocument, TopValue } from "../types.js";
import { HOST_FIELDS } from "../schema/fields.js";
import { and, eq, exists, matchAll, oneOf } from "../filter.js";
import { canonicalKey } from "../format.js";
import { fromTimestamp, toTimestamp } from "../codec.js";
import { isRecord } from "../path.js";
import { DuplicateScanError } from "../errors.js";
import { logger } from "../observability/logs.js";
import type { DatabaseOptions } from "../config.js";
import { HOST_TOPVALUES } from "../topvalues/host-fields.js";
import { recordAt, recordsAt } from "../topvalues/table.js";
import { addrToInternal, addrToText, collectFeatures, RecordDb, type PortListOptions } from "./base.js";

const SCANS = "scans";
const TIME_FIELDS = ["starttime", "endtime"] as const;

export interface PagedResult<T> {
  records: T[];
  count: number;
}

export interface IpPorts {
  addr: unknown;
  ports: { state_state: unknown; port: unknown }[];
}

export interface OpenPortCount {
  addr: unknown;
  starttime: unknown;
  openports: { count: unknown };
}

/**
 * Apply `convert` to `field` of every element of the array at `list`
 */
function convertEach(doc: Document, list: string, field: string, convert: (value: unknown) => unknown): void {
  for (const element of recordsAt(doc, list)) {
    if (field in element) {
      element[field] = convert(element[field]);
    }
  }
}

function convertHops(doc: Document, convert: (value: unknown) => unknown): void {
  for (const trace of recordsAt(doc, "traces")) {
    convertEach(trace, "hops", "ipaddr", convert);
  }
}

function scanIds(doc: Document): string[] {
  const value = doc["scanid"];
  if (typeof value === "string") return [value];
  return Array.isArray(value) ? value.filter((id): id is string => typeof id === "string") : [];
}

export class HostDb extends RecordDb {
  protected readonly registry = HOST_FIELDS;
  protected readonly pseudoFields = HOST_TOPVALUES;
  protected readonly primary = "hosts";

  /**
   * Internal form of a host record
   */
  static toInternal(host: HostRecord): Document {
    const doc: Document = structuredClone(host);
    if (typeof doc["scanid"] === "string") {
      doc["scanid"] = [doc["scanid"]];
    }
    if ("addr" in doc) {
      doc["addr"] = addrToInternal(doc["addr"]);
    }
    convertEach(doc, "ports", "state_reason_ip", addrToInternal);
    convertHops(doc, addrToInternal);
    for (const field of TIME_FIELDS) {
      const value = doc[field];
      if (typeof value === "number" || typeof value === "string" || value instanceof Date) {
        doc[field] = toTimestamp(value);
      }
    }
    return doc;
  }

  protected toExternal(doc: Document): Document {
    const rec: Document = structuredClone(doc);
    if ("addr" in rec) {
      rec["addr"] = addrToText(rec["addr"]);
    }
    convertEach(rec, "ports", "state_reason_ip", addrToText);
    convertHops(rec, addrToText);
    for (const field of TIME_FIELDS) {
      const value = rec[field];
      if (typeof value === "number") {
        rec[field] = fromTimestamp(value);
      }
    }
    return rec;
  }

  /**
   * Store a new host record
   * @returns The host's id (a fresh UUID unless the record carries one)
   * @throws {RecordValidationError} If the record fails validation
   */
  async storeHost(host: HostRecord): Promise<string> {
    this.validator.assertValid("host", host);
    const doc = HostDb.toInternal(host);
    const id = typeof doc._id === "string" ? doc._id : randomUUID();
    doc._id = id;
    await this.collection().insert(doc);
    logger.debug("host.stored", { collection: this.primary, id });
    return id;
  }

  /**
   * Hand the host to the configured merger, storing it as new when there is
   * none or when it did not merge
   */
  async storeOrMergeHost(host: HostRecord): Promise<void> {
    const { merger } = this.options;
    if (merger && (await merger(host))) {
      logger.debug("host.merged", { collection: this.primary, details: { addr: host.addr } });
      return;
    }
    await this.storeHost(host);
  }

  /**
   * @throws {DuplicateScanError} If a scan document with that id exists
   */
  async storeScanDoc(scan: ScanDocument): Promise<string> {
    this.validator.assertValid("scan", scan);
    const scans = this.collection(SCANS);
    if ((await scans.count(eq("_id", scan._id))) > 0) {
      throw new DuplicateScanError(scan._id);
    }
    await scans.insert(structuredClone(scan));
    logger.debug("scan.stored", { collection: SCANS, id: scan._id });
    return scan._id;
  }

  async getScan(scanId: string): Promise<Document | undefined> {
    return this.collection(SCANS).get(eq("_id", scanId));
  }

  async isScanPresent(scanId: string): Promise<boolean> {
    return (await this.collection(SCANS).count(eq("_id", scanId))) > 0;
  }

  /**
   * Remove hosts, then the scan documents no remaining host refers to
   */
  override async remove(target: RecordId | Filter): Promise<number> {
    const filter = typeof target === "object" ? target : eq("_id", target);
    const hosts = this.collection();
    const removed = await hosts.search(filter);
    if (removed.length === 0) {
      return 0;
    }
    const count = await super.remove(filter);
    const candidates = [...new Set(removed.flatMap(scanIds))];
    const orphans: string[] = [];
    for (const scanId of candidates) {
      if ((await hosts.count(eq("scanid", scanId))) === 0) {
        orphans.push(scanId);
      }
    }
    if (orphans.length > 0) {
      await this.collection(SCANS).remove(oneOf("_id", orphans));
      logger.debug("scan.removed", { collection: SCANS, details: { scans: orphans } });
    }
    return count;
  }

  /**
   * Remove every host and scan document
   */
  override async init(): Promise<void> {
    await super.init();
    await this.collection(SCANS).purge();
  }

  /**
   * Distinct port feature tuples of the matching hosts; the host-level
   * pseudo-port is left out
   */
  async featuresPortList(filter: Filter = matchAll(), options: PortListOptions = {}): Promise<unknown[][]> {
    const fields = ["ports.port"];
    if (options.useService) {
      fields.push("ports.service_name");
      if (options.useProduct) {
        fields.push("ports.service_product");
        if (options.useVersion) fields.push("ports.service_version");
      }
    }
    const docs = await this.get(and(filter, exists("ports.port")), { fields });
    const rows = docs.flatMap((doc) => recordsAt(doc, "ports")).filter((port) => port["port"] !== -1);
    return collectFeatures(rows, options);
  }

  /**
   * Coordinates of the matching hosts with the number of hosts at each
   */
  async getLocations(filter: Filter = matchAll()): Promise<TopValue[]> {
    const docs = await this.get(filter, { fields: ["infos.coordinates"] });
    const counts = new Map<string, TopValue>();
    for (const doc of docs) {
      const coords = recordAt(doc, "infos")["coordinates"];
      if (!Array.isArray(coords) || coords.length === 0) continue;
      const key = canonicalKey(coords);
      const entry = counts.get(key);
      if (entry) entry.count += 1;
      else counts.set(key, { value: coords, count: 1 });
    }
    return [...counts.values()];
  }

  /**
   * Addresses and port states of the matching hosts that have ports, with
   * the total number of ports
   */
  async getIpsPorts(filter: Filter = matchAll(), options: QueryOptions = {}): Promise<PagedResult<IpPorts>> {
    const docs = await this.get(filter, options);
    let count = 0;
    const records: IpPorts[] = [];
    for (const doc of docs) {
      const ports = recordsAt(doc, "ports");
      count += ports.length;
      if (ports.length === 0) continue;
      records.push({
        addr: doc["addr"],
        ports: ports
          .filter((port) => "state_state" in port)
          .map((port) => ({ state_state: port["state_state"], port: port["port"] })),
      });
    }
    return { records, count };
  }

  async getIps(filter: Filter = matchAll(), options: QueryOptions = {}): Promise<PagedResult<{ addr: unknown }>> {
    const docs = await this.get(filter, { ...options, fields: ["addr"] });
    return { records: docs.map((doc) => ({ addr: doc["addr"] })), count: docs.length };
  }

  /**
   * Open port counts of the matching hosts; `count` is the number of
   * matching hosts, including those without a count
   */
  async getOpenPortCount(
    filter: Filter = matchAll(),
    options: QueryOptions = {}
  ): Promise<PagedResult<OpenPortCount>> {
    const docs = await this.get(filter, { ...options, fields: ["addr", "starttime", "openports.count"] });
    const records: OpenPortCount[] = [];
    for (const doc of docs) {
      const openports = doc["openports"];
      if (!isRecord(openports) || openports["count"] === undefined || openports["count"] === null) continue;
      records.push({
        addr: doc["addr"],
        starttime: doc["starttime"],
        openports: { count: openports["count"] },
      });
    }
    return { records, count: docs.length };
  }
}

/**
 * Open a host database
 * @throws {ConfigError} If the options are invalid
 */
export function openHostDb(options: DatabaseOptions = {}): HostDb {
  return new HostDb(options);
}

/**
 * Core types for scanvault
 */

/**
 * Identity key of a stored record
 */
export type RecordId = string | number;

/**
 * Base document structure. Every stored record carries an `_id` once it has
 * been inserted; everything else is schema-less.
 */
export interface Document {
  _id?: RecordId;
  [field: string]: unknown;
}

/**
 * Values a filter leaf can compare against
 */
export type Scalar = string | number | bigint | boolean | null;

/**
 * Comparison operators accepted by `cmp`
 */
export type CompareOperator = "<" | "<=" | ">" | ">=";

/**
 * Filter leaves. Paths are dotted and relative to the enclosing element when
 * the leaf sits under an `any` / `all` quantifier.
 */
export type FilterLeaf =
  | { kind: "eq"; path: string; value: unknown }
  | { kind: "ne"; path: string; value: unknown }
  | { kind: "cmp"; path: string; op: CompareOperator; value: number | bigint | string }
  | { kind: "in"; path: string; values: readonly unknown[] }
  | { kind: "regex"; path: string; pattern: string; flags: string }
  | { kind: "exists"; path: string }
  | { kind: "contains"; path: string; values: readonly unknown[] };

/**
 * Serializable filter tree, evaluated by the storage collaborator
 */
export type Filter =
  | { kind: "true" }
  | { kind: "false" }
  | FilterLeaf
  | { kind: "any"; path: string; filter: Filter }
  | { kind: "all"; path: string; filter: Filter }
  | { kind: "and"; filters: readonly Filter[] }
  | { kind: "or"; filters: readonly Filter[] }
  | { kind: "not"; filter: Filter };

/**
 * Sort direction (1 = ascending, -1 = descending)
 */
export type SortDirection = 1 | -1;

/**
 * Ordered sort specification
 */
export type Sort = ReadonlyArray<readonly [path: string, direction: SortDirection]>;

/**
 * Options shared by every read operation
 */
export interface QueryOptions {
  /** Sort order applied before pagination */
  sort?: Sort;
  /** Maximum number of records to return */
  limit?: number;
  /** Number of records to skip */
  skip?: number;
}

/**
 * Options for `get()`
 */
export interface GetOptions extends QueryOptions {
  /** Dotted paths to keep (the `_id` is always kept) */
  fields?: readonly string[];
}

/**
 * Options for `distinct()`
 */
export interface DistinctOptions extends QueryOptions {
  filter?: Filter;
}

/**
 * Options for `topvalues()`
 */
export interface TopValuesOptions extends QueryOptions {
  filter?: Filter;
  /** Number of values to return (default: 10) */
  topnbr?: number;
}

/**
 * Options for passive `topvalues()`
 */
export interface PassiveTopValuesOptions extends TopValuesOptions {
  /**
   * true (default): count one per matching event.
   * false: sum each event's own `count` field.
   */
  distinct?: boolean;
}

/**
 * One ranked aggregation result
 */
export interface TopValue<T = unknown> {
  value: T;
  count: number;
}

/**
 * Accepted external timestamp forms
 */
export type TimestampInput = number | string | Date;

/**
 * A script result attached to a port
 */
export interface ScriptResult {
  id: string;
  output?: string;
  [payload: string]: unknown;
}

/**
 * A port entry of a host record. `port` is -1 for the host-level pseudo-port.
 */
export interface PortEntry {
  protocol?: string;
  port: number;
  state_state?: string;
  state_reason?: string;
  state_reason_ip?: string;
  service_name?: string;
  service_product?: string;
  service_version?: string;
  service_extrainfo?: string;
  service_hostname?: string;
  service_devicetype?: string;
  screenwords?: string[];
  scripts?: ScriptResult[];
  [field: string]: unknown;
}

export interface HostnameEntry {
  name: string;
  type?: string;
  domains?: string[];
}

export interface TraceHop {
  ipaddr: string;
  ttl?: number;
  rtt?: number;
  host?: string;
  domains?: string[];
}

export interface TraceEntry {
  protocol?: string;
  port?: number;
  hops?: TraceHop[];
}

export interface CpeEntry {
  type?: string;
  vendor?: string;
  product?: string;
  version?: string;
  origins?: string[];
}

export interface HostInfos {
  country_code?: string;
  country_name?: string;
  city?: string;
  coordinates?: [number, number];
  as_num?: number;
  as_name?: string;
  [field: string]: unknown;
}

/**
 * A host record as presented by and to callers (external form)
 */
export interface HostRecord {
  _id?: string;
  addr: string;
  starttime: TimestampInput;
  endtime: TimestampInput;
  source?: string;
  scanid?: string | string[];
  categories?: string[];
  hostnames?: HostnameEntry[];
  ports?: PortEntry[];
  traces?: TraceEntry[];
  cpes?: CpeEntry[];
  os?: { osclass?: Record<string, unknown>[]; osmatch?: Record<string, unknown>[] };
  infos?: HostInfos;
  openports?: Record<string, unknown>;
  schema_version?: number;
  [field: string]: unknown;
}

/**
 * A passive observation as presented by and to callers (external form)
 */
export interface PassiveRecord {
  _id?: RecordId;
  recontype: string;
  source?: string;
  value?: string | Uint8Array;
  targetval?: string;
  sensor?: string;
  port?: number;
  addr?: string;
  count?: number;
  firstseen?: TimestampInput;
  lastseen?: TimestampInput;
  infos?: Record<string, unknown>;
  [field: string]: unknown;
}

/**
 * A scan document (provenance payload referenced by host records)
 */
export interface ScanDocument {
  _id: string;
  [field: string]: unknown;
}

/**
 * Derives extra fields (usually an `infos` block) for a passive record
 * about to be created
 */
export type InfoResolver = (record: PassiveRecord) => Record<string, unknown> | undefined;

/**
 * External host merge collaborator. Returns true when it merged `host` into
 * an existing record, false when the caller must store it as new.
 */
export type HostMerger = (host: HostRecord) => Promise<boolean>;

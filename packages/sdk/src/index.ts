/**
 * scanvault SDK
 *
 * Query and aggregation engine for network reconnaissance records: active
 * scan results (hosts) and passive observations.
 */

export type {
  RecordId,
  Document,
  Scalar,
  CompareOperator,
  FilterLeaf,
  Filter,
  SortDirection,
  Sort,
  QueryOptions,
  GetOptions,
  DistinctOptions,
  TopValuesOptions,
  PassiveTopValuesOptions,
  TopValue,
  TimestampInput,
  ScriptResult,
  PortEntry,
  HostnameEntry,
  TraceHop,
  TraceEntry,
  CpeEntry,
  HostInfos,
  HostRecord,
  PassiveRecord,
  ScanDocument,
  InfoResolver,
  HostMerger,
} from "./types.js";

// Databases
export { HostDb, openHostDb } from "./db/hosts.js";
export type { PagedResult, IpPorts, OpenPortCount } from "./db/hosts.js";
export { PassiveDb, openPassiveDb } from "./db/passive.js";
export { RecordDb, collectFeatures } from "./db/base.js";
export type { PortListOptions } from "./db/base.js";
export { resolveOptions } from "./config.js";
export type { DatabaseOptions, ResolvedOptions } from "./config.js";

// Filters and search builders
export { matchAll, matchNone, eq, ne, cmp, oneOf, regex, exists, contains, any, all, and, or, not, negateIf } from "./filter.js";
export * from "./search/common.js";
export * as hostSearch from "./search/host.js";
export * as passiveSearch from "./search/passive.js";

// Evaluation
export { matches, project, compareValues, compareTuples, compareRecords, sortDocuments, paginate, evaluateQuery } from "./query.js";
export { getPath, isRecord, resolvePath, fieldValues, weightedFieldValues } from "./path.js";
export type { WeightOptions } from "./path.js";

// Top values
export { PseudoFieldTable, directField } from "./topvalues/table.js";
export type { FieldPlan, PseudoField, TableContext, Counted, Extractor } from "./topvalues/table.js";
export { topCounts } from "./topvalues/counter.js";
export { HOST_TOPVALUES } from "./topvalues/host-fields.js";
export { PASSIVE_TOPVALUES } from "./topvalues/passive-fields.js";

// Storage
export type { Collection, Transform } from "./storage/collection.js";
export { MemoryCollection } from "./storage/memory.js";
export { FileCollection } from "./storage/file.js";
export type { FileCollectionOptions } from "./storage/file.js";

// Schema
export { FieldRegistry, HOST_FIELDS, PASSIVE_FIELDS, HOST_LIST_FIELDS, PASSIVE_LIST_FIELDS } from "./schema/fields.js";
export { RecordValidator, RECORD_FORMATS } from "./schema/records.js";
export type { RecordKind, ValidationMode } from "./schema/records.js";

// Codec and serialization
export {
  IPV4_MAPPED_START,
  IPV4_MAPPED_END,
  isIPv4Internal,
  ipToInternal,
  internalToIp,
  prefixMask,
  cidrToRange,
  ipv4Network,
  toTimestamp,
  fromTimestamp,
  toBinary,
  fromBinary,
  parsePattern,
} from "./codec.js";
export { stableStringify, canonicalKey, serializeRecords, parseRecords } from "./format.js";

// Errors
export {
  ScanVaultError,
  InvalidOperatorError,
  InvalidArgumentError,
  InvalidPseudoFieldError,
  UnsupportedQueryError,
  AddressDecodeError,
  TimestampDecodeError,
  BinaryDecodeError,
  DuplicateScanError,
  RecordValidationError,
  CollectionReadError,
  CollectionWriteError,
  ConfigError,
} from "./errors.js";
export type { ValidationIssue } from "./errors.js";

// Logging
export { Logger, logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";

/**
 * Search builders shared by host and passive records
 */

import type { Filter, RecordId } from "../types.js";
import { and, cmp, contains, eq, exists, ne, negateIf, not, oneOf, regex } from "../filter.js";
import { cidrToRange, ipToInternal, IPV4_MAPPED_END, IPV4_MAPPED_START } from "../codec.js";

/**
 * Literal text or a pattern
 */
export type TextQuery = string | RegExp;

/**
 * Text condition: a RegExp searches, a string must be equal
 * (with `neg`, a string must differ and the field must exist)
 */
export function searchString(path: string, value: TextQuery, neg = false): Filter {
  if (value instanceof RegExp) {
    return negateIf(regex(path, value), neg);
  }
  return neg ? ne(path, value) : eq(path, value);
}

/**
 * Text condition on an array of strings: some element must match
 */
export function searchStringInArray(path: string, value: TextQuery, neg = false): Filter {
  const res = value instanceof RegExp ? regex(path, value) : contains(path, [value]);
  return negateIf(res, neg);
}

/**
 * Filter that matches nothing stored
 */
export function searchNonExistent(): Filter {
  return eq("_id", 0);
}

export function searchObjectId(id: RecordId | readonly RecordId[], neg = false): Filter {
  if (Array.isArray(id)) {
    return negateIf(oneOf("_id", id), neg);
  }
  return neg ? ne("_id", id) : eq("_id", id);
}

/**
 * Records with the given schema version, or with any when omitted
 */
export function searchVersion(version?: number): Filter {
  if (version === undefined) {
    return exists("schema_version");
  }
  return eq("schema_version", version);
}

export function searchHost(addr: string | bigint, neg = false): Filter {
  const internal = ipToInternal(addr);
  return neg ? ne("addr", internal) : eq("addr", internal);
}

export function searchHosts(addrs: ReadonlyArray<string | bigint>, neg = false): Filter {
  return negateIf(oneOf("addr", addrs.map((addr) => ipToInternal(addr))), neg);
}

/**
 * Addresses in the closed interval [start, stop]
 */
export function searchRange(start: string | bigint, stop: string | bigint, neg = false): Filter {
  const res = and(cmp("addr", ">=", ipToInternal(start)), cmp("addr", "<=", ipToInternal(stop)));
  return negateIf(res, neg);
}

/**
 * Addresses inside a network given as "a.b.c.d/n" or "x::/n"
 */
export function searchNet(net: string, neg = false): Filter {
  const { start, stop } = cidrToRange(net);
  return searchRange(start, stop, neg);
}

export function searchIPv4(): Filter {
  return searchRange(IPV4_MAPPED_START, IPV4_MAPPED_END);
}

export function searchIPv6(): Filter {
  return and(exists("addr"), not(searchIPv4()));
}

export function searchVal(path: string, value: unknown): Filter {
  return eq(path, value);
}

/**
 * @throws {InvalidOperatorError} If `op` is not one of <, <=, >, >=
 */
export function searchCmp(path: string, value: number | bigint | string, op: string): Filter {
  return cmp(path, op, value);
}

const HEX = /^[0-9a-f]+$/i;
const HASH_BY_LENGTH: Record<number, string> = { 32: "md5", 40: "sha1", 64: "sha256" };

/**
 * Map a JA3 value to the field it is stored under: hex digests of 32, 40 or
 * 64 digits are md5, sha1 or sha256 (lowercased), anything else is raw
 */
export function ja3KeyValue(value: string | RegExp): [key: string, value: string | RegExp] {
  if (value instanceof RegExp) {
    return ["raw", value];
  }
  const key = HEX.test(value) ? HASH_BY_LENGTH[value.length] : undefined;
  if (key !== undefined) {
    return [key, value.toLowerCase()];
  }
  return ["raw", value];
}

/**
 * Current time minus `seconds`, as epoch seconds
 */
export function secondsAgo(seconds: number): number {
  return Date.now() / 1000 - seconds;
}

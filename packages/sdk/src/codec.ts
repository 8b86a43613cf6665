/**
 * Value codecs: IP addresses, timestamps, binary payloads and patterns
 *
 * Invariants:
 * - The internal address form is an unsigned 128-bit bigint; IPv4 lives in
 *   the IPv4-mapped range ::ffff:0:0/96
 * - Timestamps are stored as epoch seconds with millisecond precision
 * - Decoding never defaults: malformed input throws a typed error
 */

import ipaddr from "ipaddr.js";
import { isValid, parseISO } from "date-fns";
import type { TimestampInput } from "./types.js";
import {
  AddressDecodeError,
  BinaryDecodeError,
  InvalidArgumentError,
  TimestampDecodeError,
} from "./errors.js";

const MAX_INTERNAL = (1n << 128n) - 1n;
const IPV4_LOW_MASK = (1n << 32n) - 1n;
const DOTTED_QUAD = /^(?:0|[1-9]\d{0,2})(?:\.(?:0|[1-9]\d{0,2})){3}$/;

/**
 * First internal address of the IPv4-mapped range (::ffff:0.0.0.0)
 */
export const IPV4_MAPPED_START = 0xffffn << 32n;

/**
 * Last internal address of the IPv4-mapped range (::ffff:255.255.255.255)
 */
export const IPV4_MAPPED_END = IPV4_MAPPED_START | IPV4_LOW_MASK;

function bytesToBigInt(bytes: readonly number[]): bigint {
  return bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
}

function bigIntToBytes(value: bigint, length: number): number[] {
  const bytes: number[] = new Array<number>(length);
  let rest = value;
  for (let i = length - 1; i >= 0; i--) {
    bytes[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return bytes;
}

/**
 * Check whether an internal address belongs to the IPv4-mapped range
 */
export function isIPv4Internal(addr: bigint): boolean {
  return addr >= IPV4_MAPPED_START && addr <= IPV4_MAPPED_END;
}

/**
 * Convert a textual IP address to its internal 128-bit form.
 * Internal values are passed through after a range check.
 */
export function ipToInternal(addr: string | bigint): bigint {
  if (typeof addr === "bigint") {
    if (addr < 0n || addr > MAX_INTERNAL) {
      throw new AddressDecodeError(addr);
    }
    return addr;
  }
  if (typeof addr !== "string") {
    throw new AddressDecodeError(addr);
  }

  const text = addr.trim();
  if (DOTTED_QUAD.test(text)) {
    try {
      return IPV4_MAPPED_START | bytesToBigInt(ipaddr.IPv4.parse(text).toByteArray());
    } catch (err) {
      throw new AddressDecodeError(addr, { cause: err });
    }
  }
  // Zone indexes ("fe80::1%eth0") have no internal representation
  if (!text.includes("%") && ipaddr.IPv6.isValid(text)) {
    try {
      return bytesToBigInt(ipaddr.IPv6.parse(text).toByteArray());
    } catch (err) {
      throw new AddressDecodeError(addr, { cause: err });
    }
  }
  throw new AddressDecodeError(addr);
}

/**
 * Convert an internal address back to canonical text: dotted quad for the
 * IPv4-mapped range, RFC 5952 otherwise.
 */
export function internalToIp(addr: bigint): string {
  if (typeof addr !== "bigint" || addr < 0n || addr > MAX_INTERNAL) {
    throw new AddressDecodeError(addr);
  }
  if (isIPv4Internal(addr)) {
    return new ipaddr.IPv4(bigIntToBytes(addr & IPV4_LOW_MASK, 4)).toString();
  }
  const parts: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    parts.push(Number((addr >> shift) & 0xffffn));
  }
  return new ipaddr.IPv6(parts).toRFC5952String();
}

/**
 * Bit mask keeping the first `bits` bits of an address of the given family,
 * expressed over the 128-bit internal form
 */
export function prefixMask(bits: number, family: "ipv4" | "ipv6" = "ipv4"): bigint {
  const width = family === "ipv4" ? 32 : 128;
  if (!Number.isInteger(bits) || bits < 0 || bits > width) {
    throw new InvalidArgumentError(`Invalid ${family} prefix length: ${bits}`);
  }
  const hostMask = (1n << BigInt(width - bits)) - 1n;
  return MAX_INTERNAL ^ hostMask;
}

/**
 * Parse "a.b.c.d/n" or "x::/n" into the first and last internal addresses
 */
export function cidrToRange(cidr: string): { start: bigint; stop: bigint } {
  const slash = cidr.lastIndexOf("/");
  if (slash === -1) {
    throw new InvalidArgumentError(`Invalid network "${cidr}": missing prefix length`);
  }
  const addrText = cidr.slice(0, slash);
  const bitsText = cidr.slice(slash + 1);
  if (!/^\d{1,3}$/.test(bitsText)) {
    throw new InvalidArgumentError(`Invalid network "${cidr}": bad prefix length`);
  }
  const addr = ipToInternal(addrText);
  const family = isIPv4Internal(addr) && !addrText.includes(":") ? "ipv4" : "ipv6";
  const mask = prefixMask(Number(bitsText), family);
  const start = addr & mask;
  return { start, stop: start | (MAX_INTERNAL ^ mask) };
}

/**
 * Network of an IPv4 address for a given prefix length, as "a.b.c.d/n"
 */
export function ipv4Network(addr: string | bigint, bits: number): string {
  const internal = ipToInternal(addr);
  if (!isIPv4Internal(internal)) {
    throw new InvalidArgumentError(`Not an IPv4 address: ${String(addr)}`);
  }
  return `${internalToIp(internal & prefixMask(bits, "ipv4"))}/${bits}`;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](.+)$/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const NUMERIC = /^-?\d+(?:\.\d+)?$/;

/**
 * Parse textual timestamps. Text without a zone designator is UTC.
 */
function parseTimestampText(text: string): Date | number {
  const trimmed = text.trim();
  if (NUMERIC.test(trimmed)) {
    return Number(trimmed);
  }
  if (DATE_ONLY.test(trimmed)) {
    return parseISO(`${trimmed}T00:00:00Z`);
  }
  const match = DATE_TIME.exec(trimmed);
  if (match) {
    const [, day, time] = match;
    return parseISO(ZONE_SUFFIX.test(time ?? "") ? `${day}T${time}` : `${day}T${time}Z`);
  }
  return parseISO(trimmed);
}

/**
 * Normalize an external timestamp to epoch seconds (millisecond precision)
 */
export function toTimestamp(value: TimestampInput): number {
  let parsed: Date | number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string") {
    parsed = parseTimestampText(value);
  } else if (value instanceof Date) {
    parsed = value;
  } else {
    throw new TimestampDecodeError(value);
  }

  if (typeof parsed === "number") {
    if (!Number.isFinite(parsed)) {
      throw new TimestampDecodeError(value);
    }
    return Math.round(parsed * 1000) / 1000;
  }
  if (!isValid(parsed)) {
    throw new TimestampDecodeError(value);
  }
  return parsed.getTime() / 1000;
}

/**
 * Convert any accepted timestamp form to a Date
 */
export function fromTimestamp(value: TimestampInput): Date {
  return new Date(Math.round(toTimestamp(value) * 1000));
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encode a binary payload as base64 text
 */
export function toBinary(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}

/**
 * Decode base64 text to a binary payload
 */
export function fromBinary(text: string): Buffer {
  if (typeof text !== "string") {
    throw new BinaryDecodeError(`expected a string, got ${typeof text}`);
  }
  if (!BASE64.test(text)) {
    throw new BinaryDecodeError("not valid base64");
  }
  return Buffer.from(text, "base64");
}

const PATTERN_TEXT = /^\/(.*)\/([a-z]*)$/s;

/**
 * Turn "/pattern/flags" into a RegExp; anything else is returned as-is.
 * Global and sticky flags are dropped so the pattern can be tested again
 * and again.
 */
export function parsePattern(text: string): string | RegExp {
  const match = PATTERN_TEXT.exec(text);
  if (!match) {
    return text;
  }
  const [, source, flags] = match;
  try {
    return new RegExp(source ?? "", flags?.replace(/[gy]/g, ""));
  } catch (err) {
    throw new InvalidArgumentError(`Invalid pattern ${text}`, { cause: err });
  }
}

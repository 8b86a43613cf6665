/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseJson, parseList, parseNonNegativeInt, parsePort, parseRange, parseSort } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid integers", () => {
      expect(parseNonNegativeInt("0", "--limit")).toBe(0);
      expect(parseNonNegativeInt(" 25 ", "--limit")).toBe(25);
      expect(parseNonNegativeInt("10000", "--limit")).toBe(10000);
    });

    it("should reject negative numbers and text", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "--limit")).toThrow("--limit must be a non-negative integer");
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("10001", "--topnbr")).toThrow("--topnbr must be <= 10000");
    });
  });

  describe("parsePort", () => {
    it("should accept the port range", () => {
      expect(parsePort("0", "--port")).toBe(0);
      expect(parsePort("443", "--port")).toBe(443);
      expect(parsePort("65535", "--port")).toBe(65535);
    });

    it("should reject anything else", () => {
      expect(() => parsePort("65536", "--port")).toThrow("--port must be a port number between 0 and 65535");
      expect(() => parsePort("http", "--port")).toThrow(InvalidArgumentError);
      expect(() => parsePort("", "--port")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseList", () => {
    it("should split on commas and drop empty items", () => {
      expect(parseList("addr, ports.port,,infos.country_code")).toEqual(["addr", "ports.port", "infos.country_code"]);
    });
  });

  describe("parseSort", () => {
    it("should parse sort keys with optional directions", () => {
      expect(parseSort("addr,starttime:desc,count:asc")).toEqual([
        ["addr", 1],
        ["starttime", -1],
        ["count", 1],
      ]);
    });

    it("should reject unknown directions", () => {
      expect(() => parseSort("addr:up")).toThrow('Invalid sort key "addr:up"');
      expect(() => parseSort(":desc")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseRange", () => {
    it("should split start and stop", () => {
      expect(parseRange("192.0.2.1-192.0.2.9")).toEqual(["192.0.2.1", "192.0.2.9"]);
      expect(parseRange("2001:db8::1 - 2001:db8::ff")).toEqual(["2001:db8::1", "2001:db8::ff"]);
    });

    it("should need exactly two bounds", () => {
      expect(() => parseRange("192.0.2.1")).toThrow('Invalid range "192.0.2.1" (expected start-stop)');
      expect(() => parseRange("1-2-3")).toThrow(InvalidArgumentError);
      expect(() => parseRange("192.0.2.1-")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"addr":"192.0.2.1"}', "--data")).toEqual({ addr: "192.0.2.1" });
      expect(parseJson("[1,2,3]", "--data")).toEqual([1, 2, 3]);
      expect(parseJson("null", "--data")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "stdin")).toEqual({ a: 1 });
    });

    it("should name the source of invalid JSON", () => {
      expect(() => parseJson("{invalid}", "stdin")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });
});

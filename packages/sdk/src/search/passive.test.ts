import { describe, it, expect } from "vitest";
import type { Filter, PassiveRecord } from "../types.js";
import { matches } from "../query.js";
import { PASSIVE_FIELDS } from "../schema/fields.js";
import { PassiveDb } from "../db/passive.js";
import { UnsupportedQueryError } from "../errors.js";
import {
  searchBasicAuth,
  searchCert,
  searchCertSubject,
  searchDns,
  searchMac,
  searchNewer,
  searchPort,
  searchRecontype,
  searchService,
  searchUserAgent,
} from "./passive.js";

function check(record: PassiveRecord, filter: Filter): boolean {
  return matches(PassiveDb.toInternal(record), filter, PASSIVE_FIELDS);
}

const dns: PassiveRecord = {
  recontype: "DNS_ANSWER",
  source: "A-192.0.2.53-53",
  value: "www.example.com",
  targetval: "192.0.2.80",
  sensor: "edge",
  firstseen: 1000,
  lastseen: 2000,
  infos: { domain: ["example.com", "com"] },
};

const cert: PassiveRecord = {
  recontype: "SSL_SERVER",
  source: "cert",
  value: "MIIB",
  port: 443,
  infos: {
    subject_text: "CN=www.example.com",
    issuer_text: "CN=Example CA",
    pubkeyalgo: "rsaEncryption",
    service_name: "https",
  },
};

describe("passive search builders", () => {
  it("match recontypes, alone or in lists", () => {
    expect(check(dns, searchRecontype("DNS_ANSWER"))).toBe(true);
    expect(check(dns, searchRecontype(["SSL_SERVER", "DNS_ANSWER"]))).toBe(true);
    expect(check(dns, searchRecontype(["SSL_SERVER"], true))).toBe(true);
    expect(check(dns, searchRecontype(/^DNS/, true))).toBe(false);
  });

  describe("searchDns", () => {
    it("matches the queried name or its subdomains", () => {
      expect(check(dns, searchDns({ name: "www.example.com" }))).toBe(true);
      expect(check(dns, searchDns({ name: "example.com" }))).toBe(false);
      expect(check(dns, searchDns({ name: "example.com", subdomains: true }))).toBe(true);
    });

    it("matches the answer with reverse", () => {
      expect(check(dns, searchDns({ name: "192.0.2.80", reverse: true }))).toBe(true);
    });

    it("filters on the record type", () => {
      expect(check(dns, searchDns({ dnstype: "a" }))).toBe(true);
      expect(check(dns, searchDns({ dnstype: "mx" }))).toBe(false);
    });
  });

  it("accept only open TCP ports", () => {
    expect(check(cert, searchPort(443))).toBe(true);
    expect(check(cert, searchPort(443, "tcp", "open", true))).toBe(false);
    expect(() => searchPort(53, "udp")).toThrow(UnsupportedQueryError);
    expect(() => searchPort(443, "tcp", "closed")).toThrow(UnsupportedQueryError);
    expect(() => searchService("domain", { protocol: "udp" })).toThrow(UnsupportedQueryError);
  });

  it("match services from the infos", () => {
    expect(check(cert, searchService("https", { port: 443 }))).toBe(true);
    expect(check(cert, searchService("https", { port: 8443 }))).toBe(false);
  });

  it("match certificates", () => {
    expect(check(cert, searchCert())).toBe(true);
    expect(check(cert, searchCert("rsa"))).toBe(true);
    expect(check(cert, searchCert("ec"))).toBe(false);
    expect(check(cert, searchCertSubject(/example\.com/, "CN=Example CA"))).toBe(true);
    expect(check(cert, searchCertSubject(/example\.com/, "CN=Other CA"))).toBe(false);
  });

  it("match MAC addresses case-insensitively", () => {
    const mac: PassiveRecord = { recontype: "MAC_ADDRESS", source: "ARP", value: "00:11:22:aa:bb:cc" };
    expect(check(mac, searchMac("00:11:22:AA:BB:CC"))).toBe(true);
    expect(check(mac, searchMac())).toBe(true);
    expect(check(dns, searchMac())).toBe(false);
  });

  it("match HTTP authorizations", () => {
    const auth: PassiveRecord = {
      recontype: "HTTP_CLIENT_HEADER_SERVER",
      source: "AUTHORIZATION",
      value: "Basic dXNlcjpwYXNz",
    };
    expect(check(auth, searchBasicAuth())).toBe(true);
    expect(check({ ...auth, value: "Bearer token" }, searchBasicAuth())).toBe(false);
  });

  it("refuse a negated user agent search", () => {
    expect(() => searchUserAgent("curl", true)).toThrow(UnsupportedQueryError);
  });

  it("compare first or last sighting times", () => {
    expect(check(dns, searchNewer(1500))).toBe(false);
    expect(check(dns, searchNewer(1500, false, false))).toBe(true);
    expect(check(dns, searchNewer(1500, true))).toBe(true);
  });
});

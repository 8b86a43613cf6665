import { describe, it, expect } from "vitest";
import type { Document } from "../types.js";
import { HOST_FIELDS } from "../schema/fields.js";
import { matches } from "../query.js";
import { InvalidPseudoFieldError } from "../errors.js";
import { HOST_TOPVALUES } from "./host-fields.js";

const context = { registry: HOST_FIELDS };

const host: Document = {
  addr: "192.0.2.10",
  hostnames: [
    { name: "www.example.com", domains: ["example.com", "com"] },
    { name: "mail.corp.example.org", domains: ["corp.example.org", "example.org", "org"] },
  ],
  cpes: [
    { type: "a", vendor: "nginx", product: "nginx", version: "1.24" },
    { type: "o", vendor: "linux", product: "linux_kernel" },
  ],
  ports: [
    {
      protocol: "tcp",
      port: 80,
      state_state: "open",
      service_name: "http",
      service_product: "nginx",
      scripts: [
        { id: "http-title", output: "Welcome" },
        {
          id: "http-headers",
          "http-headers": [
            { name: "server", value: "nginx" },
            { name: "content-type", value: "text/html" },
          ],
        },
        {
          id: "ssl-cert",
          "ssl-cert": { subject: { commonName: "www.example.com", countryName: "FR" }, issuer: { commonName: "CA" } },
        },
      ],
    },
    {
      protocol: "tcp",
      port: 22,
      state_state: "open",
      service_name: "ssh",
      scripts: [
        {
          id: "ssh-hostkey",
          "ssh-hostkey": [
            { type: "ssh-rsa", bits: 2048 },
            { type: "ssh-ed25519", bits: 256 },
          ],
        },
        { id: "vulners", vulns: [{ id: "CVE-2000-0001", state: "VULNERABLE" }] },
        {
          id: "nfs-ls",
          ls: { volumes: [{ volume: "/srv", files: [{ filename: "a.txt", size: "10" }, { filename: "b.txt" }] }] },
        },
      ],
    },
    { port: -1, scripts: [{ id: "whois", output: "AS64500" }] },
  ],
  traces: [
    {
      hops: [
        { ipaddr: "198.51.100.1", ttl: 1 },
        { ipaddr: "198.51.100.2", ttl: 2 },
        { ipaddr: "198.51.100.3", ttl: 3 },
      ],
    },
  ],
};

function values(field: string, rec: Document = host): unknown[] {
  const plan = HOST_TOPVALUES.resolve(field, context);
  const out = plan.output ?? ((value: unknown) => value);
  return [...plan.extract(rec)].map(([value]) => out(value));
}

describe("host pseudo-fields", () => {
  it("resolve unknown names to plain paths", () => {
    const plan = HOST_TOPVALUES.resolve("ports.service_name", context);
    expect(plan.fields).toEqual(["ports.service_name"]);
    expect(plan.filter).toEqual({ kind: "exists", path: "ports.service_name" });
    expect(values("ports.service_name")).toEqual(["http", "ssh"]);
  });

  describe("cpe", () => {
    it("counts full CPEs by default", () => {
      expect(values("cpe")).toEqual([
        ["a", "nginx", "nginx", "1.24"],
        ["o", "linux", "linux_kernel", null],
      ]);
    });

    it("stops at the requested part, by name or position", () => {
      expect(values("cpe.vendor")).toEqual([
        ["a", "nginx"],
        ["o", "linux"],
      ]);
      expect(values("cpe.1")).toEqual([["a"], ["o"]]);
    });

    it("keeps the CPEs matching the given parts", () => {
      expect(values("cpe.product:o")).toEqual([["o", "linux", "linux_kernel"]]);
      expect(values("cpe.product::/^ng/")).toEqual([["a", "nginx", "nginx"]]);
    });

    it("rejects unknown parts", () => {
      expect(() => HOST_TOPVALUES.resolve("cpe.edition", context)).toThrow(InvalidPseudoFieldError);
    });
  });

  it("count scripts outputs, optionally on one port or on the host", () => {
    expect(values("script:http-title")).toEqual(["Welcome"]);
    expect(values("script:22:http-title")).toEqual([]);
    expect(values("script:host:whois")).toEqual(["AS64500"]);
  });

  it("count domains, optionally at one level", () => {
    expect(values("domains")).toEqual(["example.com", "com", "corp.example.org", "example.org", "org"]);
    expect(values("domains:2")).toEqual(["example.com", "example.org"]);
    expect(values("domains:1")).toEqual(["com", "org"]);
  });

  it("count certificate subjects as objects", () => {
    expect(values("cert.subject")).toEqual([{ commonName: "www.example.com", countryName: "FR" }]);
    expect(values("cert.issuer.commonName")).toEqual(["CA"]);
  });

  it("count HTTP headers", () => {
    expect(values("httphdr")).toEqual([
      ["server", "nginx"],
      ["content-type", "text/html"],
    ]);
    expect(values("httphdr:Server")).toEqual(["nginx"]);
  });

  it("count SSH key sizes with their types", () => {
    expect(values("sshkey.bits")).toEqual([
      ["ssh-rsa", 2048],
      ["ssh-ed25519", 256],
    ]);
    expect(values("sshkey.type")).toEqual(["ssh-rsa", "ssh-ed25519"]);
  });

  it("count vulnerabilities", () => {
    expect(values("vulns.id")).toEqual(["CVE-2000-0001"]);
    expect(values("vulns.state")).toEqual([["CVE-2000-0001", "VULNERABLE"]]);
  });

  it("count listed files", () => {
    expect(values("file")).toEqual(["a.txt", "b.txt"]);
    expect(values("file.size")).toEqual(["10", null]);
    expect(values("file:smb-ls")).toEqual([]);
  });

  it("count products and versions on open ports", () => {
    expect(values("product")).toEqual([
      ["http", "nginx"],
      ["ssh", null],
    ]);
    expect(values("product:80")).toEqual([["http", "nginx"]]);
    expect(values("version:ssh")).toEqual([["ssh", null, null]]);
  });

  it("list the ports of each host", () => {
    expect(values("portlist:open")).toEqual([
      [
        ["tcp", 22],
        ["tcp", 80],
      ],
    ]);
    expect(values("countports:open")).toEqual([2]);
  });

  it("count traceroute hops by ttl", () => {
    expect(values("hop")).toEqual(["198.51.100.1", "198.51.100.2", "198.51.100.3"]);
    expect(values("hop:2")).toEqual(["198.51.100.2"]);
    expect(values("hop>1")).toEqual(["198.51.100.2", "198.51.100.3"]);
  });

  it("reject unusable arguments", () => {
    expect(() => HOST_TOPVALUES.resolve("net:33", context)).toThrow(InvalidPseudoFieldError);
    expect(() => HOST_TOPVALUES.resolve("service:http", context)).toThrow(InvalidPseudoFieldError);
    expect(() => HOST_TOPVALUES.resolve("domains:x", context)).toThrow(InvalidPseudoFieldError);
  });

  it("pre-filter records that have the data", () => {
    const plan = HOST_TOPVALUES.resolve("httphdr:server", context);
    expect(matches(host, plan.filter, HOST_FIELDS)).toBe(true);
    expect(matches({ addr: "192.0.2.11" }, plan.filter, HOST_FIELDS)).toBe(false);
  });
});

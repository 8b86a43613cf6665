import { describe, it, expect, beforeEach } from "vitest";
import { HostDb, openHostDb } from "./hosts.js";
import type { HostRecord } from "../types.js";
import { eq } from "../filter.js";
import { searchCountry, searchPort, searchService } from "../search/host.js";
import { searchHost, searchNet } from "../search/common.js";
import { DuplicateScanError, RecordValidationError } from "../errors.js";

function host(addr: string, extra: Partial<HostRecord> = {}): HostRecord {
  return { addr, starttime: 1_700_000_000, endtime: 1_700_000_100, ...extra };
}

describe("HostDb", () => {
  let db: HostDb;

  beforeEach(() => {
    db = openHostDb();
  });

  describe("port scenario", () => {
    beforeEach(async () => {
      await db.storeHost(
        host("192.0.2.10", {
          ports: [
            { protocol: "tcp", port: 80, state_state: "open", service_name: "http" },
            { protocol: "tcp", port: 22, state_state: "closed" },
          ],
        })
      );
    });

    it("matches an open port", async () => {
      expect(await db.count(searchPort(80, "tcp", "open"))).toBe(1);
    });

    it("does not match the port in another state", async () => {
      expect(await db.count(searchPort(80, "tcp", "closed"))).toBe(0);
    });

    it("excludes the host when negated", async () => {
      expect(await db.count(searchPort(80, "tcp", "open", true))).toBe(0);
    });

    it("keeps hosts where the port is absent or in another state when negated", async () => {
      await db.storeHost(host("192.0.2.11", { ports: [{ protocol: "tcp", port: 443, state_state: "open" }] }));
      await db.storeHost(host("192.0.2.12", { ports: [{ protocol: "tcp", port: 80, state_state: "filtered" }] }));

      const found = await db.get(searchPort(80, "tcp", "open", true), { sort: [["addr", 1]] });
      expect(found.map((rec) => rec["addr"])).toEqual(["192.0.2.11", "192.0.2.12"]);
    });
  });

  it("stores concurrent hosts under distinct ids", async () => {
    const ids = await Promise.all(["192.0.2.1", "192.0.2.2", "192.0.2.3"].map((addr) => db.storeHost(host(addr))));
    expect(new Set(ids).size).toBe(3);
    expect(await db.count()).toBe(3);
  });

  it("returns records in external form", async () => {
    await db.storeHost(
      host("2001:db8::1", {
        starttime: "2024-01-01T00:00:00Z",
        traces: [{ hops: [{ ipaddr: "198.51.100.1", ttl: 1 }] }],
      })
    );

    const [rec] = await db.get();
    expect(rec?.["addr"]).toBe("2001:db8::1");
    expect(rec?.["starttime"]).toEqual(new Date("2024-01-01T00:00:00Z"));
    expect(rec?.["traces"]).toEqual([{ hops: [{ ipaddr: "198.51.100.1", ttl: 1 }] }]);
  });

  it("searches by address and network", async () => {
    await db.storeHost(host("192.0.2.10"));
    await db.storeHost(host("198.51.100.7"));

    expect(await db.count(searchHost("198.51.100.7"))).toBe(1);
    expect(await db.count(searchNet("192.0.2.0/24"))).toBe(1);
    expect(await db.count(searchNet("192.0.2.0/24", true))).toBe(1);
  });

  it("returns distinct AS numbers once each, in first-seen order", async () => {
    await db.storeHost(host("192.0.2.1", { infos: { as_num: 15169 } }));
    await db.storeHost(host("192.0.2.2", { infos: { as_num: 15169 } }));
    await db.storeHost(host("192.0.2.3", { infos: { as_num: 8075 } }));
    await db.storeHost(host("192.0.2.4"));

    expect(await db.distinct("infos.as_num")).toEqual([15169, 8075]);
  });

  it("applies projection, sort and pagination", async () => {
    await db.storeHost(host("192.0.2.3", { source: "c" }));
    await db.storeHost(host("192.0.2.1", { source: "a" }));
    await db.storeHost(host("192.0.2.2", { source: "b" }));

    const page = await db.get(undefined, { fields: ["source"], sort: [["source", -1]], skip: 1, limit: 1 });
    expect(page).toHaveLength(1);
    expect(page[0]?.["source"]).toBe("b");
    expect(page[0]?.["addr"]).toBeUndefined();
    expect(typeof page[0]?._id).toBe("string");
  });

  it("rejects invalid hosts in strict mode", async () => {
    const bad: HostRecord = { addr: "not-an-address", starttime: 1, endtime: 2 };
    await expect(db.storeHost(bad)).rejects.toThrow(RecordValidationError);
    expect(await db.count()).toBe(0);
  });

  it("stores anything when validation is off", async () => {
    const lax = openHostDb({ validation: "off" });
    const id = await lax.storeHost({ addr: "not-an-address", starttime: 1, endtime: 2 });
    const rec = await lax.getOne(eq("_id", id));
    expect(rec?.["addr"]).toBe("not-an-address");
  });

  describe("scan documents", () => {
    it("refuses a reused scan id without touching the stored document", async () => {
      await db.storeScanDoc({ _id: "scan-1", args: "-sS" });

      await expect(db.storeScanDoc({ _id: "scan-1", args: "-sU" })).rejects.toThrow(DuplicateScanError);
      expect(await db.getScan("scan-1")).toEqual({ _id: "scan-1", args: "-sS" });
    });

    it("removes scan documents no host refers to any more", async () => {
      await db.storeScanDoc({ _id: "scan-1" });
      await db.storeScanDoc({ _id: "scan-2" });
      const first = await db.storeHost(host("192.0.2.1", { scanid: "scan-1" }));
      await db.storeHost(host("192.0.2.2", { scanid: ["scan-1", "scan-2"] }));
      await db.storeHost(host("192.0.2.3", { scanid: "scan-2" }));

      expect(await db.remove(first)).toBe(1);
      expect(await db.isScanPresent("scan-1")).toBe(true);

      expect(await db.remove(searchHost("192.0.2.2"))).toBe(1);
      expect(await db.isScanPresent("scan-1")).toBe(false);
      expect(await db.isScanPresent("scan-2")).toBe(true);
    });

    it("purges hosts and scans on init", async () => {
      await db.storeScanDoc({ _id: "scan-1" });
      await db.storeHost(host("192.0.2.1", { scanid: "scan-1" }));

      await db.init();

      expect(await db.count()).toBe(0);
      expect(await db.isScanPresent("scan-1")).toBe(false);
    });
  });

  describe("storeOrMergeHost", () => {
    it("stores the host when the merger declines", async () => {
      const seen: string[] = [];
      const merging = openHostDb({
        merger: async (rec) => {
          seen.push(rec.addr);
          return false;
        },
      });
      await merging.storeOrMergeHost(host("192.0.2.1"));
      expect(seen).toEqual(["192.0.2.1"]);
      expect(await merging.count()).toBe(1);
    });

    it("stores nothing when the merger took the host", async () => {
      const merging = openHostDb({ merger: async () => true });
      await merging.storeOrMergeHost(host("192.0.2.1"));
      expect(await merging.count()).toBe(0);
    });
  });

  describe("topvalues", () => {
    beforeEach(async () => {
      await db.storeHost(
        host("192.0.2.1", {
          infos: { country_code: "FR", country_name: "France" },
          ports: [
            { protocol: "tcp", port: 80, state_state: "open", service_name: "http" },
            { protocol: "tcp", port: 443, state_state: "open", service_name: "https" },
          ],
        })
      );
      await db.storeHost(
        host("192.0.2.2", {
          infos: { country_code: "FR", country_name: "France" },
          ports: [{ protocol: "tcp", port: 80, state_state: "open", service_name: "http" }],
        })
      );
      await db.storeHost(
        host("198.51.100.1", {
          infos: { country_code: "DE" },
          ports: [{ protocol: "udp", port: 53, state_state: "closed", service_name: "domain" }],
        })
      );
    });

    it("counts countries with their names", async () => {
      expect(await db.topvalues("country")).toEqual([
        { value: ["FR", "France"], count: 2 },
        { value: ["DE", "?"], count: 1 },
      ]);
    });

    it("counts ports in any state", async () => {
      expect(await db.topvalues("port")).toEqual([
        { value: ["tcp", 80], count: 2 },
        { value: ["tcp", 443], count: 1 },
        { value: ["udp", 53], count: 1 },
      ]);
    });

    it("counts ports in a given state", async () => {
      expect(await db.topvalues("port:closed")).toEqual([{ value: ["udp", 53], count: 1 }]);
    });

    it("counts open services", async () => {
      expect(await db.topvalues("service")).toEqual([
        { value: "http", count: 2 },
        { value: "https", count: 1 },
      ]);
    });

    it("counts networks", async () => {
      expect(await db.topvalues("net:16")).toEqual([
        { value: "192.0.0.0/16", count: 2 },
        { value: "198.51.0.0/16", count: 1 },
      ]);
    });

    it("falls back to plain fields", async () => {
      expect(await db.topvalues("infos.country_code")).toEqual([
        { value: "FR", count: 2 },
        { value: "DE", count: 1 },
      ]);
    });

    it("honours the caller's filter", async () => {
      expect(await db.topvalues("service", { filter: searchCountry("DE") })).toEqual([]);
      expect(await db.topvalues("port", { filter: searchCountry("DE") })).toEqual([
        { value: ["udp", 53], count: 1 },
      ]);
    });

    it("applies a global CPE pattern to every host", async () => {
      const cpes = [{ type: "a", vendor: "apache", product: "httpd" }];
      await Promise.all(
        ["203.0.113.1", "203.0.113.2", "203.0.113.3", "203.0.113.4"].map((addr) => db.storeHost(host(addr, { cpes })))
      );
      expect(await db.topvalues("cpe.vendor:/a/g")).toEqual([{ value: ["a", "apache"], count: 4 }]);
      expect(await db.topvalues("cpe.vendor::/^ap/y")).toEqual([{ value: ["a", "apache"], count: 4 }]);
    });

    it("returns at most topnbr entries with non-increasing counts", async () => {
      const top = await db.topvalues("port", { topnbr: 2 });
      expect(top).toHaveLength(2);
      expect(top[0]?.count).toBeGreaterThanOrEqual(top[1]?.count ?? 0);
    });
  });

  describe("port features", () => {
    beforeEach(async () => {
      await db.storeHost(
        host("192.0.2.1", {
          ports: [
            { protocol: "tcp", port: 443, state_state: "open", service_name: "https", service_product: "nginx" },
            { protocol: "tcp", port: 80, state_state: "open", service_name: "http" },
            { port: -1, scripts: [{ id: "whois" }] },
          ],
        })
      );
      await db.storeHost(
        host("192.0.2.2", {
          ports: [{ protocol: "tcp", port: 80, state_state: "open", service_name: "http" }],
        })
      );
    });

    it("lists sorted distinct ports without the host pseudo-port", async () => {
      expect(await db.featuresPortList()).toEqual([[80], [443]]);
    });

    it("adds services and products on request", async () => {
      expect(await db.featuresPortList(undefined, { useService: true, useProduct: true })).toEqual([
        [80, "http", null],
        [443, "https", "nginx"],
      ]);
    });

    it("keeps discovery order with yieldAll", async () => {
      expect(await db.featuresPortList(undefined, { yieldAll: true })).toEqual([[443], [80]]);
    });

    it("restricts to matching hosts", async () => {
      expect(await db.featuresPortList(searchService("https"))).toEqual([[80], [443]]);
    });
  });

  it("reports addresses with their port states", async () => {
    await db.storeHost(
      host("192.0.2.1", {
        ports: [
          { protocol: "tcp", port: 80, state_state: "open" },
          { port: -1, scripts: [{ id: "whois" }] },
        ],
      })
    );
    await db.storeHost(host("192.0.2.2"));

    expect(await db.getIpsPorts()).toEqual({
      records: [{ addr: "192.0.2.1", ports: [{ state_state: "open", port: 80 }] }],
      count: 2,
    });
    expect(await db.getIps(searchHost("192.0.2.2"))).toEqual({ records: [{ addr: "192.0.2.2" }], count: 1 });
  });

  it("reports open port counts and locations", async () => {
    await db.storeHost(
      host("192.0.2.1", { openports: { count: 2 }, infos: { coordinates: [48.85, 2.35] } })
    );
    await db.storeHost(host("192.0.2.2", { infos: { coordinates: [48.85, 2.35] } }));

    const counts = await db.getOpenPortCount(searchNet("192.0.2.0/24"));
    expect(counts.count).toBe(2);
    expect(counts.records).toEqual([
      { addr: "192.0.2.1", starttime: new Date(1_700_000_000_000), openports: { count: 2 } },
    ]);
    expect(await db.getLocations()).toEqual([{ value: [48.85, 2.35], count: 2 }]);
  });
});

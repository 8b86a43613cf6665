import { describe, it, expect, beforeEach } from "vitest";
import { PassiveDb, openPassiveDb } from "./passive.js";
import type { PassiveRecord } from "../types.js";
import { eq } from "../filter.js";
import { searchRecontype, searchSensor } from "../search/passive.js";
import { RecordValidationError } from "../errors.js";

const answer: PassiveRecord = {
  sensor: "S",
  recontype: "DNS_ANSWER",
  source: "A",
  value: "example.com",
  addr: "192.0.2.1",
};

describe("PassiveDb", () => {
  let db: PassiveDb;

  beforeEach(() => {
    db = openPassiveDb();
  });

  describe("insertOrUpdate", () => {
    it("folds repeated sightings into one record", async () => {
      await db.insertOrUpdate(10, answer);
      await db.insertOrUpdate(5, answer);
      await db.insertOrUpdate(20, answer);

      const records = await db.get();
      expect(records).toHaveLength(1);
      expect(records[0]?.["count"]).toBe(3);
      expect(records[0]?.["firstseen"]).toEqual(new Date(5000));
      expect(records[0]?.["lastseen"]).toEqual(new Date(20000));
      expect(records[0]?.["addr"]).toBe("192.0.2.1");
    });

    it("folds concurrent sightings without losing any", async () => {
      const ids = await Promise.all([10, 5, 20].map((time) => db.insertOrUpdate(time, answer)));

      expect(new Set(ids).size).toBe(1);
      const records = await db.get();
      expect(records).toHaveLength(1);
      expect(records[0]?.["count"]).toBe(3);
      expect(records[0]?.["firstseen"]).toEqual(new Date(5000));
      expect(records[0]?.["lastseen"]).toEqual(new Date(20000));
    });

    it("returns the same id for every sighting", async () => {
      const first = await db.insertOrUpdate(10, answer);
      const second = await db.insertOrUpdate(11, answer);
      expect(second).toBe(first);
    });

    it("keeps observations that differ apart", async () => {
      await db.insertOrUpdate(10, answer);
      await db.insertOrUpdate(10, { ...answer, value: "example.org" });
      expect(await db.count()).toBe(2);
    });

    it("adds the record's own count and spans the given period", async () => {
      await db.insertOrUpdate(100, { ...answer, count: 4 }, undefined, 150);
      await db.insertOrUpdate(120, { ...answer, count: 2 });

      const rec = await db.getOne();
      expect(rec?.["count"]).toBe(6);
      expect(rec?.["firstseen"]).toEqual(new Date(100_000));
      expect(rec?.["lastseen"]).toEqual(new Date(150_000));
    });

    it("ignores infos when matching", async () => {
      await db.insertOrUpdate(10, { ...answer, infos: { ttl: 60 } });
      await db.insertOrUpdate(20, { ...answer, infos: { ttl: 30 } });
      expect(await db.count()).toBe(1);
    });

    it("resolves infos only for new records", async () => {
      const calls: string[] = [];
      const getInfos = (rec: PassiveRecord) => {
        calls.push(String(rec.value));
        return { infos: { domain: ["com"] } };
      };

      await db.insertOrUpdate(10, answer, getInfos);
      await db.insertOrUpdate(20, answer, getInfos);

      expect(calls).toEqual(["example.com"]);
      const rec = await db.getOne();
      expect(rec?.["infos"]).toEqual({ domain: ["com"] });
    });

    it("does nothing for a null record", async () => {
      expect(await db.insertOrUpdate(10, null)).toBeUndefined();
      expect(await db.count()).toBe(0);
    });

    it("rejects records without a recontype", async () => {
      const bad: PassiveRecord = { recontype: "" };
      await expect(db.insertOrUpdate(10, bad)).rejects.toThrow(RecordValidationError);
    });
  });

  it("inserts records as they are, with the resolved fields", async () => {
    const id = await db.insert({ ...answer, count: 1, firstseen: 1, lastseen: 1 }, () => ({
      infos: { domain: ["com"] },
    }));
    await db.insert({ ...answer, count: 1, firstseen: 1, lastseen: 1 });

    expect(await db.count()).toBe(2);
    const rec = await db.getOne(eq("_id", id));
    expect(rec?.["infos"]).toEqual({ domain: ["com"] });
  });

  it("stores certificates as binary and hands them back as buffers", async () => {
    const der = new Uint8Array([0x30, 0x82, 0x01, 0x0a]);
    await db.insertOrUpdate(10, { recontype: "SSL_SERVER", source: "cert", value: der, port: 443 });

    const rec = await db.getOne(searchRecontype("SSL_SERVER"));
    expect(Buffer.isBuffer(rec?.["value"])).toBe(true);
    expect(rec?.["value"]).toEqual(Buffer.from([0x30, 0x82, 0x01, 0x0a]));
  });

  describe("topvalues", () => {
    beforeEach(async () => {
      await db.insertOrUpdate(1, { ...answer, count: 5 });
      await db.insertOrUpdate(1, { ...answer, value: "example.org", addr: "192.0.2.2" });
      await db.insertOrUpdate(1, { ...answer, sensor: "T", value: "example.net", addr: "198.51.100.9" });
    });

    it("counts one per record by default", async () => {
      expect(await db.topvalues("sensor")).toEqual([
        { value: "S", count: 2 },
        { value: "T", count: 1 },
      ]);
    });

    it("sums the records' counts when not distinct", async () => {
      expect(await db.topvalues("sensor", { distinct: false })).toEqual([
        { value: "S", count: 6 },
        { value: "T", count: 1 },
      ]);
    });

    it("weighs networks by count when not distinct", async () => {
      expect(await db.topvalues("net:24", { distinct: false })).toEqual([
        { value: "192.0.2.0/24", count: 6 },
        { value: "198.51.100.0/24", count: 1 },
      ]);
      expect(await db.topvalues("net:24")).toEqual([
        { value: "192.0.2.0/24", count: 2 },
        { value: "198.51.100.0/24", count: 1 },
      ]);
    });

    it("honours the filter and topnbr", async () => {
      expect(await db.topvalues("value", { filter: searchSensor("S"), topnbr: 1 })).toEqual([
        { value: "example.com", count: 1 },
      ]);
    });
  });

  it("lists port features from the service infos", async () => {
    await db.insertOrUpdate(1, {
      recontype: "OPEN_PORT",
      port: 22,
      addr: "192.0.2.1",
      infos: { service_name: "ssh", service_product: "OpenSSH" },
    });
    await db.insertOrUpdate(1, { recontype: "OPEN_PORT", port: 80, addr: "192.0.2.1" });

    expect(await db.featuresPortList(undefined, { useService: true })).toEqual([
      [22, "ssh"],
      [80, null],
    ]);
  });

  it("removes records by filter", async () => {
    await db.insertOrUpdate(1, answer);
    await db.insertOrUpdate(1, { ...answer, sensor: "T" });

    expect(await db.remove(searchSensor("T"))).toBe(1);
    expect(await db.distinct("sensor")).toEqual(["S"]);
  });
});

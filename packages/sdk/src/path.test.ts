import { describe, it, expect } from "vitest";
import { fieldValues, getPath, resolvePath, weightedFieldValues } from "./path.js";
import { FieldRegistry } from "./schema/fields.js";

const registry = new FieldRegistry(["ports", "ports.scripts", "hostnames", "hostnames.domains"]);

const host = {
  count: 3,
  infos: { as_num: 64500 },
  hostnames: [{ name: "a.example.com", domains: ["example.com", "com"] }, { name: "b.example.net" }],
  ports: [
    { port: 80, scripts: [{ id: "http-title" }, { id: "http-headers" }], hits: 5 },
    { port: 22 },
  ],
};

describe("getPath", () => {
  it("should get nested properties without crossing arrays", () => {
    expect(getPath(host, "infos.as_num")).toBe(64500);
    expect(getPath(host, "ports.port")).toBeUndefined();
    expect(getPath(host, "infos.missing.deeper")).toBeUndefined();
  });
});

describe("resolvePath", () => {
  it("should expand list fields crossed on the way", () => {
    expect([...resolvePath(host, "ports.port", registry)]).toEqual([80, 22]);
    expect([...resolvePath(host, "ports.scripts.id", registry)]).toEqual(["http-title", "http-headers"]);
  });

  it("should yield a terminal list whole", () => {
    expect([...resolvePath(host, "hostnames.domains", registry)]).toEqual([["example.com", "com"]]);
  });

  it("should yield nothing for missing paths", () => {
    expect([...resolvePath(host, "infos.country_code", registry)]).toEqual([]);
    expect([...resolvePath(host, "os.osclass.vendor", registry)]).toEqual([]);
  });

  it("should resolve relative to a base path", () => {
    const port = host.ports[0];
    expect([...resolvePath(port, "scripts.id", registry, "ports")]).toEqual(["http-title", "http-headers"]);
  });
});

describe("fieldValues", () => {
  it("should expand terminal lists too", () => {
    expect([...fieldValues(host, "hostnames.domains", registry)]).toEqual(["example.com", "com"]);
    expect([...fieldValues(host, "hostnames.name", registry)]).toEqual(["a.example.com", "b.example.net"]);
  });

  it("should be single pass", () => {
    const values = fieldValues(host, "ports.port", registry);
    expect([...values]).toEqual([80, 22]);
    expect([...values]).toEqual([]);
  });
});

describe("weightedFieldValues", () => {
  it("should weigh every value 1 by default", () => {
    expect([...weightedFieldValues(host, "ports.port", registry)]).toEqual([
      [80, 1],
      [22, 1],
    ]);
  });

  it("should use the record's count field", () => {
    expect([...weightedFieldValues(host, "infos.as_num", registry, { countField: "count" })]).toEqual([
      [64500, 3],
    ]);
  });

  it("should resolve a count field under the iterated list on each element", () => {
    expect([...weightedFieldValues(host, "ports.port", registry, { countField: "ports.hits" })]).toEqual([
      [80, 5],
      [22, 1],
    ]);
  });

  it("should let a fixed weight win", () => {
    expect([...weightedFieldValues(host, "ports.port", registry, { countField: "count", weight: 2 })]).toEqual([
      [80, 2],
      [22, 2],
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileCollection } from "./file.js";
import { FieldRegistry } from "../schema/fields.js";
import { eq, matchAll } from "../filter.js";
import { CollectionReadError } from "../errors.js";

const registry = new FieldRegistry([]);

describe("FileCollection", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "scanvault-file-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads a missing file as an empty collection", async () => {
    const hosts = new FileCollection(root, "hosts", registry);
    expect(await hosts.count(matchAll())).toBe(0);
    expect(hosts.filePath).toBe(join(root, "hosts.json"));
  });

  it("writes every change with bigint values tagged", async () => {
    const hosts = new FileCollection(root, "hosts", registry, { indent: 0 });
    await hosts.insert({ addr: 281470681743361n });

    expect(await readFile(join(root, "hosts.json"), "utf8")).toBe(
      '[{"_id":1,"addr":{"$bigint":"281470681743361"}}]\n'
    );
  });

  it("reopens the stored records", async () => {
    const first = new FileCollection(root, "passive", registry);
    await first.insert({ addr: 5n, value: "a" });
    await first.insert({ addr: 6n, value: "b" });
    await first.close();

    const second = new FileCollection(root, "passive", registry);
    expect(await second.get(eq("addr", 6n))).toEqual({ _id: 2, addr: 6n, value: "b" });
    expect(await second.insert({ addr: 7n })).toBe(3);
  });

  it("rejects files that do not hold records", async () => {
    await writeFile(join(root, "hosts.json"), '{"not":"an array"}');
    const hosts = new FileCollection(root, "hosts", registry);
    await expect(hosts.count(matchAll())).rejects.toThrow(CollectionReadError);
  });

  it("rejects files that are not JSON", async () => {
    await writeFile(join(root, "hosts.json"), "[{");
    const hosts = new FileCollection(root, "hosts", registry);
    await expect(hosts.search(matchAll())).rejects.toThrow(CollectionReadError);
  });
});

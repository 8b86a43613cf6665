import { describe, it, expect } from "vitest";
import { resolveOptions } from "./config.js";
import { ConfigError } from "./errors.js";
import type { HostMerger } from "./types.js";

describe("resolveOptions", () => {
  it("defaults to strict in-memory storage", () => {
    expect(resolveOptions()).toEqual({
      root: undefined,
      storage: "memory",
      indent: 2,
      validation: "strict",
      merger: undefined,
    });
  });

  it("uses file storage when a root is given", () => {
    expect(resolveOptions({ root: "/tmp/scans", indent: 0 })).toMatchObject({
      root: "/tmp/scans",
      storage: "file",
      indent: 0,
    });
    expect(resolveOptions({ root: "/tmp/scans", storage: "memory" }).storage).toBe("memory");
  });

  it("keeps the caller's merger", () => {
    const merger: HostMerger = async () => false;
    expect(resolveOptions({ merger }).merger).toBe(merger);
  });

  it("requires a root for file storage", () => {
    expect(() => resolveOptions({ storage: "file" })).toThrow(
      "Invalid database options: root: file storage needs a root directory"
    );
  });

  it("rejects out-of-range and unknown options", () => {
    expect(() => resolveOptions({ indent: 12 })).toThrow(ConfigError);
    expect(() => resolveOptions({ root: "" })).toThrow(ConfigError);
    const extra = { indent: 2, cache: true };
    expect(() => resolveOptions(extra)).toThrow(ConfigError);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { DEBUG_VAR, ROOT_VAR, isVerbose, resolveRoot } from "../src/lib/env.js";

describe("env", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of [ROOT_VAR, DEBUG_VAR]) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("prefers --root over the environment", () => {
    process.env[ROOT_VAR] = "/env/scans";
    expect(resolveRoot("/cli/scans")).toBe(path.resolve("/cli/scans"));
    expect(resolveRoot()).toBe(path.resolve("/env/scans"));
  });

  it("falls back to ./data, made absolute", () => {
    expect(resolveRoot()).toBe(path.resolve("data"));
    expect(resolveRoot("relative/scans")).toBe(path.join(process.cwd(), "relative", "scans"));
  });

  it("is verbose only for SCANVAULT_CLI_DEBUG=1", () => {
    expect(isVerbose()).toBe(false);
    process.env[DEBUG_VAR] = "yes";
    expect(isVerbose()).toBe(false);
    process.env[DEBUG_VAR] = "1";
    expect(isVerbose()).toBe(true);
  });
});

/**
 * JSON Schemas for incoming records, compiled with ajv
 *
 * Validation runs on the external form, before any codec conversion.
 */

import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { ipToInternal, toTimestamp } from "../codec.js";
import { RecordValidationError, type ValidationIssue } from "../errors.js";

export type RecordKind = "host" | "passive" | "scan";

export type ValidationMode = "strict" | "off";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const timestamp = {
  anyOf: [{ type: "number" }, { type: "string", format: "timestamp" }, { type: "object" }],
};

const address = { type: "string", format: "ip" };

const HOST_SCHEMA = {
  $id: "scanvault:host",
  type: "object",
  required: ["addr", "starttime", "endtime"],
  properties: {
    _id: { type: "string", format: "uuid" },
    addr: address,
    starttime: timestamp,
    endtime: timestamp,
    source: { type: "string" },
    scanid: {
      anyOf: [{ type: "string" }, { type: "array", items: { type: "string" } }],
    },
    categories: { type: "array", items: { type: "string" } },
    hostnames: {
      type: "array",
      items: {
        type: "object",
        required: ["name"],
        properties: {
          name: { type: "string" },
          type: { type: "string" },
          domains: { type: "array", items: { type: "string" } },
        },
      },
    },
    ports: {
      type: "array",
      items: {
        type: "object",
        required: ["port"],
        properties: {
          protocol: { type: "string" },
          port: { type: "integer", minimum: -1, maximum: 65535 },
          state_state: { type: "string" },
          state_reason_ip: address,
          screenwords: { type: "array", items: { type: "string" } },
          scripts: {
            type: "array",
            items: {
              type: "object",
              required: ["id"],
              properties: { id: { type: "string" }, output: { type: "string" } },
            },
          },
        },
      },
    },
    traces: {
      type: "array",
      items: {
        type: "object",
        properties: {
          hops: {
            type: "array",
            items: {
              type: "object",
              required: ["ipaddr"],
              properties: { ipaddr: address, ttl: { type: "integer" } },
            },
          },
        },
      },
    },
    cpes: { type: "array", items: { type: "object" } },
    infos: { type: "object" },
    openports: { type: "object" },
    schema_version: { type: "integer" },
  },
};

const PASSIVE_SCHEMA = {
  $id: "scanvault:passive",
  type: "object",
  required: ["recontype"],
  properties: {
    recontype: { type: "string", minLength: 1 },
    source: { type: "string" },
    value: { anyOf: [{ type: "string" }, { type: "object" }] },
    targetval: { type: "string" },
    sensor: { type: "string" },
    port: { type: "integer", minimum: 0, maximum: 65535 },
    addr: address,
    count: { type: "integer", minimum: 1 },
    firstseen: timestamp,
    lastseen: timestamp,
    infos: { type: "object" },
  },
};

const SCAN_SCHEMA = {
  $id: "scanvault:scan",
  type: "object",
  required: ["_id"],
  properties: {
    _id: { type: "string", minLength: 1 },
  },
};

const SCHEMAS: Record<RecordKind, SchemaObject> = {
  host: HOST_SCHEMA,
  passive: PASSIVE_SCHEMA,
  scan: SCAN_SCHEMA,
};

function accepts(decode: (text: string) => unknown): (text: string) => boolean {
  return (text) => {
    try {
      decode(text);
      return true;
    } catch {
      return false;
    }
  };
}

/**
 * Custom formats backed by the value codec
 */
export const RECORD_FORMATS: Record<string, (value: string) => boolean> = {
  ip: accepts(ipToInternal),
  timestamp: accepts(toTimestamp),
};

/**
 * Build a JSON Pointer from an ajv error
 */
function buildPointer(err: ErrorObject): string {
  const base = err.instancePath ?? "";
  const missing: unknown = err.keyword === "required" ? err.params["missingProperty"] : undefined;
  if (typeof missing === "string") {
    return `${base}/${missing}`;
  }
  return base;
}

function formatMessage(err: ErrorObject): string {
  const path = err.instancePath || "record";
  if (err.keyword === "required") {
    return `${path} is missing required property: ${String(err.params["missingProperty"])}`;
  }
  if (err.keyword === "format") {
    return `${path} must match format "${String(err.params["format"])}"`;
  }
  return `${path} ${err.message ?? "is invalid"}`;
}

/**
 * Validates incoming records against their JSON Schema
 */
export class RecordValidator {
  readonly #mode: ValidationMode;
  readonly #compiled = new Map<RecordKind, ValidateFunction>();
  readonly #ajv: InstanceType<typeof Ajv>;

  constructor(mode: ValidationMode = "strict") {
    this.#mode = mode;
    this.#ajv = new Ajv({ allErrors: true, strict: true });
    addFormats(this.#ajv, ["uuid"]);
    for (const [name, validator] of Object.entries(RECORD_FORMATS)) {
      this.#ajv.addFormat(name, validator);
    }
  }

  get mode(): ValidationMode {
    return this.#mode;
  }

  /**
   * Normalized issues of a record; empty when valid or when validation is off
   */
  issues(kind: RecordKind, record: unknown): ValidationIssue[] {
    if (this.#mode === "off") {
      return [];
    }
    let validate = this.#compiled.get(kind);
    if (!validate) {
      validate = this.#ajv.compile(SCHEMAS[kind]);
      this.#compiled.set(kind, validate);
    }
    if (validate(record)) {
      return [];
    }
    return (validate.errors ?? []).map((err) => ({
      pointer: buildPointer(err),
      message: formatMessage(err),
    }));
  }

  /**
   * @throws {RecordValidationError} If the record is invalid in strict mode
   */
  assertValid(kind: RecordKind, record: unknown): void {
    const issues = this.issues(kind, record);
    if (issues.length > 0) {
      throw new RecordValidationError(kind, issues);
    }
  }
}

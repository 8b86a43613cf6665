/**
 * Pseudo-fields of host `topvalues()`
 */

import type { Document, Filter } from "../types.js";
import { and, any, exists } from "../filter.js";
import { ipv4Network, parsePattern } from "../codec.js";
import { fieldValues, isRecord } from "../path.js";
import { compareTuples } from "../query.js";
import { InvalidPseudoFieldError } from "../errors.js";
import { ja3KeyValue, searchIPv4, type TextQuery } from "../search/common.js";
import {
  searchCpe,
  searchFile,
  searchJa3Client,
  searchJa3Server,
  searchOpenPort,
  searchPort,
  searchProduct,
  searchScript,
  searchService,
  searchSshKey,
  searchUserAgent,
  type CpeQuery,
} from "../search/host.js";
import {
  directField,
  intArgument,
  once,
  PseudoFieldTable,
  recordAt,
  recordsAt,
  valueAt,
  type FieldPlan,
  type PseudoField,
} from "./table.js";

type PortRecord = Record<string, unknown>;

const HAS_STATE = (): Filter => any("ports", exists("state_state"));

function* ports(rec: Document): Generator<PortRecord> {
  yield* recordsAt(rec, "ports");
}

function* scripts(rec: Document): Generator<PortRecord> {
  for (const port of ports(rec)) {
    yield* recordsAt(port, "scripts");
  }
}

/**
 * Elements of a list-valued script payload, over every script of every port
 */
function* payloadItems(rec: Document, key: string): Generator<PortRecord> {
  for (const script of scripts(rec)) {
    yield* recordsAt(script, key);
  }
}

function isOpen(port: PortRecord): boolean {
  return port["state_state"] === "open";
}

function textMatches(query: TextQuery, value: unknown): boolean {
  if (query instanceof RegExp) {
    return typeof value === "string" && value.search(query) !== -1;
  }
  return value === query;
}

function portNumber(field: string, text: string): number {
  return intArgument(field, text);
}

/**
 * Plan over the open ports of each record selected by `select`, counting
 * the tuple built by `pick`
 */
function openPorts(
  filter: Filter,
  fields: readonly string[],
  select: (port: PortRecord) => boolean,
  pick: (port: PortRecord) => unknown
): FieldPlan {
  return {
    filter,
    fields,
    extract: once(function* (rec) {
      for (const port of ports(rec)) {
        if (isOpen(port) && select(port)) {
          yield pick(port);
        }
      }
    }),
  };
}

const serviceOf = (port: PortRecord): unknown => valueAt(port, "service_name");
const productOf = (port: PortRecord): unknown[] => [valueAt(port, "service_name"), valueAt(port, "service_product")];
const versionOf = (port: PortRecord): unknown[] => [
  valueAt(port, "service_name"),
  valueAt(port, "service_product"),
  valueAt(port, "service_version"),
];

const CPE_PARTS = ["type", "vendor", "product", "version"] as const;
type CpePart = (typeof CPE_PARTS)[number];

function cpePart(field: string, text: string | undefined): CpePart {
  if (text === undefined) {
    return "version";
  }
  const found = CPE_PARTS.find((part) => part === text);
  if (found) {
    return found;
  }
  const index = /^[1-4]$/.test(text) ? CPE_PARTS[Number(text) - 1] : undefined;
  if (index === undefined) {
    throw new InvalidPseudoFieldError(field, `unknown CPE part "${text}"`);
  }
  return index;
}

/**
 * Split on ":" into at most `limit` parts, the last one keeping the rest
 */
function splitN(text: string, limit: number): string[] {
  const parts = text.split(":");
  if (parts.length <= limit) {
    return parts;
  }
  return [...parts.slice(0, limit - 1), parts.slice(limit - 1).join(":")];
}

function isPair(value: unknown): value is [string, unknown] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "string";
}

const ENIP_ALIASES: Readonly<Record<string, string>> = {
  vendor: "Vendor",
  product: "Product Name",
  serial: "Serial Number",
  devtype: "Device Type",
  prodcode: "Product Code",
  rev: "Revision",
  ip: "Device IP",
};

const IKE_TRANSFORM_FIELDS = [
  "Authentication",
  "Encryption",
  "GroupDesc",
  "Hash",
  "LifeDuration",
  "LifeType",
] as const;

const ENTRIES: readonly PseudoField[] = [
  {
    pattern: /^category$/,
    build: (_m, ctx) => directField("categories", ctx),
  },
  {
    pattern: /^country$/,
    build: () => ({
      filter: exists("infos.country_code"),
      fields: ["infos.country_code", "infos.country_name"],
      extract: once(function* (rec) {
        const infos = recordAt(rec, "infos");
        yield [valueAt(infos, "country_code"), infos["country_name"] ?? "?"];
      }),
    }),
  },
  {
    pattern: /^city$/,
    build: () => ({
      filter: and(exists("infos.country_code"), exists("infos.city")),
      fields: ["infos.country_code", "infos.city"],
      extract: once(function* (rec) {
        const infos = recordAt(rec, "infos");
        yield [valueAt(infos, "country_code"), valueAt(infos, "city")];
      }),
    }),
  },
  {
    pattern: /^asnum$/,
    build: (_m, ctx) => directField("infos.as_num", ctx),
  },
  {
    pattern: /^as$/,
    build: () => ({
      filter: exists("infos.as_num"),
      fields: ["infos.as_num", "infos.as_name"],
      extract: once(function* (rec) {
        const infos = recordAt(rec, "infos");
        yield [valueAt(infos, "as_num"), infos["as_name"] ?? "?"];
      }),
    }),
  },
  {
    pattern: /^net(?::(.*))?$/,
    build: (m) => {
      const bits = m[1] === undefined ? 24 : intArgument(m[0], m[1]);
      if (bits < 0 || bits > 32) {
        throw new InvalidPseudoFieldError(m[0], "prefix length must be between 0 and 32");
      }
      return {
        filter: searchIPv4(),
        fields: ["addr"],
        extract: once(function* (rec) {
          const addr = rec["addr"];
          if (typeof addr === "string") {
            yield ipv4Network(addr, bits);
          }
        }),
      };
    },
  },
  {
    pattern: /^port(?::(.+))?$/,
    build: (m) => {
      const info = m[1];
      let matchField = "ports.state_state";
      let select: (port: PortRecord) => boolean = (port) => port["state_state"] !== undefined;
      if (info === "open" || info === "filtered" || info === "closed") {
        select = (port) => port["state_state"] === info;
      } else if (info !== undefined) {
        matchField = "ports.service_name";
        select = (port) => port["service_name"] === info;
      }
      return {
        filter: HAS_STATE(),
        fields: ["ports.port", "ports.protocol", matchField],
        extract: once(function* (rec) {
          for (const port of ports(rec)) {
            if (select(port)) {
              yield [port["protocol"] ?? "?", valueAt(port, "port")];
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^portlist:(.+)$/,
    build: (m) => {
      const state = m[1];
      return {
        filter: HAS_STATE(),
        fields: ["ports.port", "ports.protocol", "ports.state_state"],
        extract: once(function* (rec) {
          const list = [...ports(rec)]
            .filter((port) => port["state_state"] === state)
            .map((port) => [port["protocol"] ?? "?", valueAt(port, "port")])
            .sort(compareTuples);
          yield list;
        }),
      };
    },
  },
  {
    pattern: /^countports:(.+)$/,
    build: (m) => {
      const state = m[1];
      return {
        filter: HAS_STATE(),
        fields: ["ports.state_state"],
        extract: once(function* (rec) {
          yield [...ports(rec)].filter((port) => port["state_state"] === state).length;
        }),
      };
    },
  },
  {
    pattern: /^service$/,
    build: () =>
      openPorts(searchOpenPort(), ["ports.state_state", "ports.service_name"], () => true, serviceOf),
  },
  {
    pattern: /^service:(.+)$/,
    build: (m) => {
      const portnum = portNumber(m[0], m[1] ?? "");
      return openPorts(
        searchPort(portnum),
        ["ports.port", "ports.state_state", "ports.service_name"],
        (port) => port["port"] === portnum,
        serviceOf
      );
    },
  },
  {
    pattern: /^product$/,
    build: () =>
      openPorts(
        searchOpenPort(),
        ["ports.state_state", "ports.service_name", "ports.service_product"],
        () => true,
        productOf
      ),
  },
  {
    pattern: /^product:(.+)$/,
    build: (m) => {
      const arg = m[1] ?? "";
      const fields = ["ports.state_state", "ports.service_name", "ports.service_product"];
      if (/^\d+$/.test(arg)) {
        const portnum = Number(arg);
        return openPorts(searchPort(portnum), ["ports.port", ...fields], (port) => port["port"] === portnum, productOf);
      }
      return openPorts(searchService(arg), fields, (port) => port["service_name"] === arg, productOf);
    },
  },
  {
    pattern: /^version$/,
    build: () =>
      openPorts(
        searchOpenPort(),
        ["ports.state_state", "ports.service_name", "ports.service_product", "ports.service_version"],
        () => true,
        versionOf
      ),
  },
  {
    pattern: /^version:(.+)$/,
    build: (m) => {
      const arg = m[1] ?? "";
      const fields = ["ports.state_state", "ports.service_name", "ports.service_product", "ports.service_version"];
      if (/^\d+$/.test(arg)) {
        const portnum = Number(arg);
        return openPorts(searchPort(portnum), ["ports.port", ...fields], (port) => port["port"] === portnum, versionOf);
      }
      const colon = arg.indexOf(":");
      if (colon !== -1) {
        const service = arg.slice(0, colon);
        const product = arg.slice(colon + 1);
        return openPorts(
          searchProduct(product, { service }),
          fields,
          (port) => port["service_name"] === service && port["service_product"] === product,
          versionOf
        );
      }
      return openPorts(searchService(arg), fields, (port) => port["service_name"] === arg, versionOf);
    },
  },
  {
    pattern: /^cpe(?:\.([^:]*))?(?::(.*))?$/,
    build: (m) => {
      const part = cpePart(m[0], m[1]);
      const constraints: [CpePart, TextQuery][] = [];
      const query: CpeQuery = {};
      splitN(m[2] ?? "", 4).forEach((segment, i) => {
        const key = CPE_PARTS[i];
        if (segment === "" || key === undefined) return;
        const value = parsePattern(segment);
        constraints.push([key, value]);
        query[key] = value;
      });
      const depth = CPE_PARTS.indexOf(part) + 1;
      return {
        filter: searchCpe(query),
        fields: ["cpes"],
        extract: once(function* (rec) {
          for (const cpe of recordsAt(rec, "cpes")) {
            if (constraints.every(([key, value]) => textMatches(value, cpe[key]))) {
              yield CPE_PARTS.slice(0, depth).map((key) => valueAt(cpe, key));
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^devicetype$/,
    build: (_m, ctx) => directField("ports.service_devicetype", ctx),
  },
  {
    pattern: /^devicetype:(.+)$/,
    build: (m) => {
      const portnum = portNumber(m[0], m[1] ?? "");
      return openPorts(
        searchPort(portnum),
        ["ports.port", "ports.state_state", "ports.service_devicetype"],
        (port) => port["port"] === portnum,
        (port) => valueAt(port, "service_devicetype")
      );
    },
  },
  {
    pattern: /^smb\.(.+)$/,
    build: (m, ctx) => {
      const sub = m[1] === "dnsdomain" ? "domain_dns" : m[1] === "forest" ? "forest_dns" : m[1];
      return directField(
        `ports.scripts.smb-os-discovery.${sub ?? ""}`,
        ctx,
        searchScript({ name: "smb-os-discovery" })
      );
    },
  },
  {
    pattern: /^script$/,
    build: (_m, ctx) => directField("ports.scripts.id", ctx),
  },
  {
    pattern: /^script:(?:([^:]+):)?(.+)$/,
    build: (m) => {
      const scriptId = m[2] ?? "";
      const portArg = m[1];
      const portnum =
        portArg === undefined ? undefined : portArg === "host" ? -1 : portNumber(m[0], portArg);
      const filter =
        portnum === undefined
          ? searchScript({ name: scriptId })
          : and(searchScript({ name: scriptId }), searchPort(portnum === -1 ? "host" : portnum));
      return {
        filter,
        fields: ["ports.port", "ports.scripts.id", "ports.scripts.output"],
        extract: once(function* (rec) {
          for (const port of ports(rec)) {
            if (portnum !== undefined && port["port"] !== portnum) continue;
            for (const script of recordsAt(port, "scripts")) {
              if (script["id"] === scriptId) {
                yield valueAt(script, "output");
              }
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^domains$/,
    build: (_m, ctx) => directField("hostnames.domains", ctx),
  },
  {
    pattern: /^domains:(.+)$/,
    build: (m) => {
      const level = intArgument(m[0], m[1]) - 1;
      return {
        filter: exists("hostnames.domains"),
        fields: ["hostnames.domains"],
        extract: once(function* (rec) {
          for (const hostname of recordsAt(rec, "hostnames")) {
            const domains = hostname["domains"];
            if (!Array.isArray(domains)) continue;
            for (const domain of domains) {
              if (typeof domain === "string" && domain.split(".").length - 1 === level) {
                yield domain;
              }
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^cert\.(.+)$/,
    build: (m, ctx) => {
      const sub = m[1] ?? "";
      const path = `ports.scripts.ssl-cert.${sub}`;
      if (sub !== "issuer" && sub !== "subject") {
        return directField(path, ctx);
      }
      return {
        filter: exists(path),
        fields: [path],
        extract: once(function* (rec) {
          for (const value of fieldValues(rec, path, ctx.registry)) {
            if (isRecord(value)) {
              yield Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
            }
          }
        }),
        output: (value) => (Array.isArray(value) ? Object.fromEntries(value.filter(isPair)) : value),
      };
    },
  },
  {
    pattern: /^useragent(?::(.+))?$/,
    build: (m, ctx) => {
      const path = "ports.scripts.http-user-agent";
      if (m[1] === undefined) {
        return directField(path, ctx, searchUserAgent());
      }
      const useragent = parsePattern(m[1]);
      return {
        filter: searchUserAgent({ useragent }),
        fields: [path],
        extract: once(function* (rec) {
          for (const script of scripts(rec)) {
            const agents = script["http-user-agent"];
            if (!Array.isArray(agents)) continue;
            for (const agent of agents) {
              if (textMatches(useragent, agent)) {
                yield agent;
              }
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^ja3-client(?:\.([^:]+))?(?::(.+))?$/,
    build: (m) => {
      const subfield = m[1] ?? "md5";
      const wanted = m[2] === undefined ? undefined : ja3KeyValue(parsePattern(m[2]));
      return {
        filter: searchJa3Client(wanted?.[1]),
        fields: ["ports.scripts.ssl-ja3-client"],
        extract: once(function* (rec) {
          for (const client of payloadItems(rec, "ssl-ja3-client")) {
            if (wanted && !textMatches(wanted[1], client[wanted[0]])) continue;
            yield valueAt(client, subfield);
          }
        }),
      };
    },
  },
  {
    pattern: /^ja3-server(?:\.([^:]+))?(?::(.*))?$/,
    build: (m) => {
      const subfield = m[1] ?? "md5";
      const [serverText, clientText] = m[2] === undefined ? [] : splitN(m[2], 2);
      const server = serverText ? ja3KeyValue(parsePattern(serverText)) : undefined;
      const client = clientText ? ja3KeyValue(parsePattern(clientText)) : undefined;
      return {
        filter: searchJa3Server(server?.[1], client?.[1]),
        fields: ["ports.scripts.ssl-ja3-server"],
        extract: once(function* (rec) {
          for (const srv of payloadItems(rec, "ssl-ja3-server")) {
            const cli = recordAt(srv, "client");
            if (server && !textMatches(server[1], srv[server[0]])) continue;
            if (client && !textMatches(client[1], cli[client[0]])) continue;
            yield [valueAt(srv, subfield), valueAt(cli, subfield)];
          }
        }),
      };
    },
  },
  {
    pattern: /^sshkey\.bits$/,
    build: () => ({
      filter: searchSshKey(),
      fields: ["ports.scripts.ssh-hostkey"],
      extract: once(function* (rec) {
        for (const key of payloadItems(rec, "ssh-hostkey")) {
          yield [valueAt(key, "type"), valueAt(key, "bits")];
        }
      }),
    }),
  },
  {
    pattern: /^sshkey\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.ssh-hostkey.${m[1] ?? ""}`, ctx, searchSshKey()),
  },
  {
    pattern: /^ike\.vendor_ids$/,
    build: () => ({
      filter: searchScript({ name: "ike-info" }),
      fields: ["ports.scripts.ike-info.vendor_ids"],
      extract: once(function* (rec) {
        for (const script of scripts(rec)) {
          for (const vid of recordsAt(recordAt(script, "ike-info"), "vendor_ids")) {
            yield [valueAt(vid, "value"), valueAt(vid, "name")];
          }
        }
      }),
    }),
  },
  {
    pattern: /^ike\.transforms$/,
    build: () => ({
      filter: searchScript({ name: "ike-info" }),
      fields: ["ports.scripts.ike-info.transforms"],
      extract: once(function* (rec) {
        for (const script of scripts(rec)) {
          for (const xfrm of recordsAt(recordAt(script, "ike-info"), "transforms")) {
            yield IKE_TRANSFORM_FIELDS.map((key) => valueAt(xfrm, key));
          }
        }
      }),
    }),
  },
  {
    pattern: /^ike\.notification$/,
    build: (_m, ctx) => directField("ports.scripts.ike-info.notification_type", ctx),
  },
  {
    pattern: /^ike\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.ike-info.${m[1] ?? ""}`, ctx),
  },
  {
    pattern: /^httphdr$/,
    build: () => ({
      filter: searchScript({ name: "http-headers" }),
      fields: ["ports.scripts.http-headers"],
      extract: once(function* (rec) {
        for (const header of payloadItems(rec, "http-headers")) {
          yield [valueAt(header, "name"), valueAt(header, "value")];
        }
      }),
    }),
  },
  {
    pattern: /^httphdr\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.http-headers.${m[1] ?? ""}`, ctx),
  },
  {
    pattern: /^httphdr:(.+)$/,
    build: (m) => {
      const name = (m[1] ?? "").toLowerCase();
      return {
        filter: searchScript({ name: "http-headers", values: { name } }),
        fields: ["ports.scripts.http-headers"],
        extract: once(function* (rec) {
          for (const header of payloadItems(rec, "http-headers")) {
            const headerName = header["name"];
            if (typeof headerName === "string" && headerName.toLowerCase() === name) {
              yield valueAt(header, "value");
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^modbus\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.modbus-discover.${m[1] ?? ""}`, ctx),
  },
  {
    pattern: /^s7\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.s7-info.${m[1] ?? ""}`, ctx),
  },
  {
    pattern: /^enip\.(.+)$/,
    build: (m, ctx) => {
      const sub = m[1] ?? "";
      return directField(`ports.scripts.enip-info.${ENIP_ALIASES[sub] ?? sub}`, ctx);
    },
  },
  {
    pattern: /^mongo\.dbs\.(.+)$/,
    build: (m, ctx) => directField(`ports.scripts.mongodb-databases.${m[1] ?? ""}`, ctx),
  },
  {
    pattern: /^vulns\.(.+)$/,
    build: (m, ctx) => {
      const sub = m[1] ?? "";
      const path = `ports.scripts.vulns.${sub}`;
      if (sub === "id") {
        return directField(path, ctx);
      }
      return {
        filter: exists(path),
        fields: [path, "ports.scripts.vulns.id"],
        extract: once(function* (rec) {
          for (const vuln of payloadItems(rec, "vulns")) {
            yield [valueAt(vuln, "id"), valueAt(vuln, sub)];
          }
        }),
      };
    },
  },
  {
    pattern: /^file(?:\.(.+)|:([^.]+)(?:\.(.+))?)?$/,
    build: (m) => {
      const fieldname = m[1] ?? m[3] ?? "filename";
      const ids = m[2]?.split(",");
      return {
        filter: searchFile({ scripts: ids }),
        fields: ["ports.scripts.id", "ports.scripts.ls"],
        extract: once(function* (rec) {
          for (const script of scripts(rec)) {
            if (ids !== undefined && !ids.some((id) => id === script["id"])) continue;
            for (const volume of recordsAt(recordAt(script, "ls"), "volumes")) {
              for (const file of recordsAt(volume, "files")) {
                yield valueAt(file, fieldname);
              }
            }
          }
        }),
      };
    },
  },
  {
    pattern: /^screenwords$/,
    build: (_m, ctx) => directField("ports.screenwords", ctx),
  },
  {
    pattern: /^hop$/,
    build: (_m, ctx) => directField("traces.hops.ipaddr", ctx),
  },
  {
    pattern: /^hop([:>])(.+)$/,
    build: (m) => {
      const ttl = intArgument(m[0], m[2]);
      const select =
        m[1] === ":"
          ? (hop: PortRecord) => (hop["ttl"] ?? 0) === ttl
          : (hop: PortRecord) => {
              const value = hop["ttl"] ?? 0;
              return typeof value === "number" && value > ttl;
            };
      return {
        filter: exists("traces.hops.ipaddr"),
        fields: ["traces.hops.ipaddr", "traces.hops.ttl"],
        extract: once(function* (rec) {
          for (const trace of recordsAt(rec, "traces")) {
            for (const hop of recordsAt(trace, "hops")) {
              if (select(hop)) {
                yield valueAt(hop, "ipaddr");
              }
            }
          }
        }),
      };
    },
  },
];

export const HOST_TOPVALUES = new PseudoFieldTable(ENTRIES);

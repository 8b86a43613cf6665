/**
 * Search builders for host records
 *
 * Every builder returns a plain filter tree; nothing here touches storage.
 * Port-level conditions sit under `any("ports", …)`, script-level ones under
 * `any("ports", any("scripts", …))`.
 */

import type { Filter, TimestampInput } from "../types.js";
import { all, and, any, cmp, contains, eq, exists, ne, negateIf, not, oneOf, or, regex } from "../filter.js";
import { ipToInternal, toTimestamp } from "../codec.js";
import { HOST_FIELDS } from "../schema/fields.js";
import { AddressDecodeError, InvalidArgumentError } from "../errors.js";
import { ja3KeyValue, searchString, searchStringInArray, secondsAgo, type TextQuery } from "./common.js";

/**
 * Script ids whose structured payload is stored under another key
 */
export const SCRIPT_ALIASES: Readonly<Record<string, string>> = {
  "afp-ls": "ls",
  "ftp-anon": "ls",
  "http-ls": "ls",
  "nfs-ls": "ls",
  "smb-ls": "ls",
};

export function searchDomain(name: TextQuery, neg = false): Filter {
  return negateIf(any("hostnames", searchStringInArray("domains", name)), neg);
}

export function searchHostname(name: TextQuery, neg = false): Filter {
  return negateIf(any("hostnames", searchString("name", name)), neg);
}

export function searchCategory(category: TextQuery, neg = false): Filter {
  return searchStringInArray("categories", category, neg);
}

export function searchCountry(country: string | readonly string[], neg = false): Filter {
  if (typeof country !== "string") {
    return negateIf(oneOf("infos.country_code", country), neg);
  }
  return neg ? ne("infos.country_code", country) : eq("infos.country_code", country);
}

export function searchCity(city: TextQuery, neg = false): Filter {
  return searchString("infos.city", city, neg);
}

export function searchHasLocation(neg = false): Filter {
  return negateIf(exists("infos.coordinates"), neg);
}

function toAsNumber(value: number | string): number {
  const num = typeof value === "number" ? value : Number(value.replace(/^AS/i, ""));
  if (!Number.isInteger(num)) {
    throw new InvalidArgumentError(`Invalid AS number: ${String(value)}`);
  }
  return num;
}

export function searchAsNum(asnum: number | string | ReadonlyArray<number | string>, neg = false): Filter {
  if (typeof asnum === "number" || typeof asnum === "string") {
    const num = toAsNumber(asnum);
    return neg ? ne("infos.as_num", num) : eq("infos.as_num", num);
  }
  return negateIf(oneOf("infos.as_num", asnum.map(toAsNumber)), neg);
}

export function searchAsName(name: TextQuery, neg = false): Filter {
  return searchString("infos.as_name", name, neg);
}

export function searchSource(source: TextQuery, neg = false): Filter {
  return searchString("source", source, neg);
}

/**
 * Hosts with `port`/`protocol` in `state`. `"host"` targets the host-level
 * pseudo-port -1.
 *
 * Negated, a host matches when it has the port in another state, or when
 * none of its ports is that port at all; a host without any `ports` field
 * matches neither.
 */
export function searchPort(
  port: number | "host",
  protocol = "tcp",
  state = "open",
  neg = false
): Filter {
  if (port === "host") {
    return any("ports", neg ? cmp("port", ">", 0) : eq("port", -1));
  }
  const same = and(eq("port", port), eq("protocol", protocol));
  if (neg) {
    return or(any("ports", and(same, ne("state_state", state))), all("ports", not(same)));
  }
  return any("ports", and(same, eq("state_state", state)));
}

/**
 * Hosts with at least one port in `state` other than those listed
 */
export function searchPortsOther(ports: readonly number[], protocol = "tcp", state = "open"): Filter {
  return any(
    "ports",
    and(eq("protocol", protocol), eq("state_state", state), not(oneOf("port", ports)))
  );
}

/**
 * Hosts with every listed port (negated: with none of them)
 */
export function searchPorts(ports: readonly number[], protocol = "tcp", state = "open", neg = false): Filter {
  const res = ports.map((port) => searchPort(port, protocol, state));
  return neg ? not(or(...res)) : and(...res);
}

/**
 * Hosts whose open port count lies in [min, max]
 */
export function searchCountOpenPorts(min?: number, max?: number, neg = false): Filter {
  if (min === undefined && max === undefined) {
    throw new InvalidArgumentError("searchCountOpenPorts() needs a minimum or a maximum");
  }
  if (min === max && min !== undefined) {
    return neg ? ne("openports.count", min) : eq("openports.count", min);
  }
  const res: Filter[] = [];
  if (min !== undefined) {
    res.push(neg ? cmp("openports.count", "<", min) : cmp("openports.count", ">=", min));
  }
  if (max !== undefined) {
    res.push(neg ? cmp("openports.count", ">", max) : cmp("openports.count", "<=", max));
  }
  return neg ? or(...res) : and(...res);
}

export function searchOpenPort(neg = false): Filter {
  return negateIf(any("ports", eq("state_state", "open")), neg);
}

export interface ServiceQuery {
  port?: number;
  protocol?: string;
}

export function searchService(service: TextQuery, options: ServiceQuery = {}): Filter {
  const res: Filter[] = [searchString("service_name", service)];
  if (options.port !== undefined) res.push(eq("port", options.port));
  if (options.protocol !== undefined) res.push(eq("protocol", options.protocol));
  return any("ports", and(...res));
}

export interface ProductQuery extends ServiceQuery {
  version?: TextQuery;
  service?: TextQuery;
}

export function searchProduct(product: TextQuery, options: ProductQuery = {}): Filter {
  const res: Filter[] = [searchString("service_product", product)];
  if (options.version !== undefined) res.push(searchString("service_version", options.version));
  if (options.service !== undefined) res.push(searchString("service_name", options.service));
  if (options.port !== undefined) res.push(eq("port", options.port));
  if (options.protocol !== undefined) res.push(eq("protocol", options.protocol));
  return any("ports", and(...res));
}

export type ScriptValues = TextQuery | Readonly<Record<string, unknown>>;

export interface ScriptQuery {
  name?: TextQuery;
  output?: TextQuery;
  /** Conditions on the script's structured payload */
  values?: ScriptValues;
  neg?: boolean;
}

function payloadCondition(path: string, value: unknown, isList: boolean): Filter {
  if (value instanceof RegExp) {
    return regex(path, value);
  }
  return isList ? contains(path, [value]) : eq(path, value);
}

/**
 * Hosts with a script result matching every given condition
 * @throws {InvalidArgumentError} If `values` is given without a literal `name`
 */
export function searchScript(query: ScriptQuery = {}): Filter {
  const { name, output, values, neg = false } = query;
  const res: Filter[] = [];
  if (name !== undefined) {
    res.push(searchString("id", name));
  }
  if (output !== undefined) {
    res.push(searchString("output", output));
  }
  if (values !== undefined) {
    if (typeof name !== "string") {
      throw new InvalidArgumentError("searchScript() needs a literal `name` when using `values`");
    }
    const key = SCRIPT_ALIASES[name] ?? name;
    const keyIsList = HOST_FIELDS.isList(`ports.scripts.${key}`);
    if (typeof values === "string" || values instanceof RegExp) {
      res.push(keyIsList ? searchStringInArray(key, values) : searchString(key, values));
    } else {
      const conditions = Object.entries(values).map(([field, value]) =>
        payloadCondition(
          keyIsList ? field : `${key}.${field}`,
          value,
          HOST_FIELDS.isList(`ports.scripts.${key}.${field}`)
        )
      );
      res.push(keyIsList ? any(key, and(...conditions)) : and(...conditions));
    }
  }
  const found = res.length > 0 ? any("ports", any("scripts", and(...res))) : any("ports", exists("scripts"));
  return negateIf(found, neg);
}

export function searchSvcHostname(hostname: TextQuery): Filter {
  return any("ports", searchString("service_hostname", hostname));
}

export function searchWebmin(): Filter {
  return any(
    "ports",
    and(
      eq("service_name", "http"),
      eq("service_product", "MiniServ"),
      ne("service_extrainfo", "Webmin httpd")
    )
  );
}

export function searchX11(): Filter {
  return any("ports", and(eq("service_name", "X11"), ne("service_extrainfo", "access denied")));
}

export interface FileQuery {
  /** File name to look for; any file when omitted */
  fname?: TextQuery;
  /** Restrict to these listing scripts */
  scripts?: string | readonly string[];
}

/**
 * Hosts sharing a file, as reported by file-listing scripts
 */
export function searchFile(query: FileQuery = {}): Filter {
  const fname = query.fname === undefined ? exists("filename") : searchString("filename", query.fname);
  const listing = any("ls.volumes", any("files", fname));
  const { scripts } = query;
  if (scripts === undefined) {
    return any("ports", any("scripts", listing));
  }
  const ids = typeof scripts === "string" ? [scripts] : scripts;
  const idFilter = ids.length === 1 ? eq("id", ids[0]) : oneOf("id", ids);
  return any("ports", any("scripts", and(idFilter, listing)));
}

export function searchHttpTitle(title: TextQuery): Filter {
  return any(
    "ports",
    any("scripts", and(oneOf("id", ["http-title", "html-title"]), searchString("output", title)))
  );
}

export function searchOs(text: TextQuery): Filter {
  return any(
    "os.osclass",
    or(searchString("vendor", text), searchString("osfamily", text), searchString("osclass", text))
  );
}

export function searchVsftpdBackdoor(): Filter {
  return any(
    "ports",
    and(
      eq("protocol", "tcp"),
      eq("state_state", "open"),
      eq("service_product", "vsftpd"),
      eq("service_version", "2.3.4")
    )
  );
}

export function searchVulnIntersil(): Filter {
  return any(
    "ports",
    and(
      eq("protocol", "tcp"),
      eq("state_state", "open"),
      eq("service_product", "Boa HTTPd"),
      regex("service_version", /^0\.9(3([^0-9]|$)|4\.([0-9]|0[0-9]|1[0-1])([^0-9]|$))/)
    )
  );
}

export function searchDeviceType(devtype: TextQuery | readonly string[]): Filter {
  if (typeof devtype === "string" || devtype instanceof RegExp) {
    return any("ports", searchString("service_devicetype", devtype));
  }
  return any("ports", oneOf("service_devicetype", devtype));
}

export function searchNetDev(): Filter {
  return searchDeviceType([
    "bridge",
    "broadband router",
    "firewall",
    "hub",
    "load balancer",
    "proxy server",
    "router",
    "switch",
    "WAP",
  ]);
}

export function searchPhoneDev(): Filter {
  return searchDeviceType(["PBX", "phone", "telecom-misc", "VoIP adapter", "VoIP phone"]);
}

export function searchLdapAnon(): Filter {
  return any("ports", eq("service_extrainfo", "Anonymous bind OK"));
}

export interface VulnQuery {
  vulnid?: TextQuery;
  status?: TextQuery;
}

export function searchVuln(query: VulnQuery = {}): Filter {
  const res: Filter[] = [];
  if (query.status !== undefined) res.push(any("vulns", searchString("status", query.status)));
  if (query.vulnid !== undefined) res.push(any("vulns", searchString("id", query.vulnid)));
  const cond = res.length > 0 ? and(...res) : any("vulns", exists("id"));
  return any("ports", any("scripts", cond));
}

/**
 * Hosts seen (by `endtime`) within the last `seconds`
 */
export function searchTimeAgo(seconds: number, neg = false): Filter {
  const since = secondsAgo(seconds);
  return neg ? cmp("endtime", "<", since) : cmp("endtime", ">=", since);
}

/**
 * Hosts whose scan window overlaps [start, stop]
 */
export function searchTimeRange(start: TimestampInput, stop: TimestampInput, neg = false): Filter {
  const from = toTimestamp(start);
  const to = toTimestamp(stop);
  if (neg) {
    return or(cmp("endtime", "<", from), cmp("starttime", ">", to));
  }
  return and(cmp("endtime", ">=", from), cmp("starttime", "<=", to));
}

function hopValue(hop: string | bigint): string | bigint {
  try {
    return ipToInternal(hop);
  } catch (err) {
    if (err instanceof AddressDecodeError) {
      return hop;
    }
    throw err;
  }
}

/**
 * Hosts with a traceroute hop at `hop` (an address, or any stored value)
 */
export function searchHop(hop: string | bigint, ttl?: number, neg = false): Filter {
  const res: Filter[] = [eq("ipaddr", hopValue(hop))];
  if (ttl !== undefined) {
    res.push(eq("ttl", ttl));
  }
  return negateIf(any("traces", any("hops", and(...res))), neg);
}

export function searchHopDomain(hop: TextQuery, neg = false): Filter {
  return negateIf(any("traces", any("hops", searchStringInArray("domains", hop))), neg);
}

export function searchHopName(hop: TextQuery, neg = false): Filter {
  return negateIf(any("traces", any("hops", searchString("host", hop))), neg);
}

export interface CpeQuery {
  type?: TextQuery;
  vendor?: TextQuery;
  product?: TextQuery;
  version?: TextQuery;
}

/**
 * Hosts with a CPE matching every given part; any CPE when none is given
 */
export function searchCpe(query: CpeQuery = {}): Filter {
  const parts = (["type", "vendor", "product", "version"] as const).flatMap((part) => {
    const value = query[part];
    return value === undefined ? [] : [searchString(part, value)];
  });
  if (parts.length === 0) {
    return exists("cpes");
  }
  return any("cpes", and(...parts));
}

export interface UserAgentQuery {
  useragent?: TextQuery;
  neg?: boolean;
}

export function searchUserAgent(query: UserAgentQuery = {}): Filter {
  return searchScript({ name: "http-user-agent", values: query.useragent, neg: query.neg });
}

export function searchJa3Client(valueOrHash?: TextQuery): Filter {
  if (valueOrHash === undefined) {
    return searchScript({ name: "ssl-ja3-client" });
  }
  const [key, value] = ja3KeyValue(valueOrHash);
  return searchScript({ name: "ssl-ja3-client", values: { [key]: value } });
}

export function searchJa3Server(valueOrHash?: TextQuery, clientValueOrHash?: TextQuery): Filter {
  const values: Record<string, unknown> = {};
  if (valueOrHash !== undefined) {
    const [key, value] = ja3KeyValue(valueOrHash);
    values[key] = value;
  }
  if (clientValueOrHash !== undefined) {
    const [key, value] = ja3KeyValue(clientValueOrHash);
    values[`client.${key}`] = value;
  }
  if (Object.keys(values).length === 0) {
    return searchScript({ name: "ssl-ja3-server" });
  }
  return searchScript({ name: "ssl-ja3-server", values });
}

export interface SshKeyQuery {
  fingerprint?: TextQuery;
  key?: TextQuery;
  keytype?: string;
  bits?: number;
}

export function searchSshKey(query: SshKeyQuery = {}): Filter {
  const values: Record<string, unknown> = {};
  if (query.fingerprint !== undefined) {
    values["fingerprint"] =
      typeof query.fingerprint === "string"
        ? query.fingerprint.replaceAll(":", "").toLowerCase()
        : query.fingerprint;
  }
  if (query.key !== undefined) values["key"] = query.key;
  if (query.keytype !== undefined) values["type"] = `ssh-${query.keytype}`;
  if (query.bits !== undefined) values["bits"] = query.bits;
  if (Object.keys(values).length === 0) {
    return searchScript({ name: "ssh-hostkey" });
  }
  return searchScript({ name: "ssh-hostkey", values });
}

export function searchCert(keytype?: string): Filter {
  if (keytype === undefined) {
    return searchScript({ name: "ssl-cert" });
  }
  return searchScript({ name: "ssl-cert", values: { "pubkey.type": keytype } });
}

export interface HttpHeaderQuery {
  name?: string;
  value?: TextQuery;
}

export function searchHttpHeader(query: HttpHeaderQuery = {}): Filter {
  const values: Record<string, unknown> = {};
  if (query.name !== undefined) values["name"] = query.name.toLowerCase();
  if (query.value !== undefined) values["value"] = query.value;
  if (Object.keys(values).length === 0) {
    return searchScript({ name: "http-headers" });
  }
  return searchScript({ name: "http-headers", values });
}

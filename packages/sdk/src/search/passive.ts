/**
 * Search builders for passive records
 */

import type { Filter, TimestampInput } from "../types.js";
import { and, cmp, contains, eq, ne, negateIf, oneOf, regex } from "../filter.js";
import { toTimestamp } from "../codec.js";
import { UnsupportedQueryError } from "../errors.js";
import { ja3KeyValue, searchString, secondsAgo, type TextQuery } from "./common.js";

export function searchRecontype(recontype: TextQuery | readonly string[], neg = false): Filter {
  if (typeof recontype === "string" || recontype instanceof RegExp) {
    return searchString("recontype", recontype, neg);
  }
  return negateIf(oneOf("recontype", recontype), neg);
}

export function searchSensor(sensor: TextQuery, neg = false): Filter {
  return searchString("sensor", sensor, neg);
}

function requireTcp(protocol: string): void {
  if (protocol !== "tcp") {
    throw new UnsupportedQueryError("Passive records only know TCP ports");
  }
}

/**
 * Records seen on a TCP port. Passive records only hold open TCP ports.
 * @throws {UnsupportedQueryError} For any other protocol or state
 */
export function searchPort(port: number, protocol = "tcp", state = "open", neg = false): Filter {
  requireTcp(protocol);
  if (state !== "open") {
    throw new UnsupportedQueryError("Passive records only know open ports");
  }
  return neg ? ne("port", port) : eq("port", port);
}

export interface ServiceQuery {
  port?: number;
  protocol?: string;
}

export function searchService(service: TextQuery, options: ServiceQuery = {}): Filter {
  if (options.protocol !== undefined) requireTcp(options.protocol);
  const res: Filter[] = [searchString("infos.service_name", service)];
  if (options.port !== undefined) res.push(eq("port", options.port));
  return and(...res);
}

export interface ProductQuery extends ServiceQuery {
  version?: TextQuery;
  service?: TextQuery;
}

export function searchProduct(product: TextQuery, options: ProductQuery = {}): Filter {
  if (options.protocol !== undefined) requireTcp(options.protocol);
  const res: Filter[] = [searchString("infos.service_product", product)];
  if (options.version !== undefined) res.push(searchString("infos.service_version", options.version));
  if (options.service !== undefined) res.push(searchString("infos.service_name", options.service));
  if (options.port !== undefined) res.push(eq("port", options.port));
  return and(...res);
}

export function searchSvcHostname(hostname: TextQuery): Filter {
  return searchString("infos.service_hostname", hostname);
}

/**
 * MAC address observations, optionally for one address
 */
export function searchMac(mac?: TextQuery, neg = false): Filter {
  if (mac !== undefined) {
    const value = typeof mac === "string" ? mac.toLowerCase() : mac;
    return and(eq("recontype", "MAC_ADDRESS"), searchString("value", value, neg));
  }
  return neg ? ne("recontype", "MAC_ADDRESS") : eq("recontype", "MAC_ADDRESS");
}

/**
 * @throws {UnsupportedQueryError} When negated
 */
export function searchUserAgent(useragent?: TextQuery, neg = false): Filter {
  if (neg) {
    throw new UnsupportedQueryError("Negated user-agent search is not supported");
  }
  const base = and(eq("recontype", "HTTP_CLIENT_HEADER"), eq("source", "USER-AGENT"));
  if (useragent === undefined) {
    return base;
  }
  return and(base, searchString("value", useragent));
}

export interface DnsQuery {
  name?: TextQuery | readonly string[];
  /** Match the answer's target instead of the queried name */
  reverse?: boolean;
  /** Record type, e.g. "a" or "mx" */
  dnstype?: string;
  /** Match the name and every subdomain of it */
  subdomains?: boolean;
}

export function searchDns(query: DnsQuery = {}): Filter {
  const { name, reverse = false, dnstype, subdomains = false } = query;
  const res: Filter[] = [eq("recontype", "DNS_ANSWER")];
  if (name !== undefined) {
    if (subdomains) {
      const path = reverse ? "infos.domaintarget" : "infos.domain";
      if (typeof name === "string" || name instanceof RegExp) {
        res.push(name instanceof RegExp ? regex(path, name) : contains(path, [name]));
      } else {
        res.push(contains(path, name));
      }
    } else {
      const path = reverse ? "targetval" : "value";
      if (typeof name === "string" || name instanceof RegExp) {
        res.push(searchString(path, name));
      } else {
        res.push(oneOf(path, name));
      }
    }
  }
  if (dnstype !== undefined) {
    res.push(regex("source", `^${dnstype.toUpperCase()}-`));
  }
  return and(...res);
}

const CERT_BASE = (): Filter => and(eq("recontype", "SSL_SERVER"), eq("source", "cert"));

export function searchCert(keytype?: string): Filter {
  if (keytype === undefined) {
    return CERT_BASE();
  }
  return and(CERT_BASE(), eq("infos.pubkeyalgo", `${keytype}Encryption`));
}

function ja3Value(valueOrHash: TextQuery): Filter {
  const [key, value] = ja3KeyValue(valueOrHash);
  return searchString(key === "md5" ? "value" : `infos.${key}`, value);
}

export function searchJa3Client(valueOrHash?: TextQuery): Filter {
  const base = and(eq("recontype", "SSL_CLIENT"), eq("source", "ja3"));
  if (valueOrHash === undefined) {
    return base;
  }
  return and(base, ja3Value(valueOrHash));
}

/**
 * JA3 server fingerprints, optionally restricted to the client fingerprint
 * they answered
 */
export function searchJa3Server(valueOrHash?: TextQuery, clientValueOrHash?: TextQuery): Filter {
  const res: Filter[] = [eq("recontype", "SSL_SERVER")];
  if (valueOrHash !== undefined) {
    res.push(ja3Value(valueOrHash));
  }
  if (clientValueOrHash === undefined) {
    res.push(regex("source", "^ja3-"));
  } else {
    const [key, value] = ja3KeyValue(clientValueOrHash);
    if (key === "md5" && typeof value === "string") {
      res.push(eq("source", `ja3-${value}`));
    } else {
      res.push(regex("source", "^ja3-"), searchString(`infos.client.${key}`, value));
    }
  }
  return and(...res);
}

export function searchSshKey(keytype?: string): Filter {
  const base = and(eq("recontype", "SSH_SERVER_HOSTKEY"), eq("source", "SSHv2"));
  if (keytype === undefined) {
    return base;
  }
  return and(base, eq("infos.algo", `ssh-${keytype}`));
}

/**
 * Certificates whose subject matches, and whose issuer matches `issuer`
 * when given
 */
export function searchCertSubject(expr: TextQuery, issuer?: TextQuery): Filter {
  const res: Filter[] = [CERT_BASE(), searchString("infos.subject_text", expr)];
  if (issuer !== undefined) {
    res.push(searchString("infos.issuer_text", issuer));
  }
  return and(...res);
}

export function searchCertIssuer(expr: TextQuery): Filter {
  return and(CERT_BASE(), searchString("infos.issuer_text", expr));
}

const HTTP_AUTH = (): Filter =>
  and(
    oneOf("recontype", ["HTTP_CLIENT_HEADER", "HTTP_CLIENT_HEADER_SERVER"]),
    oneOf("source", ["AUTHORIZATION", "PROXY-AUTHORIZATION"])
  );

export function searchBasicAuth(): Filter {
  return and(HTTP_AUTH(), regex("value", "^Basic", "i"));
}

export function searchHttpAuth(): Filter {
  return HTTP_AUTH();
}

export function searchFtpAuth(): Filter {
  return oneOf("recontype", ["FTP_CLIENT", "FTP_SERVER"]);
}

export function searchPopAuth(): Filter {
  return oneOf("recontype", ["POP_CLIENT", "POP_SERVER"]);
}

export function searchTcpSrvBanner(banner: TextQuery): Filter {
  return and(eq("recontype", "TCP_SERVER_BANNER"), searchString("value", banner));
}

/**
 * Records first seen (`isNew`) or last seen within the last `seconds`
 */
export function searchTimeAgo(seconds: number, neg = false, isNew = true): Filter {
  const path = isNew ? "firstseen" : "lastseen";
  const since = secondsAgo(seconds);
  return neg ? cmp(path, "<", since) : cmp(path, ">=", since);
}

/**
 * Records first seen (`isNew`) or last seen after `timestamp`
 */
export function searchNewer(timestamp: TimestampInput, neg = false, isNew = true): Filter {
  const path = isNew ? "firstseen" : "lastseen";
  const ts = toTimestamp(timestamp);
  return neg ? cmp(path, "<=", ts) : cmp(path, ">", ts);
}

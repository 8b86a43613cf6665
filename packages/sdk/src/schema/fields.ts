/**
 * Field schema registry: which dotted paths hold arrays
 *
 * Every traversal (extraction, filter evaluation, projection) consults a
 * registry before descending so that array levels are mapped element-wise.
 * Unknown paths are not lists.
 */

export class FieldRegistry {
  readonly #lists: ReadonlySet<string>;

  constructor(listFields: Iterable<string>) {
    this.#lists = new Set(listFields);
  }

  /**
   * True if the dotted path is declared array-valued
   */
  isList(path: string): boolean {
    return this.#lists.has(path);
  }
}

/**
 * Join a base path and a segment
 */
export function joinPath(base: string, segment: string): string {
  return base ? `${base}.${segment}` : segment;
}

export const HOST_LIST_FIELDS = [
  "categories",
  "cpes",
  "cpes.origins",
  "hostnames",
  "hostnames.domains",
  "openports.tcp.ports",
  "openports.udp.ports",
  "os.osclass",
  "os.osmatch",
  "ports",
  "ports.screenwords",
  "ports.scripts",
  "ports.scripts.dns-domains",
  "ports.scripts.dns-domains.parents",
  "ports.scripts.http-headers",
  "ports.scripts.http-user-agent",
  "ports.scripts.ike-info.transforms",
  "ports.scripts.ike-info.vendor_ids",
  "ports.scripts.ls.volumes",
  "ports.scripts.ls.volumes.files",
  "ports.scripts.mongodb-databases.databases",
  "ports.scripts.mongodb-databases.databases.shards",
  "ports.scripts.rpcinfo",
  "ports.scripts.rpcinfo.version",
  "ports.scripts.smb-enum-shares.shares",
  "ports.scripts.ssh-hostkey",
  "ports.scripts.ssl-ja3-client",
  "ports.scripts.ssl-ja3-server",
  "ports.scripts.vulns",
  "ports.scripts.vulns.ids",
  "ports.scripts.vulns.refs",
  "scanid",
  "traces",
  "traces.hops",
  "traces.hops.domains",
] as const;

export const PASSIVE_LIST_FIELDS = [
  "infos.domain",
  "infos.domaintarget",
  "infos.san",
] as const;

/**
 * Registry for host records
 */
export const HOST_FIELDS = new FieldRegistry(HOST_LIST_FIELDS);

/**
 * Registry for passive records
 */
export const PASSIVE_FIELDS = new FieldRegistry(PASSIVE_LIST_FIELDS);

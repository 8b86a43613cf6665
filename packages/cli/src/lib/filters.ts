/**
 * Filters built from command line flags, combined with `and`
 */

import { and, hostSearch, passiveSearch, searchHost, searchNet, searchRange, type Filter } from "@scanvault/sdk";
import { parseRange } from "./arg.js";

export interface FilterFlags {
  host?: string;
  /** "start-stop" or a CIDR network */
  range?: string;
  port?: number;
  service?: string;
  country?: string;
  recontype?: string;
  sensor?: string;
}

function addressFilters(flags: FilterFlags): Filter[] {
  const res: Filter[] = [];
  if (flags.host !== undefined) res.push(searchHost(flags.host));
  if (flags.range !== undefined) {
    if (flags.range.includes("/")) {
      res.push(searchNet(flags.range));
    } else {
      const [start, stop] = parseRange(flags.range);
      res.push(searchRange(start, stop));
    }
  }
  return res;
}

export function hostFilter(flags: FilterFlags): Filter {
  const res = addressFilters(flags);
  if (flags.port !== undefined) res.push(hostSearch.searchPort(flags.port));
  if (flags.service !== undefined) res.push(hostSearch.searchService(flags.service));
  if (flags.country !== undefined) res.push(hostSearch.searchCountry(flags.country));
  return and(...res);
}

export function passiveFilter(flags: FilterFlags): Filter {
  const res = addressFilters(flags);
  if (flags.port !== undefined) res.push(passiveSearch.searchPort(flags.port));
  if (flags.service !== undefined) res.push(passiveSearch.searchService(flags.service));
  if (flags.recontype !== undefined) res.push(passiveSearch.searchRecontype(flags.recontype));
  if (flags.sensor !== undefined) res.push(passiveSearch.searchSensor(flags.sensor));
  return and(...res);
}

/**
 * Record factories
 */

import type { HostRecord, PassiveRecord, PortEntry } from "@scanvault/sdk";

/**
 * Open TCP port with a service name
 */
export function openPort(port: number, service?: string, extra: Partial<PortEntry> = {}): PortEntry {
  return {
    protocol: "tcp",
    port,
    state_state: "open",
    ...(service === undefined ? {} : { service_name: service }),
    ...extra,
  };
}

/**
 * Host scanned on 2024-01-01 between 00:00 and 00:05 UTC
 */
export function makeHost(addr: string, overrides: Partial<HostRecord> = {}): HostRecord {
  return {
    addr,
    starttime: "2024-01-01T00:00:00Z",
    endtime: "2024-01-01T00:05:00Z",
    source: "test-scan",
    ...overrides,
  };
}

/**
 * DNS answer observed by the "test-sensor" sensor
 */
export function makePassive(value: string, overrides: Partial<PassiveRecord> = {}): PassiveRecord {
  return {
    recontype: "DNS_ANSWER",
    source: "A",
    sensor: "test-sensor",
    value,
    ...overrides,
  };
}

/**
 * Database handles for CLI commands
 *
 * Every command opens file-backed databases under the data directory and
 * releases them when it is done.
 */

import { openHostDb, openPassiveDb, type HostDb, type PassiveDb } from "@scanvault/sdk";

export interface CliDatabases {
  hosts: HostDb;
  passive: PassiveDb;
}

/**
 * Open both databases under `root`, run `fn` and close them
 */
export async function withDatabases<T>(root: string, fn: (dbs: CliDatabases) => Promise<T>): Promise<T> {
  const dbs: CliDatabases = {
    hosts: openHostDb({ root }),
    passive: openPassiveDb({ root }),
  };
  try {
    return await fn(dbs);
  } finally {
    await Promise.all([dbs.hosts.invalidateCache(), dbs.passive.invalidateCache()]);
  }
}

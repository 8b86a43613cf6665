/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openHostDb, openPassiveDb } from "@scanvault/sdk";
import type { DatabaseOptions, HostDb, PassiveDb } from "@scanvault/sdk";

/**
 * Create a unique temporary directory
 * @param prefix - Prefix for the directory name (default: "scanvault-test-")
 * @returns Absolute path to the directory
 */
export async function createTempRoot(prefix = "scanvault-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export interface TempDatabases {
  hosts: HostDb;
  passive: PassiveDb;
  root: string;
}

/**
 * Run `fn` against file-backed databases in a fresh directory, closing them
 * and removing the directory afterwards. An error from `fn` wins over a
 * cleanup error.
 */
export async function withTempDatabases<T>(
  fn: (dbs: TempDatabases) => Promise<T>,
  options: Omit<DatabaseOptions, "root" | "storage"> = {}
): Promise<T> {
  const root = await createTempRoot();
  const dbs: TempDatabases = {
    hosts: openHostDb({ ...options, root }),
    passive: openPassiveDb({ ...options, root }),
    root,
  };

  let fnError: unknown;
  try {
    return await fn(dbs);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    const results = await Promise.allSettled([dbs.hosts.invalidateCache(), dbs.passive.invalidateCache()]);
    const failed = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
    await removeDir(root);
    if (fnError === undefined && failed !== undefined) {
      // eslint-disable-next-line no-unsafe-finally
      throw failed.reason;
    }
  }
}

/**
 * Atomic file I/O for collection files
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files read as undefined
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { CollectionReadError, CollectionWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Check a Node.js system error code
 */
export function hasErrorCode(err: unknown, ...codes: string[]): boolean {
  if (!(err instanceof Error) || !("code" in err)) {
    return false;
  }
  const { code } = err;
  return typeof code === "string" && codes.includes(code);
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Sync file data to disk (prefer datasync, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported; EINVAL: some CIFS/FUSE mounts
      if (hasErrorCode(err, "ENOTSUP", "ENOSYS", "EINVAL")) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    // fsync parent directory (best-effort)
    try {
      const dirHandle = await fs.open(dir, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      if (!hasErrorCode(err, "EINVAL", "ENOTSUP", "EBADF", "EISDIR", "EPERM")) {
        logger.debug("io.dir_fsync_failed", {
          message: err instanceof Error ? err.message : String(err),
          details: { dir },
        });
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.unlink(tmp).catch(() => undefined);
    throw new CollectionWriteError(filePath, { cause: err });
  }
}

/**
 * Read a file as UTF-8
 * @returns File contents, or undefined if the file does not exist
 * @throws {CollectionReadError} For other read failures
 */
export async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return undefined;
    }
    throw new CollectionReadError(filePath, { cause: err });
  }
}

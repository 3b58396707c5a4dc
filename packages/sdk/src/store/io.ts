/**
 * Atomic file I/O for the file-backed store
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reading a missing file yields undefined
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  DirectoryError,
  DocumentReadError,
  DocumentRemoveError,
  DocumentWriteError,
  ListFilesError,
  errnoCode,
} from "../errors.js";
import { logger } from "../observability/logs.js";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report one of these
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("store.dir_fsync_failed", { details: { dir, code } });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("store.tmp_close_failed", { details: { tmp, error: String(closeErr) } });
      });
    }
    await fs.rm(tmp, { force: true });
    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 file
 * @returns contents, or undefined when the file does not exist
 * @throws DocumentReadError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Remove a file
 * @returns false when there was nothing to remove
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw new DocumentRemoveError(filePath, { cause: err });
  }
}

/**
 * List files in a directory with the given extension
 * @returns sorted file names (not full paths); empty when the directory is missing
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw new ListFilesError(dirPath, { cause: err });
  }
}

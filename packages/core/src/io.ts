/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - File handles are closed on every exit path
 * - Reads are UTF-8 only; missing files throw FileNotFoundError
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { FileNotFoundError, ValidationError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code of a Node.js system error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new ValidationError("Directory path must be a non-empty string");
  }

  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o700 });
  } catch (err) {
    throw new ValidationError(`Cannot create directory ${dirPath}: ${describe(err)}`, {
      cause: err,
    });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    // Token-bearing files are private to the user
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

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { path: tmp, err_message: describe(closeErr) });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // ENOENT: the temp file was never created or already renamed
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup_failed", { path: tmp, err_message: describe(unlinkErr) });
      }
    });

    throw new ValidationError(`Cannot write ${filePath}: ${describe(err)}`, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory so a completed rename survives a crash
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF/EISDIR: platform does not support directory fsync
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.warn("io.dir_fsync_failed", { path: dir, err_message: describe(err) });
    }
  }
}

/**
 * Read a UTF-8 text file
 * @throws FileNotFoundError if the file doesn't exist
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new FileNotFoundError(filePath, { cause: err });
    }
    throw new ValidationError(`Cannot read ${filePath}: ${describe(err)}`, { cause: err });
  }
}

/**
 * Read a UTF-8 text file, or null if it does not exist
 */
export async function readTextFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await readTextFile(filePath);
  } catch (err) {
    if (err instanceof FileNotFoundError) {
      return null;
    }
    throw err;
  }
}

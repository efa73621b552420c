/**
 * Local filesystem operations used by the remote → local pass.
 *
 * Handles directory creation for downloads and remote folders, and
 * idempotent deletion of local files.
 */

import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import * as path from "node:path";
import type { DeleteOutcome } from "../dropbox/types.js";
import { isErrnoException } from "../errors.js";

export type MakeDirectoryOutcome = "created" | "replaced-file" | "exists";

/**
 * Creates the parent directory of a file, including intermediate ones.
 */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

/**
 * Makes sure a directory exists at `dirPath`.
 *
 * If a file occupies the path it is removed first: a remote folder wins
 * over a local file of the same name.
 *
 * @example
 * ```ts
 * await makeLocalDirectory("/sync/docs"); // "created"
 * await makeLocalDirectory("/sync/docs"); // "exists"
 * ```
 */
export async function makeLocalDirectory(dirPath: string): Promise<MakeDirectoryOutcome> {
  let stats: Stats;
  try {
    stats = await fs.stat(dirPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      await fs.mkdir(dirPath, { recursive: true });
      return "created";
    }
    throw error;
  }

  if (stats.isDirectory()) {
    return "exists";
  }

  await fs.unlink(dirPath);
  await fs.mkdir(dirPath);
  return "replaced-file";
}

/**
 * Deletes a local file.
 *
 * Does not throw an error if the file doesn't exist (idempotent delete).
 *
 * @param filePath - The absolute path to the file to delete
 * @returns "not-found" when there was nothing to delete
 */
export async function deleteLocalFile(filePath: string): Promise<DeleteOutcome> {
  try {
    await fs.unlink(filePath);
    return "deleted";
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return "not-found";
    }
    throw error;
  }
}

/**
 * True when something exists at the path.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

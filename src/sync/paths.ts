/**
 * Relative path handling shared by both passes.
 *
 * Relative paths are the join key between the local tree and the remote
 * listing: POSIX separators, no leading slash, case preserved.
 */

import * as path from "node:path";

/**
 * Normalizes a configured remote root: "" for the app folder root,
 * otherwise a leading slash and no trailing slash.
 *
 * @example
 * ```ts
 * normalizeRemoteRoot("/");            // ""
 * normalizeRemoteRoot("Backups/notes/"); // "/Backups/notes"
 * ```
 */
export function normalizeRemoteRoot(remoteRoot: string): string {
  const trimmed = remoteRoot.trim().replace(/\\/g, "/").replace(/\/+/g, "/").replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Maps a relative path to the store's absolute path under `remoteRoot`.
 */
export function toRemotePath(remoteRoot: string, relativePath: string): string {
  return `${remoteRoot}/${relativePath}`;
}

/**
 * Maps a store path back to a path relative to `remoteRoot`.
 *
 * The prefix match ignores case because Dropbox paths are case-insensitive
 * while `path_display` may differ in case from the configured root. Returns
 * null for the root itself and for paths outside it.
 */
export function toRelativeRemotePath(remoteRoot: string, remotePath: string): string | null {
  const prefix = `${remoteRoot}/`.toLowerCase();
  if (!remotePath.toLowerCase().startsWith(prefix)) return null;
  const relative = remotePath.slice(prefix.length);
  return relative === "" ? null : relative;
}

/**
 * Resolves a relative path against the local root.
 */
export function toLocalPath(localRoot: string, relativePath: string): string {
  return path.join(localRoot, ...relativePath.split("/"));
}

/**
 * Local scanner for the local → remote pass.
 *
 * Walks the local root recursively and returns every regular file that
 * passes the inclusion rules, with its mtime and size.
 *
 * Inclusion rules:
 * - no path component may start with "."
 * - the state file is never included
 * - filenames starting with "@" or ending with "~" are temporary files
 * - generated artifacts (by extension) are skipped
 * - reserved directories directly under the root are skipped
 */

import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import * as path from "node:path";
import type { LocalFile, ScanRules } from "../types.js";
import { DEFAULT_STATE_FILE_NAME } from "./state.js";

export const DEFAULT_SCAN_RULES: ScanRules = {
  stateFileName: DEFAULT_STATE_FILE_NAME,
  excludedExtensions: [".pyc", ".pyo"],
  reservedDirectories: ["temp"],
  reservedDirectoryPrefixes: ["site"],
};

/**
 * Checks a directory name against the rules.
 *
 * @param name - The directory name (one path component)
 * @param depth - 1 for a directory directly under the root
 */
export function isIncludedDirectory(name: string, depth: number, rules: ScanRules): boolean {
  if (name.startsWith(".")) return false;
  if (depth === 1) {
    if (rules.reservedDirectories.includes(name)) return false;
    if (rules.reservedDirectoryPrefixes.some((prefix) => name.startsWith(prefix))) return false;
  }
  return true;
}

export function isIncludedFilename(name: string, rules: ScanRules): boolean {
  return !(
    name === rules.stateFileName ||
    name.startsWith(".") ||
    name.startsWith("@") ||
    name.endsWith("~") ||
    rules.excludedExtensions.some((ext) => name.endsWith(ext))
  );
}

/**
 * Checks a whole relative path: every directory component and the filename.
 *
 * @example
 * ```ts
 * isIncludedPath("docs/readme.txt", DEFAULT_SCAN_RULES); // true
 * isIncludedPath("temp/scratch.txt", DEFAULT_SCAN_RULES); // false
 * isIncludedPath("lib/temp/a.txt", DEFAULT_SCAN_RULES);  // true
 * ```
 */
export function isIncludedPath(relativePath: string, rules: ScanRules): boolean {
  const parts = relativePath.split("/");
  const filename = parts.pop() ?? "";
  return (
    parts.every((part, index) => isIncludedDirectory(part, index + 1, rules)) &&
    isIncludedFilename(filename, rules)
  );
}

/**
 * Scan the local root for files to synchronize.
 *
 * Returns an empty array if the root does not exist. Symbolic links are
 * not followed. Results are sorted by path.
 *
 * @param localRoot - The directory to scan
 * @param rules - Inclusion rules
 */
export async function scanLocalFiles(
  localRoot: string,
  rules: ScanRules = DEFAULT_SCAN_RULES
): Promise<LocalFile[]> {
  try {
    await fs.access(localRoot);
  } catch {
    // Nothing synced locally yet
    return [];
  }

  const results: LocalFile[] = [];
  await walk(localRoot, [], rules, results);
  return results.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

async function walk(
  localRoot: string,
  parts: string[],
  rules: ScanRules,
  results: LocalFile[]
): Promise<void> {
  const dir = path.join(localRoot, ...parts);
  const entries: Dirent[] = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (isIncludedDirectory(entry.name, parts.length + 1, rules)) {
        await walk(localRoot, [...parts, entry.name], rules, results);
      }
    } else if (entry.isFile() && isIncludedFilename(entry.name, rules)) {
      const stats = await fs.stat(path.join(dir, entry.name));
      results.push({
        path: [...parts, entry.name].join("/"),
        modifiedAt: stats.mtimeMs,
        size: stats.size,
      });
    }
  }
}

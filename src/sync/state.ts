/**
 * Sync state management.
 *
 * Tracks, per relative path, the remote revision and local mtime recorded
 * at the last sync, once for the local side and once for the remote side.
 * A run diffs the current listing and scan against these maps.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { FileRecord, SyncStateFile } from "../types.js";
import { isErrnoException } from "../errors.js";

/**
 * Current sync state file schema version.
 * Increment when making breaking changes to the state file format.
 */
export const STATE_FILE_VERSION = 1;

/**
 * Default state file name, created in the local root.
 */
export const DEFAULT_STATE_FILE_NAME = ".dropbox-sync-state.json";

/**
 * Create an empty sync state object.
 *
 * Used when no state file exists (first sync) or when the state file
 * is corrupted and cannot be parsed.
 */
export function createEmptyState(): SyncStateFile {
  return {
    version: STATE_FILE_VERSION,
    lastSyncTime: "",
    localFiles: createRecordMap(),
    remoteFiles: createRecordMap(),
  };
}

/**
 * A record map without a prototype, so any filename (including
 * "__proto__") is stored as an own key.
 */
export function createRecordMap(): Record<string, FileRecord> {
  const records: Record<string, FileRecord> = Object.create(null);
  return records;
}

/**
 * Load sync state from a JSON file.
 *
 * If the file doesn't exist, returns an empty state (first sync).
 * If the file is empty, corrupted or has an invalid structure, logs a
 * warning and returns an empty state. Never throws.
 *
 * @param stateFilePath - Path to the state JSON file
 */
export async function loadState(stateFilePath: string): Promise<SyncStateFile> {
  let content: string;
  try {
    content = await fs.readFile(stateFilePath, "utf-8");
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      console.warn(
        `[sync-state] Failed to read state file ${stateFilePath}:`,
        error instanceof Error ? error.message : error
      );
      console.warn("[sync-state] Starting fresh sync.");
    }
    return createEmptyState();
  }

  if (content.trim() === "") {
    return createEmptyState();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    console.warn(
      `[sync-state] Failed to parse state file ${stateFilePath}:`,
      error instanceof Error ? error.message : error
    );
    console.warn("[sync-state] Starting fresh sync.");
    return createEmptyState();
  }

  const state = toSyncState(parsed);
  if (!state) {
    console.warn(`[sync-state] State file ${stateFilePath} has invalid structure. Starting fresh.`);
    return createEmptyState();
  }

  return state;
}

/**
 * Save sync state to a JSON file atomically.
 *
 * Writes to a temporary file first, then renames to the target path.
 * This prevents corruption if the process is interrupted during write.
 *
 * @param stateFilePath - Path to the state JSON file
 * @param state - The state to save
 */
export async function saveState(stateFilePath: string, state: SyncStateFile): Promise<void> {
  const dir = path.dirname(stateFilePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = `${stateFilePath}.tmp`;
  const content = JSON.stringify(state, null, 2);

  await fs.writeFile(tempPath, content, "utf-8");

  // Rename is atomic on most filesystems
  await fs.rename(tempPath, stateFilePath);
}

/**
 * Record a path as synchronized: both maps receive the same record.
 *
 * Mutates the provided state object in place.
 */
export function recordSynced(state: SyncStateFile, relativePath: string, record: FileRecord): void {
  state.localFiles[relativePath] = { ...record };
  state.remoteFiles[relativePath] = { ...record };
}

/**
 * Looks up a path in one of the maps, ignoring inherited object keys.
 */
export function getRecord(
  records: Record<string, FileRecord>,
  relativePath: string
): FileRecord | undefined {
  return Object.hasOwn(records, relativePath) ? records[relativePath] : undefined;
}

/**
 * Remove a path from both maps.
 *
 * Mutates the provided state object in place.
 */
export function forgetPath(state: SyncStateFile, relativePath: string): void {
  delete state.localFiles[relativePath];
  delete state.remoteFiles[relativePath];
}

/**
 * True when both maps hold an identical record for the path.
 */
export function isSynchronized(state: SyncStateFile, relativePath: string): boolean {
  const local = getRecord(state.localFiles, relativePath);
  const remote = getRecord(state.remoteFiles, relativePath);
  return (
    local !== undefined &&
    remote !== undefined &&
    local.revision === remote.revision &&
    local.modifiedAt === remote.modifiedAt
  );
}

/**
 * Paths whose records are missing from one map or differ between them,
 * sorted.
 */
export function pendingPaths(state: SyncStateFile): string[] {
  const paths = new Set([...Object.keys(state.localFiles), ...Object.keys(state.remoteFiles)]);
  return [...paths].filter((p) => !isSynchronized(state, p)).sort();
}

function isFileRecord(value: unknown): value is FileRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "revision" in value &&
    typeof value.revision === "string" &&
    "modifiedAt" in value &&
    typeof value.modifiedAt === "number" &&
    Number.isFinite(value.modifiedAt)
  );
}

function toRecordMap(value: unknown): Record<string, FileRecord> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  const records = createRecordMap();
  for (const [key, entry] of Object.entries(value)) {
    if (!isFileRecord(entry)) return null;
    records[key] = { revision: entry.revision, modifiedAt: entry.modifiedAt };
  }
  return records;
}

/**
 * Validates a parsed state file. Returns null when any part is malformed.
 */
function toSyncState(value: unknown): SyncStateFile | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("version" in value) || typeof value.version !== "number") return null;
  if (!("localFiles" in value) || !("remoteFiles" in value)) return null;

  const localFiles = toRecordMap(value.localFiles);
  const remoteFiles = toRecordMap(value.remoteFiles);
  if (!localFiles || !remoteFiles) return null;

  const lastSyncTime =
    "lastSyncTime" in value && typeof value.lastSyncTime === "string" ? value.lastSyncTime : "";

  return { version: value.version, lastSyncTime, localFiles, remoteFiles };
}

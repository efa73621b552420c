/**
 * Sync engine: Dropbox ⇄ local folder reconciliation.
 *
 * One run:
 * 1. Load sync state
 * 2. Remote pass: list Dropbox, download new/changed files, create folders,
 *    delete local copies of files removed from Dropbox
 * 3. Save state
 * 4. Local pass: scan the local root, upload new/changed files, delete
 *    remote copies of files removed locally
 * 5. Save state and return a summary
 *
 * The remote pass runs first, so when a file changed on both sides the
 * Dropbox version is downloaded before the local pass looks at it.
 */

import * as fs from "node:fs/promises";
import type { RemoteFile, RemoteFolder, RemoteStore } from "../dropbox/types.js";
import { DropboxClientWrapper, type DropboxAccount } from "../dropbox/client.js";
import type {
  ConflictRecord,
  LocalFile,
  PathSyncResult,
  SyncConfig,
  SyncError,
  SyncResult,
  SyncStateFile,
  TransferProgress,
} from "../types.js";
import {
  DeleteError,
  InitializationError,
  TransferError,
  errorMessage,
  isErrnoException,
} from "../errors.js";
import { loadState, saveState, forgetPath, getRecord } from "./state.js";
import { listRemoteEntries } from "./remote-lister.js";
import { isIncludedPath, scanLocalFiles } from "./local-scanner.js";
import { TransferEngine } from "./transfer.js";
import { deleteLocalFile, makeLocalDirectory, pathExists } from "./file-writer.js";
import { normalizeRemoteRoot, toLocalPath, toRemotePath } from "./paths.js";

/**
 * Options for the sync operation.
 */
export interface SyncOptions {
  /** If true, suppress console output */
  quiet?: boolean;
  /** Called once per uploaded chunk of a large file */
  onProgress?: (progress: TransferProgress) => void;
}

/**
 * Everything one pass needs. Each pass is the only writer of `state`
 * while it runs.
 */
export interface PassContext {
  store: RemoteStore;
  config: SyncConfig;
  options: SyncOptions;
  transfer: TransferEngine;
  results: PathSyncResult[];
  conflicts: ConflictRecord[];
  errors: SyncError[];
  /**
   * Paths the remote pass failed on. The local pass leaves them alone, so a
   * stale local copy never overwrites or deletes a newer Dropbox version.
   */
  failedRemotePaths: Set<string>;
}

/**
 * Builds the context for running passes against `state`.
 *
 * @throws RangeError when the chunk size settings are invalid
 */
export function createPassContext(
  store: RemoteStore,
  state: SyncStateFile,
  config: SyncConfig,
  options: SyncOptions = {}
): PassContext {
  const normalized: SyncConfig = { ...config, remoteRoot: normalizeRemoteRoot(config.remoteRoot) };
  const transfer = new TransferEngine(store, state, {
    localRoot: normalized.localRoot,
    remoteRoot: normalized.remoteRoot,
    largeFileThreshold: normalized.largeFileThreshold,
    chunkSize: normalized.chunkSize,
    onProgress: options.onProgress,
    quiet: options.quiet,
  });
  return {
    store,
    config: normalized,
    options,
    transfer,
    results: [],
    conflicts: [],
    errors: [],
    failedRemotePaths: new Set(),
  };
}

/**
 * Runs a full sync of `config.localRoot` against `store`.
 *
 * Per-path transfer and delete failures are collected in `errors` and the
 * pass moves on, unless `config.failFast` is set. Listing failures, scan
 * failures, state save failures and fail-fast aborts end the run; state is
 * then left as of the last successful save.
 *
 * @example
 * ```ts
 * const result = await syncFolder(client, config);
 * const uploads = result.localToRemote.filter((r) => r.action === "uploaded");
 * ```
 */
export async function syncFolder(
  store: RemoteStore,
  config: SyncConfig,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const { quiet = false } = options;
  const remoteToLocal: PathSyncResult[] = [];
  const localToRemote: PathSyncResult[] = [];
  const conflicts: ConflictRecord[] = [];
  const errors: SyncError[] = [];

  try {
    if (!quiet) console.log("[sync] Loading sync state...");
    const state = await loadState(config.stateFile);

    const ctx = createPassContext(store, state, config, options);

    if (!quiet) console.log("[pull] Checking Dropbox for changes...");
    await applyRemoteDelta({ ...ctx, results: remoteToLocal, conflicts, errors }, state);

    if (!quiet) console.log("[sync] Saving sync state...");
    await saveState(config.stateFile, state);

    if (!quiet) console.log("[push] Checking for new, updated or deleted local files...");
    await applyLocalDelta({ ...ctx, results: localToRemote, conflicts, errors }, state);

    state.lastSyncTime = new Date().toISOString();
    if (!quiet) console.log("[sync] Saving sync state...");
    await saveState(config.stateFile, state);

    if (!quiet) {
      const count = (list: PathSyncResult[], action: PathSyncResult["action"]) =>
        list.filter((r) => r.action === action).length;
      console.log(
        `[sync] Complete: ${count(remoteToLocal, "downloaded")} downloaded, ` +
          `${count(localToRemote, "uploaded")} uploaded, ` +
          `${count(remoteToLocal, "deleted") + count(localToRemote, "deleted")} deleted`
      );
      if (errors.length > 0) {
        console.log(`[sync] ${errors.length} errors occurred`);
      }
    }
  } catch (error) {
    errors.push({
      path: error instanceof TransferError || error instanceof DeleteError ? error.path : undefined,
      message: errorMessage(error),
      fatal: true,
      cause: error,
    });
    if (!quiet) {
      console.error("[sync] Fatal error:", errorMessage(error));
    }
  }

  return { remoteToLocal, localToRemote, conflicts, errors };
}

/**
 * Connects to Dropbox with `config.accessToken` and runs `syncFolder`.
 *
 * @throws InitializationError when the token is missing or rejected
 */
export async function syncWithDropbox(
  config: SyncConfig,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const client = await connectDropbox(config.accessToken, options);
  return syncFolder(client, config, options);
}

/**
 * Creates a Dropbox client and verifies the token against the account
 * endpoint.
 *
 * @throws InitializationError when the token is missing or rejected
 */
export async function connectDropbox(
  accessToken: string,
  options: SyncOptions = {}
): Promise<DropboxClientWrapper> {
  if (!accessToken) {
    throw new InitializationError("No Dropbox access token configured");
  }

  const client = new DropboxClientWrapper({ accessToken });
  let account: DropboxAccount;
  try {
    account = await client.verifyAccount();
  } catch (error) {
    throw new InitializationError(`Failed to initialize Dropbox session: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!options.quiet) {
    console.log(`[sync] Connected to Dropbox as ${account.displayName} (${account.email})`);
  }
  return client;
}

// =============================================================================
// Remote → Local
// =============================================================================

/**
 * Applies the remote delta to the local tree.
 *
 * A file is downloaded when it is unknown locally or its revision differs
 * from the recorded one; mtime changes alone are ignored on this side.
 * Paths recorded remotely at the last sync but missing from this listing
 * are deleted locally, only after the whole listing has been read.
 *
 * @throws ListingError when a listing page cannot be fetched
 */
export async function applyRemoteDelta(ctx: PassContext, state: SyncStateFile): Promise<void> {
  const seenPaths = new Set<string>();

  for await (const entry of listRemoteEntries(ctx.store, ctx.config.remoteRoot)) {
    switch (entry.kind) {
      case "file":
        seenPaths.add(entry.path);
        await pullFile(ctx, state, entry);
        break;
      case "folder":
        await pullFolder(ctx, state, entry);
        break;
    }
  }

  for (const relativePath of Object.keys(state.remoteFiles)) {
    if (seenPaths.has(relativePath)) continue;

    if (getRecord(state.localFiles, relativePath)) {
      await deleteLocal(ctx, state, relativePath);
    } else {
      // Gone on both sides
      forgetPath(state, relativePath);
    }
  }
}

async function pullFile(ctx: PassContext, state: SyncStateFile, entry: RemoteFile): Promise<void> {
  const known = getRecord(state.localFiles, entry.path);
  const reason = !known
    ? "not found locally"
    : entry.revision !== known.revision
      ? "remote file changed"
      : null;

  if (reason === null) {
    ctx.results.push({ path: entry.path, direction: "remote-to-local", action: "skipped" });
    return;
  }

  try {
    if (known) {
      const localModifiedAt = await localMtime(ctx.config.localRoot, entry.path);
      if (localModifiedAt !== null && localModifiedAt > known.modifiedAt) {
        ctx.conflicts.push({
          path: entry.path,
          remoteRevision: entry.revision,
          localModifiedAt,
          winner: "remote",
        });
        if (!ctx.options.quiet) {
          console.log(`[pull] Conflict: ${entry.path} changed on both sides, keeping Dropbox version`);
        }
      }
    }

    await ctx.transfer.download(entry.path, reason);
    ctx.results.push({ path: entry.path, direction: "remote-to-local", action: "downloaded", reason });
  } catch (error) {
    handlePathFailure(ctx, "pull", entry.path, error);
  }
}

async function pullFolder(ctx: PassContext, state: SyncStateFile, entry: RemoteFolder): Promise<void> {
  try {
    const outcome = await makeLocalDirectory(toLocalPath(ctx.config.localRoot, entry.path));
    if (outcome === "exists") return;

    if (outcome === "replaced-file") {
      forgetPath(state, entry.path);
    }
    const reason = outcome === "replaced-file" ? "replaced local file" : "not found locally";
    ctx.results.push({ path: entry.path, direction: "remote-to-local", action: "created-folder", reason });
    if (!ctx.options.quiet) console.log(`[pull] Created directory: ${entry.path} (${reason})`);
  } catch (error) {
    handlePathFailure(ctx, "pull", entry.path, error);
  }
}

/**
 * Removes the local copy of a file deleted from Dropbox and forgets it in
 * both maps. A file that is already gone counts as deleted.
 */
export async function deleteLocal(
  ctx: PassContext,
  state: SyncStateFile,
  relativePath: string
): Promise<void> {
  try {
    await deleteLocalFile(toLocalPath(ctx.config.localRoot, relativePath));
  } catch (error) {
    handlePathFailure(
      ctx,
      "pull",
      relativePath,
      new DeleteError(`Failed to delete ${relativePath} locally: ${errorMessage(error)}`, relativePath, "local", {
        cause: error,
      })
    );
    return;
  }

  forgetPath(state, relativePath);
  const reason = "file no longer in Dropbox";
  ctx.results.push({ path: relativePath, direction: "remote-to-local", action: "deleted", reason });
  if (!ctx.options.quiet) console.log(`[pull] Deleted locally: ${relativePath} (${reason})`);
}

// =============================================================================
// Local → Remote
// =============================================================================

/**
 * Applies the local delta to Dropbox.
 *
 * A file is uploaded when it is unknown remotely or its mtime is newer than
 * the recorded one. Paths recorded locally at the last sync but missing
 * from this scan are deleted from Dropbox, after the whole scan. Excluded
 * paths that still exist on disk are left alone.
 */
export async function applyLocalDelta(ctx: PassContext, state: SyncStateFile): Promise<void> {
  const { localRoot, scanRules } = ctx.config;
  const files = await scanLocalFiles(localRoot, scanRules);
  const currentPaths = new Set(files.map((f) => f.path));

  for (const file of files) {
    if (ctx.failedRemotePaths.has(file.path)) {
      skipFailedRemotePath(ctx, file.path);
      continue;
    }

    const reason = localChangeReason(state, file);
    if (reason === null) {
      ctx.results.push({ path: file.path, direction: "local-to-remote", action: "skipped" });
      continue;
    }

    try {
      await ctx.transfer.upload(file.path, reason);
      ctx.results.push({ path: file.path, direction: "local-to-remote", action: "uploaded", reason });
    } catch (error) {
      handlePathFailure(ctx, "push", file.path, error);
    }
  }

  for (const relativePath of Object.keys(state.localFiles)) {
    if (currentPaths.has(relativePath)) continue;
    if (ctx.failedRemotePaths.has(relativePath)) {
      skipFailedRemotePath(ctx, relativePath);
      continue;
    }

    let excludedButPresent: boolean;
    try {
      excludedButPresent =
        !isIncludedPath(relativePath, scanRules) &&
        (await pathExists(toLocalPath(localRoot, relativePath)));
    } catch (error) {
      handlePathFailure(ctx, "push", relativePath, error);
      continue;
    }
    if (excludedButPresent) continue;

    await deleteRemote(ctx, state, relativePath);
  }
}

function skipFailedRemotePath(ctx: PassContext, relativePath: string): void {
  const reason = "remote pass failed";
  ctx.results.push({ path: relativePath, direction: "local-to-remote", action: "skipped", reason });
  if (!ctx.options.quiet) console.log(`[push] Skipped: ${relativePath} (${reason})`);
}

/**
 * Why a scanned file needs uploading, or null when it is in sync.
 */
export function localChangeReason(state: SyncStateFile, file: LocalFile): string | null {
  if (!getRecord(state.remoteFiles, file.path)) return "not found remotely";

  const known = getRecord(state.localFiles, file.path);
  if (!known) return "local record missing";
  if (file.modifiedAt > known.modifiedAt) return "local file changed";

  return null;
}

/**
 * Deletes the Dropbox copy of a file removed locally and forgets it in
 * both maps. A file that is already gone from Dropbox counts as deleted.
 */
export async function deleteRemote(
  ctx: PassContext,
  state: SyncStateFile,
  relativePath: string
): Promise<void> {
  try {
    await ctx.store.delete(toRemotePath(ctx.config.remoteRoot, relativePath));
  } catch (error) {
    handlePathFailure(
      ctx,
      "push",
      relativePath,
      new DeleteError(`Failed to delete ${relativePath} from Dropbox: ${errorMessage(error)}`, relativePath, "remote", {
        cause: error,
      })
    );
    return;
  }

  forgetPath(state, relativePath);
  const reason = "file deleted locally";
  ctx.results.push({ path: relativePath, direction: "local-to-remote", action: "deleted", reason });
  if (!ctx.options.quiet) console.log(`[push] Deleted from Dropbox: ${relativePath} (${reason})`);
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Records a failure for one path, or rethrows it to abort the pass when
 * `failFast` is set. Paths that fail in the remote pass are held back from
 * the local pass of the same run.
 */
function handlePathFailure(ctx: PassContext, prefix: "pull" | "push", relativePath: string, error: unknown): void {
  if (ctx.config.failFast) {
    throw error;
  }
  if (prefix === "pull") {
    ctx.failedRemotePaths.add(relativePath);
  }
  ctx.errors.push({ path: relativePath, message: errorMessage(error), fatal: false, cause: error });
  if (!ctx.options.quiet) {
    console.error(`[${prefix}] Error on "${relativePath}":`, errorMessage(error));
  }
}

async function localMtime(localRoot: string, relativePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(toLocalPath(localRoot, relativePath));
    return stats.mtimeMs;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

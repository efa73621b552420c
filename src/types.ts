/**
 * Core types for the sync engine.
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Inclusion rules applied by the local scanner before a path can take part
 * in the local pass.
 */
export interface ScanRules {
  /** Name of the persisted state file; never uploaded */
  stateFileName: string;
  /** Filename suffixes of generated artifacts (e.g. ".pyc") */
  excludedExtensions: string[];
  /** Top-level directory names that are skipped (e.g. "temp") */
  reservedDirectories: string[];
  /** Top-level directory name prefixes that are skipped (e.g. "site") */
  reservedDirectoryPrefixes: string[];
}

export interface SyncConfig {
  /** Dropbox access token */
  accessToken: string;
  /** Local directory being synchronized */
  localRoot: string;
  /** Dropbox folder being synchronized ("" for the app folder root) */
  remoteRoot: string;
  /** Path to the sync state file */
  stateFile: string;
  /** Files strictly larger than this many bytes use an upload session */
  largeFileThreshold: number;
  /** Bytes per upload session request */
  chunkSize: number;
  /** Abort a pass on the first transfer or delete failure */
  failFast: boolean;
  /** Local inclusion rules */
  scanRules: ScanRules;
}

// =============================================================================
// Sync State File
// =============================================================================

/**
 * What the engine knows about one path as of the last sync.
 */
export interface FileRecord {
  /** Opaque remote revision of the content */
  revision: string;
  /** Local file mtime (ms since epoch) at the moment of the last sync */
  modifiedAt: number;
}

/**
 * Persisted sync state. A path that is fully synchronized has equal
 * records in both maps.
 */
export interface SyncStateFile {
  /** Schema version for future migrations */
  version: number;
  /** ISO timestamp of the last completed run */
  lastSyncTime: string;
  /** What the engine believes is on disk, keyed by relative path */
  localFiles: Record<string, FileRecord>;
  /** What the engine believes is in Dropbox, keyed by relative path */
  remoteFiles: Record<string, FileRecord>;
}

// =============================================================================
// Local side
// =============================================================================

/**
 * A file found by the local scanner.
 */
export interface LocalFile {
  /** POSIX path relative to the local root */
  path: string;
  /** mtime in ms since epoch */
  modifiedAt: number;
  /** Size in bytes */
  size: number;
}

// =============================================================================
// Results
// =============================================================================

export type SyncDirection = "remote-to-local" | "local-to-remote";

export type SyncAction =
  | "downloaded"
  | "uploaded"
  | "deleted"
  | "created-folder"
  | "skipped";

export interface PathSyncResult {
  path: string;
  direction: SyncDirection;
  action: SyncAction;
  /** Why the action was taken (e.g. "not found locally") */
  reason?: string;
}

/**
 * A path that changed on both sides since the last sync. The remote pass
 * runs first, so the remote side always wins.
 */
export interface ConflictRecord {
  path: string;
  remoteRevision: string;
  localModifiedAt: number;
  winner: "remote";
}

export interface SyncError {
  path?: string;
  message: string;
  /** True when the error aborted the run */
  fatal: boolean;
  cause?: unknown;
}

export interface SyncResult {
  /** Results of the remote pass */
  remoteToLocal: PathSyncResult[];
  /** Results of the local pass */
  localToRemote: PathSyncResult[];
  /** Paths changed on both sides, resolved in favour of the remote */
  conflicts: ConflictRecord[];
  /** Errors encountered */
  errors: SyncError[];
}

/**
 * Per-chunk progress of a session upload.
 */
export interface TransferProgress {
  path: string;
  bytesTransferred: number;
  totalBytes: number;
}

/**
 * dropbox-folder-sync
 *
 * Two-way sync between a local directory and a Dropbox folder.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Sync Functions
// =============================================================================

export {
  syncFolder,
  syncWithDropbox,
  connectDropbox,
  applyRemoteDelta,
  applyLocalDelta,
  createPassContext,
  localChangeReason,
  deleteLocal,
  deleteRemote,
  type SyncOptions,
  type PassContext,
} from "./sync/engine.js";

// =============================================================================
// Dropbox Client Wrapper (for advanced use cases)
// =============================================================================

export {
  DropboxClientWrapper,
  DropboxRateLimitError,
  isNotFoundError,
  type DropboxClientConfig,
  type DropboxAccount,
} from "./dropbox/client.js";

export type {
  RemoteStore,
  RemoteEntry,
  RemoteFile,
  RemoteFolder,
  ListFolderPage,
  DeleteOutcome,
} from "./dropbox/types.js";

// =============================================================================
// Sync State Management
// =============================================================================

export {
  loadState,
  saveState,
  createEmptyState,
  createRecordMap,
  recordSynced,
  getRecord,
  forgetPath,
  isSynchronized,
  pendingPaths,
  STATE_FILE_VERSION,
  DEFAULT_STATE_FILE_NAME,
} from "./sync/state.js";

// =============================================================================
// Listing, scanning and transfers
// =============================================================================

export { listRemoteEntries } from "./sync/remote-lister.js";

export {
  scanLocalFiles,
  isIncludedPath,
  isIncludedDirectory,
  isIncludedFilename,
  DEFAULT_SCAN_RULES,
} from "./sync/local-scanner.js";

export {
  TransferEngine,
  DEFAULT_LARGE_FILE_THRESHOLD,
  DEFAULT_CHUNK_SIZE,
  type TransferOptions,
} from "./sync/transfer.js";

export {
  ensureParentDirectory,
  makeLocalDirectory,
  deleteLocalFile,
  pathExists,
  type MakeDirectoryOutcome,
} from "./sync/file-writer.js";

export {
  normalizeRemoteRoot,
  toRemotePath,
  toRelativeRemotePath,
  toLocalPath,
} from "./sync/paths.js";

// =============================================================================
// Configuration and errors
// =============================================================================

export {
  loadConfigFile,
  parseFileConfig,
  resolveConfig,
  DEFAULT_CONFIG_FILE,
  ACCESS_TOKEN_ENV,
  type FileConfig,
  type ConfigOverrides,
} from "./config.js";

export {
  InitializationError,
  ListingError,
  TransferError,
  DeleteError,
  ConfigError,
  errorMessage,
  type TransferDirection,
} from "./errors.js";

// =============================================================================
// Core Types
// =============================================================================

export type {
  SyncConfig,
  ScanRules,
  SyncResult,
  PathSyncResult,
  SyncDirection,
  SyncAction,
  SyncError,
  ConflictRecord,
  FileRecord,
  SyncStateFile,
  LocalFile,
  TransferProgress,
} from "./types.js";

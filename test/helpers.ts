/**
 * Test helpers: an in-memory `RemoteStore` and temp directory utilities.
 *
 * `MemoryRemoteStore` behaves like the Dropbox API as far as the sync
 * engine can tell: recursive paged listings, opaque revisions, upload
 * sessions with offset checks and "not found" deletes. It never touches
 * the network.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type {
  DeleteOutcome,
  ListFolderPage,
  RemoteEntry,
  RemoteStore,
} from "../src/dropbox/types.js";
import type { SyncConfig } from "../src/types.js";
import { DEFAULT_SCAN_RULES } from "../src/sync/local-scanner.js";
import { DEFAULT_STATE_FILE_NAME } from "../src/sync/state.js";
import { DEFAULT_CHUNK_SIZE, DEFAULT_LARGE_FILE_THRESHOLD } from "../src/sync/transfer.js";

interface StoredFile {
  path: string;
  contents: Buffer;
  revision: string;
}

interface UploadSession {
  chunks: Buffer[];
  offset: number;
}

export type StoreMethod = keyof RemoteStore;

export interface StoreCall {
  method: StoreMethod;
  path?: string;
  sessionId?: string;
  offset?: number;
  size?: number;
}

export interface MemoryRemoteStoreOptions {
  /** Entries per listing page (default: 100) */
  pageSize?: number;
}

/**
 * In-process stand-in for Dropbox.
 *
 * Revisions are "r1", "r2", ... in the order files are written, across the
 * whole store.
 *
 * @example
 * ```ts
 * const store = new MemoryRemoteStore({ pageSize: 2 });
 * store.putFile("/docs/readme.txt", "hello"); // "r1"
 * ```
 */
export class MemoryRemoteStore implements RemoteStore {
  readonly calls: StoreCall[] = [];

  private readonly files = new Map<string, StoredFile>();
  private readonly folders = new Set<string>();
  private readonly sessions = new Map<string, UploadSession>();
  private readonly cursors = new Map<string, RemoteEntry[]>();
  private readonly failures = new Map<string, Error>();
  private readonly pageSize: number;
  private revisionCounter = 0;
  private sessionCounter = 0;
  private cursorCounter = 0;

  constructor(options: MemoryRemoteStoreOptions = {}) {
    this.pageSize = options.pageSize ?? 100;
  }

  // ---------------------------------------------------------------------------
  // Test setup and inspection
  // ---------------------------------------------------------------------------

  /**
   * Stores a file and its ancestor folders. Returns the new revision.
   */
  putFile(remotePath: string, contents: string | Buffer): string {
    const revision = this.nextRevision();
    this.addAncestors(remotePath);
    this.files.set(remotePath, {
      path: remotePath,
      contents: Buffer.from(contents),
      revision,
    });
    return revision;
  }

  putFolder(remotePath: string): void {
    this.addAncestors(remotePath);
    this.folders.add(remotePath);
  }

  removeFile(remotePath: string): void {
    this.files.delete(remotePath);
  }

  hasFile(remotePath: string): boolean {
    return this.files.has(remotePath);
  }

  /** File contents as UTF-8, or undefined when absent */
  readFile(remotePath: string): string | undefined {
    return this.files.get(remotePath)?.contents.toString("utf-8");
  }

  readBuffer(remotePath: string): Buffer | undefined {
    return this.files.get(remotePath)?.contents;
  }

  revisionOf(remotePath: string): string | undefined {
    return this.files.get(remotePath)?.revision;
  }

  filePaths(): string[] {
    return [...this.files.keys()].sort();
  }

  /**
   * Makes every call of `method` fail with `error`; when `remotePath` is
   * given only calls for that path fail.
   */
  failOn(method: StoreMethod, error: Error, remotePath?: string): void {
    this.failures.set(failureKey(method, remotePath), error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  callsTo(method: StoreMethod): StoreCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  // ---------------------------------------------------------------------------
  // RemoteStore
  // ---------------------------------------------------------------------------

  async listFolder(folderPath: string, recursive: boolean): Promise<ListFolderPage> {
    this.record({ method: "listFolder", path: folderPath });

    const prefix = `${folderPath}/`.toLowerCase();
    const entries: RemoteEntry[] = [];
    for (const folder of this.folders) {
      if (isListed(folder, prefix, recursive)) {
        entries.push({ kind: "folder", path: folder });
      }
    }
    for (const file of this.files.values()) {
      if (isListed(file.path, prefix, recursive)) {
        entries.push({
          kind: "file",
          path: file.path,
          revision: file.revision,
          clientModifiedAt: "2026-01-01T00:00:00Z",
          serverModifiedAt: "2026-01-01T00:00:00Z",
          contentHash: null,
          size: file.contents.length,
        });
      }
    }
    entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    return this.page(entries);
  }

  async listFolderContinue(cursor: string): Promise<ListFolderPage> {
    this.record({ method: "listFolderContinue" });

    const remaining = this.cursors.get(cursor);
    if (!remaining) {
      throw new Error(`reset: unknown cursor ${cursor}`);
    }
    this.cursors.delete(cursor);
    return this.page(remaining);
  }

  async uploadWhole(contents: Buffer, remotePath: string, overwrite: boolean): Promise<string> {
    this.record({ method: "uploadWhole", path: remotePath, size: contents.length });

    if (!overwrite && this.files.has(remotePath)) {
      throw new Error(`path/conflict/file/: ${remotePath}`);
    }
    return this.putFile(remotePath, Buffer.from(contents));
  }

  async uploadSessionStart(contents: Buffer): Promise<string> {
    this.record({ method: "uploadSessionStart", size: contents.length });

    const sessionId = `session-${++this.sessionCounter}`;
    this.sessions.set(sessionId, { chunks: [Buffer.from(contents)], offset: contents.length });
    return sessionId;
  }

  async uploadSessionAppend(contents: Buffer, sessionId: string, offset: number): Promise<void> {
    this.record({ method: "uploadSessionAppend", sessionId, offset, size: contents.length });

    const session = this.openSession(sessionId, offset);
    session.chunks.push(Buffer.from(contents));
    session.offset += contents.length;
  }

  async uploadSessionFinish(
    contents: Buffer,
    sessionId: string,
    offset: number,
    remotePath: string,
    overwrite: boolean
  ): Promise<string> {
    this.record({
      method: "uploadSessionFinish",
      path: remotePath,
      sessionId,
      offset,
      size: contents.length,
    });

    const session = this.openSession(sessionId, offset);
    this.sessions.delete(sessionId);
    if (!overwrite && this.files.has(remotePath)) {
      throw new Error(`path/conflict/file/: ${remotePath}`);
    }
    return this.putFile(remotePath, Buffer.concat([...session.chunks, contents]));
  }

  async downloadToFile(remotePath: string, localPath: string): Promise<string> {
    this.record({ method: "downloadToFile", path: remotePath });

    const file = this.files.get(remotePath);
    if (!file) {
      throw new Error(`path/not_found/: ${remotePath}`);
    }
    await fs.writeFile(localPath, file.contents);
    return file.revision;
  }

  async delete(remotePath: string): Promise<DeleteOutcome> {
    this.record({ method: "delete", path: remotePath });

    if (this.files.delete(remotePath)) {
      return "deleted";
    }
    if (this.folders.delete(remotePath)) {
      const prefix = `${remotePath}/`;
      for (const filePath of [...this.files.keys()]) {
        if (filePath.startsWith(prefix)) this.files.delete(filePath);
      }
      for (const folder of [...this.folders]) {
        if (folder.startsWith(prefix)) this.folders.delete(folder);
      }
      return "deleted";
    }
    return "not-found";
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private record(call: StoreCall): void {
    this.calls.push(call);
    const error =
      (call.path !== undefined ? this.failures.get(failureKey(call.method, call.path)) : undefined) ??
      this.failures.get(failureKey(call.method));
    if (error) {
      throw error;
    }
  }

  private page(entries: RemoteEntry[]): ListFolderPage {
    const pageEntries = entries.slice(0, this.pageSize);
    const remaining = entries.slice(this.pageSize);
    const cursor = `cursor-${++this.cursorCounter}`;
    if (remaining.length > 0) {
      this.cursors.set(cursor, remaining);
    }
    return { entries: pageEntries, cursor, hasMore: remaining.length > 0 };
  }

  private openSession(sessionId: string, offset: number): UploadSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`upload_session/not_found: ${sessionId}`);
    }
    if (session.offset !== offset) {
      throw new Error(`incorrect_offset: expected ${session.offset}, got ${offset}`);
    }
    return session;
  }

  private addAncestors(remotePath: string): void {
    const parts = remotePath.split("/").filter((part) => part !== "");
    for (let i = 1; i < parts.length; i++) {
      this.folders.add(`/${parts.slice(0, i).join("/")}`);
    }
  }

  private nextRevision(): string {
    return `r${++this.revisionCounter}`;
  }
}

function failureKey(method: StoreMethod, remotePath?: string): string {
  return remotePath === undefined ? method : `${method}:${remotePath}`;
}

function isListed(entryPath: string, prefix: string, recursive: boolean): boolean {
  const lower = entryPath.toLowerCase();
  if (!lower.startsWith(prefix)) return false;
  return recursive || !lower.slice(prefix.length).includes("/");
}

// =============================================================================
// Filesystem helpers
// =============================================================================

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Writes a file below `root`, creating parent directories.
 */
export async function writeLocalFile(
  root: string,
  relativePath: string,
  contents: string | Buffer
): Promise<string> {
  const filePath = path.join(root, ...relativePath.split("/"));
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
  return filePath;
}

export async function readLocalFile(root: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(root, ...relativePath.split("/")), "utf-8");
}

export async function localFileExists(root: string, relativePath: string): Promise<boolean> {
  try {
    await fs.access(path.join(root, ...relativePath.split("/")));
    return true;
  } catch {
    return false;
  }
}

/**
 * Sets both atime and mtime of a local file.
 */
export async function setMtime(root: string, relativePath: string, mtimeMs: number): Promise<void> {
  const time = new Date(mtimeMs);
  await fs.utimes(path.join(root, ...relativePath.split("/")), time, time);
}

/**
 * A SyncConfig rooted at `localRoot` with the state file inside it.
 */
export function createTestConfig(localRoot: string, overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    accessToken: "test-secret",
    localRoot,
    remoteRoot: "",
    stateFile: path.join(localRoot, DEFAULT_STATE_FILE_NAME),
    largeFileThreshold: DEFAULT_LARGE_FILE_THRESHOLD,
    chunkSize: DEFAULT_CHUNK_SIZE,
    failFast: false,
    scanRules: { ...DEFAULT_SCAN_RULES },
    ...overrides,
  };
}

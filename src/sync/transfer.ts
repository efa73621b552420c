/**
 * Transfer engine: uploads and downloads single files and records the
 * result in both state maps.
 *
 * Files larger than the threshold are uploaded through an upload session:
 * the first chunk opens the session, each following full chunk is appended
 * at the running byte offset, and the trailing (possibly empty) chunk
 * commits the session with overwrite semantics.
 */

import * as fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { RemoteStore } from "../dropbox/types.js";
import type { FileRecord, SyncStateFile, TransferProgress } from "../types.js";
import { TransferError, errorMessage } from "../errors.js";
import { recordSynced } from "./state.js";
import { toLocalPath, toRemotePath } from "./paths.js";
import { ensureParentDirectory } from "./file-writer.js";

/** Files strictly larger than this use an upload session */
export const DEFAULT_LARGE_FILE_THRESHOLD = 140_000_000;

/** Bytes sent per upload session request */
export const DEFAULT_CHUNK_SIZE = 10_000_000;

export interface TransferOptions {
  /** Local directory being synchronized */
  localRoot: string;
  /** Normalized remote root */
  remoteRoot: string;
  largeFileThreshold?: number;
  /** Must be positive and not larger than `largeFileThreshold` */
  chunkSize?: number;
  /** Called once per uploaded chunk of a session upload */
  onProgress?: (progress: TransferProgress) => void;
  /** If true, suppress console output */
  quiet?: boolean;
}

export class TransferEngine {
  private readonly localRoot: string;
  private readonly remoteRoot: string;
  private readonly largeFileThreshold: number;
  private readonly chunkSize: number;
  private readonly onProgress?: (progress: TransferProgress) => void;
  private readonly quiet: boolean;

  constructor(
    private readonly store: RemoteStore,
    private readonly state: SyncStateFile,
    options: TransferOptions
  ) {
    this.localRoot = options.localRoot;
    this.remoteRoot = options.remoteRoot;
    this.largeFileThreshold = options.largeFileThreshold ?? DEFAULT_LARGE_FILE_THRESHOLD;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.onProgress = options.onProgress;
    this.quiet = options.quiet ?? false;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new RangeError(`Chunk size must be a positive integer, got ${this.chunkSize}`);
    }
    if (this.chunkSize > this.largeFileThreshold) {
      throw new RangeError(
        `Chunk size (${this.chunkSize}) must not exceed the large file threshold (${this.largeFileThreshold})`
      );
    }
  }

  /**
   * Uploads a local file, overwriting the remote copy.
   *
   * The mtime is captured before the content is read, so an edit made during
   * the upload is picked up by the next run.
   *
   * @throws TransferError - state is unchanged for the path
   */
  async upload(relativePath: string, reason?: string): Promise<FileRecord> {
    if (!this.quiet) {
      console.log(`[transfer] Uploading: ${relativePath}${reason ? ` (${reason})` : ""}`);
    }

    const localPath = toLocalPath(this.localRoot, relativePath);
    const remotePath = toRemotePath(this.remoteRoot, relativePath);

    try {
      const stats = await fs.stat(localPath);
      const revision =
        stats.size > this.largeFileThreshold
          ? await this.uploadInSession(relativePath, localPath, remotePath, stats.size)
          : await this.store.uploadWhole(await fs.readFile(localPath), remotePath, true);

      const record: FileRecord = { revision, modifiedAt: stats.mtimeMs };
      recordSynced(this.state, relativePath, record);
      return record;
    } catch (error) {
      throw new TransferError(
        `Failed to upload ${relativePath}: ${errorMessage(error)}`,
        relativePath,
        "upload",
        { cause: error }
      );
    }
  }

  /**
   * Downloads a remote file, creating intermediate directories as needed.
   *
   * @throws TransferError - state is unchanged for the path
   */
  async download(relativePath: string, reason?: string): Promise<FileRecord> {
    if (!this.quiet) {
      console.log(`[transfer] Downloading: ${relativePath}${reason ? ` (${reason})` : ""}`);
    }

    const localPath = toLocalPath(this.localRoot, relativePath);
    const remotePath = toRemotePath(this.remoteRoot, relativePath);

    try {
      await ensureParentDirectory(localPath);
      const revision = await this.store.downloadToFile(remotePath, localPath);
      const stats = await fs.stat(localPath);

      const record: FileRecord = { revision, modifiedAt: stats.mtimeMs };
      recordSynced(this.state, relativePath, record);
      return record;
    } catch (error) {
      throw new TransferError(
        `Failed to download ${relativePath}: ${errorMessage(error)}`,
        relativePath,
        "download",
        { cause: error }
      );
    }
  }

  private async uploadInSession(
    relativePath: string,
    localPath: string,
    remotePath: string,
    totalBytes: number
  ): Promise<string> {
    const handle = await fs.open(localPath, "r");
    try {
      let sessionId: string | null = null;
      let offset = 0;
      let data = await readChunk(handle, this.chunkSize);

      while (data.length === this.chunkSize) {
        if (sessionId === null) {
          sessionId = await this.store.uploadSessionStart(data);
        } else {
          await this.store.uploadSessionAppend(data, sessionId, offset);
        }
        offset += data.length;
        this.reportProgress({ path: relativePath, bytesTransferred: offset, totalBytes });
        data = await readChunk(handle, this.chunkSize);
      }

      if (sessionId === null) {
        // File shrank below one chunk after it was measured
        return await this.store.uploadWhole(data, remotePath, true);
      }

      const revision = await this.store.uploadSessionFinish(data, sessionId, offset, remotePath, true);
      this.reportProgress({ path: relativePath, bytesTransferred: offset + data.length, totalBytes });
      return revision;
    } finally {
      await handle.close();
    }
  }

  private reportProgress(progress: TransferProgress): void {
    if (this.onProgress) {
      this.onProgress(progress);
    } else if (!this.quiet) {
      console.log(
        `[transfer] ${progress.path}: ${progress.bytesTransferred}/${progress.totalBytes} bytes`
      );
    }
  }
}

/**
 * Reads up to `size` bytes from the handle's current position. Returns a
 * shorter buffer only at end of file.
 */
async function readChunk(handle: FileHandle, size: number): Promise<Buffer> {
  const buffer = Buffer.alloc(size);
  let filled = 0;
  while (filled < size) {
    const { bytesRead } = await handle.read(buffer, filled, size - filled, null);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

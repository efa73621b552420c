/**
 * Dropbox SDK client wrapper.
 *
 * Implements the `RemoteStore` capability on top of the Dropbox v2 API and
 * handles the low-level concerns the sync engine should not see: write
 * modes, entry tags, download buffers, "not found" responses and rate
 * limiting.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  Dropbox,
  DropboxResponseError,
  type files,
  type DeleteOutcome,
  type ListFolderPage,
  type RemoteEntry,
  type RemoteStore,
} from "./types.js";

/**
 * Configuration for the DropboxClientWrapper.
 */
export interface DropboxClientConfig {
  /** Dropbox access token */
  accessToken: string;
  /** Maximum retry attempts on 429 (default: 3) */
  maxRetries?: number;
  /** First backoff delay in ms when the response carries none (default: 1000) */
  retryDelay?: number;
}

/**
 * Identity of the account behind the access token.
 */
export interface DropboxAccount {
  accountId: string;
  displayName: string;
  email: string;
}

/**
 * Error thrown when rate limiting exhausts retries.
 */
export class DropboxRateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = "DropboxRateLimitError";
  }
}

type ListedEntry =
  | files.FileMetadataReference
  | files.FolderMetadataReference
  | files.DeletedMetadataReference;

/**
 * `RemoteStore` backed by the Dropbox SDK.
 *
 * @example
 * ```ts
 * const client = new DropboxClientWrapper({ accessToken: process.env.DROPBOX_ACCESS_TOKEN ?? "" });
 * await client.verifyAccount();
 * const page = await client.listFolder("", true);
 * ```
 */
export class DropboxClientWrapper implements RemoteStore {
  private readonly client: Dropbox;
  private readonly maxRetries: number;
  private readonly retryDelay: number;

  constructor(config: DropboxClientConfig) {
    this.client = new Dropbox({ accessToken: config.accessToken });
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelay = config.retryDelay ?? 1000;
  }

  /**
   * Fetches the current account. Fails when the token is invalid, so the
   * CLI calls this before touching any file.
   */
  async verifyAccount(): Promise<DropboxAccount> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.usersGetCurrentAccount()
    );
    return {
      accountId: result.account_id,
      displayName: result.name.display_name,
      email: result.email,
    };
  }

  async listFolder(folderPath: string, recursive: boolean): Promise<ListFolderPage> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesListFolder({ path: folderPath, recursive })
    );
    return toListFolderPage(result);
  }

  async listFolderContinue(cursor: string): Promise<ListFolderPage> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesListFolderContinue({ cursor })
    );
    return toListFolderPage(result);
  }

  async uploadWhole(contents: Buffer, remotePath: string, overwrite: boolean): Promise<string> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesUpload({
        path: remotePath,
        contents,
        mode: writeMode(overwrite),
        mute: true,
      })
    );
    return result.rev;
  }

  async uploadSessionStart(contents: Buffer): Promise<string> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesUploadSessionStart({ contents, close: false })
    );
    return result.session_id;
  }

  async uploadSessionAppend(contents: Buffer, sessionId: string, offset: number): Promise<void> {
    await this.executeWithRateLimiting(() =>
      this.client.filesUploadSessionAppendV2({
        cursor: { session_id: sessionId, offset },
        contents,
        close: false,
      })
    );
  }

  async uploadSessionFinish(
    contents: Buffer,
    sessionId: string,
    offset: number,
    remotePath: string,
    overwrite: boolean
  ): Promise<string> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesUploadSessionFinish({
        cursor: { session_id: sessionId, offset },
        commit: { path: remotePath, mode: writeMode(overwrite), mute: true },
        contents,
      })
    );
    return result.rev;
  }

  /**
   * Downloads a file and writes it next to `localPath` under a hidden
   * temporary name before renaming it into place. The parent directory must
   * already exist.
   */
  async downloadToFile(remotePath: string, localPath: string): Promise<string> {
    const { result } = await this.executeWithRateLimiting(() =>
      this.client.filesDownload({ path: remotePath })
    );

    // The SDK attaches the body as `fileBinary`, which its typings omit
    const binary: unknown = "fileBinary" in result ? result.fileBinary : undefined;
    if (!Buffer.isBuffer(binary)) {
      throw new Error(`Download of ${remotePath} returned no file content`);
    }

    const tempPath = path.join(path.dirname(localPath), `.${path.basename(localPath)}.download`);
    try {
      await fs.writeFile(tempPath, binary);
      await fs.rename(tempPath, localPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    return result.rev;
  }

  async delete(remotePath: string): Promise<DeleteOutcome> {
    try {
      await this.executeWithRateLimiting(() => this.client.filesDeleteV2({ path: remotePath }));
      return "deleted";
    } catch (error) {
      if (isNotFoundError(error)) {
        return "not-found";
      }
      throw error;
    }
  }

  /**
   * Executes an API call, retrying on HTTP 429.
   *
   * - Waits for `retry_after` seconds when Dropbox sends it, otherwise uses
   *   exponential backoff starting at `retryDelay`
   * - Throws DropboxRateLimitError if retries are exhausted
   */
  private async executeWithRateLimiting<T>(apiCall: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    let retryDelay = this.retryDelay;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await apiCall();
      } catch (error) {
        lastError = error;

        if (isRateLimitError(error)) {
          if (attempt < this.maxRetries) {
            await this.sleep(getRetryAfter(error) ?? retryDelay);
            retryDelay *= 2;
            continue;
          }

          throw new DropboxRateLimitError(
            `Rate limit exceeded after ${this.maxRetries} retries`,
            getRetryAfter(error)
          );
        }

        throw error;
      }
    }

    throw lastError;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Exposes the underlying Dropbox client for advanced use cases.
   */
  get rawClient(): Dropbox {
    return this.client;
  }
}

function writeMode(overwrite: boolean): files.WriteMode {
  return overwrite ? { ".tag": "overwrite" } : { ".tag": "add" };
}

function toListFolderPage(result: files.ListFolderResult): ListFolderPage {
  const entries: RemoteEntry[] = [];
  for (const entry of result.entries) {
    const converted = toRemoteEntry(entry);
    if (converted) {
      entries.push(converted);
    }
  }
  return { entries, cursor: result.cursor, hasMore: result.has_more };
}

/**
 * Maps a tagged Dropbox entry to a `RemoteEntry`. Deleted entries and
 * entries without a path are dropped.
 */
function toRemoteEntry(entry: ListedEntry): RemoteEntry | null {
  const entryPath = entry.path_display ?? entry.path_lower;
  if (!entryPath) return null;

  switch (entry[".tag"]) {
    case "file":
      return {
        kind: "file",
        path: entryPath,
        revision: entry.rev,
        clientModifiedAt: entry.client_modified,
        serverModifiedAt: entry.server_modified,
        contentHash: entry.content_hash ?? null,
        size: entry.size,
      };
    case "folder":
      return { kind: "folder", path: entryPath };
    default:
      return null;
  }
}

/**
 * Returns the parsed error body of a Dropbox API error, if any.
 */
function errorBody(error: unknown): object | null {
  if (!(error instanceof DropboxResponseError)) return null;
  const body: unknown = error.error;
  return typeof body === "object" && body !== null ? body : null;
}

function errorSummary(error: unknown): string {
  const body = errorBody(error);
  if (body && "error_summary" in body && typeof body.error_summary === "string") {
    return body.error_summary;
  }
  return "";
}

/**
 * Checks for a 409 "path not found" (e.g. `path_lookup/not_found/`).
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof DropboxResponseError &&
    error.status === 409 &&
    errorSummary(error).includes("not_found")
  );
}

/**
 * Checks if an error is a Dropbox rate limit error (HTTP 429).
 */
function isRateLimitError(error: unknown): boolean {
  return error instanceof DropboxResponseError && error.status === 429;
}

/**
 * Extracts `retry_after` (seconds) from a rate limit error body, in ms.
 */
function getRetryAfter(error: unknown): number | undefined {
  const body = errorBody(error);
  if (!body || !("error" in body)) return undefined;
  const detail: unknown = body.error;
  if (
    typeof detail === "object" &&
    detail !== null &&
    "retry_after" in detail &&
    typeof detail.retry_after === "number"
  ) {
    return detail.retry_after * 1000;
  }
  return undefined;
}

/**
 * Remote store capability used by the sync engine, plus the Dropbox SDK
 * types the client wrapper works with.
 *
 * The engine only talks to `RemoteStore`; `DropboxClientWrapper` is the
 * production implementation and tests use an in-memory one.
 */

export { Dropbox, DropboxResponseError } from "dropbox";
export type { files, users, DropboxResponse } from "dropbox";

/**
 * A file in the remote listing. `path` is relative to the sync root once
 * it leaves the remote lister; inside a `ListFolderPage` it is the store's
 * own absolute path.
 */
export interface RemoteFile {
  kind: "file";
  path: string;
  revision: string;
  clientModifiedAt: string;
  serverModifiedAt: string;
  contentHash: string | null;
  size: number;
}

export interface RemoteFolder {
  kind: "folder";
  path: string;
}

export type RemoteEntry = RemoteFile | RemoteFolder;

/**
 * One page of a folder listing.
 */
export interface ListFolderPage {
  entries: RemoteEntry[];
  cursor: string;
  hasMore: boolean;
}

export type DeleteOutcome = "deleted" | "not-found";

/**
 * Minimal capability set the sync engine needs from a remote object store.
 * All paths are the store's absolute paths (e.g. "/docs/readme.txt").
 */
export interface RemoteStore {
  listFolder(path: string, recursive: boolean): Promise<ListFolderPage>;
  listFolderContinue(cursor: string): Promise<ListFolderPage>;
  /** Single-shot upload; returns the new revision */
  uploadWhole(contents: Buffer, path: string, overwrite: boolean): Promise<string>;
  /** Opens an upload session with the first chunk; returns the session ID */
  uploadSessionStart(contents: Buffer): Promise<string>;
  uploadSessionAppend(contents: Buffer, sessionId: string, offset: number): Promise<void>;
  /** Commits the session with the final chunk; returns the new revision */
  uploadSessionFinish(
    contents: Buffer,
    sessionId: string,
    offset: number,
    path: string,
    overwrite: boolean
  ): Promise<string>;
  /** Writes the remote file to `localPath`; returns its revision */
  downloadToFile(remotePath: string, localPath: string): Promise<string>;
  /** "not-found" when the path was already absent */
  delete(path: string): Promise<DeleteOutcome>;
}

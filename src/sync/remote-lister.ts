/**
 * Remote listing for the remote → local pass.
 *
 * Follows the listing cursor until `hasMore` is false and yields a single
 * stream of entries with paths relative to the sync root.
 */

import type { ListFolderPage, RemoteEntry, RemoteStore } from "../dropbox/types.js";
import { ListingError, errorMessage } from "../errors.js";
import { toRelativeRemotePath } from "./paths.js";

/**
 * List every file and folder under `remoteRoot`, recursively.
 *
 * The sequence is lazy and cannot be resumed: calling again re-lists from
 * scratch. A failed page request throws `ListingError`; entries yielded
 * before it must not be treated as a complete listing.
 *
 * @param store - The remote store
 * @param remoteRoot - Normalized remote root ("" for the app folder root)
 *
 * @example
 * ```ts
 * for await (const entry of listRemoteEntries(client, "")) {
 *   if (entry.kind === "file") console.log(entry.path, entry.revision);
 * }
 * ```
 */
export async function* listRemoteEntries(
  store: RemoteStore,
  remoteRoot: string
): AsyncGenerator<RemoteEntry> {
  let page: ListFolderPage;
  try {
    page = await store.listFolder(remoteRoot, true);
  } catch (error) {
    throw new ListingError(
      `Failed to list ${remoteRoot || "/"}: ${errorMessage(error)}`,
      remoteRoot,
      { cause: error }
    );
  }

  while (true) {
    for (const entry of page.entries) {
      const relativePath = toRelativeRemotePath(remoteRoot, entry.path);
      if (relativePath === null) continue;
      yield { ...entry, path: relativePath };
    }

    if (!page.hasMore) break;

    try {
      page = await store.listFolderContinue(page.cursor);
    } catch (error) {
      throw new ListingError(
        `Failed to continue listing ${remoteRoot || "/"}: ${errorMessage(error)}`,
        remoteRoot,
        { cause: error }
      );
    }
  }
}

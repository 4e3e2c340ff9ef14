import { readFolderManifest } from "../storage/dashboards/manager.js";
import { GENERAL_FOLDER, toSafeFilename } from "../storage/dashboards/paths.js";
import type { Folder } from "../schemas/folder.js";
import {
  folderMapFromList,
  folderMapFromManifest,
  type FolderMap,
  type SyncDeps,
} from "./types.js";

/**
 * Builds the folder map for an upload: from `folders.json` when the source
 * has one, otherwise from the folders the service already holds.
 */
export async function resolveFolders(
  sourceDir: string,
  deps: SyncDeps,
): Promise<FolderMap> {
  const manifest = await readFolderManifest(sourceDir);
  if (manifest) {
    deps.logger.debug(
      { folders: Object.keys(manifest).length },
      "Loaded folder manifest",
    );
    return folderMapFromManifest(manifest);
  }

  deps.logger.warn(
    { sourceDir },
    "folders.json is missing; it is created when dashboards are downloaded",
  );
  deps.logger.warn(
    "Folders will not keep their folderUid and links/bookmarks will break",
  );
  return folderMapFromList(await deps.client.listFolders());
}

/**
 * Finds the folder a directory was written for. Download names directories
 * with `toSafeFilename(title)`, so "Team/Ops" lives in `Team_Ops/`.
 */
export function findFolderForDirectory(
  name: string,
  folders: FolderMap,
): { title: string; folder: Folder } | null {
  const exact = folders.get(name);
  if (exact) {
    return { title: name, folder: exact };
  }
  for (const [title, folder] of folders) {
    if (toSafeFilename(title) === name) {
      return { title, folder };
    }
  }
  return null;
}

/**
 * Ensures the remote folder for a local directory exists.
 *
 * A known folder is created under its own title with its known uid (the
 * service upserts). An unknown directory is created without one and the
 * service's folder is added to the map. Returns the folder dashboards should
 * be filed under, or null for the root "General" folder, which is never
 * created.
 */
export async function materializeFolder(
  name: string,
  folders: FolderMap,
  deps: SyncDeps,
): Promise<Folder | null> {
  if (name === GENERAL_FOLDER) {
    return null;
  }

  const known = findFolderForDirectory(name, folders);
  if (known) {
    await deps.client.createFolder(known.title, known.folder.uid);
    return known.folder;
  }

  const created = await deps.client.createFolder(name);
  folders.set(created.title, created);
  deps.logger.info(
    { folder: created.title, uid: created.uid, id: created.id },
    "Created folder with service-assigned uid",
  );
  return created;
}

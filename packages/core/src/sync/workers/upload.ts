import { join } from "node:path";
import {
  InvalidSourceError,
  MissingSourceError,
  UploadAbortedError,
} from "../../errors/catalog.js";
import {
  describeSourceTree,
  isDirectory,
  listDashboardFiles,
  listFolderDirs,
  readDashboardFile,
} from "../../storage/dashboards/manager.js";
import { rewriteDashlistPanels } from "../dashlist.js";
import { materializeFolder, resolveFolders } from "../folders.js";
import type {
  FolderMap,
  SyncDeps,
  UploadDeps,
  UploadOptions,
  UploadSummary,
} from "../types.js";
import { uploadHomeDashboard } from "./home.js";

export const CONFIRM_MESSAGE =
  "Folder hierarchy will be preserved. Press enter to confirm upload...";

/**
 * Uploads one folder directory:
 * 1. Ensure the remote folder exists (known uid, or service-assigned)
 * 2. For each dashboard file: parse, rewrite dashlist panels, submit
 *
 * Returns the number of dashboards uploaded.
 */
export async function uploadFolder(
  deps: SyncDeps,
  sourceDir: string,
  name: string,
  folders: FolderMap,
): Promise<number> {
  const { client, logger } = deps;
  const folder = await materializeFolder(name, folders, deps);
  const folderDir = join(sourceDir, name);

  let uploaded = 0;
  for (const file of await listDashboardFiles(folderDir)) {
    logger.info({ folder: name, file }, "Adding dashboard");
    const document = rewriteDashlistPanels(
      await readDashboardFile(join(folderDir, file)),
      folders,
      logger,
    );
    await client.createDashboard(document, folder?.uid);
    uploaded++;
  }
  return uploaded;
}

/**
 * Writes a source directory of dashboards to the service, folder by folder
 * and file by file. Any service or parse failure ends the run.
 */
export async function uploadDashboards(
  deps: UploadDeps,
  options: UploadOptions,
): Promise<UploadSummary> {
  const { logger } = deps;
  const sourceDir = options.source;

  if (sourceDir === undefined) {
    throw new MissingSourceError();
  }
  if (!(await isDirectory(sourceDir))) {
    throw new InvalidSourceError(sourceDir);
  }

  logger.info({ sourceDir }, "Uploading dashboards");
  logger.info({ tree: await describeSourceTree(sourceDir) }, "Source tree");

  const folders = await resolveFolders(sourceDir, deps);

  if (!options.nonInteractive && deps.confirm) {
    const confirmed = await deps.confirm(CONFIRM_MESSAGE);
    if (!confirmed) {
      throw new UploadAbortedError({ sourceDir });
    }
  }

  const summary: UploadSummary = { folders: [], dashboards: 0, home: null };

  for (const name of await listFolderDirs(sourceDir)) {
    summary.dashboards += await uploadFolder(deps, sourceDir, name, folders);
    summary.folders.push(name);
  }

  summary.home = await uploadHomeDashboard(deps, sourceDir, folders);

  logger.info(
    { folders: summary.folders.length, dashboards: summary.dashboards },
    "Upload complete",
  );
  return summary;
}

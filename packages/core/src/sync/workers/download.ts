import { MissingDestinationError } from "../../errors/catalog.js";
import {
  writeDashboardFile,
  writeFolderManifest,
} from "../../storage/dashboards/manager.js";
import {
  buildDashboardPath,
  buildHomePath,
  GENERAL_FOLDER,
  toSafeFilename,
} from "../../storage/dashboards/paths.js";
import type { FolderManifest } from "../../schemas/folder.js";
import type { DownloadOptions, DownloadSummary, SyncDeps } from "../types.js";

/**
 * Mirrors the service into a destination directory in the layout upload
 * reads back:
 * 1. `folders.json` with every folder keyed by title
 * 2. `<folder>/<dashboard>.json` per dashboard (root dashboards under General)
 * 3. `home.json` when the service reports a home dashboard
 */
export async function downloadDashboards(
  deps: SyncDeps,
  options: DownloadOptions,
): Promise<DownloadSummary> {
  const { client, logger } = deps;
  const destination = options.destination;
  if (destination === undefined) {
    throw new MissingDestinationError();
  }

  logger.info({ destination }, "Downloading dashboards");

  const folders = await client.listFolders();
  const manifest: FolderManifest = {};
  for (const folder of folders) {
    manifest[folder.title] = folder;
  }
  const manifestPath = await writeFolderManifest(destination, manifest);
  logger.info({ path: manifestPath, folders: folders.length }, "Wrote folder manifest");

  const written = new Set<string>();
  let dashboards = 0;
  for (const hit of await client.searchDashboards()) {
    const document = await client.getDashboard(hit.uid);
    const folderTitle = hit.folderTitle ?? GENERAL_FOLDER;

    let filePath = buildDashboardPath(destination, folderTitle, document.title);
    if (written.has(filePath)) {
      // Two dashboards with one title in a folder: keep both
      filePath = buildDashboardPath(
        destination,
        folderTitle,
        `${document.title}-${toSafeFilename(hit.uid)}`,
      );
    }
    written.add(filePath);

    await writeDashboardFile(filePath, document);
    logger.debug({ folder: folderTitle, dashboard: document.title, path: filePath }, "Saved dashboard");
    dashboards++;
  }

  const home = await client.getHomeDashboard();
  if (home) {
    await writeDashboardFile(buildHomePath(destination), home);
    logger.info({ dashboard: home.title }, "Saved home dashboard");
  } else {
    logger.warn("Service has no standalone home dashboard, home.json not written");
  }

  logger.info({ folders: folders.length, dashboards }, "Download complete");
  return { manifestPath, folders: folders.length, dashboards, home: home !== null };
}

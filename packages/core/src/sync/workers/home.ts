import { isFile, readDashboardFile } from "../../storage/dashboards/manager.js";
import { buildHomePath } from "../../storage/dashboards/paths.js";
import { rewriteDashlistPanels } from "../dashlist.js";
import type { FolderMap, SyncDeps } from "../types.js";

/**
 * Uploads `home.json` and makes it the landing dashboard.
 *
 * Skipped with a warning, and without any service call, when there is no
 * source directory or no `home.json` in it. Returns the dashboard uid, or
 * null when skipped.
 */
export async function uploadHomeDashboard(
  deps: SyncDeps,
  sourceDir: string | undefined,
  folders: FolderMap,
): Promise<string | null> {
  const { client, logger } = deps;

  if (sourceDir === undefined) {
    logger.warn("No source directory, cannot find home.json file");
    return null;
  }

  const homePath = buildHomePath(sourceDir);
  if (!(await isFile(homePath))) {
    logger.warn({ path: homePath }, "home.json is not a file, skipping home dashboard");
    return null;
  }

  const document = rewriteDashlistPanels(
    await readDashboardFile(homePath),
    folders,
    logger,
  );
  const dashboardUid = await client.createHomeDashboard(document);
  logger.info({ dashboard: document.title, uid: dashboardUid }, "Set home dashboard");

  await client.setHomeDashboard(dashboardUid);
  return dashboardUid;
}

import type { Logger } from "pino";
import {
  panelLayout,
  type DashboardDocument,
  type Panel,
} from "../schemas/dashboard.js";
import type { FolderMap } from "./types.js";

/**
 * Points a `dashlist` panel at the folder named by its title.
 *
 * `options.folderId` / `options.folderUID` are replaced only when present
 * and different; absent keys are not added. Panels that are not dashlists,
 * or whose title is not a known folder (recent dashboards, alerts, ...),
 * come back as the same object.
 */
export function rewritePanel(
  panel: Panel,
  folders: FolderMap,
  logger: Logger,
): Panel {
  if (panel.type !== "dashlist") {
    return panel;
  }

  const folderName = panel.title;
  const folder = folderName !== undefined ? folders.get(folderName) : undefined;
  if (!folder) {
    logger.debug({ panel: folderName }, "Dashlist panel is not a known folder");
    return panel;
  }

  const options = panel.options;
  if (!options) {
    return panel;
  }

  logger.info(
    { panel: folderName, folderUid: folder.uid, folderId: folder.id },
    "Checking dashlist panel folder reference",
  );

  let updated = options;
  if (
    options.folderId !== undefined &&
    options.folderId !== null &&
    options.folderId !== folder.id
  ) {
    logger.info(
      { panel: folderName, from: options.folderId, to: folder.id },
      "Updating folderId",
    );
    updated = { ...updated, folderId: folder.id };
  }
  if (
    options.folderUID !== undefined &&
    options.folderUID !== null &&
    options.folderUID !== folder.uid
  ) {
    logger.info(
      { panel: folderName, from: options.folderUID, to: folder.uid },
      "Updating folderUID",
    );
    updated = { ...updated, folderUID: folder.uid };
  }

  return updated === options ? panel : { ...panel, options: updated };
}

/**
 * Rewrites every dashlist panel of a dashboard. Flat `panels` take
 * precedence; otherwise each row's panels are rewritten in place of that
 * row's own list. The input document is never mutated.
 */
export function rewriteDashlistPanels(
  document: DashboardDocument,
  folders: FolderMap,
  logger: Logger,
): DashboardDocument {
  const layout = panelLayout(document);

  switch (layout.kind) {
    case "panels":
      return {
        ...document,
        panels: layout.panels.map((panel) => rewritePanel(panel, folders, logger)),
      };
    case "rows":
      return {
        ...document,
        rows: layout.rows.map((row) =>
          row.panels
            ? {
                ...row,
                panels: row.panels.map((panel) =>
                  rewritePanel(panel, folders, logger),
                ),
              }
            : row,
        ),
      };
    case "none":
      logger.info({ dashboard: document.title }, "Dashboard has no panels");
      return document;
  }
}

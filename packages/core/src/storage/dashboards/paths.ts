import { join } from "node:path";

export const MANIFEST_FILENAME = "folders.json";
export const HOME_FILENAME = "home.json";

/** Directory holding dashboards that live in the service's root folder. */
export const GENERAL_FOLDER = "General";

export function buildManifestPath(baseDir: string): string {
  return join(baseDir, MANIFEST_FILENAME);
}

export function buildHomePath(baseDir: string): string {
  return join(baseDir, HOME_FILENAME);
}

export function buildFolderDir(baseDir: string, folderTitle: string): string {
  return join(baseDir, toSafeFilename(folderTitle));
}

/** `<baseDir>/<folder>/<dashboard title>.json`, both segments made filesystem-safe */
export function buildDashboardPath(
  baseDir: string,
  folderTitle: string,
  dashboardTitle: string,
): string {
  return join(
    buildFolderDir(baseDir, folderTitle),
    toSafeFilename(dashboardTitle) + ".json",
  );
}

/** "CPU / Memory" → "CPU _ Memory" */
export function toSafeFilename(name: string): string {
  const cleaned = name.replace(/[/\\:*?"<>|\x00-\x1f]/g, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") {
    return "_";
  }
  return cleaned;
}

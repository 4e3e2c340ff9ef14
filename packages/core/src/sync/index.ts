export {
  folderMapFromManifest,
  folderMapFromList,
  type FolderMap,
  type SyncDeps,
  type ConfirmPrompt,
  type UploadDeps,
  type UploadOptions,
  type UploadSummary,
  type DownloadOptions,
  type DownloadSummary,
} from "./types.js";
export { rewritePanel, rewriteDashlistPanels } from "./dashlist.js";
export {
  resolveFolders,
  materializeFolder,
  findFolderForDirectory,
} from "./folders.js";
export {
  uploadDashboards,
  uploadFolder,
  CONFIRM_MESSAGE,
} from "./workers/upload.js";
export { uploadHomeDashboard } from "./workers/home.js";
export { downloadDashboards } from "./workers/download.js";

import type { Logger } from "pino";
import type { GrafanaClient } from "../grafana/client.js";
import type { Folder, FolderManifest } from "../schemas/folder.js";

/**
 * Folder title → folder, threaded through one sync run. Upload appends
 * folders the service creates so later panel rewrites can resolve them.
 */
export type FolderMap = Map<string, Folder>;

export function folderMapFromManifest(manifest: FolderManifest): FolderMap {
  return new Map(Object.entries(manifest));
}

/** Later entries win when two folders share a title. */
export function folderMapFromList(folders: Folder[]): FolderMap {
  return new Map(folders.map((folder) => [folder.title, folder]));
}

export interface SyncDeps {
  client: GrafanaClient;
  logger: Logger;
}

/** Resolves to false when the operator declines. */
export type ConfirmPrompt = (message: string) => Promise<boolean>;

export interface UploadDeps extends SyncDeps {
  confirm?: ConfirmPrompt;
}

export interface UploadOptions {
  source?: string;
  nonInteractive: boolean;
}

export interface UploadSummary {
  /** Folder directories processed, in upload order */
  folders: string[];
  dashboards: number;
  /** uid of the home dashboard, null when none was uploaded */
  home: string | null;
}

export interface DownloadOptions {
  destination?: string;
}

export interface DownloadSummary {
  manifestPath: string;
  folders: number;
  dashboards: number;
  home: boolean;
}

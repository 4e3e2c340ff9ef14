export {
  FolderSchema,
  FolderManifestSchema,
  FolderListSchema,
  type Folder,
  type FolderManifest,
} from "./folder.js";
export {
  PanelSchema,
  PanelOptionsSchema,
  RowSchema,
  DashboardDocumentSchema,
  DashboardSchema,
  DashboardSearchHitSchema,
  DashboardWithMetaSchema,
  panelLayout,
  type Panel,
  type Row,
  type DashboardDocument,
  type Dashboard,
  type DashboardSearchHit,
  type DashboardWithMeta,
  type PanelLayout,
} from "./dashboard.js";
export {
  DEFAULTS,
  LogLevel,
  SyncConfigSchema,
  type SyncConfig,
  type LoggingConfig,
  type GrafanaConfig,
} from "./sync-config.js";

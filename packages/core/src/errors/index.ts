export {
  DashboardSyncError,
  GrafanaApiError,
  MissingSourceError,
  InvalidSourceError,
  MissingDestinationError,
  UploadAbortedError,
} from "./catalog.js";

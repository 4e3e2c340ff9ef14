export {
  createGrafanaClient,
  authorizationHeader,
  dashboardUidFromUrl,
  type GrafanaClient,
  type GrafanaClientOptions,
} from "./client.js";

export {
  createMockGrafanaClient,
  createMockLogger,
  createSourceDir,
  type MockGrafanaClient,
} from "./grafana.js";

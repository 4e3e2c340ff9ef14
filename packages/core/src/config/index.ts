export { DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_PATH } from "./defaults.js";
export {
  loadConfig,
  applyOverrides,
  type LoadConfigOptions,
  type ConfigOverrides,
} from "./loader.js";
export { expandHomePath, resolveConfigPath, resolveDirectory } from "./paths.js";

import { readFile } from "node:fs/promises";
import {
  SyncConfigSchema,
  type SyncConfig,
} from "../schemas/sync-config.js";
import { resolveConfigPath, resolveDirectory } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
}

/** Values that take precedence over the config file (flags, environment). */
export interface ConfigOverrides {
  url?: string;
  token?: string;
  logLevel?: string;
  source?: string;
  destination?: string;
  nonInteractive?: boolean;
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<SyncConfig> {
  const configPath = resolveConfigPath(options?.configPath);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // No config file — defaults apply
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  return SyncConfigSchema.parse(parsed);
}

/**
 * Layers overrides on top of a loaded config and re-validates the result.
 * Directory values are resolved to absolute paths.
 */
export function applyOverrides(
  config: SyncConfig,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): SyncConfig {
  const url = overrides.url ?? env.GRAFANA_URL;
  const token = overrides.token ?? env.GRAFANA_TOKEN;
  const source = overrides.source ?? config.source;
  const destination = overrides.destination ?? config.destination;

  return SyncConfigSchema.parse({
    ...config,
    grafana: {
      ...config.grafana,
      ...(url !== undefined && { url }),
      ...(token !== undefined && { token }),
    },
    logging: {
      ...config.logging,
      ...(overrides.logLevel !== undefined && { level: overrides.logLevel }),
    },
    source: source !== undefined ? resolveDirectory(source) : undefined,
    destination:
      destination !== undefined ? resolveDirectory(destination) : undefined,
    nonInteractive: overrides.nonInteractive ?? config.nonInteractive,
  });
}

import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_CONFIG_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the config file location: explicit path, then
 * DASHBOARD_SYNC_CONFIG, then the default under ~/.config.
 */
export function resolveConfigPath(input?: string): string {
  return resolve(
    expandHomePath(
      input ?? process.env.DASHBOARD_SYNC_CONFIG ?? DEFAULT_CONFIG_PATH,
    ),
  );
}

/** Resolves a source/destination directory to an absolute path. */
export function resolveDirectory(input: string): string {
  return resolve(expandHomePath(input));
}

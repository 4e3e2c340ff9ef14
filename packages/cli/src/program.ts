import { createRequire } from "node:module";
import { Command, Option } from "commander";
import {
  applyOverrides,
  loadConfig,
  resolveDirectory,
  type ConfigOverrides,
} from "@dashboard-sync/core/config";
import { createLogger, type Logger } from "@dashboard-sync/core/logger";
import {
  createGrafanaClient,
  type GrafanaClient,
  type GrafanaClientOptions,
} from "@dashboard-sync/core/grafana";
import type { LoggingConfig, SyncConfig } from "@dashboard-sync/core/schemas";
import { LogLevel } from "@dashboard-sync/core/schemas";
import { describeSourceTree } from "@dashboard-sync/core/storage/dashboards";
import {
  downloadDashboards,
  uploadDashboards,
  type ConfirmPrompt,
} from "@dashboard-sync/core/sync";
import { createConfirmPrompt } from "./confirm.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const CLI_NAME = "dashboard-sync";

/** Everything a command touches outside the process: swapped out in tests. */
export interface CliRuntime {
  createClient(options: GrafanaClientOptions): GrafanaClient;
  createLogger(config: LoggingConfig): Logger;
  confirm: ConfirmPrompt;
  print(line: string): void;
  env: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  config?: string;
  host?: string;
  token?: string;
  logLevel?: string;
};

export function defaultRuntime(): CliRuntime {
  return {
    createClient: createGrafanaClient,
    createLogger,
    confirm: createConfirmPrompt(),
    print: (line) => process.stdout.write(line + "\n"),
    env: process.env,
  };
}

async function resolveConfig(
  globals: GlobalOptions,
  overrides: ConfigOverrides,
  runtime: CliRuntime,
): Promise<SyncConfig> {
  const config = await loadConfig({
    configPath: globals.config ?? runtime.env.DASHBOARD_SYNC_CONFIG,
  });
  return applyOverrides(
    config,
    {
      url: globals.host,
      token: globals.token,
      logLevel: globals.logLevel,
      ...overrides,
    },
    runtime.env,
  );
}

function connect(config: SyncConfig, runtime: CliRuntime) {
  const logger = runtime.createLogger(config.logging);
  const client = runtime.createClient(config.grafana);
  logger.debug({ url: config.grafana.url }, "Using Grafana instance");
  return { client, logger };
}

export function createProgram(runtime: CliRuntime = defaultRuntime()): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Upload and download Grafana dashboards, keeping folders and dashlist links intact",
    )
    .version(pkg.version)
    .option("-c, --config <file>", "path to config.json")
    .option("--host <url>", "Grafana base url (env: GRAFANA_URL)")
    .option("--token <token>", "API token (env: GRAFANA_TOKEN)")
    .addOption(
      new Option("--log-level <level>", "log verbosity").choices(LogLevel.options),
    );

  program
    .command("upload")
    .description("write a directory of dashboards to Grafana")
    .option("-s, --source <dir>", "directory to upload from")
    .option("-y, --non-interactive", "do not ask for confirmation")
    .action(async (opts: { source?: string; nonInteractive?: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      const config = await resolveConfig(globals, opts, runtime);
      const deps = connect(config, runtime);

      const summary = await uploadDashboards(
        { ...deps, confirm: runtime.confirm },
        { source: config.source, nonInteractive: config.nonInteractive },
      );
      runtime.print(
        `Uploaded ${summary.dashboards} dashboard(s) in ${summary.folders.length} folder(s)` +
          (summary.home !== null ? `, home dashboard ${summary.home}` : ""),
      );
    });

  program
    .command("download")
    .description("save Grafana folders and dashboards to a directory")
    .option("-d, --destination <dir>", "directory to download into")
    .action(async (opts: { destination?: string }) => {
      const globals = program.opts<GlobalOptions>();
      const config = await resolveConfig(globals, opts, runtime);
      const deps = connect(config, runtime);

      const summary = await downloadDashboards(deps, {
        destination: config.destination,
      });
      runtime.print(
        `Downloaded ${summary.dashboards} dashboard(s) and ${summary.folders} folder(s) to ${config.destination ?? ""}`,
      );
    });

  program
    .command("show")
    .description("list the folders and dashboards an upload would read")
    .argument("<dir>", "source directory")
    .action(async (dir: string) => {
      for (const line of await describeSourceTree(resolveDirectory(dir))) {
        runtime.print(line);
      }
    });

  return program;
}

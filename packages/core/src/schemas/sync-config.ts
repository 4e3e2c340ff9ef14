import { z } from "zod";

export const DEFAULTS = {
  grafana: {
    url: "http://localhost:3000",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  nonInteractive: false,
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const SyncConfigSchema = z.object({
  grafana: z
    .object({
      url: z.url().default(DEFAULTS.grafana.url),
      token: z.string().min(1).optional(),
      username: z.string().min(1).optional(),
      password: z.string().optional(),
    })
    .default(DEFAULTS.grafana),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  source: z.string().optional().describe("Directory dashboards are uploaded from"),
  destination: z
    .string()
    .optional()
    .describe("Directory dashboards are downloaded into"),
  nonInteractive: z.boolean().default(DEFAULTS.nonInteractive),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type LoggingConfig = SyncConfig["logging"];
export type GrafanaConfig = SyncConfig["grafana"];

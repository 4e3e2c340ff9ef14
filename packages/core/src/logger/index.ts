import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/sync-config.js";

export type { Logger } from "pino";

/** Logs go to stderr so command output on stdout stays clean. */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  if (usePretty) {
    return pino({
      name: "dashboard-sync",
      level: config.level,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino({ name: "dashboard-sync", level: config.level }, pino.destination(2));
}

#!/usr/bin/env node
import { DashboardSyncError } from "@dashboard-sync/core/errors";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof DashboardSyncError) {
    console.error(`Error [${err.errorCode}]: ${err.message}`);
  } else {
    console.error(err instanceof Error ? `Error: ${err.message}` : err);
  }
  process.exitCode = 1;
});

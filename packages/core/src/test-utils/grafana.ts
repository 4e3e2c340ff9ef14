/**
 * Test doubles for the sync pipeline: an in-memory Grafana client, a
 * silent pino-shaped logger and a helper that lays out a source directory.
 */

import { vi, type Mock } from "vitest";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "pino";
import type { GrafanaClient } from "../grafana/client.js";
import type { Folder } from "../schemas/folder.js";

export type MockGrafanaClient = {
  [K in keyof GrafanaClient]: Mock<GrafanaClient[K]>;
};

/**
 * Every method is a vi.fn(). createFolder echoes the requested uid, or
 * assigns `generated-<n>` ids starting at 100 when none is given.
 */
export function createMockGrafanaClient(existing: Folder[] = []): MockGrafanaClient {
  let nextId = 100;
  return {
    listFolders: vi.fn<GrafanaClient["listFolders"]>().mockResolvedValue(existing),
    getFolder: vi.fn<GrafanaClient["getFolder"]>().mockResolvedValue(null),
    createFolder: vi.fn<GrafanaClient["createFolder"]>(async (title, uid) => {
      const id = nextId++;
      return { title, uid: uid ?? `generated-${id}`, id };
    }),
    createDashboard: vi.fn<GrafanaClient["createDashboard"]>(async () => ({
      id: 1,
      uid: "dashboard-uid",
    })),
    createHomeDashboard: vi
      .fn<GrafanaClient["createHomeDashboard"]>()
      .mockResolvedValue("home-uid"),
    setHomeDashboard: vi
      .fn<GrafanaClient["setHomeDashboard"]>()
      .mockResolvedValue(undefined),
    searchDashboards: vi
      .fn<GrafanaClient["searchDashboards"]>()
      .mockResolvedValue([]),
    getDashboard: vi.fn<GrafanaClient["getDashboard"]>(),
    getHomeDashboard: vi
      .fn<GrafanaClient["getHomeDashboard"]>()
      .mockResolvedValue(null),
  };
}

export function createMockLogger(): Logger {
  const mockLogger: Partial<Logger> = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  return mockLogger as Logger;
}

/**
 * Creates a temp directory holding the given files. Keys are paths relative
 * to the directory; values are JSON-serialized unless already a string.
 */
export async function createSourceDir(
  files: Record<string, unknown>,
): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "dashboard-sync-test-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(dir, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(
      filePath,
      typeof content === "string" ? content : JSON.stringify(content),
    );
  }
  return dir;
}

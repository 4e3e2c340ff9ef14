import { describe, it, expect, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import {
  createMockGrafanaClient,
  createMockLogger,
  createSourceDir,
} from "../../test-utils/index.js";
import { uploadHomeDashboard } from "./home.js";

describe("uploadHomeDashboard", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("skips with a warning when there is no source directory", async () => {
    const client = createMockGrafanaClient();
    const logger = createMockLogger();

    const uid = await uploadHomeDashboard({ client, logger }, undefined, new Map());

    expect(uid).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      "No source directory, cannot find home.json file",
    );
    expect(client.createHomeDashboard).not.toHaveBeenCalled();
  });

  it("makes no service calls when home.json is absent", async () => {
    dir = await createSourceDir({ "Team A/dash.json": { title: "Dash" } });
    const client = createMockGrafanaClient();
    const logger = createMockLogger();

    const uid = await uploadHomeDashboard({ client, logger }, dir, new Map());

    expect(uid).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    for (const fn of Object.values(client)) {
      expect(fn).not.toHaveBeenCalled();
    }
  });

  it("uploads, rewrites and sets the home dashboard", async () => {
    dir = await createSourceDir({
      "home.json": {
        title: "Home",
        panels: [
          { type: "dashlist", title: "Ops", options: { folderId: 9, folderUID: "x" } },
        ],
      },
    });
    const client = createMockGrafanaClient();
    client.createHomeDashboard.mockResolvedValueOnce("landing");
    const folders = new Map([["Ops", { title: "Ops", uid: "ops", id: 3 }]]);

    const uid = await uploadHomeDashboard(
      { client, logger: createMockLogger() },
      dir,
      folders,
    );

    expect(uid).toBe("landing");
    expect(client.createHomeDashboard).toHaveBeenCalledWith({
      title: "Home",
      panels: [
        { type: "dashlist", title: "Ops", options: { folderId: 3, folderUID: "ops" } },
      ],
    });
    expect(client.setHomeDashboard).toHaveBeenCalledWith("landing");
    expect(client.createDashboard).not.toHaveBeenCalled();
  });

  it("does not set the preference when the upload fails", async () => {
    dir = await createSourceDir({ "home.json": { title: "Home" } });
    const client = createMockGrafanaClient();
    client.createHomeDashboard.mockRejectedValueOnce(new Error("rejected"));

    await expect(
      uploadHomeDashboard({ client, logger: createMockLogger() }, dir, new Map()),
    ).rejects.toThrow("rejected");
    expect(client.setHomeDashboard).not.toHaveBeenCalled();
  });
});

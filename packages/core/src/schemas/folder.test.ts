import { describe, it, expect } from "vitest";
import { FolderManifestSchema, FolderSchema } from "./folder.js";

describe("FolderSchema", () => {
  it("strips keys the service adds to folder records", () => {
    const folder = FolderSchema.parse({
      id: 7,
      uid: "ops",
      title: "Ops",
      url: "/dashboards/f/ops/ops",
      parentUid: "",
    });

    expect(folder).toEqual({ id: 7, uid: "ops", title: "Ops" });
  });

  it("rejects a folder without a uid", () => {
    expect(() => FolderSchema.parse({ id: 7, title: "Ops" })).toThrow();
  });
});

describe("FolderManifestSchema", () => {
  it("parses a title-keyed manifest", () => {
    const manifest = FolderManifestSchema.parse({
      "Team A": { title: "Team A", uid: "abc", id: 1 },
    });

    expect(manifest["Team A"]).toEqual({ title: "Team A", uid: "abc", id: 1 });
  });

  it("rejects a manifest entry with a string id", () => {
    expect(() =>
      FolderManifestSchema.parse({
        "Team A": { title: "Team A", uid: "abc", id: "1" },
      }),
    ).toThrow();
  });
});

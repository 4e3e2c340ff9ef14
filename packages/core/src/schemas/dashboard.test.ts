import { describe, it, expect } from "vitest";
import { DashboardDocumentSchema, panelLayout } from "./dashboard.js";

describe("DashboardDocumentSchema", () => {
  it("keeps keys it does not model", () => {
    const document = DashboardDocumentSchema.parse({
      title: "Overview",
      uid: "overview",
      schemaVersion: 39,
      panels: [{ type: "graph", gridPos: { x: 0, y: 0 } }],
    });

    expect(document.uid).toBe("overview");
    expect(document.schemaVersion).toBe(39);
    expect(document.panels?.[0]?.gridPos).toEqual({ x: 0, y: 0 });
  });

  it("requires a title", () => {
    expect(() => DashboardDocumentSchema.parse({ panels: [] })).toThrow();
  });

  it("requires every panel to carry a type", () => {
    expect(() =>
      DashboardDocumentSchema.parse({ title: "x", panels: [{ title: "p" }] }),
    ).toThrow();
  });
});

describe("panelLayout", () => {
  it("prefers top-level panels", () => {
    const layout = panelLayout({
      title: "x",
      panels: [{ type: "graph" }],
      rows: [{ panels: [{ type: "text" }] }],
    });

    expect(layout).toEqual({ kind: "panels", panels: [{ type: "graph" }] });
  });

  it("falls back to rows when panels is empty", () => {
    const layout = panelLayout({
      title: "x",
      panels: [],
      rows: [{ panels: [{ type: "text" }] }],
    });

    expect(layout.kind).toBe("rows");
  });

  it("reports no layout when neither key is present", () => {
    expect(panelLayout({ title: "x" })).toEqual({ kind: "none" });
  });
});

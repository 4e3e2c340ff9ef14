import { describe, it, expect } from "vitest";
import { join, resolve } from "node:path";
import { homedir, tmpdir } from "node:os";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { applyOverrides, loadConfig } from "./loader.js";
import { SyncConfigSchema } from "../schemas/sync-config.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    const config = await loadConfig({
      configPath: "/tmp/nonexistent-dashboard-sync/config.json",
    });

    expect(config.grafana.url).toBe("http://localhost:3000");
    expect(config.grafana.token).toBeUndefined();
    expect(config.logging.level).toBe("info");
    expect(config.logging.pretty).toBe(false);
    expect(config.nonInteractive).toBe(false);
  });

  it("parses valid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          grafana: { url: "https://grafana.example.com", token: "test-token" },
          logging: { level: "debug", pretty: true },
          source: "/srv/dashboards",
          nonInteractive: true,
        }),
      );

      const config = await loadConfig({ configPath });

      expect(config.grafana.url).toBe("https://grafana.example.com");
      expect(config.grafana.token).toBe("test-token");
      expect(config.logging.level).toBe("debug");
      expect(config.logging.pretty).toBe(true);
      expect(config.source).toBe("/srv/dashboards");
      expect(config.nonInteractive).toBe(true);
    });
  });

  it("merges partial config with defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ logging: { level: "warn" } }));

      const config = await loadConfig({ configPath });

      expect(config.logging.level).toBe("warn");
      expect(config.logging.pretty).toBe(false);
      expect(config.grafana.url).toBe("http://localhost:3000");
    });
  });

  it("throws ZodError for invalid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({ grafana: { url: "nowhere" } }),
      );

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(SyntaxError);
    });
  });
});

describe("applyOverrides", () => {
  const base = SyncConfigSchema.parse({
    grafana: { url: "https://grafana.example.com", token: "file-token" },
    source: "/srv/dashboards",
  });

  it("prefers flags over environment and file values", () => {
    const config = applyOverrides(
      base,
      { url: "https://flag.example.com", token: "flag-token" },
      { GRAFANA_URL: "https://env.example.com", GRAFANA_TOKEN: "env-token" },
    );

    expect(config.grafana.url).toBe("https://flag.example.com");
    expect(config.grafana.token).toBe("flag-token");
  });

  it("falls back to environment variables", () => {
    const config = applyOverrides(
      base,
      {},
      { GRAFANA_URL: "https://env.example.com", GRAFANA_TOKEN: "env-token" },
    );

    expect(config.grafana.url).toBe("https://env.example.com");
    expect(config.grafana.token).toBe("env-token");
  });

  it("keeps file values when nothing overrides them", () => {
    const config = applyOverrides(base, {}, {});

    expect(config.grafana.url).toBe("https://grafana.example.com");
    expect(config.grafana.token).toBe("file-token");
    expect(config.source).toBe("/srv/dashboards");
    expect(config.nonInteractive).toBe(false);
  });

  it("resolves directories and expands the home prefix", () => {
    const config = applyOverrides(
      base,
      { source: "~/dashboards", destination: "backup" },
      {},
    );

    expect(config.source).toBe(resolve(homedir(), "dashboards"));
    expect(config.destination).toBe(resolve("backup"));
  });

  it("sets the log level and non-interactive flag", () => {
    const config = applyOverrides(
      base,
      { logLevel: "debug", nonInteractive: true },
      {},
    );

    expect(config.logging.level).toBe("debug");
    expect(config.nonInteractive).toBe(true);
  });

  it("rejects an invalid log level", () => {
    expect(() => applyOverrides(base, { logLevel: "loud" }, {})).toThrow();
  });
});

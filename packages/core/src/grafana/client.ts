/**
 * HTTP client for the Grafana API endpoints the sync uses.
 *
 * Every response body is validated with zod before it is handed back, and
 * every non-OK status surfaces as a GrafanaApiError. There are no retries:
 * a failed call ends the run.
 */

import { z } from "zod";
import { GrafanaApiError } from "../errors/catalog.js";
import {
  DashboardSchema,
  DashboardSearchHitSchema,
  DashboardWithMetaSchema,
  type Dashboard,
  type DashboardDocument,
  type DashboardSearchHit,
} from "../schemas/dashboard.js";
import { FolderListSchema, FolderSchema, type Folder } from "../schemas/folder.js";

export interface GrafanaClientOptions {
  url: string;
  token?: string;
  username?: string;
  password?: string;
}

export interface GrafanaClient {
  listFolders(): Promise<Folder[]>;
  getFolder(uid: string): Promise<Folder | null>;
  /** Creates a folder, or returns the existing one when it is already there. */
  createFolder(title: string, uid?: string): Promise<Folder>;
  createDashboard(
    document: DashboardDocument,
    folderUid?: string,
  ): Promise<Dashboard>;
  /** Uploads the landing-page dashboard into the root folder; returns its uid. */
  createHomeDashboard(document: DashboardDocument): Promise<string>;
  setHomeDashboard(dashboardUid: string): Promise<void>;
  searchDashboards(): Promise<DashboardSearchHit[]>;
  getDashboard(uid: string): Promise<DashboardDocument>;
  getHomeDashboard(): Promise<DashboardDocument | null>;
}

// Grafana answers a duplicate folder with 409 (uid) or 412 (title) depending on version
const FOLDER_EXISTS_STATUSES = new Set([409, 412]);

const HomeRedirectSchema = z.object({ redirectUri: z.string() });

/** "/grafana/d/abc/overview?orgId=1" → "abc" */
export function dashboardUidFromUrl(url: string): string | null {
  const match = /\/d\/([^/?#]+)/.exec(url);
  return match?.[1] !== undefined ? decodeURIComponent(match[1]) : null;
}

export function authorizationHeader(
  options: GrafanaClientOptions,
): string | undefined {
  if (options.token) {
    return `Bearer ${options.token}`;
  }
  if (options.username !== undefined && options.password !== undefined) {
    const encoded = Buffer.from(
      `${options.username}:${options.password}`,
    ).toString("base64");
    return `Basic ${encoded}`;
  }
  return undefined;
}

export function createGrafanaClient(
  options: GrafanaClientOptions,
): GrafanaClient {
  const base = options.url.replace(/\/+$/, "");
  const authorization = authorizationHeader(options);

  function headers(withBody: boolean): Record<string, string> {
    return {
      Accept: "application/json",
      ...(withBody && { "Content-Type": "application/json" }),
      ...(authorization !== undefined && { Authorization: authorization }),
    };
  }

  async function send(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<Response> {
    return fetch(`${base}${path}`, {
      method,
      headers: headers(body !== undefined),
      ...(body !== undefined && { body: JSON.stringify(body) }),
    });
  }

  async function fail(
    res: Response,
    method: string,
    path: string,
  ): Promise<never> {
    const text = await res.text().catch(() => "");
    throw new GrafanaApiError(
      res.status,
      res.statusText,
      method,
      path,
      text ? { body: text } : undefined,
    );
  }

  async function request<S extends z.ZodType>(
    schema: S,
    method: string,
    path: string,
    body?: unknown,
  ): Promise<z.output<S>> {
    const res = await send(method, path, body);
    if (!res.ok) {
      return fail(res, method, path);
    }
    return schema.parse(await res.json());
  }

  async function findFolderByTitle(title: string): Promise<Folder | null> {
    const folders = await request(FolderListSchema, "GET", "/api/folders");
    return folders.find((folder) => folder.title === title) ?? null;
  }

  return {
    async listFolders(): Promise<Folder[]> {
      return request(FolderListSchema, "GET", "/api/folders");
    },

    async getFolder(uid: string): Promise<Folder | null> {
      const path = `/api/folders/${encodeURIComponent(uid)}`;
      const res = await send("GET", path);
      if (res.status === 404) return null;
      if (!res.ok) {
        return fail(res, "GET", path);
      }
      return FolderSchema.parse(await res.json());
    },

    async createFolder(title: string, uid?: string): Promise<Folder> {
      const path = "/api/folders";
      const res = await send("POST", path, {
        title,
        ...(uid !== undefined && { uid }),
      });

      if (FOLDER_EXISTS_STATUSES.has(res.status)) {
        // drain the conflict body before the follow-up lookup reuses the connection
        const conflict = await res.text();
        const existing =
          uid !== undefined
            ? await this.getFolder(uid)
            : await findFolderByTitle(title);
        if (existing) return existing;
        throw new GrafanaApiError(
          res.status,
          res.statusText,
          "POST",
          path,
          conflict ? { body: conflict } : undefined,
        );
      }
      if (!res.ok) {
        return fail(res, "POST", path);
      }
      return FolderSchema.parse(await res.json());
    },

    async createDashboard(
      document: DashboardDocument,
      folderUid?: string,
    ): Promise<Dashboard> {
      // id must be null so the uid decides which dashboard gets overwritten
      return request(DashboardSchema, "POST", "/api/dashboards/db", {
        dashboard: { ...document, id: null },
        ...(folderUid !== undefined && { folderUid }),
        overwrite: true,
      });
    },

    async createHomeDashboard(document: DashboardDocument): Promise<string> {
      const dashboard = await this.createDashboard(document);
      return dashboard.uid;
    },

    async setHomeDashboard(dashboardUid: string): Promise<void> {
      const path = "/api/org/preferences";
      const res = await send("PUT", path, { homeDashboardUID: dashboardUid });
      if (!res.ok) {
        await fail(res, "PUT", path);
      }
    },

    async searchDashboards(): Promise<DashboardSearchHit[]> {
      return request(
        z.array(DashboardSearchHitSchema),
        "GET",
        "/api/search?type=dash-db",
      );
    },

    async getDashboard(uid: string): Promise<DashboardDocument> {
      const result = await request(
        DashboardWithMetaSchema,
        "GET",
        `/api/dashboards/uid/${encodeURIComponent(uid)}`,
      );
      return result.dashboard;
    },

    async getHomeDashboard(): Promise<DashboardDocument | null> {
      const path = "/api/dashboards/home";
      const res = await send("GET", path);
      if (res.status === 404) return null;
      if (!res.ok) {
        return fail(res, "GET", path);
      }
      const body: unknown = await res.json();
      const parsed = DashboardWithMetaSchema.safeParse(body);
      if (parsed.success) {
        return parsed.data.dashboard;
      }

      // A home preference set to a stored dashboard comes back as a redirect to it
      const redirect = HomeRedirectSchema.safeParse(body);
      const uid = redirect.success
        ? dashboardUidFromUrl(redirect.data.redirectUri)
        : null;
      return uid !== null ? this.getDashboard(uid) : null;
    },
  };
}

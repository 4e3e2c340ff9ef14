import { z } from "zod";

export const PanelOptionsSchema = z.looseObject({
  folderId: z.number().int().nullable().optional(),
  folderUID: z.string().nullable().optional(),
});

export const PanelSchema = z.looseObject({
  type: z.string(),
  title: z.string().optional(),
  options: PanelOptionsSchema.optional(),
});

export type Panel = z.infer<typeof PanelSchema>;

export const RowSchema = z.looseObject({
  panels: z.array(PanelSchema).optional(),
});

export type Row = z.infer<typeof RowSchema>;

/**
 * A dashboard definition. Only the keys the sync touches are typed; anything
 * else the service put in the document is carried through untouched.
 */
export const DashboardDocumentSchema = z.looseObject({
  title: z.string(),
  panels: z.array(PanelSchema).optional(),
  rows: z.array(RowSchema).optional(),
});

export type DashboardDocument = z.infer<typeof DashboardDocumentSchema>;

/** Response of a dashboard create/overwrite. */
export const DashboardSchema = z.object({
  id: z.number().int(),
  uid: z.string(),
  url: z.string().optional(),
  status: z.string().optional(),
  version: z.number().int().optional(),
});

export type Dashboard = z.infer<typeof DashboardSchema>;

export const DashboardSearchHitSchema = z.object({
  uid: z.string(),
  title: z.string(),
  folderUid: z.string().optional(),
  folderTitle: z.string().optional(),
});

export type DashboardSearchHit = z.infer<typeof DashboardSearchHitSchema>;

/** Envelope returned by the "get dashboard" endpoints. */
export const DashboardWithMetaSchema = z.object({
  dashboard: DashboardDocumentSchema,
  meta: z
    .looseObject({
      folderTitle: z.string().optional(),
      folderUid: z.string().optional(),
    })
    .optional(),
});

export type DashboardWithMeta = z.infer<typeof DashboardWithMetaSchema>;

/**
 * Panel layout of a dashboard: a flat `panels` list, or the legacy
 * `rows` layout with panels nested in each row.
 */
export type PanelLayout =
  | { kind: "panels"; panels: Panel[] }
  | { kind: "rows"; rows: Row[] }
  | { kind: "none" };

export function panelLayout(document: DashboardDocument): PanelLayout {
  if (document.panels && document.panels.length > 0) {
    return { kind: "panels", panels: document.panels };
  }
  if (document.rows && document.rows.length > 0) {
    return { kind: "rows", rows: document.rows };
  }
  return { kind: "none" };
}

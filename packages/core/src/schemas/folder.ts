import { z } from "zod";

/** A remote folder. Extra keys returned by the service are stripped. */
export const FolderSchema = z.object({
  title: z.string(),
  uid: z.string(),
  id: z.number().int(),
});

export type Folder = z.infer<typeof FolderSchema>;

/** `folders.json`: folder title → folder, written by a download. */
export const FolderManifestSchema = z.record(z.string(), FolderSchema);

export type FolderManifest = z.infer<typeof FolderManifestSchema>;

export const FolderListSchema = z.array(FolderSchema);

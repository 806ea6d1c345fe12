import { z } from "zod";
import { LOAD_SET_FORMAT } from "./loadset_config";

const Sha256Schema = z.string().regex(/^[0-9a-f]{64}$/);

export const LoadSetTableSchema = z.union([
  z.literal("identifier_codes"),
  z.literal("status_codes"),
  z.literal("storms"),
  z.literal("observations"),
]);

export const SourceDigestSchema = z.object({
  name: z.string(),
  sha256: Sha256Schema,
});

export type SourceDigest = z.infer<typeof SourceDigestSchema>;

export const TableEntrySchema = z.object({
  table: LoadSetTableSchema,
  file: z.string(),
  rows: z.number().int().nonnegative(),
  sha256: Sha256Schema,
});

export type TableEntry = z.infer<typeof TableEntrySchema>;

export const LoadSetManifestSchema = z.object({
  load_set_id: z.string(),
  format: z.literal(LOAD_SET_FORMAT),
  sources: z.array(SourceDigestSchema),
  tables: z.array(TableEntrySchema),
  total_rows: z.number().int().nonnegative(),
  warnings: z.array(z.string()),
  root_hash: Sha256Schema,
});

export type LoadSetManifest = z.infer<typeof LoadSetManifestSchema>;

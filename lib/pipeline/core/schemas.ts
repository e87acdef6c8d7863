/**
 * Zod schemas for the persisted index file.
 *
 * The on-disk layout is snake_case JSON with nullable summary fields, which
 * is what downstream consumers read. ./types holds the in-memory shape.
 */

import { z } from "zod/v4";

export const INDEX_SCHEMA_VERSION = 1;

export const pageEntrySchema = z.object({
  page_num: z.int().min(1),
  summary: z.string().nullable(),
  summary_error: z.string().nullable(),
  page_image: z.string().nullable(),
  image_error: z.string().nullable(),
});

export const documentStatusEntrySchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("discovered") }),
  z.object({ state: z.literal("normalized") }),
  z.object({ state: z.literal("rasterized") }),
  z.object({ state: z.literal("summarized") }),
  z.object({
    state: z.literal("failed"),
    stage: z.enum(["normalize", "rasterize", "summarize"]),
    reason: z.string(),
  }),
]);

export const documentEntrySchema = z.object({
  doc_id: z.string().regex(/^doc_\d{3,}$/),
  original_file: z.string(),
  relative_path: z.string(),
  source_hash: z.string(),
  pdf_file: z.string().nullable(),
  status: documentStatusEntrySchema,
  summary: z.string().nullable(),
  summary_error: z.string().nullable(),
  pages: z.array(pageEntrySchema),
});

export const indexMetadataSchema = z.object({
  schema_version: z.literal(INDEX_SCHEMA_VERSION),
  total_documents: z.int().min(0),
  created_at: z.iso.datetime(),
  updated_at: z.iso.datetime(),
  model_used: z.string(),
  input_root: z.string(),
  next_doc_seq: z.int().min(1),
  revision: z.int().min(0),
});

export const dataRoomIndexSchema = z.object({
  metadata: indexMetadataSchema,
  documents: z.array(documentEntrySchema),
});

export type PageEntry = z.infer<typeof pageEntrySchema>;
export type DocumentEntry = z.infer<typeof documentEntrySchema>;
export type IndexMetadataEntry = z.infer<typeof indexMetadataSchema>;
export type DataRoomIndexFile = z.infer<typeof dataRoomIndexSchema>;

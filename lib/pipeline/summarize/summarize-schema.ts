import { z } from "zod/v4";

export const pageSummarySchema = z.object({
  summary: z.string().min(1),
});

export const documentSummarySchema = z.object({
  summary: z.string().min(1),
});

export type PageSummaryOutput = z.infer<typeof pageSummarySchema>;
export type DocumentSummaryOutput = z.infer<typeof documentSummarySchema>;

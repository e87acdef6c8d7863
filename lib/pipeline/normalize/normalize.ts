/**
 * Format Normalizer
 *
 * Produces one canonical PDF per document under pdfs/<doc_id>.pdf. PDF
 * sources are copied byte for byte; everything else goes through the
 * converter.
 */

import fs from "node:fs";
import path from "node:path";
import type { DocumentRecord } from "../core/types";
import type { Emit, PipelineContext, StageResult } from "../core/context";
import { advanceStatus, failDocument } from "../core/records";
import { CancelledError, describeError, isFatalError } from "../errors";
import { runPool } from "../parallel";
import { toIndexPath } from "../types";
import { createRetryingConverter } from "./converter";

export function documentsToNormalize(ctx: PipelineContext): DocumentRecord[] {
  return [...ctx.index.documents.values()].filter((doc) => doc.status.state === "discovered");
}

export function canonicalPdfFile(ctx: PipelineContext, docId: string): string {
  return path.join(ctx.paths.pdfsDir, `${docId}.pdf`);
}

export async function normalizeDocuments(ctx: PipelineContext, emit: Emit): Promise<StageResult> {
  const docs = documentsToNormalize(ctx);
  const converter = createRetryingConverter(ctx.converter, {
    maxAttempts: ctx.config.converter.max_attempts,
    delayMs: ctx.config.converter.retry_delay_ms,
    signal: ctx.signal,
    onRetry: ({ request, attempt, delayMs, error }) =>
      emit({ type: "retry", stage: "normalize", docId: request.docId, attempt, delayMs, error }),
  });

  let completed = 0;
  let failed = 0;
  let cancelled = 0;

  const result = await runPool(
    docs,
    (doc) => doc.docId,
    async (doc) => {
      emit({ type: "document-start", stage: "normalize", docId: doc.docId });
      const target = canonicalPdfFile(ctx, doc.docId);
      try {
        if (!fs.existsSync(doc.originalPath)) {
          throw new Error(`source file missing: ${doc.originalPath}`);
        }
        fs.mkdirSync(ctx.paths.pdfsDir, { recursive: true });
        if (path.extname(doc.originalPath).toLowerCase() === ".pdf") {
          fs.copyFileSync(doc.originalPath, target);
        } else {
          await converter.convert({ docId: doc.docId, sourcePath: doc.originalPath, outputPath: target });
        }
        doc.canonicalPdfPath = toIndexPath(ctx.paths, target);
        advanceStatus(doc, { state: "normalized" });
        completed++;
        emit({ type: "document-complete", stage: "normalize", docId: doc.docId });
      } catch (err) {
        if (isFatalError(err)) throw err;
        if (err instanceof CancelledError) {
          // Left as discovered for the next run
          cancelled++;
          return;
        }
        const reason = describeError(err);
        failDocument(doc, "normalize", reason);
        failed++;
        emit({ type: "document-failed", stage: "normalize", docId: doc.docId, error: reason });
      }
    },
    { concurrency: ctx.config.converter.concurrency, signal: ctx.signal }
  );

  return { completed, failed, skipped: result.skipped + cancelled };
}

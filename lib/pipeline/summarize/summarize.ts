/**
 * Summarization Engine
 *
 * Summarizes every open page slot that has an image, then rolls each
 * document's page summaries up into a document summary once all of its page
 * attempts have settled. All AI calls share one concurrency limit. At most
 * `concurrency` documents are in flight and roll-ups go to the front of the
 * queue, so a roll-up never waits on the pages of the whole run.
 *
 * Re-entry is cheap: slots that are already done are never sent again.
 */

import fs from "node:fs";
import path from "node:path";
import type { DocumentRecord, PageRecord, Summarizer } from "../core/types";
import type { Emit, PipelineContext, StageResult } from "../core/context";
import { advanceStatus, failDocument, isOpen, settleSummary } from "../core/records";
import { isTransientAiError } from "../core/llm";
import { CancelledError, SummarizationError, describeError, isFatalError } from "../errors";
import { pLimit, runPool } from "../parallel";
import { withRetry, withTimeout } from "../retry";
import { fromIndexPath } from "../types";

export const NO_PAGE_SUMMARIES_REASON = "no page summaries available";

export interface SummarizeOptions {
  summarizer: Summarizer;
  concurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  isRetryable?: (err: unknown) => boolean;
}

export function summarizeOptionsFromContext(ctx: PipelineContext): SummarizeOptions {
  const s = ctx.config.summarization;
  return {
    summarizer: ctx.summarizer,
    concurrency: s.concurrency,
    maxAttempts: s.max_attempts,
    baseDelayMs: s.base_delay_ms,
    maxDelayMs: s.max_delay_ms,
    timeoutMs: s.timeout_ms,
  };
}

/**
 * Note appended to a roll-up built without some of the document's pages.
 */
export function skippedPagesNote(skippedPages: number[], totalPages: number): string {
  const n = skippedPages.length;
  if (n === 0) return "";
  const verb = n === 1 ? "was" : "were";
  const label = n === 1 ? "page" : "pages";
  return `Note: ${n} of ${totalPages} pages could not be summarized and ${verb} skipped (${label} ${skippedPages.join(", ")}).`;
}

/** Documents with summarization work left: open page slots or an open roll-up. */
export function documentsToSummarize(ctx: PipelineContext): DocumentRecord[] {
  return [...ctx.index.documents.values()].filter(
    (doc) => doc.status.state === "rasterized" || (doc.status.state === "summarized" && isOpen(doc.summary))
  );
}

interface Tally {
  pagesDone: number;
  pagesFailed: number;
}

export async function summarizeDocuments(
  ctx: PipelineContext,
  emit: Emit,
  options: SummarizeOptions = summarizeOptionsFromContext(ctx)
): Promise<StageResult & Tally> {
  const docs = documentsToSummarize(ctx);
  const limit = pLimit(options.concurrency);
  const isRetryable = options.isRetryable ?? isTransientAiError;
  const tally: Tally = { pagesDone: 0, pagesFailed: 0 };
  let completed = 0;
  let failed = 0;
  let skipped = 0;

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (ctx.signal.aborted) controller.abort();
  ctx.signal.addEventListener("abort", onAbort, { once: true });
  const signal = controller.signal;

  /**
   * One bounded, timed AI call with retries. Each attempt takes a slot of
   * the shared limit; backoff waits do not hold a slot.
   */
  function callWithRetry(
    call: (signal: AbortSignal) => Promise<string>,
    retryInfo: { docId: string; pageNum?: number }
  ): Promise<string> {
    const front = retryInfo.pageNum === undefined;
    return withRetry(
      () =>
        limit(() => {
          if (signal.aborted) throw new CancelledError();
          return withTimeout(
            call,
            options.timeoutMs,
            () => new SummarizationError(`AI call timed out after ${options.timeoutMs}ms`, { transient: true })
          );
        }, { front }),
      {
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.baseDelayMs,
        maxDelayMs: options.maxDelayMs,
        isRetryable: (err) => !(err instanceof CancelledError) && isRetryable(err),
        signal,
        onRetry: ({ attempt, delayMs, error }) =>
          emit({ type: "retry", stage: "summarize", ...retryInfo, attempt, delayMs, error: describeError(error) }),
      }
    );
  }

  async function summarizePage(doc: DocumentRecord, page: PageRecord): Promise<void> {
    if (page.imagePath === null) {
      const reason = `no page image: ${page.imageError ?? "not rendered"}`;
      page.summary = settleSummary(page.summary, { kind: "failed", reason });
      tally.pagesFailed++;
      emit({ type: "page-failed", stage: "summarize", docId: doc.docId, pageNum: page.pageNum, error: reason });
      return;
    }

    const imageFile = fromIndexPath(ctx.paths, page.imagePath);
    try {
      // The image is read once the call holds a slot, so only in-flight pages sit in memory
      const text = await callWithRetry(
        async (signal) =>
          options.summarizer.summarizePage(
            {
              docId: doc.docId,
              fileName: path.basename(doc.relativePath),
              pageNum: page.pageNum,
              totalPages: doc.pages.length,
              imageBase64: readImage(imageFile),
            },
            signal
          ),
        { docId: doc.docId, pageNum: page.pageNum }
      );
      page.summary = settleSummary(page.summary, { kind: "done", text });
      tally.pagesDone++;
      emit({ type: "page-complete", stage: "summarize", docId: doc.docId, pageNum: page.pageNum });
    } catch (err) {
      if (isFatalError(err) || err instanceof CancelledError) throw err;
      const reason = describeError(err);
      page.summary = settleSummary(page.summary, { kind: "failed", reason });
      tally.pagesFailed++;
      emit({ type: "page-failed", stage: "summarize", docId: doc.docId, pageNum: page.pageNum, error: reason });
    }
  }

  async function rollUp(doc: DocumentRecord): Promise<void> {
    const donePages = doc.pages.flatMap((p) =>
      p.summary.kind === "done" ? [{ pageNum: p.pageNum, summary: p.summary.text }] : []
    );
    const skippedPages = doc.pages.filter((p) => isOpen(p.summary)).map((p) => p.pageNum);

    if (donePages.length === 0) {
      doc.summary = settleSummary(doc.summary, { kind: "failed", reason: NO_PAGE_SUMMARIES_REASON });
      throw new SummarizationError(NO_PAGE_SUMMARIES_REASON);
    }

    try {
      const text = await callWithRetry(
        (signal) =>
          options.summarizer.summarizeDocument(
            {
              docId: doc.docId,
              fileName: path.basename(doc.relativePath),
              totalPages: doc.pages.length,
              pages: donePages,
              skippedPages,
            },
            signal
          ),
        { docId: doc.docId }
      );
      const note = skippedPagesNote(skippedPages, doc.pages.length);
      doc.summary = settleSummary(doc.summary, { kind: "done", text: note ? `${text}\n\n${note}` : text });
    } catch (err) {
      if (isFatalError(err) || err instanceof CancelledError) throw err;
      doc.summary = settleSummary(doc.summary, { kind: "failed", reason: describeError(err) });
      throw err;
    }
  }

  async function processDocument(doc: DocumentRecord): Promise<void> {
    emit({ type: "document-start", stage: "summarize", docId: doc.docId, totalPages: doc.pages.length });
    try {
      await settleDocument(doc);
    } finally {
      ctx.checkpoint(emit);
    }
  }

  async function settleDocument(doc: DocumentRecord): Promise<void> {
    const openPages = doc.pages.filter((p) => p.summary.kind === "pending");
    const pageResults = await Promise.allSettled(openPages.map((page) => summarizePage(doc, page)));

    // Join point: the roll-up needs every page attempt settled
    const pageErrors = pageResults.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    const fatal = pageErrors.find(isFatalError);
    if (fatal !== undefined) throw fatal;
    if (pageErrors.length > 0 || doc.pages.some((p) => p.summary.kind === "pending")) {
      skipped++;
      return;
    }

    try {
      if (isOpen(doc.summary)) {
        await rollUp(doc);
      }
      advanceStatus(doc, { state: "summarized" });
      completed++;
      emit({ type: "document-complete", stage: "summarize", docId: doc.docId });
    } catch (err) {
      if (isFatalError(err)) throw err;
      if (err instanceof CancelledError) {
        skipped++;
        return;
      }
      const reason = describeError(err);
      failDocument(doc, "summarize", reason);
      failed++;
      emit({ type: "document-failed", stage: "summarize", docId: doc.docId, error: reason });
    }
  }

  try {
    // A thrown error is fatal: the pool starts no further documents
    const pool = await runPool(
      docs,
      (doc) => doc.docId,
      (doc) =>
        processDocument(doc).catch((err: unknown) => {
          controller.abort();
          throw err;
        }),
      { concurrency: options.concurrency, signal }
    );
    skipped += pool.skipped;
  } finally {
    ctx.signal.removeEventListener("abort", onAbort);
  }

  return { completed, failed, skipped, ...tally };
}

function readImage(file: string): string {
  try {
    return fs.readFileSync(file).toString("base64");
  } catch (err) {
    throw new SummarizationError(`cannot read page image: ${describeError(err)}`);
  }
}

import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  NO_PAGE_SUMMARIES_REASON,
  documentsToSummarize,
  skippedPagesNote,
  summarizeDocuments,
  summarizeOptionsFromContext,
} from "../summarize";
import type { Emit, PipelineContext } from "../../core/context";
import type { DocumentRecord, DocumentSummaryInput, PageSummaryInput, Summarizer } from "../../core/types";
import { createPageRecord, formatDocId, PENDING } from "../../core/records";
import { ConfigurationError, SummarizationError } from "../../errors";
import { createTestContext, FakeSummarizer, makeTempDir } from "../../__tests__/test-context";

/** Register a rasterized document whose page images exist on disk. */
function seedDocument(
  ctx: PipelineContext,
  relativePath: string,
  pageCount: number,
  options: { unrendered?: number[] } = {}
): DocumentRecord {
  const docId = formatDocId(ctx.index.metadata.nextDocSeq++);
  const pages = Array.from({ length: pageCount }, (_, i) => {
    const page = createPageRecord(i + 1);
    if (options.unrendered?.includes(page.pageNum)) {
      page.imageError = "render failed";
      return page;
    }
    const rel = `pages/${docId}/page_${String(page.pageNum).padStart(3, "0")}.png`;
    const file = path.join(ctx.paths.outputRoot, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, `png ${docId} ${page.pageNum}`);
    page.imagePath = rel;
    return page;
  });
  const doc: DocumentRecord = {
    docId,
    originalPath: path.join(ctx.inputRoot, relativePath),
    relativePath,
    sourceHash: "hash",
    canonicalPdfPath: `pdfs/${docId}.pdf`,
    status: { state: "rasterized" },
    summary: PENDING,
    pages,
  };
  ctx.index.documents.set(docId, doc);
  return doc;
}

describe("skippedPagesNote", () => {
  it("uses the singular for one page", () => {
    expect(skippedPagesNote([2], 5)).toBe("Note: 1 of 5 pages could not be summarized and was skipped (page 2).");
  });

  it("lists several pages", () => {
    expect(skippedPagesNote([3, 5], 7)).toBe(
      "Note: 2 of 7 pages could not be summarized and were skipped (pages 3, 5)."
    );
  });

  it("is empty when nothing was skipped", () => {
    expect(skippedPagesNote([], 4)).toBe("");
  });
});

describe("summarizeDocuments", () => {
  let input: string;
  let output: string;

  beforeEach(() => {
    input = makeTempDir("summarize-in-");
    output = makeTempDir("summarize-out-");
  });

  afterEach(() => {
    fs.rmSync(input, { recursive: true, force: true });
    fs.rmSync(output, { recursive: true, force: true });
  });

  it("summarizes every page and rolls them up", async () => {
    const summarizer = new FakeSummarizer();
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "finance/report.pdf", 3);

    const result = await summarizeDocuments(ctx, emit);

    expect(result).toEqual({ completed: 1, failed: 0, skipped: 0, pagesDone: 3, pagesFailed: 0 });
    expect(doc.pages.map((p) => p.summary)).toEqual([
      { kind: "done", text: "Page 1 of report.pdf" },
      { kind: "done", text: "Page 2 of report.pdf" },
      { kind: "done", text: "Page 3 of report.pdf" },
    ]);
    expect(doc.summary).toEqual({ kind: "done", text: "report.pdf summarized from 3 pages" });
    expect(doc.status).toEqual({ state: "summarized" });
    expect(summarizer.pageCalls[0]).toEqual({
      docId: "doc_001",
      fileName: "report.pdf",
      pageNum: 1,
      totalPages: 3,
      imageBase64: Buffer.from("png doc_001 1").toString("base64"),
    });
  });

  it("notes pages that could not be summarized", async () => {
    const summarizer = new FakeSummarizer({
      "doc_001:2": { error: new SummarizationError("content policy violation") },
    });
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "deck.pdf", 5);

    const result = await summarizeDocuments(ctx, emit);

    expect(result).toMatchObject({ completed: 1, pagesDone: 4, pagesFailed: 1 });
    expect(doc.pages[1].summary).toEqual({ kind: "failed", reason: "content policy violation" });
    expect(summarizer.documentCalls[0].skippedPages).toEqual([2]);
    expect(summarizer.documentCalls[0].pages.map((p) => p.pageNum)).toEqual([1, 3, 4, 5]);
    expect(doc.summary).toEqual({
      kind: "done",
      text: "deck.pdf summarized from 4 pages\n\nNote: 1 of 5 pages could not be summarized and was skipped (page 2).",
    });
    expect(doc.status).toEqual({ state: "summarized" });
  });

  it("retries transient failures", async () => {
    const summarizer = new FakeSummarizer({
      "doc_001:1": { error: new SummarizationError("rate limited", { transient: true }), times: 2 },
    });
    const { ctx, events, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "a.pdf", 1);

    await summarizeDocuments(ctx, emit);

    expect(doc.pages[0].summary).toEqual({ kind: "done", text: "Page 1 of a.pdf" });
    expect(summarizer.pageCalls).toHaveLength(3);
    const retries = events.flatMap((e) => (e.type === "retry" ? [`${e.docId}:${e.pageNum}#${e.attempt}`] : []));
    expect(retries).toEqual(["doc_001:1#1", "doc_001:1#2"]);
  });

  it("fails a page once the attempt budget is spent", async () => {
    const summarizer = new FakeSummarizer({
      "doc_001:1": { error: new SummarizationError("rate limited", { transient: true }) },
    });
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "a.pdf", 2);

    await summarizeDocuments(ctx, emit);

    expect(summarizer.pageCalls.filter((c) => c.pageNum === 1)).toHaveLength(3);
    expect(doc.pages[0].summary).toEqual({ kind: "failed", reason: "rate limited" });
    expect(doc.summary.kind).toBe("done");
  });

  it("fails a document with no page summaries", async () => {
    const summarizer = new FakeSummarizer({
      "doc_001:1": { error: new SummarizationError("unreadable") },
    });
    const { ctx, events, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "a.pdf", 2, { unrendered: [2] });

    const result = await summarizeDocuments(ctx, emit);

    expect(result).toMatchObject({ completed: 0, failed: 1 });
    expect(doc.pages[1].summary).toEqual({ kind: "failed", reason: "no page image: render failed" });
    expect(summarizer.pageCalls.map((c) => c.pageNum)).toEqual([1]);
    expect(summarizer.documentCalls).toEqual([]);
    expect(doc.summary).toEqual({ kind: "failed", reason: NO_PAGE_SUMMARIES_REASON });
    expect(doc.status).toEqual({ state: "failed", stage: "summarize", reason: NO_PAGE_SUMMARIES_REASON });
    expect(events).toContainEqual({
      type: "document-failed",
      stage: "summarize",
      docId: "doc_001",
      error: NO_PAGE_SUMMARIES_REASON,
    });
  });

  it("keeps page summaries when the roll-up fails", async () => {
    const summarizer = new FakeSummarizer({
      doc_001: { error: new SummarizationError("context too long") },
    });
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "a.pdf", 2);

    await summarizeDocuments(ctx, emit);

    expect(doc.pages.every((p) => p.summary.kind === "done")).toBe(true);
    expect(doc.summary).toEqual({ kind: "failed", reason: "context too long" });
    expect(doc.status).toEqual({ state: "failed", stage: "summarize", reason: "context too long" });
  });

  it("never sends a summarized slot again", async () => {
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output });
    seedDocument(ctx, "a.pdf", 2);
    await summarizeDocuments(ctx, emit);
    const before = structuredClone([...ctx.index.documents.values()]);

    const second = new FakeSummarizer();
    const result = await summarizeDocuments(ctx, emit, { ...summarizeOptionsFromContext(ctx), summarizer: second });

    expect(result).toEqual({ completed: 0, failed: 0, skipped: 0, pagesDone: 0, pagesFailed: 0 });
    expect(second.pageCalls).toEqual([]);
    expect(second.documentCalls).toEqual([]);
    expect([...ctx.index.documents.values()]).toEqual(before);
  });

  it("finishes only the roll-up when pages are already done", async () => {
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output });
    const doc = seedDocument(ctx, "a.pdf", 2);
    doc.pages.forEach((p) => (p.summary = { kind: "done", text: `earlier ${p.pageNum}` }));
    doc.status = { state: "summarized" };

    const summarizer = new FakeSummarizer();
    expect(documentsToSummarize(ctx)).toEqual([doc]);
    await summarizeDocuments(ctx, emit, { ...summarizeOptionsFromContext(ctx), summarizer });

    expect(summarizer.pageCalls).toEqual([]);
    expect(summarizer.documentCalls[0].pages).toEqual([
      { pageNum: 1, summary: "earlier 1" },
      { pageNum: 2, summary: "earlier 2" },
    ]);
    expect(doc.summary).toEqual({ kind: "done", text: "a.pdf summarized from 2 pages" });
  });

  it("starts nothing once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const summarizer = new FakeSummarizer();
    const { ctx, emit } = createTestContext({
      inputRoot: input,
      outputRoot: output,
      summarizer,
      signal: controller.signal,
    });
    const doc = seedDocument(ctx, "a.pdf", 2);

    const result = await summarizeDocuments(ctx, emit);

    expect(result).toMatchObject({ completed: 0, failed: 0, skipped: 1 });
    expect(summarizer.pageCalls).toEqual([]);
    expect(doc.pages.map((p) => p.summary)).toEqual([PENDING, PENDING]);
    expect(doc.status).toEqual({ state: "rasterized" });
  });

  it("checkpoints the index after each document", async () => {
    const { ctx, events, emit } = createTestContext({ inputRoot: input, outputRoot: output });
    seedDocument(ctx, "a.pdf", 1);
    seedDocument(ctx, "b.pdf", 1);

    await summarizeDocuments(ctx, emit);

    expect(events.filter((e) => e.type === "index-written")).toHaveLength(2);
    expect(fs.existsSync(ctx.paths.indexFile)).toBe(true);
  });

  it("keeps AI calls within the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const slow = async <T>(value: T): Promise<T> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
      return value;
    };
    const summarizer: Summarizer = {
      modelId: "slow-model",
      summarizePage: (input: PageSummaryInput) => slow(`page ${input.pageNum}`),
      summarizeDocument: (input: DocumentSummaryInput) => slow(`doc ${input.docId}`),
    };
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    seedDocument(ctx, "a.pdf", 4);
    seedDocument(ctx, "b.pdf", 4);

    const result = await summarizeDocuments(ctx, emit, { ...summarizeOptionsFromContext(ctx), concurrency: 2 });

    expect(result).toMatchObject({ completed: 2, pagesDone: 8 });
    expect(peak).toBe(2);
  });

  it("rolls each document up before later documents are summarized", async () => {
    const calls: string[] = [];
    const summarizer: Summarizer = {
      modelId: "ordered-model",
      summarizePage: async (input: PageSummaryInput) => {
        calls.push(`page ${input.docId}:${input.pageNum}`);
        return `page ${input.pageNum}`;
      },
      summarizeDocument: async (input: DocumentSummaryInput) => {
        calls.push(`rollup ${input.docId}`);
        return `doc ${input.docId}`;
      },
    };
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    seedDocument(ctx, "a.pdf", 3);
    seedDocument(ctx, "b.pdf", 3);
    seedDocument(ctx, "c.pdf", 3);
    const writesAfterCall: number[] = [];
    const trackingEmit: Emit = (event) => {
      if (event.type === "index-written") writesAfterCall.push(calls.length);
      emit(event);
    };

    await summarizeDocuments(ctx, trackingEmit, { ...summarizeOptionsFromContext(ctx), concurrency: 1 });

    expect(calls).toEqual([
      "page doc_001:1",
      "page doc_001:2",
      "page doc_001:3",
      "rollup doc_001",
      "page doc_002:1",
      "page doc_002:2",
      "page doc_002:3",
      "rollup doc_002",
      "page doc_003:1",
      "page doc_003:2",
      "page doc_003:3",
      "rollup doc_003",
    ]);
    expect(writesAfterCall).toEqual([4, 8, 12]);
  });

  it("reads a page image only when its call starts", async () => {
    const seen: string[] = [];
    const summarizer: Summarizer = {
      modelId: "lazy-model",
      summarizePage: async (input: PageSummaryInput) => {
        seen.push(Buffer.from(input.imageBase64, "base64").toString());
        if (input.pageNum === 1) {
          fs.writeFileSync(path.join(output, "pages", "doc_001", "page_002.png"), "png rewritten 2");
        }
        return `page ${input.pageNum}`;
      },
      summarizeDocument: async () => "doc",
    };
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    seedDocument(ctx, "a.pdf", 2);

    await summarizeDocuments(ctx, emit, { ...summarizeOptionsFromContext(ctx), concurrency: 1 });

    expect(seen).toEqual(["png doc_001 1", "png rewritten 2"]);
  });

  it("fails a page whose image cannot be read without calling the model", async () => {
    const summarizer = new FakeSummarizer();
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    const doc = seedDocument(ctx, "a.pdf", 2);
    fs.rmSync(path.join(output, "pages", "doc_001", "page_001.png"));

    const result = await summarizeDocuments(ctx, emit);

    expect(result).toMatchObject({ pagesDone: 1, pagesFailed: 1 });
    expect(summarizer.pageCalls.map((c) => c.pageNum)).toEqual([2]);
    const [first] = doc.pages;
    expect(first.summary.kind).toBe("failed");
    if (first.summary.kind === "failed") {
      expect(first.summary.reason).toMatch(/^cannot read page image: ENOENT/);
    }
  });

  it("stops on a fatal error", async () => {
    const summarizer = new FakeSummarizer({
      "doc_001:1": { error: new ConfigurationError("missing API key") },
    });
    const { ctx, emit } = createTestContext({ inputRoot: input, outputRoot: output, summarizer });
    seedDocument(ctx, "a.pdf", 1);

    await expect(summarizeDocuments(ctx, emit)).rejects.toThrow("missing API key");
  });
});

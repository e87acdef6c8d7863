/**
 * Page Rasterizer
 *
 * Renders every page of a canonical PDF to pages/<doc_id>/page_NNN.png.
 * A page that fails to render keeps its slot with an image error, so page
 * numbers downstream always match the PDF.
 */

import fs from "node:fs";
import path from "node:path";
import mupdf, { type Document as MupdfDocument } from "mupdf";
import type { DocumentRecord, PageRecord } from "../core/types";
import type { Emit, PipelineContext, StageResult } from "../core/context";
import { advanceStatus, createPageRecord, failDocument, pageImageName } from "../core/records";
import { RasterizationError, describeError, isFatalError } from "../errors";
import { runPool } from "../parallel";
import { fromIndexPath, toIndexPath } from "../types";

export const POINTS_PER_INCH = 72;

export interface RasterizeOptions {
  dpi: number;
  /** Maps a written image file to the path recorded on the page. */
  toRecordedPath?: (absolutePath: string) => string;
  onPage?: (page: PageRecord, totalPages: number) => void;
}

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdf(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}

function renderPage(doc: MupdfDocument, pageIndex: number, scale: number): Buffer {
  const page = doc.loadPage(pageIndex);
  const pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false);
  return Buffer.from(pixmap.asPNG());
}

/**
 * Rasterize one PDF into `outputDir`. Throws RasterizationError when the PDF
 * cannot be opened at all; per-page failures are recorded on the page.
 */
export async function rasterizePdf(
  pdfFile: string,
  outputDir: string,
  options: RasterizeOptions
): Promise<PageRecord[]> {
  let doc: MupdfDocument;
  try {
    doc = openPdf(fs.readFileSync(pdfFile));
  } catch (err) {
    throw new RasterizationError(`cannot open PDF: ${describeError(err)}`);
  }

  if (doc.needsPassword()) {
    throw new RasterizationError("PDF is password-protected");
  }

  let totalPages: number;
  try {
    totalPages = doc.countPages();
  } catch (err) {
    throw new RasterizationError(`cannot read page tree: ${describeError(err)}`);
  }
  if (totalPages === 0) {
    throw new RasterizationError("PDF has no pages");
  }

  const scale = options.dpi / POINTS_PER_INCH;
  const toRecordedPath = options.toRecordedPath ?? ((p: string) => p);
  fs.rmSync(outputDir, { recursive: true, force: true });
  fs.mkdirSync(outputDir, { recursive: true });

  const pages: PageRecord[] = [];
  for (let i = 0; i < totalPages; i++) {
    const page = createPageRecord(i + 1);
    const imageFile = path.join(outputDir, pageImageName(page.pageNum));
    try {
      fs.writeFileSync(imageFile, renderPage(doc, i, scale));
      page.imagePath = toRecordedPath(imageFile);
    } catch (err) {
      page.imageError = describeError(err);
    }
    pages.push(page);
    options.onPage?.(page, totalPages);

    await tick();
  }

  return pages;
}

// ============================================================================
// Stage
// ============================================================================

export function documentsToRasterize(ctx: PipelineContext): DocumentRecord[] {
  return [...ctx.index.documents.values()].filter(
    (doc) => doc.status.state === "normalized" && doc.canonicalPdfPath !== null
  );
}

export async function rasterizeDocuments(ctx: PipelineContext, emit: Emit): Promise<StageResult> {
  const docs = documentsToRasterize(ctx);
  let completed = 0;
  let failed = 0;

  const result = await runPool(
    docs,
    (doc) => doc.docId,
    async (doc) => {
      emit({ type: "document-start", stage: "rasterize", docId: doc.docId });
      try {
        if (doc.canonicalPdfPath === null) {
          throw new RasterizationError("no canonical PDF");
        }
        const pages = await rasterizePdf(
          fromIndexPath(ctx.paths, doc.canonicalPdfPath),
          path.join(ctx.paths.pagesDir, doc.docId),
          {
            dpi: ctx.config.rasterize.dpi,
            toRecordedPath: (file) => toIndexPath(ctx.paths, file),
            onPage: (page) => {
              if (page.imagePath !== null) {
                emit({ type: "page-complete", stage: "rasterize", docId: doc.docId, pageNum: page.pageNum });
              } else {
                emit({
                  type: "page-failed",
                  stage: "rasterize",
                  docId: doc.docId,
                  pageNum: page.pageNum,
                  error: page.imageError ?? "unknown error",
                });
              }
            },
          }
        );
        doc.pages = pages;

        const rendered = pages.filter((p) => p.imagePath !== null).length;
        if (rendered === 0) {
          throw new RasterizationError(`no page could be rendered (${pages.length} pages)`);
        }
        advanceStatus(doc, { state: "rasterized" });
        completed++;
        emit({ type: "document-complete", stage: "rasterize", docId: doc.docId });
      } catch (err) {
        if (isFatalError(err)) throw err;
        const reason = describeError(err);
        failDocument(doc, "rasterize", reason);
        failed++;
        emit({ type: "document-failed", stage: "rasterize", docId: doc.docId, error: reason });
      }
    },
    { concurrency: ctx.config.rasterize.concurrency, signal: ctx.signal }
  );

  return { completed, failed, skipped: result.skipped };
}

/**
 * Read-only access to a built data room index, for consumers that navigate
 * documents by doc_id and page number.
 */

import fs from "node:fs";
import type { DataRoomIndex, DocumentRecord, DocumentStatus, SummaryState } from "./pipeline/core/types";
import { loadIndex } from "./pipeline/index/index-store";
import { fromIndexPath, resolveDataRoomPaths, type DataRoomPaths } from "./pipeline/types";

export interface DocumentListing {
  docId: string;
  relativePath: string;
  summary: string | null;
  status: DocumentStatus;
  pageCount: number;
}

export interface PageSummaryView {
  pageNum: number;
  summary: SummaryState;
}

export interface DocumentSummaryView {
  docId: string;
  relativePath: string;
  summary: SummaryState;
  pages: PageSummaryView[];
}

export interface PageContentView {
  pageNum: number;
  /** Absolute path, or null when the page could not be rendered. */
  imagePath: string | null;
  imageError: string | null;
  summary: string | null;
  imageBase64?: string;
}

export type PageView = PageContentView | { pageNum: number; error: string };

function summaryText(summary: SummaryState): string | null {
  return summary.kind === "done" ? summary.text : null;
}

export class DataRoom {
  constructor(
    readonly index: DataRoomIndex,
    readonly paths: DataRoomPaths
  ) {}

  /** Load the index file under `outputRoot`. */
  static open(outputRoot: string): DataRoom {
    const paths = resolveDataRoomPaths(outputRoot);
    return new DataRoom(loadIndex(paths.indexFile), paths);
  }

  listDocuments(): DocumentListing[] {
    return [...this.index.documents.values()].map((doc) => ({
      docId: doc.docId,
      relativePath: doc.relativePath,
      summary: summaryText(doc.summary),
      status: doc.status,
      pageCount: doc.pages.length,
    }));
  }

  getDocument(docId: string): DocumentRecord | null {
    return this.index.documents.get(docId) ?? null;
  }

  getDocumentSummary(docId: string): DocumentSummaryView | null {
    const doc = this.getDocument(docId);
    if (!doc) return null;
    return {
      docId: doc.docId,
      relativePath: doc.relativePath,
      summary: doc.summary,
      pages: doc.pages.map((p) => ({ pageNum: p.pageNum, summary: p.summary })),
    };
  }

  /**
   * Requested pages in request order. Unknown page numbers come back as
   * error entries; no list means every page.
   */
  getDocumentPages(
    docId: string,
    pageNums?: number[],
    options: { includeImages?: boolean } = {}
  ): PageView[] | null {
    const doc = this.getDocument(docId);
    if (!doc) return null;

    const wanted = pageNums ?? doc.pages.map((p) => p.pageNum);
    return wanted.map((pageNum): PageView => {
      const page = doc.pages.find((p) => p.pageNum === pageNum);
      if (!page) {
        return { pageNum, error: `Page ${pageNum} not found in document ${docId}` };
      }
      const imagePath = page.imagePath === null ? null : fromIndexPath(this.paths, page.imagePath);
      const view: PageContentView = {
        pageNum,
        imagePath,
        imageError: page.imageError,
        summary: summaryText(page.summary),
      };
      if (options.includeImages && imagePath !== null && fs.existsSync(imagePath)) {
        view.imageBase64 = fs.readFileSync(imagePath).toString("base64");
      }
      return view;
    });
  }
}

function describeSlot(summary: SummaryState): string {
  switch (summary.kind) {
    case "done":
      return summary.text;
    case "failed":
      return `[not summarized: ${summary.reason}]`;
    case "pending":
      return "[not summarized: pending]";
  }
}

/**
 * Render a summary view as text: the document summary, then one
 * "Page N: ..." block per page, separated by blank lines.
 */
export function formatDocumentSummary(view: DocumentSummaryView): string {
  const blocks = [
    `Document ${view.docId} (${view.relativePath})`,
    `Summary: ${describeSlot(view.summary)}`,
    ...view.pages.map((p) => `Page ${p.pageNum}: ${describeSlot(p.summary)}`),
  ];
  return blocks.join("\n\n");
}

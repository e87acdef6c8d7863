import type {
  DataRoomIndex,
  DocumentRecord,
  DocumentStatus,
  FailureStage,
  OpenSummary,
  PageRecord,
  SummaryState,
} from "./types";

export const PENDING: SummaryState = { kind: "pending" };

export function isOpen(summary: SummaryState): summary is OpenSummary {
  return summary.kind !== "done";
}

/**
 * Settle a summary slot. A slot that is already done is returned unchanged,
 * so a completed summary can never be overwritten.
 */
export function settleSummary(
  current: SummaryState,
  next: Exclude<SummaryState, { kind: "pending" }>
): SummaryState {
  return current.kind === "done" ? current : next;
}

// ============================================================================
// Status progression
// ============================================================================

const STATE_RANK: Record<DocumentStatus["state"], number> = {
  discovered: 0,
  normalized: 1,
  rasterized: 2,
  summarized: 3,
  failed: -1,
};

const FAILURE_RANK: Record<FailureStage, number> = {
  normalize: 1,
  rasterize: 2,
  summarize: 3,
};

export function statusRank(status: DocumentStatus): number {
  return status.state === "failed" ? FAILURE_RANK[status.stage] : STATE_RANK[status.state];
}

export function isFailed(status: DocumentStatus): status is Extract<DocumentStatus, { state: "failed" }> {
  return status.state === "failed";
}

/**
 * Move a document forward. Failed documents stay failed, and a status never
 * moves backwards.
 */
export function advanceStatus(record: DocumentRecord, next: DocumentStatus): void {
  if (isFailed(record.status)) return;
  if (next.state !== "failed" && STATE_RANK[next.state] <= STATE_RANK[record.status.state]) return;
  record.status = next;
}

export function failDocument(record: DocumentRecord, stage: FailureStage, reason: string): void {
  advanceStatus(record, { state: "failed", stage, reason });
}

export function formatStatus(status: DocumentStatus): string {
  return status.state === "failed"
    ? `failed(${status.stage}, ${status.reason})`
    : status.state;
}

// ============================================================================
// Factories
// ============================================================================

export function createEmptyIndex(inputRoot: string, modelUsed: string, now = new Date()): DataRoomIndex {
  const timestamp = now.toISOString();
  return {
    metadata: {
      schemaVersion: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
      modelUsed,
      inputRoot,
      nextDocSeq: 1,
      revision: 0,
    },
    documents: new Map(),
  };
}

export function formatDocId(seq: number): string {
  return "doc_" + String(seq).padStart(3, "0");
}

export function pageImageName(pageNum: number): string {
  return "page_" + String(pageNum).padStart(3, "0") + ".png";
}

export function createPageRecord(pageNum: number): PageRecord {
  return { pageNum, imagePath: null, imageError: null, summary: PENDING };
}

/** Drop everything derived from a source file so it is processed afresh. */
export function resetDerivedState(record: DocumentRecord): void {
  record.status = { state: "discovered" };
  record.canonicalPdfPath = null;
  record.summary = PENDING;
  record.pages = [];
}

/**
 * Reopen failures so a new run attempts them again. Completed summaries and
 * stages that already succeeded are left untouched.
 */
export function reopenFailures(record: DocumentRecord): boolean {
  let reopened = false;

  if (isFailed(record.status)) {
    switch (record.status.stage) {
      case "normalize":
        record.status = { state: "discovered" };
        break;
      case "rasterize":
        record.status = { state: "normalized" };
        record.pages = [];
        break;
      case "summarize":
        record.status = { state: "rasterized" };
        break;
    }
    reopened = true;
  }

  if (record.summary.kind === "failed") {
    record.summary = PENDING;
    reopened = true;
  }
  for (const page of record.pages) {
    if (page.summary.kind === "failed") {
      page.summary = PENDING;
      reopened = true;
    }
  }
  return reopened;
}

export interface StatusCounts {
  total: number;
  discovered: number;
  normalized: number;
  rasterized: number;
  summarized: number;
  failed: number;
  pages: number;
  pagesSummarized: number;
}

export function countByState(index: DataRoomIndex): StatusCounts {
  const counts: StatusCounts = {
    total: 0,
    discovered: 0,
    normalized: 0,
    rasterized: 0,
    summarized: 0,
    failed: 0,
    pages: 0,
    pagesSummarized: 0,
  };
  for (const doc of index.documents.values()) {
    counts.total++;
    counts[doc.status.state]++;
    counts.pages += doc.pages.length;
    counts.pagesSummarized += doc.pages.filter((p) => p.summary.kind === "done").length;
  }
  return counts;
}

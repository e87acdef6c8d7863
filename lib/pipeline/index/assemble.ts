/**
 * Index Assembler
 *
 * Folds the in-memory index together with whatever is already on disk and
 * writes the result atomically. Merging is in place so that records held
 * by running stages stay the live objects.
 */

import fs from "node:fs";
import type { DataRoomIndex, DocumentRecord, PageRecord, SummaryState } from "../core/types";
import { statusRank } from "../core/records";
import { fromIndexPath, type DataRoomPaths } from "../types";
import { loadIndexIfExists, writeIndexAtomic } from "./index-store";

export const MISSING_IMAGE_REASON = "page image missing at index write";

function mergeSummary(target: SummaryState, other: SummaryState): SummaryState {
  if (target.kind === "done") return target;
  if (other.kind === "done") return other;
  if (target.kind === "failed") return target;
  return other;
}

function mergePage(target: PageRecord, other: PageRecord): void {
  target.summary = mergeSummary(target.summary, other.summary);
  if (target.imagePath === null && other.imagePath !== null) {
    target.imagePath = other.imagePath;
    target.imageError = null;
  }
}

function mergeDocument(target: DocumentRecord, other: DocumentRecord): void {
  if (other.sourceHash !== target.sourceHash) {
    // The source changed between the two snapshots; the target is newer.
    return;
  }

  if (statusRank(other.status) > statusRank(target.status)) {
    target.status = other.status;
  }
  target.canonicalPdfPath ??= other.canonicalPdfPath;
  target.summary = mergeSummary(target.summary, other.summary);

  if (target.pages.length === 0) {
    target.pages = other.pages.map((p) => ({ ...p }));
  } else if (target.pages.length === other.pages.length) {
    target.pages.forEach((page, i) => mergePage(page, other.pages[i]));
  }

  if (target.summary.kind === "done" && target.status.state !== "summarized") {
    target.status = { state: "summarized" };
  }
}

/**
 * Merge `other` into `target`. Completed summaries from either side survive,
 * the further-along status wins (ties keep the target's), and documents only
 * present in `other` are appended after the target's in their own order.
 */
export function mergeIndex(target: DataRoomIndex, other: DataRoomIndex): void {
  for (const [docId, otherDoc] of other.documents) {
    const existing = target.documents.get(docId);
    if (existing) {
      mergeDocument(existing, otherDoc);
    } else {
      target.documents.set(docId, structuredClone(otherDoc));
    }
  }

  target.metadata.nextDocSeq = Math.max(target.metadata.nextDocSeq, other.metadata.nextDocSeq);
  target.metadata.revision = Math.max(target.metadata.revision, other.metadata.revision);
  if (other.metadata.createdAt < target.metadata.createdAt) {
    target.metadata.createdAt = other.metadata.createdAt;
  }
}

/**
 * Every image path left in the index must exist on disk when it is written.
 * Slots whose file has gone missing become failure markers.
 */
export function verifyPageImages(index: DataRoomIndex, paths: DataRoomPaths): number {
  let demoted = 0;
  for (const doc of index.documents.values()) {
    for (const page of doc.pages) {
      if (page.imagePath !== null && !fs.existsSync(fromIndexPath(paths, page.imagePath))) {
        page.imagePath = null;
        page.imageError = MISSING_IMAGE_REASON;
        demoted++;
      }
    }
  }
  return demoted;
}

export interface AssembleResult {
  indexFile: string;
  revision: number;
  totalDocuments: number;
  demotedImages: number;
}

/**
 * Merge with the persisted index of the same input folder (if any), stamp run
 * metadata and write. An index of another folder is replaced, not merged.
 */
export function assembleIndex(
  index: DataRoomIndex,
  paths: DataRoomPaths,
  options: { modelUsed: string; now?: Date }
): AssembleResult {
  const persisted = loadIndexIfExists(paths.indexFile);
  if (persisted && persisted.metadata.inputRoot === index.metadata.inputRoot) {
    mergeIndex(index, persisted);
  } else if (persisted) {
    index.metadata.revision = Math.max(index.metadata.revision, persisted.metadata.revision);
  }

  const demotedImages = verifyPageImages(index, paths);

  index.metadata.modelUsed = options.modelUsed;
  index.metadata.updatedAt = (options.now ?? new Date()).toISOString();
  index.metadata.revision += 1;

  writeIndexAtomic(paths.indexFile, index);

  return {
    indexFile: paths.indexFile,
    revision: index.metadata.revision,
    totalDocuments: index.documents.size,
    demotedImages,
  };
}

/**
 * Persist the live index mid-run. The index was loaded from disk at the
 * start of the run, so no merge is needed here.
 */
export function checkpointIndex(
  index: DataRoomIndex,
  paths: DataRoomPaths,
  options: { modelUsed: string; now?: Date }
): AssembleResult {
  const demotedImages = verifyPageImages(index, paths);

  index.metadata.modelUsed = options.modelUsed;
  index.metadata.updatedAt = (options.now ?? new Date()).toISOString();
  index.metadata.revision += 1;

  writeIndexAtomic(paths.indexFile, index);

  return {
    indexFile: paths.indexFile,
    revision: index.metadata.revision,
    totalDocuments: index.documents.size,
    demotedImages,
  };
}

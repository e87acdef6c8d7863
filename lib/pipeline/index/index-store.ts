import fs from "node:fs";
import path from "node:path";
import { z } from "zod/v4";
import {
  dataRoomIndexSchema,
  INDEX_SCHEMA_VERSION,
  type DataRoomIndexFile,
  type DocumentEntry,
  type PageEntry,
} from "../core/schemas";
import type {
  DataRoomIndex,
  DocumentRecord,
  DocumentStatus,
  PageRecord,
  SummaryState,
} from "../core/types";
import { PersistenceError } from "../errors";

// ============================================================================
// In-memory <-> file layout
// ============================================================================

function summaryToEntry(summary: SummaryState): { summary: string | null; summary_error: string | null } {
  switch (summary.kind) {
    case "done":
      return { summary: summary.text, summary_error: null };
    case "failed":
      return { summary: null, summary_error: summary.reason };
    case "pending":
      return { summary: null, summary_error: null };
  }
}

function summaryFromEntry(summary: string | null, error: string | null): SummaryState {
  if (summary !== null) return { kind: "done", text: summary };
  if (error !== null) return { kind: "failed", reason: error };
  return { kind: "pending" };
}

function pageToEntry(page: PageRecord): PageEntry {
  return {
    page_num: page.pageNum,
    ...summaryToEntry(page.summary),
    page_image: page.imagePath,
    image_error: page.imageError,
  };
}

function pageFromEntry(entry: PageEntry): PageRecord {
  return {
    pageNum: entry.page_num,
    imagePath: entry.page_image,
    imageError: entry.image_error,
    summary: summaryFromEntry(entry.summary, entry.summary_error),
  };
}

function statusToEntry(status: DocumentStatus): DocumentEntry["status"] {
  return status.state === "failed"
    ? { state: "failed", stage: status.stage, reason: status.reason }
    : { state: status.state };
}

function documentToEntry(doc: DocumentRecord): DocumentEntry {
  return {
    doc_id: doc.docId,
    original_file: doc.originalPath,
    relative_path: doc.relativePath,
    source_hash: doc.sourceHash,
    pdf_file: doc.canonicalPdfPath,
    status: statusToEntry(doc.status),
    ...summaryToEntry(doc.summary),
    pages: doc.pages.map(pageToEntry),
  };
}

function documentFromEntry(entry: DocumentEntry): DocumentRecord {
  return {
    docId: entry.doc_id,
    originalPath: entry.original_file,
    relativePath: entry.relative_path,
    sourceHash: entry.source_hash,
    canonicalPdfPath: entry.pdf_file,
    status: entry.status,
    summary: summaryFromEntry(entry.summary, entry.summary_error),
    pages: entry.pages.map(pageFromEntry),
  };
}

export function serializeIndex(index: DataRoomIndex): DataRoomIndexFile {
  const { metadata } = index;
  return {
    metadata: {
      schema_version: INDEX_SCHEMA_VERSION,
      total_documents: index.documents.size,
      created_at: metadata.createdAt,
      updated_at: metadata.updatedAt,
      model_used: metadata.modelUsed,
      input_root: metadata.inputRoot,
      next_doc_seq: metadata.nextDocSeq,
      revision: metadata.revision,
    },
    documents: [...index.documents.values()].map(documentToEntry),
  };
}

export function deserializeIndex(file: DataRoomIndexFile): DataRoomIndex {
  const documents = new Map<string, DocumentRecord>();
  for (const entry of file.documents) {
    if (documents.has(entry.doc_id)) {
      throw new PersistenceError(`Duplicate doc_id in index: ${entry.doc_id}`);
    }
    documents.set(entry.doc_id, documentFromEntry(entry));
  }
  return {
    metadata: {
      schemaVersion: INDEX_SCHEMA_VERSION,
      createdAt: file.metadata.created_at,
      updatedAt: file.metadata.updated_at,
      modelUsed: file.metadata.model_used,
      inputRoot: file.metadata.input_root,
      nextDocSeq: file.metadata.next_doc_seq,
      revision: file.metadata.revision,
    },
    documents,
  };
}

// ============================================================================
// Disk I/O
// ============================================================================

export function parseIndex(raw: string, source: string): DataRoomIndex {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceError(`Index file is not valid JSON: ${source}`, { cause: err });
  }
  const result = dataRoomIndexSchema.safeParse(json);
  if (!result.success) {
    throw new PersistenceError(
      `Index file does not match the expected schema: ${source}\n${z.prettifyError(result.error)}`
    );
  }
  return deserializeIndex(result.data);
}

export function loadIndex(indexFile: string): DataRoomIndex {
  let raw: string;
  try {
    raw = fs.readFileSync(indexFile, "utf-8");
  } catch (err) {
    throw new PersistenceError(`Cannot read index file: ${indexFile}`, { cause: err });
  }
  return parseIndex(raw, indexFile);
}

export function loadIndexIfExists(indexFile: string): DataRoomIndex | null {
  if (!fs.existsSync(indexFile)) return null;
  return loadIndex(indexFile);
}

let tmpCounter = 0;

/**
 * Write the index so that readers only ever see a complete file:
 * the JSON goes to a temp file in the same directory, then replaces
 * the target with a rename.
 */
export function writeIndexAtomic(indexFile: string, index: DataRoomIndex): void {
  const dir = path.dirname(indexFile);
  const tmpFile = path.join(
    dir,
    `.${path.basename(indexFile)}.${process.pid}.${++tmpCounter}.tmp`
  );
  const json = JSON.stringify(serializeIndex(index), null, 2) + "\n";

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmpFile, json, "utf-8");
    fs.renameSync(tmpFile, indexFile);
  } catch (err) {
    fs.rmSync(tmpFile, { force: true });
    throw new PersistenceError(`Failed to write index file: ${indexFile}`, { cause: err });
  }
}

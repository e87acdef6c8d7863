/**
 * Core types for the indexing pipeline.
 *
 * These types describe the in-memory data room index that flows through
 * every stage. They are independent of the persisted JSON layout
 * (see ./schemas) and of any external service.
 */

// ============================================================================
// Summaries - pending until attempted, immutable once done
// ============================================================================

export type SummaryState =
  | { kind: "pending" }
  | { kind: "done"; text: string }
  | { kind: "failed"; reason: string };

export type OpenSummary = Exclude<SummaryState, { kind: "done" }>;

// ============================================================================
// Document lifecycle
// ============================================================================

export type FailureStage = "normalize" | "rasterize" | "summarize";

export type DocumentStatus =
  | { state: "discovered" }
  | { state: "normalized" }
  | { state: "rasterized" }
  | { state: "summarized" }
  | { state: "failed"; stage: FailureStage; reason: string };

export interface PageRecord {
  pageNum: number; // 1-based, contiguous
  imagePath: string | null; // relative to the output root
  imageError: string | null;
  summary: SummaryState;
}

export interface DocumentRecord {
  docId: string; // "doc_001"
  originalPath: string;
  relativePath: string; // relative to the input root, "/"-separated
  sourceHash: string;
  canonicalPdfPath: string | null; // relative to the output root
  status: DocumentStatus;
  summary: SummaryState;
  pages: PageRecord[];
}

export interface IndexMetadata {
  schemaVersion: 1;
  createdAt: string;
  updatedAt: string;
  modelUsed: string;
  inputRoot: string;
  nextDocSeq: number;
  revision: number;
}

/**
 * The terminal artifact. `documents` preserves discovery order.
 */
export interface DataRoomIndex {
  metadata: IndexMetadata;
  documents: Map<string, DocumentRecord>;
}

// ============================================================================
// Summarizer - abstracted interface for the external AI service
// ============================================================================

export interface PageSummaryInput {
  docId: string;
  fileName: string;
  pageNum: number;
  totalPages: number;
  imageBase64: string;
}

export interface DocumentSummaryInput {
  docId: string;
  fileName: string;
  totalPages: number;
  pages: { pageNum: number; summary: string }[];
  skippedPages: number[];
}

export interface Summarizer {
  readonly modelId: string;
  summarizePage(input: PageSummaryInput, signal: AbortSignal): Promise<string>;
  summarizeDocument(input: DocumentSummaryInput, signal: AbortSignal): Promise<string>;
}

// ============================================================================
// Converter - abstracted interface for the external format converter
// ============================================================================

export interface ConvertRequest {
  docId: string;
  sourcePath: string;
  outputPath: string;
}

export interface DocumentConverter {
  convert(request: ConvertRequest): Promise<void>;
}

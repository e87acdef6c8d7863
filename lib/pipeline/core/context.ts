import type { AppConfig } from "../../config";
import type { DataRoomPaths, PipelineStage } from "../types";
import type { DataRoomIndex, DocumentConverter, FailureStage, Summarizer } from "./types";

// ============================================================================
// Events
// ============================================================================

export type PipelineEvent =
  // Stage-level events
  | { type: "stage-start"; stage: PipelineStage; total?: number }
  | { type: "stage-progress"; stage: PipelineStage; message: string }
  | { type: "stage-complete"; stage: PipelineStage; completed: number; failed: number; skipped: number }
  | { type: "stage-skipped"; stage: PipelineStage; reason: string }
  // Discovery
  | { type: "file-skipped"; path: string; reason: string }
  // Document-level events
  | { type: "document-start"; stage: PipelineStage; docId: string; totalPages?: number }
  | { type: "document-complete"; stage: PipelineStage; docId: string }
  | { type: "document-failed"; stage: FailureStage; docId: string; error: string }
  // Page-level events
  | { type: "page-complete"; stage: "rasterize" | "summarize"; docId: string; pageNum: number }
  | { type: "page-failed"; stage: "rasterize" | "summarize"; docId: string; pageNum: number; error: string }
  | {
      type: "retry";
      stage: "normalize" | "summarize";
      docId: string;
      pageNum?: number;
      attempt: number;
      delayMs: number;
      error: string;
    }
  // Persistence
  | { type: "index-written"; indexFile: string; revision: number; totalDocuments: number; final: boolean };

export type Emit = (event: PipelineEvent) => void;

export interface StageResult {
  completed: number;
  failed: number;
  skipped: number;
}

// ============================================================================
// Context shared by every stage of one run
// ============================================================================

export interface PipelineContext {
  inputRoot: string;
  /** The live index; stages mutate its records in place. */
  index: DataRoomIndex;
  paths: DataRoomPaths;
  config: AppConfig;
  converter: DocumentConverter;
  summarizer: Summarizer;
  /** Once aborted, no new work starts. Work already running completes. */
  signal: AbortSignal;
  /** Reopen failed documents and summaries instead of leaving them as they are. */
  retryFailed: boolean;
  /** Persist the live index atomically. */
  checkpoint: (emit: Emit) => void;
}

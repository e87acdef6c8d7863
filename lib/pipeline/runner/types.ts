/**
 * Runner layer types.
 *
 * Progress sinks turn pipeline events into console lines, host callbacks,
 * or nothing at all.
 */

import type { PipelineEvent } from "../core/context";
import type { PipelineStage } from "../types";

export type { PipelineEvent } from "../core/context";

// ============================================================================
// Progress Interface
// ============================================================================

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, send SSE events, update a job queue, etc.
 */
export interface Progress {
  emit(event: PipelineEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Describe an event as one line of text, or null for events too fine-grained
 * to report line by line.
 */
export function formatEvent(event: PipelineEvent): string | null {
  switch (event.type) {
    case "stage-start":
      return `Starting ${formatStepName(event.stage)}...`;
    case "stage-progress":
      return `${formatStepName(event.stage)}: ${event.message}`;
    case "stage-complete":
      return (
        `Completed ${formatStepName(event.stage)} ` +
        `(${event.completed} ok, ${event.failed} failed, ${event.skipped} skipped)`
      );
    case "stage-skipped":
      return `Skipped ${formatStepName(event.stage)}: ${event.reason}`;
    case "file-skipped":
      return `Skipped file ${event.path}: ${event.reason}`;
    case "document-start":
    case "page-complete":
      return null;
    case "document-complete":
      return `[${event.docId}] ${formatStepName(event.stage)} done`;
    case "document-failed":
      return `[${event.docId}] Error in ${formatStepName(event.stage)}: ${event.error}`;
    case "page-failed":
      return `[${event.docId}] Page ${event.pageNum} ${formatStepName(event.stage)} failed: ${event.error}`;
    case "retry": {
      const where = event.pageNum !== undefined ? `${event.docId} p${event.pageNum}` : event.docId;
      return `[${where}] Attempt ${event.attempt} failed (${event.error}), retrying in ${event.delayMs}ms`;
    }
    case "index-written":
      return event.final
        ? `Wrote ${event.indexFile} (revision ${event.revision}, ${event.totalDocuments} documents)`
        : null;
  }
}

function isErrorEvent(event: PipelineEvent): boolean {
  return event.type === "document-failed" || event.type === "page-failed";
}

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      const line = formatEvent(event);
      if (line === null) return;
      if (isErrorEvent(event)) console.error(line);
      else console.log(line);
    },
  };
}

/**
 * Callback-based progress emitter for an embedding host.
 */
export function createCallbackProgress(callback: (message: string) => void): Progress {
  return {
    emit(event) {
      const line = formatEvent(event);
      if (line !== null) callback(line);
    },
  };
}

export function formatStepName(step: PipelineStage): string {
  switch (step) {
    case "discover":
      return "discovery";
    case "normalize":
      return "normalization";
    case "rasterize":
      return "rasterization";
    case "summarize":
      return "summarization";
    case "assemble":
      return "index assembly";
  }
}

/**
 * Pipeline Runner Module
 *
 * Composes the five stages strictly in order:
 * discover -> normalize -> rasterize -> summarize -> assemble.
 * The live index is checkpointed after every stage, and the assembler runs
 * even after cancellation so the work done so far is persisted.
 */

import { Observable, catchError, concat, defer, lastValueFrom, of, tap, throwError } from "rxjs";
import type { DataRoomIndex } from "../core/types";
import type { Emit, PipelineContext, PipelineEvent, StageResult } from "../core/context";
import { countByState, type StatusCounts } from "../core/records";
import { defineStep, runSteps, type Step } from "../step";
import { discoverStage } from "../discover/discover";
import { documentsToNormalize, normalizeDocuments } from "../normalize/normalize";
import { documentsToRasterize, rasterizeDocuments } from "../rasterize/rasterize";
import { documentsToSummarize, summarizeDocuments } from "../summarize/summarize";
import { assembleIndex, checkpointIndex } from "../index/assemble";
import { PersistenceError } from "../errors";
import { createPipelineContext, type PipelineOptions } from "./factory";
import { nullProgress, type Progress } from "./types";

export {
  type Progress,
  type PipelineEvent,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  formatEvent,
} from "./types";
export { createPipelineContext, type PipelineOptions } from "./factory";

// ============================================================================
// Steps
// ============================================================================

type StageFn = (ctx: PipelineContext, emit: Emit) => Promise<StageResult>;

function withCheckpoint(execute: StageFn): StageFn {
  return async (ctx, emit) => {
    const result = await execute(ctx, emit);
    ctx.checkpoint(emit);
    return result;
  };
}

export const discoverStep = defineStep({
  name: "discover",
  execute: withCheckpoint(discoverStage),
});

export const normalizeStep = defineStep({
  name: "normalize",
  isComplete: (ctx) => documentsToNormalize(ctx).length === 0,
  execute: withCheckpoint(normalizeDocuments),
});

export const rasterizeStep = defineStep({
  name: "rasterize",
  isComplete: (ctx) => documentsToRasterize(ctx).length === 0,
  execute: withCheckpoint(rasterizeDocuments),
});

export const summarizeStep = defineStep({
  name: "summarize",
  isComplete: (ctx) => documentsToSummarize(ctx).length === 0,
  execute: withCheckpoint((ctx, emit) => summarizeDocuments(ctx, emit)),
});

export const assembleStep = defineStep({
  name: "assemble",
  runWhenAborted: true,
  execute: async (ctx, emit) => {
    const result = assembleIndex(ctx.index, ctx.paths, { modelUsed: ctx.summarizer.modelId });
    emit({
      type: "index-written",
      indexFile: result.indexFile,
      revision: result.revision,
      totalDocuments: result.totalDocuments,
      final: true,
    });
    return { completed: result.totalDocuments, failed: 0, skipped: 0 };
  },
});

export const PIPELINE_STEPS: Step[] = [discoverStep, normalizeStep, rasterizeStep, summarizeStep, assembleStep];

// ============================================================================
// Runner
// ============================================================================

/**
 * Run the pipeline over a prepared context. On a fatal error the index is
 * persisted (unless persisting is what failed) before the error is rethrown.
 */
export function runIndexPipeline(
  ctx: PipelineContext,
  steps: Step[] = PIPELINE_STEPS
): Observable<PipelineEvent> {
  return runSteps(steps, ctx).pipe(
    catchError((err: unknown) =>
      defer(() => {
        if (err instanceof PersistenceError || ctx.index.documents.size === 0) {
          return throwError(() => err);
        }
        const result = checkpointIndex(ctx.index, ctx.paths, { modelUsed: ctx.summarizer.modelId });
        return concat(
          of<PipelineEvent>({
            type: "index-written",
            indexFile: result.indexFile,
            revision: result.revision,
            totalDocuments: result.totalDocuments,
            final: true,
          }),
          throwError(() => err)
        );
      })
    )
  );
}

export interface BuildResult {
  index: DataRoomIndex;
  indexFile: string;
  cancelled: boolean;
  counts: StatusCounts;
}

/**
 * Build (or resume) the index for one input directory.
 */
export async function buildIndex(
  options: PipelineOptions & { progress?: Progress }
): Promise<BuildResult> {
  const progress = options.progress ?? nullProgress;
  const ctx = createPipelineContext(options);

  await lastValueFrom(runIndexPipeline(ctx).pipe(tap((event) => progress.emit(event))), {
    defaultValue: undefined,
  });

  return {
    index: ctx.index,
    indexFile: ctx.paths.indexFile,
    cancelled: ctx.signal.aborted,
    counts: countByState(ctx.index),
  };
}

import { Observable, concat, defer, of } from "rxjs";
import type { Emit, PipelineContext, PipelineEvent, StageResult } from "./core/context";
import type { PipelineStage } from "./types";

export interface Step {
  readonly name: PipelineStage;
  /** Evaluated when the step is reached, after earlier steps have run. */
  isComplete(ctx: PipelineContext): boolean;
  run(ctx: PipelineContext): Observable<PipelineEvent>;
}

export function defineStep(config: {
  name: PipelineStage;
  isComplete?: (ctx: PipelineContext) => boolean;
  /** Run even after the run has been cancelled (the assembler must persist). */
  runWhenAborted?: boolean;
  execute: (ctx: PipelineContext, emit: Emit) => Promise<StageResult>;
}): Step {
  const isComplete = config.isComplete ?? (() => false);
  return {
    name: config.name,
    isComplete,
    run(ctx: PipelineContext): Observable<PipelineEvent> {
      return defer(() => {
        if (ctx.signal.aborted && !config.runWhenAborted) {
          return of<PipelineEvent>({ type: "stage-skipped", stage: config.name, reason: "cancelled" });
        }
        if (isComplete(ctx)) {
          return of<PipelineEvent>({ type: "stage-skipped", stage: config.name, reason: "nothing to do" });
        }
        return new Observable<PipelineEvent>((subscriber) => {
          subscriber.next({ type: "stage-start", stage: config.name });
          config
            .execute(ctx, (event) => subscriber.next(event))
            .then((result) => {
              subscriber.next({ type: "stage-complete", stage: config.name, ...result });
              subscriber.complete();
            })
            .catch((err: unknown) => subscriber.error(err));
        });
      });
    },
  };
}

/** Run steps strictly in order; each starts only after the previous completes. */
export function runSteps(steps: Step[], ctx: PipelineContext): Observable<PipelineEvent> {
  return concat(...steps.map((step) => step.run(ctx)));
}

/**
 * Bounded-concurrency helpers shared by the pipeline stages.
 */

export interface LimitOptions {
  /** Queue ahead of everything already waiting. */
  front?: boolean;
}

export type Limiter = <T>(fn: () => Promise<T>, options?: LimitOptions) => Promise<T>;

/**
 * Limits the concurrency of async operations. Thunks run in FIFO order
 * as slots free up, except that `front` thunks jump the queue.
 */
export function pLimit(concurrency: number): Limiter {
  if (!(Number.isInteger(concurrency) && concurrency > 0)) {
    throw new TypeError("Expected `concurrency` to be an integer from 1 and up");
  }

  const queue: (() => void)[] = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    const nextFn = queue.shift();
    if (nextFn) nextFn();
  };

  return <T>(fn: () => Promise<T>, options: LimitOptions = {}): Promise<T> => {
    const execute = async (): Promise<T> => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        execute().then(resolve, reject);
      };
      if (options.front) queue.unshift(run);
      else queue.push(run);
    });
  };
}

export interface ParallelExecutorOptions<T> {
  concurrency?: number;
  /** No new items are started once this is aborted. */
  signal?: AbortSignal;
  onTaskStart?: (item: T) => void;
  onTaskComplete?: (item: T) => void;
  onTaskError?: (item: T, error: Error) => void;
}

export interface ParallelResult {
  completed: number;
  failed: number;
  skipped: number;
  errors: Array<{ id: string; error: Error }>;
}

/**
 * Execute tasks in parallel with configurable concurrency. A failing task
 * never stops its siblings; failures are collected in the result.
 */
export async function runParallel<T>(
  items: T[],
  getId: (item: T) => string,
  execute: (item: T) => Promise<void>,
  options: ParallelExecutorOptions<T> = {}
): Promise<ParallelResult> {
  const { concurrency = 4, signal, onTaskStart, onTaskComplete, onTaskError } = options;

  const queue = [...items];
  const errors: Array<{ id: string; error: Error }> = [];
  let completed = 0;
  let failed = 0;
  let running = 0;

  return new Promise((resolve) => {
    function finishIfIdle(): void {
      if (running === 0 && (queue.length === 0 || signal?.aborted)) {
        resolve({ completed, failed, skipped: queue.length, errors });
      }
    }

    function tryStartNext(): void {
      while (running < concurrency && queue.length > 0 && !signal?.aborted) {
        const item = queue.shift();
        if (item === undefined) break;
        const id = getId(item);
        running++;

        onTaskStart?.(item);

        execute(item)
          .then(() => {
            completed++;
            onTaskComplete?.(item);
          })
          .catch((err: unknown) => {
            failed++;
            const error = err instanceof Error ? err : new Error(String(err));
            errors.push({ id, error });
            onTaskError?.(item, error);
          })
          .finally(() => {
            running--;
            tryStartNext();
            finishIfIdle();
          });
      }
    }

    tryStartNext();
    finishIfIdle();
  });
}

/**
 * Run tasks on a bounded pool where a thrown error means the whole batch
 * must stop: no further tasks start, tasks already running finish, and the
 * first error is rethrown. Tasks record their own recoverable failures.
 */
export async function runPool<T>(
  items: T[],
  getId: (item: T) => string,
  execute: (item: T) => Promise<void>,
  options: { concurrency: number; signal?: AbortSignal }
): Promise<ParallelResult> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (options.signal?.aborted) controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const failure: { error?: Error } = {};
  try {
    const result = await runParallel(items, getId, execute, {
      concurrency: options.concurrency,
      signal: controller.signal,
      onTaskError: (_item, error) => {
        failure.error ??= error;
        controller.abort();
      },
    });
    if (failure.error) throw failure.error;
    return result;
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }
}

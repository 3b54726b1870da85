/**
 * Options for parallel worker processing.
 */
export interface ParallelWorkerOptions {
  /** Number of parallel workers */
  concurrency: number;
  /** Optional: Check if processing should stop early (e.g., shutdown signal) */
  shouldContinue?: (() => boolean) | undefined;
  /** Optional: Called when a worker encounters an error */
  onError?: ((error: unknown, taskIndex: number) => void) | undefined;
  /** Optional: Errors for which every worker stops picking up new tasks */
  isFatal?: ((error: unknown) => boolean) | undefined;
}

/**
 * Result of parallel processing.
 */
export interface ParallelWorkerResult<T> {
  /** One slot per task, in task order; undefined where the task failed or never ran */
  slots: (T | undefined)[];
  errors: { index: number; error: unknown }[];
  /** The fatal error that stopped the pool, if any */
  stoppedBy: { index: number; error: unknown } | undefined;
}

/**
 * Processes tasks with a bounded number of concurrent workers.
 *
 * Results are written into pre-sized slots addressed by task index, so the
 * output order is the input order no matter which task finishes first.
 *
 * @example
 * ```typescript
 * const { slots } = await parallelProcess(
 *   lectures,
 *   async (lecture) => fetchManifest(lecture.id),
 *   { concurrency: 4 }
 * );
 * ```
 */
export async function parallelProcess<TTask, TResult>(
  tasks: readonly TTask[],
  processor: (task: TTask, index: number) => Promise<TResult>,
  options: ParallelWorkerOptions
): Promise<ParallelWorkerResult<TResult>> {
  const { shouldContinue = () => true, onError, isFatal = () => false } = options;
  const workerCount = Math.max(1, Math.min(options.concurrency, tasks.length));

  // Results array (maintains order)
  const slots: (TResult | undefined)[] = new Array<TResult | undefined>(tasks.length).fill(
    undefined
  );
  const errors: { index: number; error: unknown }[] = [];
  let stoppedBy: { index: number; error: unknown } | undefined;

  // Task queue with indices
  const taskQueue: { task: TTask; index: number }[] = tasks.map((task, index) => ({
    task,
    index,
  }));

  // Worker function
  const runWorker = async (): Promise<void> => {
    while (!stoppedBy && shouldContinue() && taskQueue.length > 0) {
      const item = taskQueue.shift();
      if (!item) break;

      try {
        slots[item.index] = await processor(item.task, item.index);
      } catch (error) {
        errors.push({ index: item.index, error });
        onError?.(error, item.index);
        if (!stoppedBy && isFatal(error)) {
          stoppedBy = { index: item.index, error };
        }
      }
    }
  };

  // Start all workers
  const workers = Array.from({ length: tasks.length === 0 ? 0 : workerCount }, () => runWorker());
  await Promise.all(workers);

  return { slots, errors, stoppedBy };
}

/**
 * Worker Pool
 *
 * N workers continuously pull tasks from a shared queue. Results come back
 * in original task order regardless of completion order.
 */

const DEFAULT_CONCURRENCY = 3

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

export interface WorkerProgressInfo<R> {
  /** Task index (0-based) */
  readonly index: number
  readonly total: number
  /** Number of finished tasks so far, failures included */
  readonly completed: number
  readonly result: R
}

export interface WorkerPoolOptions<R> {
  /** Number of concurrent workers (default 3) */
  readonly concurrency?: number | undefined
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
}

export interface WorkerPoolResult<R> {
  /** Successful results in original order */
  readonly successes: R[]
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
}

/**
 * Run tasks through a worker pool. A failing task is recorded and the
 * remaining tasks keep running.
 */
export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<R> = {}
): Promise<WorkerPoolResult<R>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY))
  const results = new Map<number, R>()
  const errors: Array<{ index: number; error: Error }> = []

  let nextIndex = 0
  let completed = 0

  async function worker(): Promise<void> {
    for (;;) {
      const index = nextIndex++
      if (index >= tasks.length) return
      const task = tasks[index]
      if (task === undefined) return

      try {
        const result = await processor(task, index)
        results.set(index, result)
        completed++
        options.onProgress?.({ index, total: tasks.length, completed, result })
      } catch (e) {
        errors.push({ index, error: e instanceof Error ? e : new Error(String(e)) })
        completed++
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  const successes: R[] = []
  for (let i = 0; i < tasks.length; i++) {
    if (results.has(i)) {
      const result = results.get(i)
      if (result !== undefined) successes.push(result)
    }
  }
  errors.sort((a, b) => a.index - b.index)

  return { successes, errors }
}

import type { Segment, SegmentSummary } from '../types'
import { runWorkerPool, type WorkerProgressInfo } from '../worker-pool'
import type { Summarizer } from './types'

export const DEFAULT_MAX_SEGMENTS = 3
export const DEFAULT_SUMMARY_CONCURRENCY = 3

export interface SummarizeSegmentsOptions {
  /** Summarize only the first N segments; 0 means all (default 3) */
  readonly maxSegments?: number | undefined
  readonly concurrency?: number | undefined
  readonly onProgress?: ((info: WorkerProgressInfo<SegmentSummary>) => void) | undefined
}

export interface SummarizeSegmentsResult {
  /** In segment order */
  readonly summaries: SegmentSummary[]
  readonly errors: ReadonlyArray<{ readonly segmentId: string; readonly message: string }>
}

/**
 * Summarize segments through the worker pool, preserving segment order.
 */
export async function summarizeSegments(
  segments: readonly Segment[],
  summarizer: Summarizer,
  options: SummarizeSegmentsOptions = {}
): Promise<SummarizeSegmentsResult> {
  const maxSegments = options.maxSegments ?? DEFAULT_MAX_SEGMENTS
  const selected = maxSegments > 0 ? segments.slice(0, maxSegments) : segments

  const { successes, errors } = await runWorkerPool(
    selected,
    (segment) => summarizer.summarize(segment),
    {
      concurrency: options.concurrency ?? DEFAULT_SUMMARY_CONCURRENCY,
      onProgress: options.onProgress
    }
  )

  return {
    summaries: successes,
    errors: errors.map(({ index, error }) => ({
      segmentId: selected[index]?.segment_id ?? `#${index}`,
      message: error.message
    }))
  }
}

/**
 * Summarizer Types
 */

import type { ResponseCache } from '../caching/types'
import type { FetchFn } from '../http'
import type { ApiError, Segment, SegmentSummary } from '../types'

/**
 * Turns a segment into a summary. Implementations never mutate the segment.
 */
export interface Summarizer {
  readonly name: string
  summarize(segment: Segment): Promise<SegmentSummary>
}

export interface RetryInfo {
  readonly segmentId: string
  /** 1-based attempt that just failed */
  readonly attempt: number
  readonly delayMs: number
  readonly error: ApiError
}

export interface FallbackInfo {
  readonly segmentId: string
  readonly error: ApiError
}

export interface CacheErrorInfo {
  readonly segmentId: string
  readonly operation: 'read' | 'write'
  readonly message: string
}

export interface ModelSummarizerConfig {
  readonly apiKey: string
  /** Default: gpt-4o-mini */
  readonly model?: string | undefined
  /** OpenAI-compatible chat completions endpoint */
  readonly endpoint?: string | undefined
  /** Total attempts per segment on rate limits (default 3) */
  readonly maxAttempts?: number | undefined
  /** First backoff delay; doubles per attempt (default 1000) */
  readonly baseDelayMs?: number | undefined
  readonly cache?: ResponseCache | undefined
  /** Used when the model call fails (default: TemplateSummarizer) */
  readonly fallback?: Summarizer | undefined
  readonly fetch?: FetchFn | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly onRetry?: ((info: RetryInfo) => void) | undefined
  readonly onFallback?: ((info: FallbackInfo) => void) | undefined
  /** A failed read counts as a miss; a failed write still returns the summary */
  readonly onCacheError?: ((info: CacheErrorInfo) => void) | undefined
}

/**
 * Model-backed Summarizer
 *
 * Calls an OpenAI-compatible chat completions endpoint. Rate limits are
 * retried with exponential backoff; anything else, or running out of
 * attempts, falls back to the template summary. `summarize` never rejects
 * because of an API or cache failure.
 */

import { generateSummaryCacheKey } from '../caching/key'
import type { CachedResponse } from '../caching/types'
import {
  emptyResponseError,
  type FetchFn,
  handleHttpError,
  handleNetworkError,
  httpFetch
} from '../http'
import type { ApiError, Result, Segment, SegmentSummary } from '../types'
import { buildSummaryPrompt, PROMPT_VERSION } from './prompt'
import { buildSummary, TemplateSummarizer } from './template'
import type { CacheErrorInfo, ModelSummarizerConfig, Summarizer } from './types'

export const DEFAULT_SUMMARY_MODEL = 'gpt-4o-mini'
export const DEFAULT_ENDPOINT = 'https://api.openai.com/v1/chat/completions'
const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_BASE_DELAY_MS = 1000
const MAX_COMPLETION_TOKENS = 1000

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Pull `choices[0].message.content` out of a completion response.
 */
function readCompletionText(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return null
  const { choices } = data
  if (!Array.isArray(choices)) return null

  const first: unknown = choices[0]
  if (typeof first !== 'object' || first === null || !('message' in first)) return null
  const { message } = first
  if (typeof message !== 'object' || message === null || !('content' in message)) return null

  return typeof message.content === 'string' && message.content.trim() ? message.content : null
}

export class OpenAISummarizer implements Summarizer {
  readonly name: string
  private readonly model: string
  private readonly endpoint: string
  private readonly maxAttempts: number
  private readonly baseDelayMs: number
  private readonly fallback: Summarizer
  private readonly fetchFn: FetchFn
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly config: ModelSummarizerConfig) {
    this.model = config.model ?? DEFAULT_SUMMARY_MODEL
    this.name = this.model
    this.endpoint = config.endpoint ?? DEFAULT_ENDPOINT
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
    this.baseDelayMs = config.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
    this.fallback = config.fallback ?? new TemplateSummarizer()
    this.fetchFn = config.fetch ?? httpFetch
    this.sleep = config.sleep ?? defaultSleep
  }

  async summarize(segment: Segment): Promise<SegmentSummary> {
    const prompt = buildSummaryPrompt(segment)
    const cacheKey = generateSummaryCacheKey('openai', this.model, segment, PROMPT_VERSION)

    const cached = await this.readCache(cacheKey, segment.segment_id)
    if (cached) {
      return buildSummary(segment, cached.data, true)
    }

    const result = await this.completeWithRetry(prompt, segment.segment_id)
    if (!result.ok) {
      this.config.onFallback?.({ segmentId: segment.segment_id, error: result.error })
      return this.fallback.summarize(segment)
    }

    await this.writeCache(cacheKey, result.value, prompt, segment.segment_id)

    return buildSummary(segment, result.value, true)
  }

  private reportCacheError(
    segmentId: string,
    operation: CacheErrorInfo['operation'],
    error: unknown
  ): void {
    const message = error instanceof Error ? error.message : String(error)
    this.config.onCacheError?.({ segmentId, operation, message })
  }

  private async readCache(key: string, segmentId: string): Promise<CachedResponse | null> {
    const { cache } = this.config
    if (!cache) return null
    try {
      return await cache.get(key)
    } catch (error) {
      this.reportCacheError(segmentId, 'read', error)
      return null
    }
  }

  private async writeCache(key: string, text: string, prompt: string, segmentId: string): Promise<void> {
    const { cache } = this.config
    if (!cache) return
    try {
      await cache.set(key, { data: text, cachedAt: Date.now() })
      await cache.setPrompt?.(key, prompt)
    } catch (error) {
      this.reportCacheError(segmentId, 'write', error)
    }
  }

  /**
   * Backoff before retry `attempt` (1-based): base * 2^(attempt-1), or the
   * server's retry-after when that is longer.
   */
  private backoffDelay(attempt: number, error: ApiError): number {
    const exponential = this.baseDelayMs * 2 ** (attempt - 1)
    const retryAfterMs = (error.retryAfter ?? 0) * 1000
    return Math.max(exponential, retryAfterMs)
  }

  private async completeWithRetry(prompt: string, segmentId: string): Promise<Result<string>> {
    let result: Result<string> = await this.complete(prompt)

    for (let attempt = 1; attempt < this.maxAttempts; attempt++) {
      if (result.ok || result.error.type !== 'rate_limit') return result

      const delayMs = this.backoffDelay(attempt, result.error)
      this.config.onRetry?.({ segmentId, attempt, delayMs, error: result.error })
      await this.sleep(delayMs)
      result = await this.complete(prompt)
    }

    return result
  }

  private async complete(prompt: string): Promise<Result<string>> {
    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_completion_tokens: MAX_COMPLETION_TOKENS
        })
      })

      if (!response.ok) return handleHttpError(response)

      const text = readCompletionText(await response.json())
      return text ? { ok: true, value: text.trim() } : emptyResponseError()
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

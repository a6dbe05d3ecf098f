/**
 * Summarizer Module
 *
 * Segment summaries behind the `Summarizer` interface. The pipeline depends
 * only on the interface; pick an implementation with `createSummarizer`.
 */

import { OpenAISummarizer } from './openai'
import { TemplateSummarizer } from './template'
import type { ModelSummarizerConfig, Summarizer } from './types'

export {
  DEFAULT_MAX_SEGMENTS,
  DEFAULT_SUMMARY_CONCURRENCY,
  type SummarizeSegmentsOptions,
  type SummarizeSegmentsResult,
  summarizeSegments
} from './batch'
export { DEFAULT_ENDPOINT, DEFAULT_SUMMARY_MODEL, OpenAISummarizer } from './openai'
export { buildSummaryPrompt, PROMPT_VERSION } from './prompt'
export { buildSummary, TemplateSummarizer, templateSummaryText } from './template'
export { formatTimeframe } from './timeframe'
export type {
  CacheErrorInfo,
  FallbackInfo,
  ModelSummarizerConfig,
  RetryInfo,
  Summarizer
} from './types'

/**
 * Model-backed summarizer when an API key is available, template otherwise.
 */
export function createSummarizer(
  config: Omit<ModelSummarizerConfig, 'apiKey'> & { readonly apiKey?: string | undefined }
): Summarizer {
  const { apiKey } = config
  if (!apiKey) {
    return new TemplateSummarizer()
  }
  return new OpenAISummarizer({ ...config, apiKey })
}

import { describe, expect, it, vi } from 'vitest'
import type { CachedResponse, ResponseCache } from '../caching/types'
import type { FetchFn } from '../http'
import { completionResponse, createMockResponse } from '../test-support/http'
import { makeSegment } from '../test-support/records'
import { createSummarizer, summarizeSegments } from './index'
import { DEFAULT_ENDPOINT, OpenAISummarizer } from './openai'
import { TemplateSummarizer } from './template'
import type { CacheErrorInfo, FallbackInfo, RetryInfo } from './types'

class MemoryCache implements ResponseCache {
  readonly entries = new Map<string, CachedResponse>()
  readonly prompts = new Map<string, string>()

  async get(key: string): Promise<CachedResponse | null> {
    return this.entries.get(key) ?? null
  }

  async set(key: string, response: CachedResponse): Promise<void> {
    this.entries.set(key, response)
  }

  async setPrompt(key: string, prompt: string): Promise<void> {
    this.prompts.set(key, prompt)
  }
}

class FailingCache extends MemoryCache {
  constructor(private readonly failing: 'get' | 'set') {
    super()
  }

  override async get(key: string): Promise<CachedResponse | null> {
    if (this.failing === 'get') throw new Error('EIO')
    return super.get(key)
  }

  override async set(key: string, response: CachedResponse): Promise<void> {
    if (this.failing === 'set') throw new Error('EACCES')
    return super.set(key, response)
  }
}

const segment = makeSegment([
  ['2025-02-27T18:20:00Z', 'Me'],
  ['2025-02-27T18:30:00Z', 'Alex']
])

function sequenceFetch(...responses: Array<ReturnType<typeof completionResponse>>) {
  const fetch = vi.fn<FetchFn>()
  for (const response of responses) {
    fetch.mockResolvedValueOnce(response)
  }
  return fetch
}

function createTestSummarizer(
  fetch: FetchFn,
  extra: { cache?: ResponseCache; onCacheError?: (info: CacheErrorInfo) => void } = {}
) {
  const sleep = vi.fn(async (_ms: number) => {})
  const onRetry = vi.fn<(info: RetryInfo) => void>()
  const onFallback = vi.fn<(info: FallbackInfo) => void>()
  const summarizer = new OpenAISummarizer({
    apiKey: 'test-secret',
    fetch,
    sleep,
    onRetry,
    onFallback,
    ...extra
  })
  return { summarizer, sleep, onRetry, onFallback }
}

describe('OpenAISummarizer', () => {
  it('returns the trimmed model summary', async () => {
    const fetch = sequenceFetch(completionResponse('  They planned dinner.  '))
    const { summarizer } = createTestSummarizer(fetch)

    const summary = await summarizer.summarize(segment)

    expect(summary.summary).toBe('They planned dinner.')
    expect(summary.generated_by_model).toBe(true)
    expect(summary.segment_id).toBe('segment_0001')
    expect(summary.timeframe).toBe('06:20 PM - 06:30 PM')
  })

  it('posts a chat completion request with the API key', async () => {
    const fetch = sequenceFetch(completionResponse('ok'))
    const { summarizer } = createTestSummarizer(fetch)

    await summarizer.summarize(segment)

    expect(fetch).toHaveBeenCalledTimes(1)
    const call = fetch.mock.calls[0]
    const init = call?.[1]
    expect(call?.[0]).toBe(DEFAULT_ENDPOINT)
    expect(init?.method).toBe('POST')
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret'
    })
    const body: unknown = JSON.parse(String(init?.body))
    expect(body).toMatchObject({ model: 'gpt-4o-mini', max_completion_tokens: 1000 })
  })

  it('retries rate limits, honouring a longer retry-after', async () => {
    const fetch = sequenceFetch(
      createMockResponse(429, 'slow down', { 'retry-after': '2' }),
      completionResponse('Second time lucky.')
    )
    const { summarizer, sleep, onRetry } = createTestSummarizer(fetch)

    const summary = await summarizer.summarize(segment)

    expect(summary.summary).toBe('Second time lucky.')
    expect(sleep).toHaveBeenCalledWith(2000)
    expect(onRetry).toHaveBeenCalledWith(
      expect.objectContaining({ segmentId: 'segment_0001', attempt: 1, delayMs: 2000 })
    )
  })

  it('falls back to the template after exhausting rate-limit retries', async () => {
    const fetch = sequenceFetch(
      createMockResponse(429, 'slow down'),
      createMockResponse(429, 'slow down'),
      createMockResponse(429, 'slow down')
    )
    const { summarizer, sleep, onFallback } = createTestSummarizer(fetch)

    const summary = await summarizer.summarize(segment)

    expect(fetch).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000])
    expect(summary).toEqual(await new TemplateSummarizer().summarize(segment))
    expect(onFallback).toHaveBeenCalledTimes(1)
    expect(onFallback.mock.calls[0]?.[0].error.type).toBe('rate_limit')
  })

  it('falls back without retrying other API errors', async () => {
    const fetch = sequenceFetch(createMockResponse(401, 'bad key'))
    const { summarizer, sleep, onFallback } = createTestSummarizer(fetch)

    const summary = await summarizer.summarize(segment)

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
    expect(summary.generated_by_model).toBe(false)
    expect(onFallback.mock.calls[0]?.[0].error.type).toBe('auth')
  })

  it('falls back on network failures and empty responses', async () => {
    const failing = vi.fn<FetchFn>().mockRejectedValue(new Error('ECONNREFUSED'))
    const empty = sequenceFetch(completionResponse('   '))

    const afterFailure = await createTestSummarizer(failing).summarizer.summarize(segment)
    const afterEmpty = await createTestSummarizer(empty).summarizer.summarize(segment)

    expect(afterFailure.generated_by_model).toBe(false)
    expect(afterEmpty.generated_by_model).toBe(false)
  })

  it('serves repeated segments from the cache', async () => {
    const cache = new MemoryCache()
    const fetch = sequenceFetch(completionResponse('Cached summary.'))
    const { summarizer } = createTestSummarizer(fetch, { cache })

    const first = await summarizer.summarize(segment)
    const second = await summarizer.summarize(segment)

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(second).toEqual(first)
    expect(cache.entries.size).toBe(1)
    expect([...cache.prompts.values()][0]).toContain('- Me: ')
  })

  it('does not cache fallback summaries', async () => {
    const cache = new MemoryCache()
    const { summarizer } = createTestSummarizer(sequenceFetch(createMockResponse(500, 'boom')), {
      cache
    })

    await summarizer.summarize(segment)

    expect(cache.entries.size).toBe(0)
  })
})

describe('OpenAISummarizer cache failures', () => {
  it('treats a failed cache read as a miss', async () => {
    const onCacheError = vi.fn<(info: CacheErrorInfo) => void>()
    const fetch = sequenceFetch(completionResponse('Fresh summary.'))
    const { summarizer } = createTestSummarizer(fetch, {
      cache: new FailingCache('get'),
      onCacheError
    })

    const summary = await summarizer.summarize(segment)

    expect(summary.summary).toBe('Fresh summary.')
    expect(summary.generated_by_model).toBe(true)
    expect(onCacheError).toHaveBeenCalledWith({
      segmentId: 'segment_0001',
      operation: 'read',
      message: 'EIO'
    })
  })

  it('returns the model summary when the cache write fails', async () => {
    const onCacheError = vi.fn<(info: CacheErrorInfo) => void>()
    const fetch = sequenceFetch(completionResponse('Kept summary.'))
    const { summarizer } = createTestSummarizer(fetch, {
      cache: new FailingCache('set'),
      onCacheError
    })

    const result = await summarizeSegments([segment], summarizer)

    expect(result.errors).toEqual([])
    expect(result.summaries.map((s) => s.summary)).toEqual(['Kept summary.'])
    expect(onCacheError).toHaveBeenCalledWith({
      segmentId: 'segment_0001',
      operation: 'write',
      message: 'EACCES'
    })
  })
})

describe('createSummarizer', () => {
  it('uses templates without an API key', () => {
    expect(createSummarizer({ apiKey: undefined }).name).toBe('template')
  })

  it('uses the model with an API key', () => {
    expect(createSummarizer({ apiKey: 'test-secret', model: 'gpt-4o' }).name).toBe('gpt-4o')
  })
})

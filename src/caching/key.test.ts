import { describe, expect, it } from 'vitest'
import { makeSegment } from '../test-support/records'
import { generateCacheKey, generateSummaryCacheKey } from './key'

describe('Cache keys', () => {
  it('is deterministic regardless of payload key order', () => {
    const a = generateCacheKey({ service: 'openai', model: 'm', payload: { x: 1, y: [1, 2] } })
    const b = generateCacheKey({ service: 'openai', model: 'm', payload: { y: [1, 2], x: 1 } })
    expect(a).toBe(b)
    expect(a).toMatch(/^[0-9a-f]{64}$/)
  })

  it('differs by service, model and payload', () => {
    const base = { service: 'openai', model: 'm', payload: { x: 1 } }
    const key = generateCacheKey(base)
    expect(generateCacheKey({ ...base, service: 'other' })).not.toBe(key)
    expect(generateCacheKey({ ...base, model: 'n' })).not.toBe(key)
    expect(generateCacheKey({ ...base, payload: { x: 2 } })).not.toBe(key)
  })

  it('keys summaries on message fingerprints and prompt version', () => {
    const segment = makeSegment([
      ['2025-02-27T10:00:00Z', 'Me'],
      ['2025-02-27T10:05:00Z', 'Alex']
    ])
    const key = generateSummaryCacheKey('openai', 'm', segment, 'v1')
    expect(generateSummaryCacheKey('openai', 'm', { ...segment, segment_id: 'segment_0009' }, 'v1')).toBe(key)
    expect(generateSummaryCacheKey('openai', 'm', segment, 'v2')).not.toBe(key)
    expect(
      generateSummaryCacheKey('openai', 'm', { ...segment, messages: segment.messages.slice(1) }, 'v1')
    ).not.toBe(key)
  })
})

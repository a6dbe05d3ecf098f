/**
 * Cache Key Generation
 *
 * Deterministic SHA256 keys for response caching.
 */

import { createHash } from 'node:crypto'
import { canonicalJson } from '../fingerprint/canonical'
import type { CacheKeyComponents } from './types'

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:canonical_payload
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const input = `${service}:${model}:${canonicalJson(payload)}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Cache key for a segment summary. Keyed on the fingerprints of the
 * segment's messages, so any change in content invalidates it.
 */
export function generateSummaryCacheKey(
  service: string,
  model: string,
  segment: { readonly segment_id: string; readonly messages: readonly { fingerprint: string }[] },
  promptVersion: string
): string {
  return generateCacheKey({
    service,
    model,
    payload: {
      promptVersion,
      messages: segment.messages.map((m) => m.fingerprint)
    }
  })
}

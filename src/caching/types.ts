/**
 * Response Caching Types
 *
 * Pluggable cache for model responses, so re-running a summarize over the
 * same segments does not pay for the same call twice.
 */

/**
 * Cached response text with metadata
 */
export interface CachedResponse {
  readonly data: string
  readonly cachedAt: number
}

/**
 * Pluggable cache interface for API responses. Entries never expire.
 */
export interface ResponseCache {
  /**
   * @param key - SHA256 hash of the request
   * @returns Cached response or null if not found
   */
  get(key: string): Promise<CachedResponse | null>

  set(key: string, response: CachedResponse): Promise<void>

  /**
   * Store prompt text for debugging (optional).
   * Saved alongside the cached response as .prompt.txt
   */
  setPrompt?(key: string, prompt: string): Promise<void>
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Service name, e.g. 'openai' */
  readonly service: string
  /** Model name */
  readonly model: string
  /** Request payload (serialized canonically) */
  readonly payload: unknown
}

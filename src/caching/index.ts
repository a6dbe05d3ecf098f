/**
 * Cache Module
 *
 * Response caching for external model calls.
 */

export { FilesystemCache } from './filesystem'
export { generateCacheKey, generateSummaryCacheKey } from './key'
export type { CachedResponse, CacheKeyComponents, ResponseCache } from './types'

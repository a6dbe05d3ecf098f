/**
 * Filesystem-based Response Cache for CLI
 *
 * Stores cached responses as JSON files organized by hash prefix.
 * Cache entries never expire.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { CachedResponse, ResponseCache } from './types'

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'chat-segments')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/chat-segments/`
    )
  }
}

function readEntry(raw: string): CachedResponse | null {
  const entry: unknown = JSON.parse(raw)
  if (typeof entry !== 'object' || entry === null || !('response' in entry)) return null

  const { response } = entry
  if (typeof response !== 'object' || response === null) return null
  if (!('data' in response) || typeof response.data !== 'string') return null

  const cachedAt =
    'cachedAt' in response && typeof response.cachedAt === 'number' ? response.cachedAt : 0
  return { data: response.data, cachedAt }
}

/**
 * Filesystem-based cache implementation for CLI usage.
 *
 * Directory structure:
 * ```
 * <cacheDir>/responses/
 * ├── ab/
 * │   └── abcd1234...json
 * ```
 *
 * Uses first 2 chars of the key as subdirectory to avoid too many files in one dir.
 */
export class FilesystemCache implements ResponseCache {
  constructor(private readonly cacheDir: string) {
    guardAgainstUserCache(cacheDir)
  }

  async get(key: string): Promise<CachedResponse | null> {
    const path = this.getCachePath(key)

    if (!existsSync(path)) {
      return null
    }

    try {
      return readEntry(readFileSync(path, 'utf-8'))
    } catch (error) {
      // A truncated entry reads as a miss and is overwritten on the next set
      if (error instanceof SyntaxError) return null
      throw error
    }
  }

  async set(key: string, response: CachedResponse): Promise<void> {
    const path = this.getCachePath(key)
    mkdirSync(dirname(path), { recursive: true })

    writeFileSync(path, JSON.stringify({ response, cachedAt: Date.now() }, null, 2))
  }

  async setPrompt(key: string, prompt: string): Promise<void> {
    const promptPath = this.getCachePath(key).replace(/\.json$/, '.prompt.txt')
    mkdirSync(dirname(promptPath), { recursive: true })

    writeFileSync(promptPath, prompt)
  }

  /**
   * Clear all cached entries (for testing or manual cleanup)
   */
  async clear(): Promise<void> {
    rmSync(join(this.cacheDir, 'responses'), { recursive: true, force: true })
  }

  private getCachePath(key: string): string {
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, 'responses', prefix, `${key}.json`)
  }
}

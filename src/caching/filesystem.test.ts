import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FilesystemCache } from './filesystem'
import type { CachedResponse } from './types'

describe('FilesystemCache', () => {
  let testDir: string
  let cache: FilesystemCache

  beforeEach(() => {
    testDir = join(tmpdir(), `cache-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    cache = new FilesystemCache(testDir)
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('get', () => {
    it('should return null for non-existent key', async () => {
      expect(await cache.get('nonexistent')).toBeNull()
    })

    it('should return cached value', async () => {
      const response: CachedResponse = { data: 'test data', cachedAt: 1700000000000 }
      await cache.set('abc123', response)
      expect(await cache.get('abc123')).toEqual(response)
    })

    it('should treat a truncated entry as a miss', async () => {
      const dir = join(testDir, 'responses', 'ba')
      mkdirSync(dir, { recursive: true })
      writeFileSync(join(dir, 'bad123.json'), '{"response": {"da')
      expect(await cache.get('bad123')).toBeNull()
    })

    it('should treat an entry of the wrong shape as a miss', async () => {
      const dir = join(testDir, 'responses', 'sh')
      mkdirSync(dir, { recursive: true })
      writeFileSync(join(dir, 'shape1.json'), JSON.stringify({ response: { data: 42 } }))
      expect(await cache.get('shape1')).toBeNull()
    })
  })

  describe('set', () => {
    it('should store entries under a two-character prefix directory', async () => {
      await cache.set('newdir123', { data: 'test', cachedAt: 1 })
      expect(existsSync(join(testDir, 'responses', 'ne', 'newdir123.json'))).toBe(true)
    })

    it('should overwrite existing entries', async () => {
      await cache.set('key1', { data: 'first', cachedAt: 1 })
      await cache.set('key1', { data: 'second', cachedAt: 2 })
      expect((await cache.get('key1'))?.data).toBe('second')
    })
  })

  describe('setPrompt', () => {
    it('should save the prompt beside the response', async () => {
      await cache.setPrompt('prompt1', 'Summarize this')
      const path = join(testDir, 'responses', 'pr', 'prompt1.prompt.txt')
      expect(readFileSync(path, 'utf-8')).toBe('Summarize this')
    })
  })

  describe('clear', () => {
    it('should remove all entries', async () => {
      await cache.set('key1', { data: 'a', cachedAt: 1 })
      await cache.clear()
      expect(await cache.get('key1')).toBeNull()
    })
  })

  it('should refuse the real user cache directory under test', () => {
    expect(() => new FilesystemCache(join(homedir(), '.cache', 'chat-segments'))).toThrow(
      /TEST ERROR/
    )
  })
})

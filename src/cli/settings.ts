/**
 * Effective run settings: CLI flags override the config file, the config
 * file overrides defaults.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_SCHEMA_VERSION, DEFAULT_SOURCE_DEVICE_ID } from '../normalizer/index'
import { DEFAULT_WINDOW_HOURS } from '../segmenter/index'
import {
  DEFAULT_MAX_SEGMENTS,
  DEFAULT_SUMMARY_CONCURRENCY,
  DEFAULT_SUMMARY_MODEL
} from '../summarizer/index'
import type { CLIArgs } from './args'
import type { Config } from './config'

export interface Settings {
  readonly windowHours: number
  readonly schemaVersion: string
  readonly sourceDeviceId: string
  readonly model: string
  readonly cacheDir: string
  readonly outputDir: string | undefined
  readonly maxSegments: number
  readonly summaryConcurrency: number
  readonly noCache: boolean
  readonly apiKey: string | undefined
}

export function getDefaultCacheDir(): string {
  return join(homedir(), '.cache', 'chat-segments')
}

/**
 * Cache dir priority: --cache-dir > CHAT_SEGMENTS_CACHE_DIR > config > default.
 */
export function resolveSettings(
  args: CLIArgs,
  config: Config | null,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  return {
    windowHours: args.windowHours ?? config?.windowHours ?? DEFAULT_WINDOW_HOURS,
    schemaVersion: args.schemaVersion ?? config?.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
    sourceDeviceId: args.sourceDeviceId ?? config?.sourceDeviceId ?? DEFAULT_SOURCE_DEVICE_ID,
    model: args.model ?? config?.model ?? DEFAULT_SUMMARY_MODEL,
    cacheDir:
      args.cacheDir ?? env.CHAT_SEGMENTS_CACHE_DIR ?? config?.cacheDir ?? getDefaultCacheDir(),
    outputDir: args.outputDir ?? config?.outputDir,
    maxSegments: args.maxSegments ?? config?.maxSegments ?? DEFAULT_MAX_SEGMENTS,
    summaryConcurrency: config?.summaryConcurrency ?? DEFAULT_SUMMARY_CONCURRENCY,
    noCache: args.noCache,
    apiKey: env.OPENAI_API_KEY || undefined
  }
}

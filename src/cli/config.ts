/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/chat-segments/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or CHAT_SEGMENTS_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { ConfigError } from '../errors'

/** Config keys that accept string values */
const STRING_KEYS = ['schemaVersion', 'sourceDeviceId', 'model', 'cacheDir', 'outputDir'] as const
/** Config keys that accept number values */
const NUMBER_KEYS = ['windowHours', 'maxSegments', 'summaryConcurrency'] as const

type StringConfigKey = (typeof STRING_KEYS)[number]
type NumberConfigKey = (typeof NUMBER_KEYS)[number]

/** Valid config keys for type-safe access */
export type ConfigKey = StringConfigKey | NumberConfigKey

/**
 * All persistable CLI settings.
 */
export type Config = { [K in StringConfigKey]?: string } & { [K in NumberConfigKey]?: number } & {
  /** When settings were last updated */
  updatedAt?: string
}

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  windowHours: 'Max gap between messages in one segment, in hours (default: 2)',
  schemaVersion: 'schema_version written to normalized records (default: 1.0)',
  sourceDeviceId: 'source_device_id written to normalized records (default: unknown)',
  model: 'Model used for summaries (default: gpt-4o-mini)',
  cacheDir: 'Cache directory path (default: ~/.cache/chat-segments)',
  outputDir: 'Output directory for the process command (default: next to the input)',
  maxSegments: 'Segments to summarize per run, 0 for all (default: 3)',
  summaryConcurrency: 'Concurrent summary requests (default: 3)'
}

function isStringKey(key: string): key is StringConfigKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberConfigKey {
  return NUMBER_KEYS.some((k) => k === key)
}

/**
 * Get the type of a config key.
 */
export function getConfigType(key: ConfigKey): string {
  return isNumberKey(key) ? 'number' : 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get the config file path.
 * Priority: configFile arg > CHAT_SEGMENTS_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CHAT_SEGMENTS_CONFIG) {
    return process.env.CHAT_SEGMENTS_CONFIG
  }
  return join(homedir(), '.config', 'chat-segments', 'config.json')
}

/**
 * Keep only known keys holding values of the right type.
 */
function readConfigObject(value: unknown): Config {
  const config: Config = {}
  if (typeof value !== 'object' || value === null) return config

  for (const [key, entry] of Object.entries(value)) {
    if (isStringKey(key) && typeof entry === 'string') {
      config[key] = entry
    } else if (isNumberKey(key) && typeof entry === 'number') {
      config[key] = entry
    } else if (key === 'updatedAt' && typeof entry === 'string') {
      config.updatedAt = entry
    }
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError when the file is not valid JSON
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  try {
    return readConfigObject(JSON.parse(content))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid config file ${path}: ${message}`)
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws ConfigError for a number key given a non-numeric value
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  if (isNumberKey(key)) {
    const parsed = Number(value)
    if (value.trim() === '' || !Number.isFinite(parsed)) {
      throw new ConfigError(`${key} must be a number, got "${value}"`)
    }
    return parsed
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isNumberKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string | number,
  configFile?: string
): Promise<void> {
  const config: Config = (await loadConfig(configFile)) ?? {}
  if (isNumberKey(key)) {
    if (typeof value !== 'number') throw new ConfigError(`${key} must be a number`)
    config[key] = value
  } else {
    config[key] = String(value)
  }
  await saveConfig(config, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Config Command
 *
 * `config list` prints every known key with its current value, type and meaning.
 * `config set <key> <value>` and `config unset <key>` edit the persistent file.
 */

import { ConfigError } from '../../errors'
import type { CLIArgs, ConfigAction } from '../args'
import {
  type Config,
  type ConfigKey,
  formatConfigValue,
  getConfigDescription,
  getConfigPath,
  getConfigType,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

type ConfigHandler = (args: CLIArgs, logger: Logger) => Promise<void>

const HANDLERS: Record<ConfigAction, ConfigHandler> = {
  list: listConfig,
  set: setConfig,
  unset: unsetConfig
}

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  await HANDLERS[args.configAction](args, logger)
}

/**
 * One line per key: `  key = value` when set, `  key (type)` when not,
 * followed by the key's description.
 */
export function formatConfigListing(config: Config | null): string[] {
  const lines: string[] = []
  for (const key of getValidConfigKeys()) {
    const value = config?.[key]
    lines.push(
      value === undefined
        ? `  ${key} (${getConfigType(key)})`
        : `  ${key} = ${formatConfigValue(value)}`
    )
    lines.push(`      ${getConfigDescription(key)}`)
  }
  return lines
}

async function listConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile)
  logger.log(`Config file: ${getConfigPath(args.configFile)}`)
  if (config?.updatedAt) {
    logger.verbose(`Last updated ${config.updatedAt}`)
  }
  for (const line of formatConfigListing(config)) {
    logger.log(line)
  }
}

function requireKey(key: string | undefined, usage: string): ConfigKey {
  if (key === undefined || key === '') {
    throw new ConfigError(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new ConfigError(`Unknown config key "${key}". Known keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const usage = 'chat-segments config set <key> <value>'
  const key = requireKey(args.configKey, usage)
  if (args.configValue === undefined) {
    throw new ConfigError(`Missing value for ${key}. Usage: ${usage}`)
  }
  const value = parseConfigValue(key, args.configValue)
  await setConfigValue(key, value, args.configFile)
  logger.success(`${key} = ${formatConfigValue(value)}`)
}

async function unsetConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const key = requireKey(args.configKey, 'chat-segments config unset <key>')
  await unsetConfigValue(key, args.configFile)
  logger.success(`${key} unset`)
}

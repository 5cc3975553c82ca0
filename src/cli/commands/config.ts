/**
 * Config Command
 *
 * `config` lists effective settings; `config set|unset <key>` edits the
 * config file.
 */

import type { CLIArgs } from '../args'
import {
  type Config,
  type ConfigKey,
  DEFAULT_MAX_FILE_SIZE_MB,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

const DEFAULTS: Required<Omit<Config, 'updatedAt'>> = {
  dateOrder: 'auto',
  includeSystem: false,
  maxFileSizeMb: DEFAULT_MAX_FILE_SIZE_MB
}

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const { configFile } = args

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

/**
 * One line per key: the saved value, or the default marked as such.
 */
export function describeSettings(config: Config | null): string[] {
  return getValidConfigKeys().map((key) => {
    const saved = config?.[key]
    return saved === undefined
      ? `  ${key}: ${formatConfigValue(DEFAULTS[key])} (default)`
      : `  ${key}: ${formatConfigValue(saved)}`
  })
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)

  logger.log(`\nConfig file: ${getConfigPath(configFile)}${config ? '' : ' (not created yet)'}\n`)
  for (const line of describeSettings(config)) {
    logger.log(line)
  }
}

function requireConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const usage = 'transcript-lens config set <key> <value>'
  const validKey = requireConfigKey(key, usage)
  if (value === undefined) {
    throw new Error(`Missing value. Usage: ${usage}`)
  }
  const update = parseConfigValue(validKey, value)
  await setConfigValue(update, configFile)
  logger.log(`Set ${validKey}=${formatConfigValue(update[validKey])}`)
}

async function unsetConfig(key: string | undefined, configFile: string | undefined, logger: Logger): Promise<void> {
  const validKey = requireConfigKey(key, 'transcript-lens config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.log(`Unset ${validKey} (now ${formatConfigValue(DEFAULTS[validKey])})`)
}

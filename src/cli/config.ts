/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/transcript-lens/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or TRANSCRIPT_LENS_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { DateOrderOption } from '../types'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Day/month order for slash dates: auto, mdy or dmy */
  dateOrder?: DateOrderOption | undefined
  /** Include system notifications in text exports */
  includeSystem?: boolean | undefined
  /** Largest input file accepted, in megabytes */
  maxFileSizeMb?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

export const DEFAULT_MAX_FILE_SIZE_MB = 16

const CONFIG_KEYS: readonly ConfigKey[] = ['dateOrder', 'includeSystem', 'maxFileSizeMb']

const CONFIG_TYPES: Record<ConfigKey, string> = {
  dateOrder: 'string',
  includeSystem: 'boolean',
  maxFileSizeMb: 'number'
}

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  dateOrder: 'Day/month order for slash dates: auto, mdy, dmy (default: auto)',
  includeSystem: 'Include system notifications in text exports (default: false)',
  maxFileSizeMb: `Largest input file accepted in MB (default: ${DEFAULT_MAX_FILE_SIZE_MB})`
}

export function parseDateOrderOption(value: unknown): DateOrderOption | null {
  if (value === 'auto' || value === 'mdy' || value === 'dmy') {
    return value
  }
  return null
}

/**
 * Get the type of a config key for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  return CONFIG_TYPES[key]
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for transcript-lens.
 * Uses ~/.config/transcript-lens on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'transcript-lens')
}

/**
 * Get the config file path.
 * Priority: configFile arg > TRANSCRIPT_LENS_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.TRANSCRIPT_LENS_CONFIG) {
    return process.env.TRANSCRIPT_LENS_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep only known keys holding values of the right type.
 */
function readConfig(data: unknown): Config | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return null
  }
  const record: Record<string, unknown> = { ...data }
  const config: Config = {}

  const dateOrder = parseDateOrderOption(record.dateOrder)
  if (dateOrder) config.dateOrder = dateOrder
  if (typeof record.includeSystem === 'boolean') config.includeSystem = record.includeSystem
  if (typeof record.maxFileSizeMb === 'number' && record.maxFileSizeMb > 0) {
    config.maxFileSizeMb = record.maxFileSizeMb
  }
  if (typeof record.updatedAt === 'string') config.updatedAt = record.updatedAt

  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return readConfig(JSON.parse(content))
  } catch {
    return null
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
 * Parse a string value for a config key.
 *
 * @throws Error when the value is not valid for the key
 */
export function parseConfigValue(key: ConfigKey, value: string): Config {
  switch (key) {
    case 'dateOrder': {
      const dateOrder = parseDateOrderOption(value)
      if (!dateOrder) {
        throw new Error(`Invalid dateOrder: ${value}. Use auto, mdy or dmy`)
      }
      return { dateOrder }
    }
    case 'includeSystem':
      return { includeSystem: value === 'true' || value === '1' || value === 'yes' }
    case 'maxFileSizeMb': {
      const size = Number.parseFloat(value)
      if (!Number.isFinite(size) || size <= 0) {
        throw new Error(`Invalid maxFileSizeMb: ${value}. Use a positive number`)
      }
      return { maxFileSizeMb: size }
    }
  }
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...CONFIG_KEYS].sort()
}

/**
 * Merge parsed values into the config file and save.
 */
export async function setConfigValue(update: Config, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig({ ...config, ...update }, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

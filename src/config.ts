import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { DEFAULT_TTL_SECONDS } from './registry/types.js'
import { DEFAULT_RECEIVE_TIMEOUT_MS } from './receiver/types.js'

export interface Config {
  checksumTtlSeconds?: number
  registryTimeoutMs?: number
  receiveTimeoutMs?: number
  requestTimeoutMs?: number
  sweepIntervalMs?: number   // 0 disables the periodic sweep
}

export type Settings = Required<Config>

export interface ConfigValidationError {
  field: string
  message: string
}

export const DEFAULT_SETTINGS: Settings = {
  checksumTtlSeconds: DEFAULT_TTL_SECONDS,
  registryTimeoutMs: 5000,
  receiveTimeoutMs: DEFAULT_RECEIVE_TIMEOUT_MS,
  requestTimeoutMs: 30000,
  sweepIntervalMs: 0
}

type NumericField = keyof Config

const FIELD_RULES: Record<NumericField, { min: number; label: string }> = {
  checksumTtlSeconds: { min: 1, label: 'Checksum TTL' },
  registryTimeoutMs: { min: 1, label: 'Registry timeout' },
  receiveTimeoutMs: { min: 1, label: 'Receive timeout' },
  requestTimeoutMs: { min: 1, label: 'Request timeout' },
  sweepIntervalMs: { min: 0, label: 'Sweep interval' }
}

const FIELDS: NumericField[] = [
  'checksumTtlSeconds',
  'registryTimeoutMs',
  'receiveTimeoutMs',
  'requestTimeoutMs',
  'sweepIntervalMs'
]

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.NETCOPY_HOME ?? path.join(os.homedir(), '.netcopy')
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'config.json')
}

function validateField(field: NumericField, value: unknown): string | null {
  const rule = FIELD_RULES[field]
  if (typeof value !== 'number') return `${rule.label} must be a number`
  if (!Number.isInteger(value)) return `${rule.label} must be an integer`
  if (value < rule.min) return `${rule.label} must be at least ${rule.min}`
  return null
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config
  for (const field of FIELDS) {
    if (c[field] === undefined) continue
    const message = validateField(field, c[field])
    if (message) {
      errors.push({ field, message })
    }
  }

  return errors
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Keep only individually valid fields
function pickValid(parsed: Record<string, unknown>): Config {
  const config: Config = {}
  for (const field of FIELDS) {
    const value = parsed[field]
    if (typeof value === 'number' && !validateField(field, value)) {
      config[field] = value
    }
  }
  return config
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  try {
    if (!fs.existsSync(configPath)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'))
    const errors = validateConfig(parsed)
    if (errors.length > 0) {
      console.error(`Config validation errors in ${configPath}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }

    if (!isRecord(parsed)) return {}
    return pickValid(parsed)
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configPath}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, configPath: string = getConfigPath()): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true })
    fs.writeFileSync(configPath, JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined
  return parseInt(value, 10)
}

/**
 * Effective settings: environment overrides, then the config file, then
 * defaults. Invalid environment values are ignored.
 */
export function resolveSettings(config: Config, env: NodeJS.ProcessEnv = process.env): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS, ...config }

  const ttl = envInt(env.NETCOPY_TTL)
  if (ttl !== undefined && !validateField('checksumTtlSeconds', ttl)) {
    settings.checksumTtlSeconds = ttl
  }
  const timeout = envInt(env.NETCOPY_REGISTRY_TIMEOUT_MS)
  if (timeout !== undefined && !validateField('registryTimeoutMs', timeout)) {
    settings.registryTimeoutMs = timeout
  }

  return settings
}

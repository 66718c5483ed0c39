/**
 * domainset Config Loader
 *
 * Resolution order (later wins):
 *   1. DEFAULT_CONFIG
 *   2. .domainset/config.yaml (nearest, walking up) or the explicit --config file
 *   3. config.local.yaml beside it (credentials, gitignored)
 *   4. Environment variables (a .env file in the working directory fills gaps)
 *
 * YAML is a superset of JSON, so config.json files load as well.
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import type { BackendType, DomainSetConfig, LogLevel, RedisConfig } from '../types.js'
import { LOG_LEVELS } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError } from './errors.js'

const CONFIG_DIR = '.domainset'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

type Env = Record<string, string | undefined>

/**
 * Partial config as read from a file or the environment
 */
export interface ConfigOverrides {
  project?: string
  backend?: Partial<DomainSetConfig['backend']>
  redis?: Partial<RedisConfig>
  collection?: Partial<DomainSetConfig['collection']>
  logging?: Partial<DomainSetConfig['logging']>
}

export interface LoadConfigOptions {
  /** Explicit config file (--config); must exist */
  configPath?: string
  /** Where to start searching for .domainset/ (default: cwd) */
  startDir?: string
  /** Environment to read overrides from (default: process.env) */
  env?: Env
  /** Non-fatal problems, e.g. an unparsable REDIS_PORT */
  onWarning?: (message: string) => void
}

export interface LoadedConfig {
  config: DomainSetConfig
  /** Config file that was read, null when running on defaults */
  source: string | null
}

export const DEFAULT_CONFIG: DomainSetConfig = {
  project: '',
  backend: {
    type: 'redis'
  },
  redis: {
    host: 'localhost',
    port: 6379,
    db: 0,
    max_connections: 10,
    connect_timeout: 10000
  },
  collection: {
    prefix: 'domains'
  },
  logging: {
    level: 'info'
  }
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Env = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => env[varName] || defaultValue)
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => env[varName] || '')
}

/**
 * Find the .domainset directory by searching up from startDir
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) break
    currentDir = parentDir
  }

  return null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(value: unknown, field: string, configPath: string, env: Env): string | undefined {
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return expandEnvVars(value, env)
  if (typeof value === 'number') return String(value)
  throw new InvalidConfigError(`"${field}" must be a string`, configPath)
}

function readInteger(value: unknown, field: string, configPath: string, env: Env): number | undefined {
  if (value === undefined || value === null) return undefined
  const raw = typeof value === 'string' ? expandEnvVars(value, env).trim() : value
  const parsed = typeof raw === 'number' ? raw : typeof raw === 'string' && /^-?\d+$/.test(raw) ? Number(raw) : NaN
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidConfigError(`"${field}" must be a non-negative integer`, configPath)
  }
  return parsed
}

function isBackendType(value: string): value is BackendType {
  return value === 'redis' || value === 'memory'
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

function section(raw: Record<string, unknown>, name: string, configPath: string): Record<string, unknown> {
  const value = raw[name]
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) {
    throw new InvalidConfigError(`"${name}" must be a mapping`, configPath)
  }
  return value
}

/**
 * Validate a parsed config document and turn it into overrides
 */
export function parseConfigObject(raw: unknown, configPath: string, env: Env = process.env): ConfigOverrides {
  if (raw === null || raw === undefined) return {}
  if (!isRecord(raw)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const overrides: ConfigOverrides = {}

  const project = readString(raw.project, 'project', configPath, env)
  if (project !== undefined) overrides.project = project

  const backend = section(raw, 'backend', configPath)
  const backendType = readString(backend.type, 'backend.type', configPath, env)
  if (backendType !== undefined) {
    if (!isBackendType(backendType)) {
      throw new InvalidConfigError(`"backend.type" must be redis or memory, got "${backendType}"`, configPath)
    }
    overrides.backend = { type: backendType }
  }

  const redis = section(raw, 'redis', configPath)
  const redisOverrides: Partial<RedisConfig> = {}
  const setRedis = <K extends keyof RedisConfig>(key: K, value: RedisConfig[K] | undefined): void => {
    if (value !== undefined) redisOverrides[key] = value
  }
  setRedis('host', readString(redis.host, 'redis.host', configPath, env))
  setRedis('port', readInteger(redis.port, 'redis.port', configPath, env))
  setRedis('db', readInteger(redis.db, 'redis.db', configPath, env))
  setRedis('password', readString(redis.password, 'redis.password', configPath, env))
  setRedis('username', readString(redis.username, 'redis.username', configPath, env))
  setRedis('max_connections', readInteger(redis.max_connections, 'redis.max_connections', configPath, env))
  setRedis('connect_timeout', readInteger(redis.connect_timeout, 'redis.connect_timeout', configPath, env))
  setRedis('command_timeout', readInteger(redis.command_timeout, 'redis.command_timeout', configPath, env))
  overrides.redis = redisOverrides

  const collection = section(raw, 'collection', configPath)
  const prefix = readString(collection.prefix, 'collection.prefix', configPath, env)
  if (prefix !== undefined) overrides.collection = { prefix }

  const logging = section(raw, 'logging', configPath)
  const level = readString(logging.level, 'logging.level', configPath, env)
  if (level !== undefined) {
    const normalized = level.toLowerCase()
    if (!isLogLevel(normalized)) {
      throw new InvalidConfigError(`"logging.level" must be one of ${LOG_LEVELS.join(', ')}`, configPath)
    }
    overrides.logging = { level: normalized }
  }

  return overrides
}

/**
 * Read and validate a single config file
 */
export function loadConfigFile(configPath: string, env: Env = process.env): ConfigOverrides {
  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    const cause = err instanceof Error ? err : undefined
    throw new InvalidConfigError(cause?.message ?? String(err), configPath, cause)
  }
  return parseConfigObject(parsed, configPath, env)
}

/**
 * Apply overrides section by section
 */
export function mergeConfig(base: DomainSetConfig, overrides: ConfigOverrides): DomainSetConfig {
  return {
    project: overrides.project ?? base.project,
    backend: { ...base.backend, ...overrides.backend },
    redis: { ...base.redis, ...overrides.redis },
    collection: { ...base.collection, ...overrides.collection },
    logging: { ...base.logging, ...overrides.logging }
  }
}

/**
 * Read environment overrides.
 * Unparsable numbers are reported through onWarning and ignored.
 */
export function envOverrides(env: Env, onWarning: (message: string) => void = () => {}): ConfigOverrides {
  const redis: Partial<RedisConfig> = {}

  const readEnvInteger = (name: string): number | undefined => {
    const value = env[name]
    if (value === undefined || value.trim() === '') return undefined
    if (!/^\d+$/.test(value.trim())) {
      onWarning(`Invalid ${name} value: ${value}`)
      return undefined
    }
    return Number(value.trim())
  }

  if (env.REDIS_HOST) redis.host = env.REDIS_HOST
  const port = readEnvInteger('REDIS_PORT')
  if (port !== undefined) redis.port = port
  const db = readEnvInteger('REDIS_DB')
  if (db !== undefined) redis.db = db
  if (env.REDIS_PASSWORD) redis.password = env.REDIS_PASSWORD
  if (env.REDIS_USERNAME) redis.username = env.REDIS_USERNAME
  const maxConnections = readEnvInteger('REDIS_MAX_CONNECTIONS')
  if (maxConnections !== undefined) redis.max_connections = maxConnections

  const overrides: ConfigOverrides = { redis }

  const backend = env.DOMAINSET_BACKEND?.trim().toLowerCase()
  if (backend) {
    if (isBackendType(backend)) {
      overrides.backend = { type: backend }
    } else {
      onWarning(`Invalid DOMAINSET_BACKEND value: ${env.DOMAINSET_BACKEND}`)
    }
  }

  if (env.DOMAINSET_PROJECT !== undefined) overrides.project = env.DOMAINSET_PROJECT.trim()
  if (env.DOMAINSET_PREFIX) overrides.collection = { prefix: env.DOMAINSET_PREFIX.trim() }

  const level = env.DOMAINSET_LOG_LEVEL?.trim().toLowerCase()
  if (level) {
    if (isLogLevel(level)) {
      overrides.logging = { level }
    } else {
      onWarning(`Invalid DOMAINSET_LOG_LEVEL value: ${env.DOMAINSET_LOG_LEVEL}`)
    }
  }

  return overrides
}

/**
 * Merge a .env file under the given environment (real variables win)
 */
export function withDotenv(dir: string, env: Env): Env {
  const dotenvPath = path.join(dir, '.env')
  if (!fs.existsSync(dotenvPath)) return env
  const parsed = dotenv.parse(fs.readFileSync(dotenvPath, 'utf-8'))
  return { ...parsed, ...env }
}

/**
 * Resolve the effective configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const startDir = options.startDir ?? process.cwd()
  const env = withDotenv(startDir, options.env ?? process.env)
  const onWarning = options.onWarning ?? (() => {})

  let config: DomainSetConfig = mergeConfig(DEFAULT_CONFIG, {})
  let source: string | null = null

  if (options.configPath) {
    const explicitPath = path.resolve(startDir, options.configPath)
    if (!fs.existsSync(explicitPath)) {
      throw new ConfigNotFoundError(explicitPath)
    }
    config = mergeConfig(config, loadConfigFile(explicitPath, env))
    source = explicitPath
  } else {
    const configDir = findConfigDir(startDir)
    if (configDir) {
      const configPath = path.join(configDir, CONFIG_FILE)
      config = mergeConfig(config, loadConfigFile(configPath, env))
      source = configPath

      const localPath = path.join(configDir, CONFIG_LOCAL_FILE)
      if (fs.existsSync(localPath)) {
        config = mergeConfig(config, loadConfigFile(localPath, env))
      }
    }
  }

  return {
    config: mergeConfig(config, envOverrides(env, onWarning)),
    source
  }
}

/**
 * Copy of the config safe to print
 */
export function maskConfig(config: DomainSetConfig): DomainSetConfig {
  return {
    ...config,
    redis: {
      ...config.redis,
      ...(config.redis.password ? { password: '***' } : {})
    }
  }
}

/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable loading and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 */

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    issues?: string[]
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

/**
 * Redis Configuration
 */
export interface RedisEnvironmentConfig {
  host: string
  port: number
  password?: string
  db?: number
}

/**
 * Load Redis configuration from environment
 *
 * REDIS_URL (redis://[:password@]host[:port][/db]) gives the base settings;
 * REDIS_HOST, REDIS_PORT, REDIS_PASSWORD and REDIS_DB override its parts.
 * Returns null when neither REDIS_HOST nor REDIS_URL is set.
 */
export function loadRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisEnvironmentConfig | null {
  if (!env.REDIS_HOST && !env.REDIS_URL) return null

  const config: RedisEnvironmentConfig = env.REDIS_URL ? parseRedisUrl(env.REDIS_URL) : { host: 'localhost', port: 6379 }

  if (env.REDIS_HOST) {
    config.host = env.REDIS_HOST
  }
  if (env.REDIS_PORT) {
    config.port = parseInteger(env.REDIS_PORT, 'REDIS_PORT')
  }
  if (env.REDIS_PASSWORD) {
    config.password = env.REDIS_PASSWORD
  }
  if (env.REDIS_DB) {
    config.db = parseInteger(env.REDIS_DB, 'REDIS_DB')
  }
  return config
}

function parseRedisUrl(value: string): RedisEnvironmentConfig {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new ConfigurationError('REDIS_URL is not a valid URL', { key: 'REDIS_URL' })
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new ConfigurationError(`REDIS_URL must use redis: or rediss:, got "${url.protocol}"`, { key: 'REDIS_URL' })
  }

  const config: RedisEnvironmentConfig = {
    host: url.hostname || 'localhost',
    port: url.port ? parseInteger(url.port, 'REDIS_URL') : 6379,
  }
  if (url.password) {
    config.password = decodeURIComponent(url.password)
  }
  const db = url.pathname.replace(/^\//, '')
  if (db) {
    config.db = parseInteger(db, 'REDIS_URL')
  }
  return config
}

function parseInteger(value: string, key: string): number {
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${value}"`, { key })
  }
  return parsed
}

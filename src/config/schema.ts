/**
 * Zod schemas for quorum-uniqueness configuration
 * Validates YAML config files
 */

import { z } from 'zod'
import { ConsistencyLevelSchema, UniquenessDefaultsSchema } from '../uniqueness/options'

/**
 * Redis connection configuration
 */
export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).default(0),
})

export type RedisConfig = z.infer<typeof RedisConfigSchema>

/**
 * Row store configuration
 */
export const StoreConfigSchema = z.object({
  type: z.enum(['redis', 'in-memory']).default('in-memory'),
  redis: RedisConfigSchema.optional(),
  keyPrefix: z.string().default('qu:rows:'),
  defaultConsistencyLevel: ConsistencyLevelSchema.default('LOCAL_QUORUM'),
  /** Replica acknowledgements (Redis WAIT) required per consistency level */
  waitReplicas: z.record(ConsistencyLevelSchema, z.number().int().min(0)).default({}),
  waitTimeoutMs: z.number().int().positive().default(1000),
})

export type StoreConfig = z.infer<typeof StoreConfigSchema>

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Complete configuration
 */
export const QuorumUniquenessConfigSchema = z.object({
  store: StoreConfigSchema.default({}),
  uniqueness: UniquenessDefaultsSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type QuorumUniquenessConfig = z.infer<typeof QuorumUniquenessConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): QuorumUniquenessConfig {
  return QuorumUniquenessConfigSchema.parse(config ?? {})
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: QuorumUniquenessConfig } | { success: false; errors: string[] } {
  const result = QuorumUniquenessConfigSchema.safeParse(config ?? {})

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map((err) => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}

import { z } from 'zod'
import { CONSISTENCY_LEVELS, DEFAULT_CONSISTENCY_LEVEL } from '../storage/row-store'
import { DEFAULT_LOCK_PREFIX, DEFAULT_LOCK_TIMEOUT_SECONDS } from '../locks/column-prefix-row-lock'
import { ConfigurationError } from '../config/environment'

export const ConsistencyLevelSchema = z.enum(CONSISTENCY_LEVELS)

export const RowRefSchema = z.object({
  columnFamily: z.string().min(1),
  rowKey: z.string().min(1),
})

/**
 * Settings shared by every attempt of a deployment (config file section)
 */
export const UniquenessDefaultsSchema = z.object({
  /** Probe TTL in seconds; bounds how long a crashed attempt blocks its rows */
  ttlSeconds: z.number().int().positive().optional(),
  consistencyLevel: ConsistencyLevelSchema.default(DEFAULT_CONSISTENCY_LEVEL),
  columnPrefix: z.string().min(1).default(DEFAULT_LOCK_PREFIX),
  lockTimeoutSeconds: z.number().int().positive().default(DEFAULT_LOCK_TIMEOUT_SECONDS),
  failOnStaleLock: z.boolean().default(false),
})

export type UniquenessDefaults = z.infer<typeof UniquenessDefaultsSchema>

/**
 * Options of a single MultiRowUniquenessConstraint
 */
export const UniquenessOptionsSchema = UniquenessDefaultsSchema.extend({
  rows: z.array(RowRefSchema).default([]),
  /** Override the generated probe token */
  lockId: z.string().min(1).optional(),
})

export type UniquenessOptions = z.infer<typeof UniquenessOptionsSchema>
export type UniquenessOptionsInput = z.input<typeof UniquenessOptionsSchema>

export function parseUniquenessOptions(input: UniquenessOptionsInput): UniquenessOptions {
  const result = UniquenessOptionsSchema.safeParse(input)
  if (result.success) {
    return result.data
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
  throw new ConfigurationError(`Invalid uniqueness options: ${issues.join('; ')}`, { issues })
}

/**
 * Layer per-constraint options over deployment defaults. Options given
 * explicitly win; defaults fill in everything else.
 */
export function resolveUniquenessOptions(
  defaults: Partial<UniquenessDefaults>,
  options: UniquenessOptionsInput = {}
): UniquenessOptionsInput {
  return {
    ...options,
    ttlSeconds: options.ttlSeconds ?? defaults.ttlSeconds,
    consistencyLevel: options.consistencyLevel ?? defaults.consistencyLevel,
    columnPrefix: options.columnPrefix ?? defaults.columnPrefix,
    lockTimeoutSeconds: options.lockTimeoutSeconds ?? defaults.lockTimeoutSeconds,
    failOnStaleLock: options.failOnStaleLock ?? defaults.failOnStaleLock,
  }
}

/**
 * Bootstrap - Build a ready-to-use uniqueness setup from validated config
 *
 * Usage:
 *   const runtime = bootstrap(loadConfigAuto() ?? validateConfig({}))
 *   const constraint = runtime.createConstraint({ rows: [{ columnFamily: 'emails', rowKey }] })
 *   await constraint.acquire()
 */

import type { Redis } from 'ioredis'
import type { QuorumUniquenessConfig } from './config/schema'
import { createRowStore } from './storage/store-factory'
import type { RowStore } from './storage/row-store'
import type { Clock } from './timing/clock'
import { createLogger, metrics as globalMetrics, type Logger, type Metrics } from './observability'
import { resolveUniquenessOptions, type UniquenessOptionsInput } from './uniqueness/options'
import {
  MultiRowUniquenessConstraint,
  type RowLockFactory,
} from './uniqueness/multi-row-uniqueness-constraint'

export interface BootstrapDependencies {
  clock?: Clock
  metrics?: Metrics
  redis?: Redis
  lockFactory?: RowLockFactory
}

export interface QuorumUniqueness {
  readonly config: QuorumUniquenessConfig
  readonly store: RowStore
  readonly logger: Logger
  readonly metrics: Metrics
  /**
   * New single-use constraint with the configured uniqueness defaults
   * applied under `options`
   */
  createConstraint(options?: UniquenessOptionsInput): MultiRowUniquenessConstraint
}

export function bootstrap(config: QuorumUniquenessConfig, deps: BootstrapDependencies = {}): QuorumUniqueness {
  const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty })
  const metrics = deps.metrics ?? globalMetrics
  const store = createRowStore(config.store, {
    logger,
    ...(deps.clock && { clock: deps.clock }),
    ...(deps.redis && { redis: deps.redis }),
  })

  logger.debug({ store: config.store.type, uniqueness: config.uniqueness }, 'Uniqueness runtime ready')

  return {
    config,
    store,
    logger,
    metrics,
    createConstraint: (options) =>
      new MultiRowUniquenessConstraint(store, resolveUniquenessOptions(config.uniqueness, options), {
        logger,
        metrics,
        ...(deps.clock && { clock: deps.clock }),
        ...(deps.lockFactory && { lockFactory: deps.lockFactory }),
      }),
  }
}

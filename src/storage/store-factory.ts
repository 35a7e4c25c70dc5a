/**
 * Store Factory - Configuration-based row store instantiation
 *
 * Enables selecting the row store via configuration without code changes.
 */

import Redis from 'ioredis'
import type { StoreConfig } from '../config/schema'
import { loadRedisConfig } from '../config/environment'
import type { Clock } from '../timing/clock'
import type { Logger } from '../observability'
import type { RowStore } from './row-store'
import { InMemoryRowStore } from './in-memory-row-store'
import { RedisRowStore } from './redis-row-store'

export interface StoreFactoryDependencies {
  clock?: Clock
  logger?: Logger
  /** Use this client instead of opening a connection from config */
  redis?: Redis
}

/**
 * Create the configured RowStore. Redis connection settings come from the
 * config, then from REDIS_* environment variables, then localhost:6379.
 */
export function createRowStore(config: StoreConfig, deps: StoreFactoryDependencies = {}): RowStore {
  if (config.type === 'in-memory') {
    return new InMemoryRowStore({
      defaultConsistencyLevel: config.defaultConsistencyLevel,
      ...(deps.clock && { clock: deps.clock }),
      ...(deps.logger && { logger: deps.logger }),
    })
  }

  const redis = deps.redis ?? new Redis(config.redis ?? loadRedisConfig() ?? { host: 'localhost', port: 6379 })

  return new RedisRowStore(redis, {
    keyPrefix: config.keyPrefix,
    defaultConsistencyLevel: config.defaultConsistencyLevel,
    waitReplicas: config.waitReplicas,
    waitTimeoutMs: config.waitTimeoutMs,
    ...(deps.clock && { clock: deps.clock }),
    ...(deps.logger && { logger: deps.logger }),
  })
}

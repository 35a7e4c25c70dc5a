/**
 * Row stores - Pluggable storage for uniqueness claims
 *
 * ## Available stores
 *
 * - RedisRowStore (production, ioredis; rows are hashes, batches are MULTI/EXEC)
 * - InMemoryRowStore (dev/test, single process only)
 *
 * ## Usage
 *
 * ```typescript
 * import Redis from 'ioredis'
 * import { RedisRowStore, InMemoryRowStore } from 'quorum-uniqueness'
 *
 * // Production
 * const store = new RedisRowStore(new Redis(), { waitReplicas: { LOCAL_QUORUM: 1 } })
 *
 * // Development
 * const store = new InMemoryRowStore()
 * ```
 *
 * Custom stores implement RowStore and create batches with
 * `new MutationBatch(this, consistencyLevel, timestamp)`.
 */
export * from './row-store'
export * from './mutation-batch'
export * from './errors'
export * from './in-memory-row-store'
export * from './redis-row-store'
export * from './store-factory'

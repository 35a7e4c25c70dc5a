import type { Redis } from 'ioredis'
import { MutationBatch } from './mutation-batch'
import {
  DEFAULT_CONSISTENCY_LEVEL,
  type Column,
  type ConsistencyLevel,
  type ReadColumnsOptions,
  type RowStore,
} from './row-store'
import { StorageError, toError } from './errors'
import { systemClock, MICROS_PER_SECOND, type Clock } from '../timing/clock'
import { logger as rootLogger, type Logger } from '../observability'

/**
 * Stored cell layout. `ts` and `exp` are microseconds since epoch.
 */
interface RedisCell {
  v: string
  ts: number
  exp?: number
}

/**
 * KEYS[1] = row hash, ARGV[1] = column, ARGV[2] = encoded cell, ARGV[3] = write timestamp
 * Writes the cell unless the stored one carries a newer timestamp.
 */
export const PUT_CELL_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
if current then
  local stored = cjson.decode(current)
  if tonumber(stored.ts) > tonumber(ARGV[3]) then
    return 0
  end
end
redis.call('HSET', KEYS[1], ARGV[1], ARGV[2])
return 1
`

/**
 * KEYS[1] = row hash, ARGV[1] = column, ARGV[2] = delete timestamp
 * Removes the cell unless the stored one carries a newer timestamp.
 */
export const DELETE_CELL_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
if not current then
  return 0
end
local stored = cjson.decode(current)
if tonumber(stored.ts) > tonumber(ARGV[2]) then
  return 0
end
return redis.call('HDEL', KEYS[1], ARGV[1])
`

export interface RedisRowStoreOptions {
  keyPrefix?: string
  clock?: Clock
  defaultConsistencyLevel?: ConsistencyLevel
  /**
   * Replica acknowledgements to wait for (Redis WAIT) after a batch written
   * at the given consistency level. Levels not listed do not wait.
   */
  waitReplicas?: Partial<Record<ConsistencyLevel, number>>
  waitTimeoutMs?: number
  logger?: Logger
}

/**
 * RedisRowStore - Row store on Redis hashes
 *
 * Each row is a hash at `{keyPrefix}{columnFamily}:{rowKey}` whose fields are
 * the row's columns. Batches run as one MULTI/EXEC transaction of Lua scripts
 * that keep last-write-wins ordering. Expired cells are filtered on read and
 * removed lazily.
 */
export class RedisRowStore implements RowStore {
  private readonly keyPrefix: string
  private readonly clock: Clock
  private readonly defaultConsistencyLevel: ConsistencyLevel
  private readonly waitReplicas: Partial<Record<ConsistencyLevel, number>>
  private readonly waitTimeoutMs: number
  private readonly logger: Logger

  constructor(
    private readonly redis: Redis,
    options: RedisRowStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'qu:rows:'
    this.clock = options.clock ?? systemClock
    this.defaultConsistencyLevel = options.defaultConsistencyLevel ?? DEFAULT_CONSISTENCY_LEVEL
    this.waitReplicas = options.waitReplicas ?? {}
    this.waitTimeoutMs = options.waitTimeoutMs ?? 1000
    this.logger = (options.logger ?? rootLogger).child({ component: 'redis-row-store' })
  }

  prepareMutationBatch(consistencyLevel?: ConsistencyLevel): MutationBatch {
    return new MutationBatch(
      this,
      consistencyLevel ?? this.defaultConsistencyLevel,
      this.clock.nowMicros()
    )
  }

  async executeBatch(batch: MutationBatch): Promise<void> {
    const timestamp = batch.getTimestamp()
    const transaction = this.redis.multi()

    for (const mutation of batch.getMutations()) {
      const key = this.makeKey(mutation.columnFamily, mutation.rowKey)

      if (mutation.kind === 'put') {
        const cell: RedisCell = { v: mutation.value, ts: timestamp }
        if (mutation.ttlSeconds !== undefined) {
          cell.exp = timestamp + mutation.ttlSeconds * MICROS_PER_SECOND
        }
        transaction.eval(PUT_CELL_SCRIPT, 1, key, mutation.column, JSON.stringify(cell), String(timestamp))
      } else {
        transaction.eval(DELETE_CELL_SCRIPT, 1, key, mutation.column, String(timestamp))
      }
    }

    let results: [error: Error | null, result: unknown][] | null
    try {
      results = await transaction.exec()
    } catch (error) {
      throw new StorageError(`Batch of ${batch.getMutations().length} mutations failed`, toError(error))
    }

    if (results === null) {
      throw new StorageError('Batch transaction was aborted')
    }

    const failure = results.find(([error]) => error !== null)?.[0]
    if (failure) {
      throw new StorageError(`Batch mutation failed: ${failure.message}`, failure)
    }

    await this.awaitReplicas(batch.getConsistencyLevel())

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        { mutations: results.length, timestamp, consistencyLevel: batch.getConsistencyLevel() },
        'Batch executed'
      )
    }
  }

  async readColumns(columnFamily: string, rowKey: string, options: ReadColumnsOptions = {}): Promise<Column[]> {
    const key = this.makeKey(columnFamily, rowKey)

    let hash: Record<string, string>
    try {
      hash = await this.redis.hgetall(key)
    } catch (error) {
      throw new StorageError(`Failed to read row ${columnFamily}/${rowKey}`, toError(error))
    }

    const now = this.clock.nowMicros()
    const expired: string[] = []
    const columns: Column[] = []

    for (const [name, raw] of Object.entries(hash)) {
      const cell = this.decodeCell(raw)
      if (!cell) {
        this.logger.warn({ row: `${columnFamily}/${rowKey}`, column: name }, 'Skipping undecodable cell')
        continue
      }
      if (cell.exp !== undefined && cell.exp <= now) {
        expired.push(name)
        continue
      }
      if (options.prefix && !name.startsWith(options.prefix)) {
        continue
      }
      columns.push({
        name,
        value: cell.v,
        timestamp: cell.ts,
        ...(cell.exp !== undefined && { expiresAt: cell.exp }),
      })
    }

    if (expired.length > 0) {
      await this.purgeExpired(key, expired)
    }

    return columns.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  private async awaitReplicas(level: ConsistencyLevel): Promise<void> {
    const required = this.waitReplicas[level] ?? 0
    if (required <= 0) {
      return
    }

    let acknowledged: number
    try {
      acknowledged = await this.redis.wait(required, this.waitTimeoutMs)
    } catch (error) {
      throw new StorageError(`WAIT for ${required} replicas failed`, toError(error))
    }

    if (acknowledged < required) {
      throw new StorageError(
        `Consistency level ${level} not met: ${acknowledged}/${required} replicas acknowledged within ${this.waitTimeoutMs}ms`
      )
    }
  }

  private async purgeExpired(key: string, fields: string[]): Promise<void> {
    try {
      await this.redis.hdel(key, ...fields)
    } catch (error) {
      // Expired cells are already invisible to reads; the next read retries
      this.logger.warn({ err: error, key, fields }, 'Failed to purge expired cells')
    }
  }

  private decodeCell(raw: string): RedisCell | null {
    try {
      const parsed: unknown = JSON.parse(raw)
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'v' in parsed &&
        'ts' in parsed &&
        typeof parsed.v === 'string' &&
        typeof parsed.ts === 'number'
      ) {
        const exp = 'exp' in parsed && typeof parsed.exp === 'number' ? parsed.exp : undefined
        return exp === undefined ? { v: parsed.v, ts: parsed.ts } : { v: parsed.v, ts: parsed.ts, exp }
      }
      return null
    } catch {
      return null
    }
  }

  private makeKey(columnFamily: string, rowKey: string): string {
    return `${this.keyPrefix}${columnFamily}:${rowKey}`
  }
}

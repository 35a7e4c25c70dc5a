import { MutationBatch } from './mutation-batch'
import type { ColumnMutation } from './mutation-batch'
import {
  DEFAULT_CONSISTENCY_LEVEL,
  type Column,
  type ConsistencyLevel,
  type ReadColumnsOptions,
  type RowStore,
} from './row-store'
import { systemClock, MICROS_PER_SECOND, type Clock } from '../timing/clock'
import { logger as rootLogger, type Logger } from '../observability'

interface StoredCell {
  value: string
  timestamp: number
  expiresAt?: number
}

export interface InMemoryRowStoreOptions {
  clock?: Clock
  defaultConsistencyLevel?: ConsistencyLevel
  logger?: Logger
}

/**
 * InMemoryRowStore - Single-process row store for development and testing
 *
 * Mirrors the column semantics of the replicated stores: last-write-wins by
 * timestamp, deletes that only shadow older writes, and per-column TTL.
 * Consistency levels are accepted and ignored.
 */
export class InMemoryRowStore implements RowStore {
  private rows = new Map<string, Map<string, StoredCell>>()
  private readonly clock: Clock
  private readonly defaultConsistencyLevel: ConsistencyLevel
  private readonly logger: Logger

  constructor(options: InMemoryRowStoreOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.defaultConsistencyLevel = options.defaultConsistencyLevel ?? DEFAULT_CONSISTENCY_LEVEL
    this.logger = (options.logger ?? rootLogger).child({ component: 'in-memory-row-store' })

    if (process.env.NODE_ENV === 'production') {
      this.logger.warn(
        'Using InMemoryRowStore in production. Claims are not shared between processes; use RedisRowStore instead.'
      )
    }
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

    for (const mutation of batch.getMutations()) {
      this.apply(mutation, timestamp)
    }

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        { mutations: batch.getMutations().length, timestamp, consistencyLevel: batch.getConsistencyLevel() },
        'Batch applied'
      )
    }
  }

  async readColumns(columnFamily: string, rowKey: string, options: ReadColumnsOptions = {}): Promise<Column[]> {
    const row = this.rows.get(this.makeKey(columnFamily, rowKey))
    if (!row) {
      return []
    }

    const now = this.clock.nowMicros()
    const columns: Column[] = []

    for (const [name, cell] of row.entries()) {
      if (cell.expiresAt !== undefined && cell.expiresAt <= now) {
        row.delete(name)
        continue
      }
      if (options.prefix && !name.startsWith(options.prefix)) {
        continue
      }
      columns.push({
        name,
        value: cell.value,
        timestamp: cell.timestamp,
        ...(cell.expiresAt !== undefined && { expiresAt: cell.expiresAt }),
      })
    }

    return columns.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  /**
   * Number of rows holding at least one stored cell (expired cells included)
   */
  size(): number {
    return this.rows.size
  }

  clear(): void {
    this.rows.clear()
  }

  private apply(mutation: ColumnMutation, timestamp: number): void {
    const key = this.makeKey(mutation.columnFamily, mutation.rowKey)
    const row = this.rows.get(key) ?? new Map<string, StoredCell>()
    const existing = row.get(mutation.column)

    // Last write wins; ties go to the incoming write
    if (existing && existing.timestamp > timestamp) {
      return
    }

    if (mutation.kind === 'delete') {
      row.delete(mutation.column)
    } else {
      row.set(mutation.column, {
        value: mutation.value,
        timestamp,
        ...(mutation.ttlSeconds !== undefined && {
          expiresAt: timestamp + mutation.ttlSeconds * MICROS_PER_SECOND,
        }),
      })
    }

    if (row.size === 0) {
      this.rows.delete(key)
    } else {
      this.rows.set(key, row)
    }
  }

  private makeKey(columnFamily: string, rowKey: string): string {
    return `${columnFamily}\u0000${rowKey}`
  }
}

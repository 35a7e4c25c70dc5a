import type { MutationBatch } from './mutation-batch'

/**
 * Consistency levels understood by replicated row stores.
 * Stores without replica negotiation accept every level and may ignore it.
 */
export const CONSISTENCY_LEVELS = [
  'ANY',
  'ONE',
  'TWO',
  'THREE',
  'QUORUM',
  'LOCAL_QUORUM',
  'EACH_QUORUM',
  'LOCAL_ONE',
  'ALL',
] as const

export type ConsistencyLevel = (typeof CONSISTENCY_LEVELS)[number]

export const DEFAULT_CONSISTENCY_LEVEL: ConsistencyLevel = 'LOCAL_QUORUM'

/**
 * Address of a single row: the column family (table) it lives in and its key
 */
export interface RowRef {
  columnFamily: string
  rowKey: string
}

/**
 * A live column as returned by a read
 */
export interface Column {
  name: string
  value: string
  /** Write timestamp (microseconds since epoch) */
  timestamp: number
  /** Absolute expiry (microseconds since epoch), absent for permanent columns */
  expiresAt?: number
}

export interface ReadColumnsOptions {
  /** Only return columns whose name starts with this prefix */
  prefix?: string
  consistencyLevel?: ConsistencyLevel
}

/**
 * RowStore - Key/row storage client with atomic multi-row batches
 *
 * Columns follow last-write-wins by write timestamp. A TTL makes a column
 * disappear from reads once `timestamp + ttl` has passed.
 */
export interface RowStore {
  /**
   * Create an empty batch bound to a consistency level and stamped with the
   * store clock
   */
  prepareMutationBatch(consistencyLevel?: ConsistencyLevel): MutationBatch

  /**
   * Apply every mutation of the batch as one atomic write
   * @throws StorageError when the write fails
   */
  executeBatch(batch: MutationBatch): Promise<void>

  /**
   * Read the live columns of a row, sorted by name
   */
  readColumns(columnFamily: string, rowKey: string, options?: ReadColumnsOptions): Promise<Column[]>
}

export function formatRow(row: RowRef): string {
  return `${row.columnFamily}/${row.rowKey}`
}

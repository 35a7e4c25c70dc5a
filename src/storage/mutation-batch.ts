import type { ConsistencyLevel, RowRef, RowStore } from './row-store'

/**
 * A single column write or delete inside a batch
 */
export type ColumnMutation =
  | {
      kind: 'put'
      columnFamily: string
      rowKey: string
      column: string
      value: string
      ttlSeconds?: number
    }
  | {
      kind: 'delete'
      columnFamily: string
      rowKey: string
      column: string
    }

/**
 * Mutations addressed to one row of a batch
 */
export class RowMutationBuilder {
  constructor(
    private readonly batch: MutationBatch,
    private readonly row: RowRef
  ) {}

  putColumn(column: string, value: string, ttlSeconds?: number): this {
    if (ttlSeconds !== undefined && (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0)) {
      throw new RangeError(`ttlSeconds must be a positive integer, got ${ttlSeconds}`)
    }
    this.batch.addMutation({
      kind: 'put',
      columnFamily: this.row.columnFamily,
      rowKey: this.row.rowKey,
      column,
      value,
      ...(ttlSeconds !== undefined && { ttlSeconds }),
    })
    return this
  }

  deleteColumn(column: string): this {
    this.batch.addMutation({
      kind: 'delete',
      columnFamily: this.row.columnFamily,
      rowKey: this.row.rowKey,
      column,
    })
    return this
  }
}

/**
 * MutationBatch - Atomic multi-row write
 *
 * Collects column puts and deletes across any number of rows. Executing the
 * batch hands it to the store that prepared it, which applies everything as
 * one atomic write at the batch's consistency level and timestamp.
 */
export class MutationBatch {
  private readonly mutations: ColumnMutation[] = []

  constructor(
    private readonly store: RowStore,
    private consistencyLevel: ConsistencyLevel,
    private timestamp: number
  ) {}

  withRow(columnFamily: string, rowKey: string): RowMutationBuilder {
    return new RowMutationBuilder(this, { columnFamily, rowKey })
  }

  addMutation(mutation: ColumnMutation): void {
    this.mutations.push(mutation)
  }

  setConsistencyLevel(level: ConsistencyLevel): this {
    this.consistencyLevel = level
    return this
  }

  getConsistencyLevel(): ConsistencyLevel {
    return this.consistencyLevel
  }

  /**
   * Override the write timestamp (microseconds) applied to every mutation
   */
  withTimestamp(timestamp: number): this {
    this.timestamp = timestamp
    return this
  }

  getTimestamp(): number {
    return this.timestamp
  }

  /**
   * Append the mutations of another batch. Its consistency level and
   * timestamp are not carried over.
   */
  mergeShallow(other: MutationBatch): this {
    for (const mutation of other.getMutations()) {
      this.mutations.push(mutation)
    }
    return this
  }

  getMutations(): readonly ColumnMutation[] {
    return this.mutations
  }

  isEmpty(): boolean {
    return this.mutations.length === 0
  }

  async execute(): Promise<void> {
    if (this.isEmpty()) {
      return
    }
    await this.store.executeBatch(this)
  }
}

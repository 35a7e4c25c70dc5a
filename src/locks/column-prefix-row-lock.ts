import type { MutationBatch } from '../storage/mutation-batch'
import {
  DEFAULT_CONSISTENCY_LEVEL,
  formatRow,
  type ConsistencyLevel,
  type RowRef,
  type RowStore,
} from '../storage/row-store'
import { MICROS_PER_SECOND } from '../timing/clock'
import { BusyLockError, LockStateError, StaleLockError, type RowLock } from './row-lock'

export const DEFAULT_LOCK_PREFIX = '_LOCK_'
export const DEFAULT_LOCK_TIMEOUT_SECONDS = 60

/** Lock column value of a committed (permanent) claim */
export const PERMANENT_CLAIM = 0

export interface ColumnPrefixRowLockOptions {
  lockId: string
  columnPrefix?: string
  consistencyLevel?: ConsistencyLevel
  /** Expiry horizon written into provisional claims */
  lockTimeoutSeconds?: number
  /** Fail verification on expired foreign claims instead of cleaning them up on release */
  failOnStaleLock?: boolean
}

/**
 * ColumnPrefixRowLock - Row claim stored as a column inside the row itself
 *
 * Every claim is a column named `{prefix}{lockId}`. Its value is the claim's
 * expiry in microseconds, or 0 once committed. Verification reads all columns
 * sharing the prefix: any other live claim means the row is busy.
 */
export class ColumnPrefixRowLock implements RowLock {
  private readonly lockId: string
  private readonly columnPrefix: string
  private readonly consistencyLevel: ConsistencyLevel
  private readonly lockTimeoutSeconds: number
  private readonly failOnStaleLock: boolean

  private lockColumn: string | null = null
  private staleColumns: string[] = []

  constructor(
    private readonly store: RowStore,
    public readonly row: RowRef,
    options: ColumnPrefixRowLockOptions
  ) {
    this.lockId = options.lockId
    this.columnPrefix = options.columnPrefix ?? DEFAULT_LOCK_PREFIX
    this.consistencyLevel = options.consistencyLevel ?? DEFAULT_CONSISTENCY_LEVEL
    this.lockTimeoutSeconds = options.lockTimeoutSeconds ?? DEFAULT_LOCK_TIMEOUT_SECONDS
    this.failOnStaleLock = options.failOnStaleLock ?? false
  }

  fillProbeMutation(batch: MutationBatch, timestamp: number, ttlSeconds?: number): void {
    this.writeLockColumn(batch, timestamp + this.lockTimeoutSeconds * MICROS_PER_SECOND, ttlSeconds)
  }

  fillCommitMutation(batch: MutationBatch): void {
    this.writeLockColumn(batch, PERMANENT_CLAIM)
  }

  async verify(timestamp: number): Promise<void> {
    if (this.lockColumn === null) {
      throw new LockStateError(`verify() called on ${formatRow(this.row)} before a claim was written`)
    }

    const claims = await this.readLockColumns()

    for (const [column, expiresAt] of claims) {
      if (column === this.lockColumn) {
        continue
      }
      if (expiresAt !== PERMANENT_CLAIM && timestamp > expiresAt) {
        if (this.failOnStaleLock) {
          throw new StaleLockError(
            `Stale claim ${column} found on ${formatRow(this.row)}`,
            this.row,
            column
          )
        }
        this.staleColumns.push(column)
        continue
      }
      throw new BusyLockError(
        `Row ${formatRow(this.row)} is already claimed by ${column}`,
        this.row,
        column
      )
    }

    if (!claims.has(this.lockColumn)) {
      throw new StaleLockError(
        `Claim ${this.lockColumn} is no longer present on ${formatRow(this.row)}`,
        this.row,
        this.lockColumn
      )
    }
  }

  fillReleaseMutation(batch: MutationBatch, excludeCurrentLock: boolean): void {
    const mutation = batch.withRow(this.row.columnFamily, this.row.rowKey)

    for (const column of this.staleColumns) {
      mutation.deleteColumn(column)
    }
    if (!excludeCurrentLock && this.lockColumn !== null) {
      mutation.deleteColumn(this.lockColumn)
    }

    this.staleColumns = []
    if (!excludeCurrentLock) {
      this.lockColumn = null
    }
  }

  /**
   * Read every claim on the row, keyed by column name, valued by expiry
   * (microseconds, 0 for committed claims)
   */
  async readLockColumns(): Promise<Map<string, number>> {
    const columns = await this.store.readColumns(this.row.columnFamily, this.row.rowKey, {
      prefix: this.columnPrefix,
      consistencyLevel: this.consistencyLevel,
    })

    const claims = new Map<string, number>()
    for (const column of columns) {
      claims.set(column.name, parseClaimValue(column.value))
    }
    return claims
  }

  getLockColumn(): string {
    return this.columnPrefix + this.lockId
  }

  private writeLockColumn(batch: MutationBatch, value: number, ttlSeconds?: number): void {
    const column = this.getLockColumn()
    this.lockColumn = column
    batch.withRow(this.row.columnFamily, this.row.rowKey).putColumn(column, String(value), ttlSeconds)
  }
}

/**
 * Claim values that do not parse are treated as permanent claims
 */
export function parseClaimValue(value: string): number {
  const parsed = Number(value)
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : PERMANENT_CLAIM
}

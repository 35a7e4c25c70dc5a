/**
 * Multi-Row Uniqueness Constraint
 *
 * Claims one identity across several rows of an eventually-consistent row
 * store without a lock service:
 * 1. Write a provisional claim column (with TTL) to every row in one batch
 * 2. Read each row back, in order, and check the claim is the only one
 * 3. Rewrite the claims without TTL in a second batch, together with any
 *    caller writes
 *
 * A failure after step 1 releases the claims before the error surfaces. The
 * TTL covers the case where the process dies before it can release.
 */

import type { MutationBatch } from '../storage/mutation-batch'
import { formatRow, type RowRef, type RowStore } from '../storage/row-store'
import { ColumnPrefixRowLock, type ColumnPrefixRowLockOptions } from '../locks/column-prefix-row-lock'
import { isLockContentionError, type RowLock } from '../locks/row-lock'
import { ConfigurationError } from '../config/environment'
import { systemClock, type Clock } from '../timing/clock'
import { logger as rootLogger, metrics as globalMetrics, type Logger, type Metrics } from '../observability'
import { NotUniqueError, UniquenessStateError } from './errors'
import { parseUniquenessOptions, type UniquenessOptions, type UniquenessOptionsInput } from './options'
import { generateProbeToken } from './probe-token'
import { mergeBatch, type MutationCallback, type UniquenessConstraint } from './uniqueness-constraint'

/**
 * Attempt lifecycle. IDLE is initial; COMMITTED, RELEASED and FAILED are terminal.
 */
export enum UniquenessState {
  IDLE = 'IDLE',
  PROBING = 'PROBING',
  PROBES_WRITTEN = 'PROBES_WRITTEN',
  VERIFIED = 'VERIFIED',
  COMMITTED = 'COMMITTED',
  ROLLING_BACK = 'ROLLING_BACK',
  RELEASED = 'RELEASED',
  FAILED = 'FAILED',
}

export type LockSettings = Required<ColumnPrefixRowLockOptions>

export type RowLockFactory = (store: RowStore, row: RowRef, settings: LockSettings) => RowLock

export const columnPrefixLockFactory: RowLockFactory = (store, row, settings) =>
  new ColumnPrefixRowLock(store, row, settings)

export interface UniquenessDependencies {
  logger?: Logger
  metrics?: Metrics
  clock?: Clock
  lockFactory?: RowLockFactory
}

type AcquireOutcome = 'committed' | 'not_unique' | 'error'

export class MultiRowUniquenessConstraint implements UniquenessConstraint {
  private readonly options: UniquenessOptions
  private readonly rows: RowRef[]
  private readonly lockId: string
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly metrics: Metrics
  private readonly lockFactory: RowLockFactory

  private state: UniquenessState = UniquenessState.IDLE
  private locks: readonly RowLock[] = []

  constructor(
    private readonly store: RowStore,
    options: UniquenessOptionsInput = {},
    deps: UniquenessDependencies = {}
  ) {
    this.options = parseUniquenessOptions(options)
    this.rows = [...this.options.rows]
    this.lockId = this.options.lockId ?? generateProbeToken()
    this.clock = deps.clock ?? systemClock
    this.metrics = deps.metrics ?? globalMetrics
    this.lockFactory = deps.lockFactory ?? columnPrefixLockFactory
    this.logger = (deps.logger ?? rootLogger).child({ component: 'uniqueness', probeToken: this.lockId })
  }

  /**
   * Add a row to the set checked for uniqueness. Rows are verified in the
   * order they were added.
   */
  addRow(columnFamily: string, rowKey: string): this {
    if (this.state !== UniquenessState.IDLE) {
      throw new UniquenessStateError(`Cannot add row ${columnFamily}/${rowKey} once the attempt is ${this.state}`)
    }
    if (!columnFamily || !rowKey) {
      throw new ConfigurationError('Rows need a non-empty columnFamily and rowKey', { key: 'rows' })
    }
    this.rows.push({ columnFamily, rowKey })
    return this
  }

  async acquire(): Promise<void> {
    await this.acquireAndApplyMutation()
  }

  /**
   * @deprecated Use acquireAndApplyMutation with a callback
   */
  async acquireAndMutate(batch: MutationBatch): Promise<void> {
    await this.acquireAndApplyMutation(mergeBatch(batch))
  }

  async acquireAndApplyMutation(callback?: MutationCallback): Promise<void> {
    if (this.state !== UniquenessState.IDLE) {
      throw new UniquenessStateError(`Constraint is single-use; attempt already ${this.state}`)
    }
    if (this.rows.length === 0) {
      throw new ConfigurationError('At least one row is required to acquire a uniqueness constraint', {
        key: 'rows',
      })
    }

    const startedAt = Date.now()
    const settings = this.freezeSettings()
    this.locks = Object.freeze(this.rows.map((row) => this.lockFactory(this.store, row, settings)))

    // Leave IDLE before the first await so addRow and a second acquire are refused
    this.transition(UniquenessState.PROBING)

    const now = this.clock.nowMicros()

    try {
      await this.writeProbes(now)
    } catch (error) {
      // Batch atomicity means no probe is known to exist; the TTL covers partial writes
      this.transition(UniquenessState.FAILED)
      this.recordOutcome('error', startedAt)
      throw error
    }

    try {
      await this.verifyAll(now)
      await this.commit(callback)
    } catch (error) {
      await this.rollback(error)

      if (isLockContentionError(error)) {
        this.recordOutcome('not_unique', startedAt)
        this.logger.info({ row: formatRow(error.row) }, 'Uniqueness violated')
        throw new NotUniqueError(`Uniqueness violated on ${formatRow(error.row)}: ${error.message}`, error)
      }

      this.recordOutcome('error', startedAt)
      throw error
    }

    this.recordOutcome('committed', startedAt)
  }

  /**
   * Delete this attempt's claims from every row. Nothing is written when the
   * attempt never wrote a claim or its claims were already released.
   */
  async release(): Promise<void> {
    await this.releaseLocks()
    this.metrics.increment('uniqueness.release')
    if (this.state !== UniquenessState.IDLE) {
      this.transition(UniquenessState.RELEASED)
    }
  }

  /**
   * Token written to every row of this attempt
   */
  getProbeToken(): string {
    return this.lockId
  }

  /**
   * Column name carrying the claim in every row
   */
  getLockColumn(): string {
    return this.options.columnPrefix + this.lockId
  }

  getState(): UniquenessState {
    return this.state
  }

  getRows(): readonly RowRef[] {
    return this.rows.map((row) => ({ ...row }))
  }

  private freezeSettings(): LockSettings {
    return Object.freeze({
      lockId: this.lockId,
      columnPrefix: this.options.columnPrefix,
      consistencyLevel: this.options.consistencyLevel,
      lockTimeoutSeconds: this.options.lockTimeoutSeconds,
      failOnStaleLock: this.options.failOnStaleLock,
    })
  }

  private async writeProbes(now: number): Promise<void> {
    const batch = this.store.prepareMutationBatch(this.options.consistencyLevel).withTimestamp(now)
    for (const lock of this.locks) {
      lock.fillProbeMutation(batch, now, this.options.ttlSeconds)
    }
    await batch.execute()

    this.transition(UniquenessState.PROBES_WRITTEN)
  }

  private async verifyAll(now: number): Promise<void> {
    for (const lock of this.locks) {
      await lock.verify(now)
    }
    this.transition(UniquenessState.VERIFIED)
  }

  private async commit(callback?: MutationCallback): Promise<void> {
    const batch = this.store.prepareMutationBatch(this.options.consistencyLevel)
    for (const lock of this.locks) {
      lock.fillCommitMutation(batch)
    }
    if (callback) {
      await callback(batch)
    }
    await batch.execute()

    this.transition(UniquenessState.COMMITTED)
  }

  private async rollback(cause: unknown): Promise<void> {
    this.transition(UniquenessState.ROLLING_BACK)
    try {
      await this.releaseLocks()
      this.transition(UniquenessState.RELEASED)
    } catch (releaseError) {
      // The original failure is what the caller sees; claims left behind expire with their TTL
      this.logger.error({ err: releaseError, cause }, 'Failed to release claims after unsuccessful attempt')
      this.transition(UniquenessState.FAILED)
    }
  }

  private async releaseLocks(): Promise<void> {
    const batch = this.store.prepareMutationBatch(this.options.consistencyLevel)
    for (const lock of this.locks) {
      lock.fillReleaseMutation(batch, false)
    }
    await batch.execute()
  }

  private transition(next: UniquenessState): void {
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug({ from: this.state, to: next, rows: this.rows.length }, 'Uniqueness state change')
    }
    this.state = next
  }

  private recordOutcome(outcome: AcquireOutcome, startedAt: number): void {
    this.metrics.increment('uniqueness.acquire', 1, { outcome })
    this.metrics.timing('uniqueness.acquire.duration', Date.now() - startedAt, { outcome })
  }
}

export function createUniquenessConstraint(
  store: RowStore,
  options: UniquenessOptionsInput = {},
  deps: UniquenessDependencies = {}
): MultiRowUniquenessConstraint {
  return new MultiRowUniquenessConstraint(store, options, deps)
}

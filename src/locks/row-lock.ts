import type { MutationBatch } from '../storage/mutation-batch'
import type { RowRef } from '../storage/row-store'

/**
 * RowLock - Per-row claim primitive driven by the uniqueness protocol
 *
 * A lock never executes batches itself. It contributes its writes to batches
 * owned by the caller and only performs reads in `verify`.
 */
export interface RowLock {
  readonly row: RowRef

  /**
   * Add this row's provisional claim, stamped `timestamp` (microseconds) and
   * expiring after `ttlSeconds` when given
   */
  fillProbeMutation(batch: MutationBatch, timestamp: number, ttlSeconds?: number): void

  /**
   * Check that the claim written at `timestamp` is the only valid claim on the row
   * @throws BusyLockError when another valid claim exists
   * @throws StaleLockError when this claim was superseded or an expired claim is found
   */
  verify(timestamp: number): Promise<void>

  /**
   * Add this row's permanent claim (no TTL)
   */
  fillCommitMutation(batch: MutationBatch): void

  /**
   * Add the deletes that clear this row's claim. With `excludeCurrentLock`
   * the attempt's own claim is kept and only stale claims are removed.
   */
  fillReleaseMutation(batch: MutationBatch, excludeCurrentLock: boolean): void
}

/**
 * Another attempt holds a valid, unexpired claim on the row
 */
export class BusyLockError extends Error {
  constructor(message: string, public readonly row: RowRef, public readonly conflictingColumn: string) {
    super(message)
    this.name = 'BusyLockError'
  }
}

/**
 * This attempt's claim was superseded, or an expired claim blocks the row
 */
export class StaleLockError extends Error {
  constructor(message: string, public readonly row: RowRef, public readonly staleColumn: string) {
    super(message)
    this.name = 'StaleLockError'
  }
}

/**
 * A lock operation was called out of order
 */
export class LockStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LockStateError'
  }
}

export function isLockContentionError(error: unknown): error is BusyLockError | StaleLockError {
  return error instanceof BusyLockError || error instanceof StaleLockError
}

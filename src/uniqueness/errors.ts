import type { BusyLockError, StaleLockError } from '../locks/row-lock'

/**
 * Another attempt holds, or raced for, at least one of the claimed rows.
 * Probes written by the failed attempt are released before this is thrown.
 */
export class NotUniqueError extends Error {
  constructor(message: string, public readonly cause?: BusyLockError | StaleLockError) {
    super(message)
    this.name = 'NotUniqueError'
  }
}

/**
 * The constraint was used out of order: rows added after an attempt started,
 * or a second acquire on a single-use constraint
 */
export class UniquenessStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UniquenessStateError'
  }
}

import type { MutationBatch } from '../storage/mutation-batch'

/**
 * Invoked with the commit batch before it executes. Writes added here land
 * atomically with the uniqueness commit, and never land if the attempt fails.
 */
export type MutationCallback = (batch: MutationBatch) => void | Promise<void>

/**
 * UniquenessConstraint - Claim an identity that must not be claimed twice
 */
export interface UniquenessConstraint {
  /**
   * Claim every row of the constraint
   * @throws NotUniqueError when another attempt holds or races for a row
   */
  acquire(): Promise<void>

  /**
   * Claim every row and apply extra writes atomically with the commit
   * @throws NotUniqueError when another attempt holds or races for a row
   */
  acquireAndApplyMutation(callback?: MutationCallback): Promise<void>

  /**
   * Claim every row and merge a prepared batch into the commit
   * @deprecated Use acquireAndApplyMutation with a callback
   */
  acquireAndMutate(batch: MutationBatch): Promise<void>

  /**
   * Clear this attempt's claims. Safe to call repeatedly.
   */
  release(): Promise<void>
}

/**
 * Callback that merges a fixed batch into the commit batch
 */
export function mergeBatch(source: MutationBatch): MutationCallback {
  return (batch) => {
    batch.mergeShallow(source)
  }
}

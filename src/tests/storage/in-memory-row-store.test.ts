import { describe, it, expect, beforeEach, vi } from 'vitest'
import { InMemoryRowStore } from '../../storage/in-memory-row-store'
import { ManualClock } from '../../timing/clock'

/**
 * Unit tests for InMemoryRowStore and the MutationBatch it produces
 */
describe('InMemoryRowStore', () => {
  const START = 1_000_000_000
  let clock: ManualClock
  let store: InMemoryRowStore

  beforeEach(() => {
    clock = new ManualClock(START)
    store = new InMemoryRowStore({ clock })
  })

  describe('batches', () => {
    it('should stamp batches with the store clock and default consistency level', () => {
      const batch = store.prepareMutationBatch()

      expect(batch.getTimestamp()).toBe(START)
      expect(batch.getConsistencyLevel()).toBe('LOCAL_QUORUM')
      expect(store.prepareMutationBatch('ONE').getConsistencyLevel()).toBe('ONE')
    })

    it('should write columns across rows in one batch', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('email', 'alice@example.test')
      batch.withRow('emails', 'alice@example.test').putColumn('owner', 'alice')
      await batch.execute()

      expect(await store.readColumns('users', 'alice')).toEqual([
        { name: 'email', value: 'alice@example.test', timestamp: START },
      ])
      expect(await store.readColumns('emails', 'alice@example.test')).toEqual([
        { name: 'owner', value: 'alice', timestamp: START },
      ])
    })

    it('should not touch the store when the batch is empty', async () => {
      const spy = vi.spyOn(store, 'executeBatch')

      await store.prepareMutationBatch().execute()

      expect(spy).not.toHaveBeenCalled()
    })

    it('should merge mutations of another batch', async () => {
      const extra = store.prepareMutationBatch()
      extra.withRow('profiles', 'alice').putColumn('bio', 'hello')

      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('email', 'alice@example.test')
      batch.mergeShallow(extra)

      expect(batch.getMutations()).toHaveLength(2)
      await batch.execute()
      expect(await store.readColumns('profiles', 'alice')).toEqual([
        { name: 'bio', value: 'hello', timestamp: START },
      ])
    })

    it('should reject a non-positive TTL', () => {
      const row = store.prepareMutationBatch().withRow('users', 'alice')

      expect(() => row.putColumn('email', 'x', 0)).toThrow(RangeError)
      expect(() => row.putColumn('email', 'x', 1.5)).toThrow(RangeError)
    })
  })

  describe('column semantics', () => {
    it('should expire columns once their TTL has elapsed', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('probe', '1', 30)
      await batch.execute()

      clock.advanceSeconds(29)
      expect(await store.readColumns('users', 'alice')).toEqual([
        { name: 'probe', value: '1', timestamp: START, expiresAt: START + 30_000_000 },
      ])

      clock.advanceSeconds(1)
      expect(await store.readColumns('users', 'alice')).toEqual([])
    })

    it('should keep the write with the newest timestamp', async () => {
      const newer = store.prepareMutationBatch().withTimestamp(200)
      newer.withRow('users', 'alice').putColumn('name', 'new')
      await newer.execute()

      const older = store.prepareMutationBatch().withTimestamp(100)
      older.withRow('users', 'alice').putColumn('name', 'old')
      await older.execute()

      const columns = await store.readColumns('users', 'alice')
      expect(columns.map((c) => c.value)).toEqual(['new'])
    })

    it('should let an equal timestamp overwrite', async () => {
      const first = store.prepareMutationBatch().withTimestamp(100)
      first.withRow('users', 'alice').putColumn('name', 'first')
      await first.execute()

      const second = store.prepareMutationBatch().withTimestamp(100)
      second.withRow('users', 'alice').putColumn('name', 'second')
      await second.execute()

      const columns = await store.readColumns('users', 'alice')
      expect(columns.map((c) => c.value)).toEqual(['second'])
    })

    it('should ignore deletes older than the stored column', async () => {
      const put = store.prepareMutationBatch().withTimestamp(200)
      put.withRow('users', 'alice').putColumn('name', 'alice')
      await put.execute()

      const staleDelete = store.prepareMutationBatch().withTimestamp(100)
      staleDelete.withRow('users', 'alice').deleteColumn('name')
      await staleDelete.execute()
      expect(await store.readColumns('users', 'alice')).toHaveLength(1)

      const delete_ = store.prepareMutationBatch().withTimestamp(200)
      delete_.withRow('users', 'alice').deleteColumn('name')
      await delete_.execute()
      expect(await store.readColumns('users', 'alice')).toEqual([])
      expect(store.size()).toBe(0)
    })

    it('should filter by prefix and sort by column name', async () => {
      const batch = store.prepareMutationBatch()
      batch
        .withRow('users', 'alice')
        .putColumn('_LOCK_b', '2')
        .putColumn('name', 'alice')
        .putColumn('_LOCK_a', '1')
      await batch.execute()

      const claims = await store.readColumns('users', 'alice', { prefix: '_LOCK_' })
      expect(claims.map((c) => c.name)).toEqual(['_LOCK_a', '_LOCK_b'])

      const all = await store.readColumns('users', 'alice')
      expect(all.map((c) => c.name)).toEqual(['_LOCK_a', '_LOCK_b', 'name'])
    })

    it('should return no columns for an unknown row', async () => {
      expect(await store.readColumns('users', 'nobody')).toEqual([])
    })
  })

  it('should drop every row on clear', async () => {
    const batch = store.prepareMutationBatch()
    batch.withRow('users', 'alice').putColumn('name', 'alice')
    await batch.execute()

    store.clear()

    expect(store.size()).toBe(0)
  })
})

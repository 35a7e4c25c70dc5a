/**
 * Tests for RedisRowStore against an in-process stand-in for the ioredis
 * commands it uses (MULTI/EXEC with EVAL, HGETALL, HDEL, WAIT)
 */
import { describe, it, expect, beforeEach, vi } from 'vitest'
import type { Redis } from 'ioredis'
import { RedisRowStore, PUT_CELL_SCRIPT, DELETE_CELL_SCRIPT } from '../../storage/redis-row-store'
import { StorageError } from '../../storage/errors'
import { ManualClock } from '../../timing/clock'

type ExecResult = [error: Error | null, result: unknown][] | null

class FakeRedis {
  hashes = new Map<string, Map<string, string>>()
  evalCalls: (string | number)[][] = []
  execOverride: ExecResult | Error | undefined
  replicaAcks = 0

  wait = vi.fn(async (_replicas: number, _timeoutMs: number) => this.replicaAcks)
  hdel = vi.fn(async (key: string, ...fields: string[]) => {
    const hash = this.hashes.get(key)
    let removed = 0
    for (const field of fields) {
      if (hash?.delete(field)) removed++
    }
    return removed
  })

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hashes.get(key) ?? [])
  }

  multi() {
    const queued: (string | number)[][] = []
    const transaction = {
      eval: (script: string, numKeys: number, ...args: (string | number)[]) => {
        queued.push([script, numKeys, ...args])
        return transaction
      },
      exec: async (): Promise<ExecResult> => {
        this.evalCalls.push(...queued)
        if (this.execOverride instanceof Error) throw this.execOverride
        if (this.execOverride !== undefined) return this.execOverride
        return queued.map((call) => [null, this.runScript(call)])
      },
    }
    return transaction
  }

  setCell(key: string, field: string, raw: string): void {
    const hash = this.hashes.get(key) ?? new Map<string, string>()
    hash.set(field, raw)
    this.hashes.set(key, hash)
  }

  // Mirrors PUT_CELL_SCRIPT / DELETE_CELL_SCRIPT
  private runScript([script, , key, field, ...rest]: (string | number)[]): number {
    const hash = this.hashes.get(String(key)) ?? new Map<string, string>()
    this.hashes.set(String(key), hash)
    const current = hash.get(String(field))
    const storedTs = current === undefined ? undefined : (JSON.parse(current) as { ts: number }).ts

    if (script === PUT_CELL_SCRIPT) {
      const [cell, ts] = rest
      if (storedTs !== undefined && storedTs > Number(ts)) return 0
      hash.set(String(field), String(cell))
      return 1
    }

    const [ts] = rest
    if (storedTs === undefined || storedTs > Number(ts)) return 0
    hash.delete(String(field))
    return 1
  }
}

describe('RedisRowStore', () => {
  const START = 5_000_000
  let redis: FakeRedis
  let clock: ManualClock
  let store: RedisRowStore

  beforeEach(() => {
    redis = new FakeRedis()
    clock = new ManualClock(START)
    store = new RedisRowStore(redis as unknown as Redis, { clock })
  })

  describe('executeBatch', () => {
    it('should run one script per mutation inside a transaction', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('email', 'alice@example.test', 30).deleteColumn('old')
      await batch.execute()

      expect(redis.evalCalls).toEqual([
        [
          PUT_CELL_SCRIPT,
          1,
          'qu:rows:users:alice',
          'email',
          '{"v":"alice@example.test","ts":5000000,"exp":35000000}',
          '5000000',
        ],
        [DELETE_CELL_SCRIPT, 1, 'qu:rows:users:alice', 'old', '5000000'],
      ])
    })

    it('should encode permanent cells without an expiry', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('name', 'alice')
      await batch.execute()

      expect(redis.hashes.get('qu:rows:users:alice')?.get('name')).toBe('{"v":"alice","ts":5000000}')
    })

    it('should honour a custom key prefix', async () => {
      store = new RedisRowStore(redis as unknown as Redis, { clock, keyPrefix: 'app:' })
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('name', 'alice')
      await batch.execute()

      expect([...redis.hashes.keys()]).toEqual(['app:users:alice'])
    })

    it('should raise StorageError when a queued command fails', async () => {
      redis.execOverride = [[new Error('OOM command not allowed'), null]]
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      await expect(batch.execute()).rejects.toThrow('Batch mutation failed: OOM command not allowed')
      await expect(batch.execute()).rejects.toBeInstanceOf(StorageError)
    })

    it('should raise StorageError when the transaction is aborted', async () => {
      redis.execOverride = null
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      await expect(batch.execute()).rejects.toThrow('Batch transaction was aborted')
    })

    it('should wrap connection errors', async () => {
      const cause = new Error('Connection is closed.')
      redis.execOverride = cause
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      const error = await batch.execute().catch((e: unknown) => e)
      expect(error).toBeInstanceOf(StorageError)
      expect(error).toMatchObject({ message: 'Batch of 1 mutations failed', cause })
    })
  })

  describe('consistency levels', () => {
    beforeEach(() => {
      store = new RedisRowStore(redis as unknown as Redis, {
        clock,
        waitReplicas: { LOCAL_QUORUM: 2 },
      })
    })

    it('should wait for the configured replica count', async () => {
      redis.replicaAcks = 2
      const batch = store.prepareMutationBatch('LOCAL_QUORUM')
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      await batch.execute()

      expect(redis.wait).toHaveBeenCalledWith(2, 1000)
    })

    it('should fail when too few replicas acknowledge', async () => {
      redis.replicaAcks = 1
      const batch = store.prepareMutationBatch('LOCAL_QUORUM')
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      await expect(batch.execute()).rejects.toThrow(
        'Consistency level LOCAL_QUORUM not met: 1/2 replicas acknowledged within 1000ms'
      )
    })

    it('should not wait for levels without a replica requirement', async () => {
      const batch = store.prepareMutationBatch('ONE')
      batch.withRow('users', 'alice').putColumn('name', 'alice')

      await batch.execute()

      expect(redis.wait).not.toHaveBeenCalled()
    })
  })

  describe('readColumns', () => {
    it('should read back written columns filtered by prefix', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('_LOCK_b', '0').putColumn('_LOCK_a', '42', 10).putColumn('name', 'alice')
      await batch.execute()

      expect(await store.readColumns('users', 'alice', { prefix: '_LOCK_' })).toEqual([
        { name: '_LOCK_a', value: '42', timestamp: START, expiresAt: START + 10_000_000 },
        { name: '_LOCK_b', value: '0', timestamp: START },
      ])
    })

    it('should hide and purge expired cells', async () => {
      const batch = store.prepareMutationBatch()
      batch.withRow('users', 'alice').putColumn('probe', '1', 30).putColumn('name', 'alice')
      await batch.execute()

      clock.advanceSeconds(30)

      expect(await store.readColumns('users', 'alice')).toEqual([
        { name: 'name', value: 'alice', timestamp: START },
      ])
      expect(redis.hdel).toHaveBeenCalledWith('qu:rows:users:alice', 'probe')
      expect(redis.hashes.get('qu:rows:users:alice')?.has('probe')).toBe(false)
    })

    it('should skip cells it cannot decode', async () => {
      redis.setCell('qu:rows:users:alice', 'broken', 'not-json')
      redis.setCell('qu:rows:users:alice', 'partial', '{"v":1}')
      redis.setCell('qu:rows:users:alice', 'name', '{"v":"alice","ts":7}')

      expect(await store.readColumns('users', 'alice')).toEqual([{ name: 'name', value: 'alice', timestamp: 7 }])
    })

    it('should keep the newest write when batches arrive out of order', async () => {
      const newer = store.prepareMutationBatch().withTimestamp(START + 10)
      newer.withRow('users', 'alice').putColumn('name', 'new')
      await newer.execute()

      const older = store.prepareMutationBatch().withTimestamp(START)
      older.withRow('users', 'alice').putColumn('name', 'old')
      await older.execute()

      const columns = await store.readColumns('users', 'alice')
      expect(columns.map((c) => c.value)).toEqual(['new'])
    })
  })
})

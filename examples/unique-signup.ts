/**
 * Example: Reserving a username and an email address in one signup
 *
 * Runs against Redis when REDIS_HOST or REDIS_URL is set (or a config file
 * selects it), otherwise against the in-memory store.
 */

import Redis from 'ioredis'
import {
  bootstrap,
  loadConfigAuto,
  loadRedisConfig,
  validateConfig,
  NotUniqueError,
  type QuorumUniqueness,
} from '../src'

async function signup(runtime: QuorumUniqueness, username: string, email: string): Promise<boolean> {
  const constraint = runtime.createConstraint().addRow('usernames', username).addRow('emails', email)

  try {
    await constraint.acquireAndApplyMutation((batch) => {
      batch.withRow('accounts', username).putColumn('email', email)
    })
    runtime.logger.info({ username, token: constraint.getProbeToken() }, 'Account created')
    return true
  } catch (error) {
    if (error instanceof NotUniqueError) {
      runtime.logger.warn({ username, email, reason: error.message }, 'Signup rejected')
      return false
    }
    throw error
  }
}

async function main() {
  const config =
    loadConfigAuto() ??
    validateConfig({
      store: { type: loadRedisConfig() ? 'redis' : 'in-memory' },
      uniqueness: { ttlSeconds: 30 },
    })
  const redis =
    config.store.type === 'redis'
      ? new Redis(config.store.redis ?? loadRedisConfig() ?? { host: 'localhost', port: 6379 })
      : undefined
  const runtime = bootstrap(config, redis ? { redis } : {})

  try {
    await signup(runtime, 'alice', 'alice@example.test')
    // Same email, different username
    await signup(runtime, 'alice2', 'alice@example.test')
  } finally {
    await redis?.quit()
  }
}

main().catch((error) => {
  console.error('Example failed', error)
  process.exit(1)
})

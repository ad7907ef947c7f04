import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import knex from 'knex'
import db from '../db-knex'
import { QuotaService } from '../services/quotaService'
import { QuotaError } from '../services/errors'
import { createUser } from './helpers'

async function usedBy(userId: number): Promise<number | undefined> {
  const row: { used: number } | undefined = await db('generation_quotas')
    .where({ user_id: userId })
    .first()
  return row?.used
}

describe('QuotaService', () => {
  let quota: QuotaService
  let userId: number

  beforeEach(async () => {
    await db.migrate.latest()
    quota = new QuotaService(db, 5)
    userId = (await createUser('free-tier')).id
  })

  afterEach(async () => {
    await db.migrate.rollback()
  })

  it('counts down to zero', async () => {
    const remaining: number[] = []
    for (let i = 0; i < 5; i++) {
      remaining.push(await quota.consume(userId))
    }
    expect(remaining).toEqual([4, 3, 2, 1, 0])
  })

  it('refuses past the ceiling without touching the counter', async () => {
    for (let i = 0; i < 5; i++) {
      await quota.consume(userId)
    }

    const error = await quota.consume(userId).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(QuotaError)
    expect(error).toMatchObject({ code: 'QUOTA_EXHAUSTED', kind: 'quota_exhausted' })
    expect(await usedBy(userId)).toBe(5)
  })

  it('never goes over the ceiling under concurrent consumers', async () => {
    const results = await Promise.allSettled(Array.from({ length: 8 }, () => quota.consume(userId)))

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(5)
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(3)
    expect(await usedBy(userId)).toBe(5)
  })

  it('gives back exactly one unit per refund', async () => {
    await quota.consume(userId)
    await quota.consume(userId)

    expect(await quota.refund(userId)).toBe(true)
    expect(await usedBy(userId)).toBe(1)
    expect(await quota.remaining(userId)).toBe(4)
  })

  it('does nothing when there is nothing to refund', async () => {
    expect(await quota.refund(userId)).toBe(false)

    await quota.consume(userId)
    expect(await quota.refund(userId)).toBe(true)
    expect(await quota.refund(userId)).toBe(false)
    expect(await usedBy(userId)).toBe(0)
    expect(await quota.remaining(userId)).toBe(5)
  })

  it('reports the full allowance for users who never generated anything', async () => {
    expect(await quota.remaining(userId)).toBe(5)
  })

  it('surfaces storage failures as usage tracking unavailable', async () => {
    // No migrations on this connection, so the quota table is missing
    const broken = knex({ client: 'sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true })
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})

    try {
      await expect(new QuotaService(broken, 5).consume(userId)).rejects.toMatchObject({
        code: 'USAGE_TRACKING_UNAVAILABLE',
        kind: 'unavailable',
      })
      expect(errorSpy).toHaveBeenCalledTimes(1)
    } finally {
      errorSpy.mockRestore()
      await broken.destroy()
    }
  })
})

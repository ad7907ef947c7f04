import type { Knex } from 'knex'
import defaultDb from '../db-knex'
import { FREE_GENERATION_LIMIT } from '../config'
import { QuotaError } from './errors'

/**
 * Per-user counter of free AI generations. Each change is a single
 * conditional UPDATE on the user's row, so concurrent requests can never push
 * the counter past the ceiling or below zero.
 */
export class QuotaService {
  readonly ceiling: number

  constructor(
    private readonly db: Knex = defaultDb,
    ceiling: number = FREE_GENERATION_LIMIT,
  ) {
    this.ceiling = ceiling
  }

  /**
   * Uses one free generation and returns how many are left.
   * Throws QUOTA_EXHAUSTED without touching the counter once the ceiling is hit.
   */
  async consume(userId: number): Promise<number> {
    let used: number | null
    try {
      used = await this.db.transaction(async (trx) => {
        const now = new Date().toISOString()
        await trx('generation_quotas')
          .insert({ user_id: userId, used: 0, updated_at: now })
          .onConflict('user_id')
          .ignore()

        const updated = await trx('generation_quotas')
          .where({ user_id: userId })
          .andWhere('used', '<', this.ceiling)
          .update({ used: trx.raw('used + 1'), updated_at: now })
        if (updated === 0) {
          return null
        }

        const row: { used: number } | undefined = await trx('generation_quotas')
          .where({ user_id: userId })
          .select('used')
          .first()
        return row ? row.used : null
      })
    } catch (error) {
      console.error(`[quota] Failed to consume free generation for user ${userId}:`, error)
      throw new QuotaError('USAGE_TRACKING_UNAVAILABLE', { cause: error })
    }

    if (used === null) {
      throw new QuotaError('QUOTA_EXHAUSTED')
    }
    return Math.max(0, this.ceiling - used)
  }

  /**
   * Gives back one unit after a failure that was not the user's fault.
   * Resolves false when there was nothing to give back.
   */
  async refund(userId: number): Promise<boolean> {
    const updated = await this.db('generation_quotas')
      .where({ user_id: userId })
      .andWhere('used', '>', 0)
      .update({ used: this.db.raw('used - 1'), updated_at: new Date().toISOString() })
    return updated > 0
  }

  async remaining(userId: number): Promise<number> {
    const row: { used: number } | undefined = await this.db('generation_quotas')
      .where({ user_id: userId })
      .select('used')
      .first()
    return Math.max(0, this.ceiling - (row?.used ?? 0))
  }
}

export const quotaService = new QuotaService()

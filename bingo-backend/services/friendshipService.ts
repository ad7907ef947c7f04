import type { Knex } from 'knex'
import defaultDb from '../db-knex'

function orderedPair(userId1: number, userId2: number): [number, number] {
  return userId1 < userId2 ? [userId1, userId2] : [userId2, userId1]
}

export class FriendshipService {
  constructor(private readonly db: Knex = defaultDb) {}

  /**
   * Check if two users are friends
   */
  async areFriends(userId1: number, userId2: number): Promise<boolean> {
    const [smallerId, largerId] = orderedPair(userId1, userId2)

    const friendship = await this.db('friendships')
      .where({
        user_id_1: smallerId,
        user_id_2: largerId,
        status: 'accepted',
      })
      .first()

    return !!friendship
  }

  async createFriendship(
    userId1: number,
    userId2: number,
    status: 'accepted' | 'pending' = 'accepted',
  ): Promise<void> {
    const [smallerId, largerId] = orderedPair(userId1, userId2)

    await this.db('friendships').insert({
      user_id_1: smallerId,
      user_id_2: largerId,
      status,
      requested_by: userId1,
      created_at: new Date().toISOString(),
      updated_at: new Date().toISOString(),
    })
  }
}

export const friendshipService = new FriendshipService()

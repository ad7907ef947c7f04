import jwt from 'jsonwebtoken'
import db from '../db-knex'
import { JWT_SECRET } from '../config'
import { CardService } from '../services/cardService'
import { userService } from '../services/userService'
import type { RandomSource } from '../utils/grid'

// Mid-2026, so valid card years run 2020..2027
export const FIXED_NOW = new Date('2026-06-15T12:00:00.000Z')

/** Small seeded PRNG so shuffles are repeatable. */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function makeCardService(random: RandomSource = mulberry32(42)): CardService {
  return new CardService(db, { random, now: () => FIXED_NOW })
}

export async function createUser(username: string, emailVerified = false) {
  return userService.createUser(username, { emailVerified })
}

export function tokenFor(user: { id: number; username: string }): string {
  return jwt.sign({ id: user.id, username: user.username }, JWT_SECRET)
}

/** Fills every open slot of a draft with numbered goals. */
export async function fillCard(service: CardService, ownerId: number, cardId: string): Promise<void> {
  const card = await service.getCard(ownerId, cardId)
  for (let i = card.items.length; i < card.capacity; i++) {
    await service.addItem(ownerId, cardId, { content: `Goal ${i + 1}` })
  }
}

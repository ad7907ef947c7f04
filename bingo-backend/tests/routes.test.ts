import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import db from '../db-knex'
import { createApp } from '../hono-app'
import { QuotaService } from '../services/quotaService'
import { GenerationError, type GoalGenerator } from '../utils/openai'
import type { GoalPrompt } from '../utils/goalSchema'
import { createUser, tokenFor } from './helpers'

const YEAR = new Date().getFullYear()

class FakeGenerator implements GoalGenerator {
  calls = 0
  failure: GenerationError | null = null

  async generateGoals(prompt: GoalPrompt): Promise<string[]> {
    this.calls++
    if (this.failure) throw this.failure
    return Array.from({ length: prompt.count }, (_, i) => `Idea ${i + 1}`)
  }
}

describe('API routes', () => {
  let app: ReturnType<typeof createApp>
  let generator: FakeGenerator
  let token: string
  let otherToken: string

  function call(method: string, path: string, body?: unknown, bearer: string | null = token) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (bearer) headers.Authorization = `Bearer ${bearer}`
    return app.request(path, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    })
  }

  async function createCard(body: Record<string, unknown> = {}): Promise<string> {
    const res = await call('POST', '/api/cards', { year: YEAR, ...body })
    expect(res.status).toBe(201)
    const data = (await res.json()) as { id: string }
    return data.id
  }

  beforeEach(async () => {
    await db.migrate.latest()
    generator = new FakeGenerator()
    app = createApp({ generator, quota: new QuotaService(db, 5) })
    token = tokenFor(await createUser('alice'))
    otherToken = tokenFor(await createUser('bob'))
  })

  afterEach(async () => {
    await db.migrate.rollback()
  })

  describe('authentication', () => {
    it('rejects requests without a token', async () => {
      const res = await call('GET', '/api/cards', undefined, null)
      expect(res.status).toBe(401)
      expect(await res.json()).toEqual({ error: 'Unauthorized', code: 'UNAUTHORIZED' })
    })

    it('rejects malformed tokens', async () => {
      const res = await call('GET', '/api/cards', undefined, 'not-a-real-token')
      expect(res.status).toBe(401)
    })
  })

  describe('cards', () => {
    it('creates and lists cards', async () => {
      const id = await createCard({ gridSize: 3, title: 'Outdoors' })

      const res = await call('GET', '/api/cards')
      expect(res.status).toBe(200)
      const cards = (await res.json()) as Array<{ id: string; title: string; capacity: number }>
      expect(cards).toHaveLength(1)
      expect(cards[0]).toMatchObject({ id, title: 'Outdoors', capacity: 8 })
    })

    it('maps conflicts to 409', async () => {
      await createCard()
      const res = await call('POST', '/api/cards', { year: YEAR })
      expect(res.status).toBe(409)
      expect(await res.json()).toEqual({
        error: 'card already exists for this year',
        code: 'CARD_ALREADY_EXISTS',
      })
    })

    it('rejects malformed bodies with 400', async () => {
      const res = await call('POST', '/api/cards', { year: 'next' })
      expect(res.status).toBe(400)
      const data = (await res.json()) as { code: string }
      expect(data.code).toBe('INVALID_REQUEST')
    })

    it('maps validation errors to 400', async () => {
      const res = await call('POST', '/api/cards', { year: YEAR, gridSize: 7 })
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'invalid grid size', code: 'INVALID_GRID_SIZE' })
    })

    it('maps ownership to 403 and missing cards to 404', async () => {
      const id = await createCard()

      const foreign = await call('GET', `/api/cards/${id}`, undefined, otherToken)
      expect(foreign.status).toBe(403)
      expect(await foreign.json()).toEqual({ error: 'you do not own this card', code: 'NOT_CARD_OWNER' })

      const missing = await call('GET', '/api/cards/no-such-card')
      expect(missing.status).toBe(404)
      expect(await missing.json()).toEqual({ error: 'card not found', code: 'CARD_NOT_FOUND' })
    })

    it('lists missing positions when finalizing too early', async () => {
      const id = await createCard({ gridSize: 2 })
      await call('POST', `/api/cards/${id}/items`, { content: 'Learn to juggle' })

      const res = await call('POST', `/api/cards/${id}/finalize`, {})
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'card needs 3 items, has 1',
        code: 'INCOMPLETE_GRID',
        missingPositions: [2, 3],
      })
    })

    it('runs a card from draft to stats', async () => {
      const id = await createCard({ gridSize: 2 })
      for (const content of ['Swim', 'Bike', 'Run']) {
        const added = await call('POST', `/api/cards/${id}/items`, { content })
        expect(added.status).toBe(201)
      }

      const early = await call('PUT', `/api/cards/${id}/items/1/complete`, {})
      expect(early.status).toBe(400)
      expect(await early.json()).toMatchObject({ code: 'CARD_NOT_FINALIZED' })

      const finalized = await call('POST', `/api/cards/${id}/finalize`, { visibleToFriends: false })
      expect(finalized.status).toBe(200)
      expect(await finalized.json()).toMatchObject({ state: 'finalized', visibleToFriends: false })

      const completed = await call('PUT', `/api/cards/${id}/items/1/complete`, { notes: 'Lake swim' })
      expect(completed.status).toBe(200)
      expect(await completed.json()).toMatchObject({ content: 'Swim', isCompleted: true, notes: 'Lake swim' })

      const stats = await call('GET', `/api/cards/${id}/stats`)
      expect(stats.status).toBe(200)
      // 2x2 with FREE at 0: completing 1 finishes row 0
      expect(await stats.json()).toMatchObject({
        totalItems: 3,
        completedItems: 1,
        bingosAchieved: 1,
        completedLines: [{ kind: 'row', index: 0, positions: [0, 1] }],
      })
    })

    it('rejects non-numeric positions', async () => {
      const id = await createCard()
      const res = await call('DELETE', `/api/cards/${id}/items/first`)
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'position must be an integer', code: 'INVALID_REQUEST' })
    })

    it('requires a year when checking for conflicts', async () => {
      for (const query of ['', '?year=', '?year=%20', '?year=20.5']) {
        const res = await call('GET', `/api/cards/conflict${query}`)
        expect(res.status).toBe(400)
        expect(await res.json()).toEqual({ error: 'year must be an integer', code: 'INVALID_REQUEST' })
      }
    })

    it('returns the existing card when an import conflicts', async () => {
      const id = await createCard({ title: 'Books' })

      const res = await call('POST', '/api/cards/import', {
        year: YEAR,
        title: 'Books',
        gridSize: 2,
        items: [{ position: 1, content: 'Read a classic' }],
      })
      expect(res.status).toBe(409)
      expect(await res.json()).toEqual({
        error: 'you already have a card with this title for this year',
        code: 'CARD_TITLE_EXISTS',
        existingCard: { id, title: 'Books', year: YEAR, itemCount: 0, isFinalized: false },
      })

      const check = await call('GET', `/api/cards/conflict?year=${YEAR}&title=Books`)
      expect(await check.json()).toEqual({
        hasConflict: true,
        existingCard: { id, title: 'Books', year: YEAR, itemCount: 0, isFinalized: false },
      })
    })

    it('applies bulk operations only to cards the caller owns', async () => {
      const mine = await createCard()
      const res = await call('POST', '/api/cards', { year: YEAR }, otherToken)
      const theirs = ((await res.json()) as { id: string }).id

      const deleted = await call('POST', '/api/cards/bulk/delete', { cardIds: [mine, theirs] })
      expect(await deleted.json()).toEqual({ success: true, count: 1 })

      const stillThere = await call('GET', `/api/cards/${theirs}`, undefined, otherToken)
      expect(stillThere.status).toBe(200)
    })
  })

  describe('suggestions', () => {
    it('serves ideas without a login', async () => {
      const res = await call('GET', '/api/suggestions?category=fun', undefined, null)
      expect(res.status).toBe(200)
      const body = (await res.json()) as { suggestions: Array<{ content: string }> }
      expect(body.suggestions.map((s) => s.content)).toEqual([
        'Build a blanket fort',
        'Fly a kite',
        'Go to a karaoke night and sing a full song',
        'Learn a card trick well enough to fool someone',
        'Try an escape room',
        'Watch every film in a trilogy in one day',
      ])
    })

    it('returns all ideas, grouped ideas and categories', async () => {
      const all = (await (await call('GET', '/api/suggestions')).json()) as { suggestions: unknown[] }
      expect(all.suggestions).toHaveLength(48)

      const grouped = (await (await call('GET', '/api/suggestions?grouped=true')).json()) as {
        grouped: Array<{ category: string; name: string }>
      }
      expect(grouped.grouped).toHaveLength(8)
      expect(grouped.grouped[0]).toMatchObject({ category: 'personal', name: 'Personal Growth' })

      const categories = await call('GET', '/api/suggestions/categories')
      expect(await categories.json()).toEqual({
        categories: ['food', 'fun', 'health', 'hobbies', 'personal', 'professional', 'social', 'travel'],
      })
    })

    it('rejects an unknown category', async () => {
      const res = await call('GET', '/api/suggestions?category=chores')
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Unknown category: chores', code: 'INVALID_REQUEST' })
    })
  })

  describe('goal generation', () => {
    const prompt = { category: 'health', difficulty: 'easy', budget: 'free', count: 3 }

    it('spends a free generation for unverified users', async () => {
      const res = await call('POST', '/api/ai/generate', prompt)
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ goals: ['Idea 1', 'Idea 2', 'Idea 3'], freeRemaining: 4 })

      const quota = await call('GET', '/api/ai/quota')
      expect(await quota.json()).toEqual({ emailVerified: false, limit: 5, freeRemaining: 4 })
    })

    it('does not meter verified users', async () => {
      const verified = tokenFor(await createUser('carol', true))

      const res = await call('POST', '/api/ai/generate', prompt, verified)
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({ freeRemaining: null })

      const quota = await call('GET', '/api/ai/quota', undefined, verified)
      expect(await quota.json()).toEqual({ emailVerified: true, limit: 5, freeRemaining: null })
    })

    it('refunds when the provider is down', async () => {
      generator.failure = new GenerationError('provider_unavailable', 'AI provider is currently unavailable')

      const res = await call('POST', '/api/ai/generate', prompt)
      expect(res.status).toBe(503)
      expect(await res.json()).toEqual({
        error: 'AI provider is currently unavailable',
        code: 'PROVIDER_UNAVAILABLE',
        freeRemaining: 5,
      })

      const quota = await call('GET', '/api/ai/quota')
      expect(await quota.json()).toMatchObject({ freeRemaining: 5 })
    })

    it('leaves freeRemaining out of errors for verified users', async () => {
      const verified = tokenFor(await createUser('dave', true))
      generator.failure = new GenerationError('rate_limited', 'AI provider rate limit exceeded')

      const res = await call('POST', '/api/ai/generate', prompt, verified)
      expect(res.status).toBe(429)
      expect(await res.json()).toEqual({
        error: 'AI provider rate limit exceeded',
        code: 'RATE_LIMITED',
      })
    })

    it('keeps the unit when the request itself was refused', async () => {
      generator.failure = new GenerationError('safety_violation', 'generated content violated safety policies')

      const res = await call('POST', '/api/ai/generate', prompt)
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'generated content violated safety policies',
        code: 'SAFETY_VIOLATION',
        freeRemaining: 4,
      })

      const quota = await call('GET', '/api/ai/quota')
      expect(await quota.json()).toMatchObject({ freeRemaining: 4 })
    })

    it('answers 403 once the free generations are gone', async () => {
      for (let i = 0; i < 5; i++) {
        const res = await call('POST', '/api/ai/generate', prompt)
        expect(res.status).toBe(200)
      }

      const res = await call('POST', '/api/ai/generate', prompt)
      expect(res.status).toBe(403)
      expect(await res.json()).toEqual({
        error: 'free generations used up; verify your email to continue',
        code: 'QUOTA_EXHAUSTED',
        freeRemaining: 0,
      })
      expect(generator.calls).toBe(5)
    })

    it('validates the prompt', async () => {
      const res = await call('POST', '/api/ai/generate', { ...prompt, count: 30 })
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'count: Count must be between 1 and 24',
        code: 'INVALID_REQUEST',
      })
      expect(generator.calls).toBe(0)
    })
  })
})

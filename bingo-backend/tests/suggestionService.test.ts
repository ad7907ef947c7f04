import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import db from '../db-knex'
import { SuggestionService } from '../services/suggestionService'

const FUN_IDEAS = [
  'Build a blanket fort',
  'Fly a kite',
  'Go to a karaoke night and sing a full song',
  'Learn a card trick well enough to fool someone',
  'Try an escape room',
  'Watch every film in a trilogy in one day',
]

describe('SuggestionService', () => {
  let service: SuggestionService

  beforeEach(async () => {
    await db.migrate.latest()
    service = new SuggestionService(db)
  })

  afterEach(async () => {
    await db.migrate.rollback()
  })

  it('serves the seeded ideas ordered by category then content', async () => {
    const all = await service.getAll()

    expect(all).toHaveLength(48)
    expect(all[0]).toMatchObject({ category: 'food', content: 'Bake a loaf of bread from scratch' })
    expect(all[all.length - 1]).toMatchObject({
      category: 'travel',
      content: 'Watch a sunrise from a hilltop',
    })
  })

  it('filters by category', async () => {
    const fun = await service.getByCategory('fun')
    expect(fun.map((s) => s.content)).toEqual(FUN_IDEAS)
    expect(fun.every((s) => s.category === 'fun')).toBe(true)
  })

  it('lists the categories that have ideas', async () => {
    expect(await service.getCategories()).toEqual([
      'food',
      'fun',
      'health',
      'hobbies',
      'personal',
      'professional',
      'social',
      'travel',
    ])
  })

  it('groups ideas in card category order', async () => {
    const groups = await service.getGroupedByCategory()

    expect(groups.map((g) => [g.category, g.name, g.suggestions.length])).toEqual([
      ['personal', 'Personal Growth', 6],
      ['health', 'Health & Fitness', 6],
      ['food', 'Food & Dining', 6],
      ['travel', 'Travel & Adventure', 6],
      ['hobbies', 'Hobbies & Creativity', 6],
      ['social', 'Social & Relationships', 6],
      ['professional', 'Professional & Career', 6],
      ['fun', 'Fun & Silly', 6],
    ])
    expect(groups[7]?.suggestions.map((s) => s.content)).toEqual(FUN_IDEAS)
  })

  it('hides inactive ideas everywhere', async () => {
    await db('suggestions').where({ content: 'Fly a kite' }).update({ is_active: false })
    await db('suggestions').where({ category: 'travel' }).update({ is_active: false })

    expect(await service.getAll()).toHaveLength(41)
    expect((await service.getByCategory('fun')).map((s) => s.content)).not.toContain('Fly a kite')
    expect(await service.getByCategory('travel')).toEqual([])
    expect(await service.getCategories()).not.toContain('travel')
    expect((await service.getGroupedByCategory()).map((g) => g.category)).toEqual([
      'personal',
      'health',
      'food',
      'hobbies',
      'social',
      'professional',
      'fun',
    ])
  })
})

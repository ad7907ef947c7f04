import type { Knex } from 'knex'
import defaultDb from '../db-knex'
import { CARD_CATEGORIES, isValidCategory, type CardCategory } from '../utils/categories'

export interface Suggestion {
  id: number
  category: CardCategory
  content: string
}

export interface SuggestionGroup {
  category: CardCategory
  name: string
  suggestions: Suggestion[]
}

interface SuggestionRow {
  id: number
  category: CardCategory
  content: string
}

function toSuggestion(row: SuggestionRow): Suggestion {
  return { id: row.id, category: row.category, content: row.content }
}

/**
 * Curated goal ideas seeded by migration. Inactive rows stay in the table
 * but are never served.
 */
export class SuggestionService {
  constructor(private readonly db: Knex = defaultDb) {}

  async getAll(): Promise<Suggestion[]> {
    const rows: SuggestionRow[] = await this.db('suggestions')
      .where('is_active', true)
      .orderBy('category')
      .orderBy('content')
      .select('id', 'category', 'content')
    return rows.map(toSuggestion)
  }

  async getByCategory(category: CardCategory): Promise<Suggestion[]> {
    const rows: SuggestionRow[] = await this.db('suggestions')
      .where({ is_active: true, category })
      .orderBy('content')
      .select('id', 'category', 'content')
    return rows.map(toSuggestion)
  }

  async getCategories(): Promise<CardCategory[]> {
    const rows: Array<{ category: CardCategory }> = await this.db('suggestions')
      .where('is_active', true)
      .distinct('category')
      .orderBy('category')
    return rows.map((row) => row.category)
  }

  /** Groups follow the card category order; empty categories are left out. */
  async getGroupedByCategory(): Promise<SuggestionGroup[]> {
    const byCategory = new Map<CardCategory, Suggestion[]>()
    for (const suggestion of await this.getAll()) {
      const group = byCategory.get(suggestion.category)
      if (group) {
        group.push(suggestion)
      } else {
        byCategory.set(suggestion.category, [suggestion])
      }
    }

    const groups: SuggestionGroup[] = []
    for (const [category, name] of Object.entries(CARD_CATEGORIES)) {
      if (!isValidCategory(category)) continue
      const suggestions = byCategory.get(category)
      if (suggestions) {
        groups.push({ category, name, suggestions })
      }
    }
    return groups
  }
}

export const suggestionService = new SuggestionService()

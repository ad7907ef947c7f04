import crypto from 'crypto'
import type { Knex } from 'knex'
import defaultDb from '../db-knex'
import { isValidCategory, type CardCategory } from '../utils/categories'
import {
  capacity,
  completedLines,
  createGridConfig,
  defaultFreeSpacePosition,
  isFreeSpacePosition,
  isPositionInRange,
  isValidGridSize,
  isValidHeaderText,
  isValidItemPosition,
  lowestOpenPosition,
  missingPositions,
  normalizeHeaderText,
  pickRandom,
  shuffleInPlace,
  totalSquares,
  usablePositions,
  type GridConfig,
  type RandomSource,
} from '../utils/grid'
import {
  CardExistsError,
  CardServiceError,
  IncompleteGridError,
  type CardSummary,
} from './errors'
import { FriendshipService } from './friendshipService'
import type {
  AddItemParams,
  BingoCard,
  BingoItem,
  CardStats,
  CloneParams,
  CloneResult,
  CompleteItemParams,
  CreateCardParams,
  FinalizeParams,
  ImportCardParams,
  UpdateConfigParams,
  UpdateItemParams,
  UpdateMetaParams,
  UpdateNotesParams,
} from './cardTypes'

export const MIN_CARD_YEAR = 2020
export const MAX_TITLE_LENGTH = 100
export const MAX_CONTENT_LENGTH = 500

type Queryable = Knex | Knex.Transaction

// SQLite hands booleans back as 0/1
type DbBoolean = boolean | number

interface CardRow {
  id: string
  user_id: number
  year: number
  title: string | null
  category: string | null
  grid_size: number
  header_text: string
  has_free_space: DbBoolean
  free_space_position: number | null
  is_finalized: DbBoolean
  is_archived: DbBoolean
  visible_to_friends: DbBoolean
  created_at: string
  updated_at: string
}

interface ItemRow {
  id: string
  card_id: string
  position: number
  content: string
  is_completed: DbBoolean
  completed_at: string | null
  notes: string | null
  proof_url: string | null
  created_at: string
}

interface ItemMove {
  item: BingoItem
  position: number
}

export interface CardServiceOptions {
  random?: RandomSource
  now?: () => Date
  friendships?: FriendshipService
}

function cardDisplayName(title: string | null, year: number): string {
  return title ? title : `${year} Bingo Card`
}

function toGrid(row: CardRow): GridConfig {
  if (!isValidGridSize(row.grid_size)) {
    throw new Error(`Card ${row.id} has an unsupported grid size: ${row.grid_size}`)
  }
  const hasFreeSpace = Boolean(row.has_free_space)
  if (hasFreeSpace && row.free_space_position === null) {
    throw new Error(`Card ${row.id} has a free space without a position`)
  }
  return {
    size: row.grid_size,
    hasFreeSpace,
    freeSpacePosition: hasFreeSpace ? row.free_space_position : null,
    headerText: row.header_text,
  }
}

function toCategory(row: CardRow): CardCategory | null {
  if (row.category === null) return null
  if (!isValidCategory(row.category)) {
    throw new Error(`Card ${row.id} has an unknown category: ${row.category}`)
  }
  return row.category
}

function toItem(row: ItemRow): BingoItem {
  return {
    id: row.id,
    cardId: row.card_id,
    position: row.position,
    content: row.content,
    isCompleted: Boolean(row.is_completed),
    completedAt: row.completed_at,
    notes: row.notes,
    proofUrl: row.proof_url,
    createdAt: row.created_at,
  }
}

function toItemRow(item: BingoItem): ItemRow {
  return {
    id: item.id,
    card_id: item.cardId,
    position: item.position,
    content: item.content,
    is_completed: item.isCompleted,
    completed_at: item.completedAt,
    notes: item.notes,
    proof_url: item.proofUrl,
    created_at: item.createdAt,
  }
}

function toCard(row: CardRow, itemRows: ItemRow[]): BingoCard {
  const grid = toGrid(row)
  return {
    id: row.id,
    userId: row.user_id,
    year: row.year,
    title: row.title,
    category: toCategory(row),
    displayName: cardDisplayName(row.title, row.year),
    grid,
    capacity: capacity(grid),
    state: row.is_finalized ? 'finalized' : 'draft',
    isArchived: Boolean(row.is_archived),
    visibleToFriends: Boolean(row.visible_to_friends),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    items: itemRows.map(toItem).sort((a, b) => a.position - b.position),
  }
}

// Titles are measured in code points so an astral character is never split
function truncateText(text: string, maxLength: number): string {
  return Array.from(text).slice(0, maxLength).join('')
}

function normalizeTitle(title: string | null | undefined): string | null {
  const trimmed = title?.trim() ?? ''
  if (trimmed === '') return null
  if (Array.from(trimmed).length > MAX_TITLE_LENGTH) {
    throw new CardServiceError('TITLE_TOO_LONG')
  }
  return trimmed
}

function normalizeCategory(category: string | null | undefined): CardCategory | null {
  if (!category) return null
  if (!isValidCategory(category)) {
    throw new CardServiceError('INVALID_CATEGORY')
  }
  return category
}

function normalizeContent(content: string): string {
  const trimmed = content.trim()
  if (trimmed === '') {
    throw new CardServiceError('CONTENT_REQUIRED')
  }
  if (trimmed.length > MAX_CONTENT_LENGTH) {
    throw new CardServiceError('CONTENT_TOO_LONG')
  }
  return trimmed
}

function normalizeOptionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? ''
  return trimmed === '' ? null : trimmed
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const code = 'code' in error ? error.code : undefined
  if (code === '23505') return true
  return code === 'SQLITE_CONSTRAINT' && error.message.includes('UNIQUE constraint failed')
}

function cardConflictError(title: string | null): CardServiceError {
  return new CardServiceError(title === null ? 'CARD_ALREADY_EXISTS' : 'CARD_TITLE_EXISTS')
}

function assertOwner(card: BingoCard, ownerId: number): void {
  if (card.userId !== ownerId) {
    throw new CardServiceError('NOT_CARD_OWNER')
  }
}

function assertDraft(card: BingoCard): void {
  if (card.state === 'finalized') {
    throw new CardServiceError('CARD_FINALIZED')
  }
}

function assertFinalized(card: BingoCard): void {
  if (card.state !== 'finalized') {
    throw new CardServiceError('CARD_NOT_FINALIZED')
  }
}

function findItem(card: BingoCard, position: number): BingoItem {
  const item = card.items.find((i) => i.position === position)
  if (!item) {
    throw new CardServiceError('ITEM_NOT_FOUND')
  }
  return item
}

/**
 * All mutations of a card and its items. Every operation loads the card
 * inside its own transaction, so writes to one card are serialized and
 * reads see a consistent card + items snapshot.
 */
export class CardService {
  private readonly db: Knex
  private readonly random: RandomSource
  private readonly now: () => Date
  private readonly friendships: FriendshipService
  private readonly rowLocks: boolean

  constructor(db: Knex = defaultDb, options: CardServiceOptions = {}) {
    this.db = db
    this.random = options.random ?? Math.random
    this.now = options.now ?? (() => new Date())
    this.friendships = options.friendships ?? new FriendshipService(db)
    // SQLite serializes writers on its single connection and has no FOR UPDATE
    this.rowLocks = db.client.dialect !== 'sqlite3'
  }

  private timestamp(): string {
    return this.now().toISOString()
  }

  private validateYear(year: number): number {
    const maxYear = this.now().getFullYear() + 1
    if (!Number.isInteger(year) || year < MIN_CARD_YEAR || year > maxYear) {
      throw new CardServiceError('INVALID_YEAR')
    }
    return year
  }

  private async loadCard(q: Queryable, cardId: string, lock = false): Promise<BingoCard> {
    const query = q('bingo_cards').where({ id: cardId })
    if (lock && this.rowLocks) query.forUpdate()
    const row: CardRow | undefined = await query.first()
    if (!row) {
      throw new CardServiceError('CARD_NOT_FOUND')
    }
    const items: ItemRow[] = await q('bingo_items').where({ card_id: cardId }).orderBy('position')
    return toCard(row, items)
  }

  private async loadOwnedCard(q: Queryable, ownerId: number, cardId: string): Promise<BingoCard> {
    const card = await this.loadCard(q, cardId, true)
    assertOwner(card, ownerId)
    return card
  }

  private async withItems(q: Queryable, rows: CardRow[]): Promise<BingoCard[]> {
    if (rows.length === 0) return []
    const itemRows: ItemRow[] = await q('bingo_items')
      .whereIn(
        'card_id',
        rows.map((r) => r.id),
      )
      .orderBy('position')

    const byCard = new Map<string, ItemRow[]>()
    for (const item of itemRows) {
      const list = byCard.get(item.card_id) ?? []
      list.push(item)
      byCard.set(item.card_id, list)
    }
    return rows.map((row) => toCard(row, byCard.get(row.id) ?? []))
  }

  private async findConflict(
    q: Queryable,
    ownerId: number,
    year: number,
    title: string | null,
    excludeCardId?: string,
  ): Promise<CardRow | undefined> {
    const query = q('bingo_cards').where({ user_id: ownerId, year })
    if (title === null) {
      query.whereNull('title')
    } else {
      query.where({ title })
    }
    if (excludeCardId) {
      query.whereNot({ id: excludeCardId })
    }
    return query.first()
  }

  private async assertNoConflict(
    q: Queryable,
    ownerId: number,
    year: number,
    title: string | null,
    excludeCardId?: string,
  ): Promise<void> {
    if (await this.findConflict(q, ownerId, year, title, excludeCardId)) {
      throw cardConflictError(title)
    }
  }

  private async summarize(q: Queryable, row: CardRow): Promise<CardSummary> {
    const counted: { count?: number | string } | undefined = await q('bingo_items')
      .where({ card_id: row.id })
      .count({ count: '*' })
      .first()
    return {
      id: row.id,
      title: row.title,
      year: row.year,
      itemCount: Number(counted?.count ?? 0),
      isFinalized: Boolean(row.is_finalized),
    }
  }

  private async insertCard(
    q: Queryable,
    ownerId: number,
    fields: {
      year: number
      title: string | null
      category: CardCategory | null
      grid: GridConfig
      isFinalized?: boolean
      visibleToFriends?: boolean
    },
  ): Promise<CardRow> {
    const now = this.timestamp()
    const row: CardRow = {
      id: crypto.randomUUID(),
      user_id: ownerId,
      year: fields.year,
      title: fields.title,
      category: fields.category,
      grid_size: fields.grid.size,
      header_text: fields.grid.headerText,
      has_free_space: fields.grid.hasFreeSpace,
      free_space_position: fields.grid.freeSpacePosition,
      is_finalized: fields.isFinalized ?? false,
      is_archived: false,
      visible_to_friends: fields.visibleToFriends ?? true,
      created_at: now,
      updated_at: now,
    }
    await q('bingo_cards').insert(row)
    return row
  }

  private newItem(cardId: string, position: number, content: string): BingoItem {
    return {
      id: crypto.randomUUID(),
      cardId,
      position,
      content,
      isCompleted: false,
      completedAt: null,
      notes: null,
      proofUrl: null,
      createdAt: this.timestamp(),
    }
  }

  private async touch(q: Queryable, cardId: string, changes: Partial<CardRow> = {}): Promise<void> {
    await q('bingo_cards')
      .where({ id: cardId })
      .update({ ...changes, updated_at: this.timestamp() })
  }

  /**
   * Rewrites the positions of the given items. Rows are deleted and inserted
   * again so a permutation never trips the (card_id, position) unique index
   * halfway through.
   */
  private async moveItems(q: Queryable, grid: GridConfig, moves: ItemMove[]): Promise<void> {
    if (moves.length === 0) return
    for (const move of moves) {
      if (isFreeSpacePosition(grid, move.position)) {
        throw new CardServiceError('NO_SPACE_FOR_FREE')
      }
    }
    await q('bingo_items')
      .whereIn(
        'id',
        moves.map((m) => m.item.id),
      )
      .del()
    await q('bingo_items').insert(
      moves.map((m) => toItemRow({ ...m.item, position: m.position })),
    )
  }

  private async transaction<T>(work: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return this.db.transaction(work)
  }

  async create(ownerId: number, params: CreateCardParams): Promise<BingoCard> {
    const category = normalizeCategory(params.category)
    const title = normalizeTitle(params.title)
    const year = this.validateYear(params.year)
    const grid = createGridConfig({
      size: params.gridSize,
      hasFreeSpace: params.hasFreeSpace,
      headerText: params.headerText,
    })

    try {
      return await this.transaction(async (trx) => {
        await this.assertNoConflict(trx, ownerId, year, title)
        const row = await this.insertCard(trx, ownerId, { year, title, category, grid })
        return toCard(row, [])
      })
    } catch (error) {
      if (isUniqueViolation(error)) throw cardConflictError(title)
      throw error
    }
  }

  async getCard(ownerId: number, cardId: string): Promise<BingoCard> {
    return this.transaction((trx) => this.loadOwnedCard(trx, ownerId, cardId))
  }

  async listByUser(ownerId: number): Promise<BingoCard[]> {
    return this.transaction(async (trx) => {
      const rows: CardRow[] = await trx('bingo_cards')
        .where({ user_id: ownerId })
        .orderBy([
          { column: 'year', order: 'desc' },
          { column: 'created_at', order: 'desc' },
        ])
      return this.withItems(trx, rows)
    })
  }

  /**
   * Finalized cards from years before the current one
   */
  async getArchive(ownerId: number): Promise<BingoCard[]> {
    const currentYear = this.now().getFullYear()
    return this.transaction(async (trx) => {
      const rows: CardRow[] = await trx('bingo_cards')
        .where({ user_id: ownerId, is_finalized: true })
        .andWhere('year', '<', currentYear)
        .orderBy([
          { column: 'year', order: 'desc' },
          { column: 'created_at', order: 'desc' },
        ])
      return this.withItems(trx, rows)
    })
  }

  async listFriendCards(viewerId: number, friendId: number): Promise<BingoCard[]> {
    if (viewerId !== friendId && !(await this.friendships.areFriends(viewerId, friendId))) {
      throw new CardServiceError('NOT_FRIENDS')
    }
    return this.transaction(async (trx) => {
      const rows: CardRow[] = await trx('bingo_cards')
        .where({ user_id: friendId, is_finalized: true, visible_to_friends: true })
        .orderBy([
          { column: 'year', order: 'desc' },
          { column: 'created_at', order: 'desc' },
        ])
      return this.withItems(trx, rows)
    })
  }

  async addItem(ownerId: number, cardId: string, params: AddItemParams): Promise<BingoItem> {
    const content = normalizeContent(params.content)

    try {
      return await this.transaction(async (trx) => {
        const card = await this.loadOwnedCard(trx, ownerId, cardId)
        assertDraft(card)
        if (card.items.length >= card.capacity) {
          throw new CardServiceError('CARD_FULL')
        }

        const occupied = card.items.map((i) => i.position)
        let position: number
        if (params.position === undefined) {
          const open = lowestOpenPosition(card.grid, occupied)
          if (open === null) throw new CardServiceError('CARD_FULL')
          position = open
        } else {
          if (!isValidItemPosition(card.grid, params.position)) {
            throw new CardServiceError('INVALID_POSITION')
          }
          if (occupied.includes(params.position)) {
            throw new CardServiceError('POSITION_OCCUPIED')
          }
          position = params.position
        }

        const item = this.newItem(card.id, position, content)
        await trx('bingo_items').insert(toItemRow(item))
        await this.touch(trx, card.id)
        return item
      })
    } catch (error) {
      // Two writers raced past the occupancy check; the unique index decides
      if (isUniqueViolation(error)) throw new CardServiceError('POSITION_OCCUPIED')
      throw error
    }
  }

  async updateItem(
    ownerId: number,
    cardId: string,
    position: number,
    params: UpdateItemParams,
  ): Promise<BingoItem> {
    const content = params.content === undefined ? undefined : normalizeContent(params.content)

    try {
      return await this.transaction(async (trx) => {
        const card = await this.loadOwnedCard(trx, ownerId, cardId)
        assertDraft(card)
        const item = findItem(card, position)

        const updated: BingoItem = { ...item, content: content ?? item.content }
        if (params.position !== undefined && params.position !== item.position) {
          if (!isValidItemPosition(card.grid, params.position)) {
            throw new CardServiceError('INVALID_POSITION')
          }
          if (card.items.some((i) => i.position === params.position)) {
            throw new CardServiceError('POSITION_OCCUPIED')
          }
          updated.position = params.position
        }

        await trx('bingo_items')
          .where({ id: item.id })
          .update({ content: updated.content, position: updated.position })
        await this.touch(trx, card.id)
        return updated
      })
    } catch (error) {
      if (isUniqueViolation(error)) throw new CardServiceError('POSITION_OCCUPIED')
      throw error
    }
  }

  async removeItem(ownerId: number, cardId: string, position: number): Promise<void> {
    await this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertDraft(card)

      const removed = await trx('bingo_items').where({ card_id: card.id, position }).del()
      if (removed === 0) {
        throw new CardServiceError('ITEM_NOT_FOUND')
      }
      await this.touch(trx, card.id)
    })
  }

  /**
   * Permutes the items across the positions they already occupy. The FREE
   * cell is never part of the permutation.
   */
  async shuffle(ownerId: number, cardId: string, random: RandomSource = this.random): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertDraft(card)
      if (card.items.length === 0) {
        return card
      }

      const positions = shuffleInPlace(
        card.items.map((i) => i.position),
        random,
      )
      await this.moveItems(
        trx,
        card.grid,
        card.items.map((item, i) => ({ item, position: positions[i] })),
      )
      await this.touch(trx, card.id)
      return this.loadCard(trx, card.id)
    })
  }

  /**
   * Exchanges whatever sits at two non-FREE positions. One side may be empty.
   */
  async swap(ownerId: number, cardId: string, pos1: number, pos2: number): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertDraft(card)
      if (!isValidItemPosition(card.grid, pos1) || !isValidItemPosition(card.grid, pos2)) {
        throw new CardServiceError('INVALID_POSITION')
      }
      if (pos1 === pos2) {
        return card
      }

      const item1 = card.items.find((i) => i.position === pos1)
      const item2 = card.items.find((i) => i.position === pos2)
      if (!item1 && !item2) {
        throw new CardServiceError('ITEM_NOT_FOUND')
      }

      const moves: ItemMove[] = []
      if (item1) moves.push({ item: item1, position: pos2 })
      if (item2) moves.push({ item: item2, position: pos1 })
      await this.moveItems(trx, card.grid, moves)
      await this.touch(trx, card.id)
      return this.loadCard(trx, card.id)
    })
  }

  /**
   * Changes the header or toggles the FREE cell on a draft. Turning FREE on
   * moves any item in its slot to the lowest empty position.
   */
  async updateConfig(ownerId: number, cardId: string, params: UpdateConfigParams): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertDraft(card)

      let headerText = card.grid.headerText
      if (params.headerText !== undefined) {
        headerText = normalizeHeaderText(params.headerText)
        if (!isValidHeaderText(headerText, card.grid.size)) {
          throw new CardServiceError('INVALID_HEADER_TEXT')
        }
      }

      let freeSpacePosition = card.grid.freeSpacePosition
      if (params.hasFreeSpace !== undefined && params.hasFreeSpace !== card.grid.hasFreeSpace) {
        if (params.hasFreeSpace) {
          const desired = defaultFreeSpacePosition(card.grid.size)
          const next: GridConfig = {
            ...card.grid,
            hasFreeSpace: true,
            freeSpacePosition: desired,
          }
          const occupant = card.items.find((i) => i.position === desired)
          if (occupant) {
            const target = lowestOpenPosition(
              next,
              card.items.map((i) => i.position),
            )
            if (target === null) {
              throw new CardServiceError('NO_SPACE_FOR_FREE')
            }
            await this.moveItems(trx, next, [{ item: occupant, position: target }])
          }
          freeSpacePosition = desired
        } else {
          freeSpacePosition = null
        }
      }

      await this.touch(trx, card.id, {
        header_text: headerText,
        has_free_space: freeSpacePosition !== null,
        free_space_position: freeSpacePosition,
      })
      return this.loadCard(trx, card.id)
    })
  }

  async finalize(ownerId: number, cardId: string, params: FinalizeParams = {}): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      if (card.state === 'finalized') {
        return card
      }

      if (card.items.length < card.capacity) {
        throw new IncompleteGridError(
          card.capacity,
          card.items.length,
          missingPositions(
            card.grid,
            card.items.map((i) => i.position),
          ),
        )
      }

      const visibleToFriends = params.visibleToFriends ?? card.visibleToFriends
      await this.touch(trx, card.id, { is_finalized: true, visible_to_friends: visibleToFriends })
      return this.loadCard(trx, card.id)
    })
  }

  async completeItem(
    ownerId: number,
    cardId: string,
    position: number,
    params: CompleteItemParams = {},
  ): Promise<BingoItem> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertFinalized(card)
      const item = findItem(card, position)

      const completed: BingoItem = {
        ...item,
        isCompleted: true,
        completedAt: this.timestamp(),
        notes: normalizeOptionalText(params.notes),
        proofUrl: normalizeOptionalText(params.proofUrl),
      }
      await trx('bingo_items').where({ id: item.id }).update({
        is_completed: true,
        completed_at: completed.completedAt,
        notes: completed.notes,
        proof_url: completed.proofUrl,
      })
      await this.touch(trx, card.id)
      return completed
    })
  }

  async uncompleteItem(ownerId: number, cardId: string, position: number): Promise<BingoItem> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      assertFinalized(card)
      const item = findItem(card, position)

      await trx('bingo_items').where({ id: item.id }).update({
        is_completed: false,
        completed_at: null,
      })
      await this.touch(trx, card.id)
      return { ...item, isCompleted: false, completedAt: null }
    })
  }

  async updateNotes(
    ownerId: number,
    cardId: string,
    position: number,
    params: UpdateNotesParams,
  ): Promise<BingoItem> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      const item = findItem(card, position)

      const updated: BingoItem = {
        ...item,
        notes: params.notes === undefined ? item.notes : normalizeOptionalText(params.notes),
        proofUrl:
          params.proofUrl === undefined ? item.proofUrl : normalizeOptionalText(params.proofUrl),
      }
      await trx('bingo_items').where({ id: item.id }).update({
        notes: updated.notes,
        proof_url: updated.proofUrl,
      })
      await this.touch(trx, card.id)
      return updated
    })
  }

  async getStats(ownerId: number, cardId: string): Promise<CardStats> {
    const card = await this.getCard(ownerId, cardId)
    assertFinalized(card)

    const completed = card.items.filter((i) => i.isCompleted)
    const completionTimes = completed
      .map((i) => i.completedAt)
      .filter((t): t is string => t !== null)
      .sort()
    const lines = completedLines(
      card.grid,
      completed.map((i) => i.position),
    )

    return {
      cardId: card.id,
      year: card.year,
      totalItems: card.capacity,
      completedItems: completed.length,
      completionRate: card.capacity > 0 ? (completed.length / card.capacity) * 100 : 0,
      bingosAchieved: lines.length,
      completedLines: lines,
      firstCompletion: completionTimes[0] ?? null,
      lastCompletion: completionTimes[completionTimes.length - 1] ?? null,
    }
  }

  async updateMeta(ownerId: number, cardId: string, params: UpdateMetaParams): Promise<BingoCard> {
    const category = params.category === undefined ? undefined : normalizeCategory(params.category)
    const title = params.title === undefined ? undefined : normalizeTitle(params.title)

    try {
      return await this.transaction(async (trx) => {
        const card = await this.loadOwnedCard(trx, ownerId, cardId)
        const changes: Partial<CardRow> = {}
        if (title !== undefined) {
          await this.assertNoConflict(trx, ownerId, card.year, title, card.id)
          changes.title = title
        }
        if (category !== undefined) {
          changes.category = category
        }
        if (Object.keys(changes).length === 0) {
          return card
        }
        await this.touch(trx, card.id, changes)
        return this.loadCard(trx, card.id)
      })
    } catch (error) {
      if (isUniqueViolation(error)) throw cardConflictError(title ?? null)
      throw error
    }
  }

  async updateVisibility(ownerId: number, cardId: string, visibleToFriends: boolean): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      await this.touch(trx, card.id, { visible_to_friends: visibleToFriends })
      return this.loadCard(trx, card.id)
    })
  }

  async setArchived(ownerId: number, cardId: string, isArchived: boolean): Promise<BingoCard> {
    return this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      if (isArchived) {
        assertFinalized(card)
      }
      await this.touch(trx, card.id, { is_archived: isArchived })
      return this.loadCard(trx, card.id)
    })
  }

  async deleteCard(ownerId: number, cardId: string): Promise<void> {
    await this.transaction(async (trx) => {
      const card = await this.loadOwnedCard(trx, ownerId, cardId)
      await trx('bingo_items').where({ card_id: card.id }).del()
      await trx('bingo_cards').where({ id: card.id }).del()
    })
  }

  /**
   * Cards in the list that the caller does not own are skipped.
   */
  async bulkUpdateVisibility(ownerId: number, cardIds: string[], visibleToFriends: boolean): Promise<number> {
    if (cardIds.length === 0) return 0
    return this.db('bingo_cards')
      .whereIn('id', cardIds)
      .andWhere({ user_id: ownerId })
      .update({ visible_to_friends: visibleToFriends, updated_at: this.timestamp() })
  }

  async bulkUpdateArchive(ownerId: number, cardIds: string[], isArchived: boolean): Promise<number> {
    if (cardIds.length === 0) return 0
    const query = this.db('bingo_cards').whereIn('id', cardIds).andWhere({ user_id: ownerId })
    if (isArchived) {
      query.andWhere({ is_finalized: true })
    }
    return query.update({ is_archived: isArchived, updated_at: this.timestamp() })
  }

  async bulkDelete(ownerId: number, cardIds: string[]): Promise<number> {
    if (cardIds.length === 0) return 0
    return this.transaction(async (trx) => {
      const owned: { id: string }[] = await trx('bingo_cards')
        .whereIn('id', cardIds)
        .andWhere({ user_id: ownerId })
        .select('id')
      const ids = owned.map((r) => r.id)
      if (ids.length === 0) return 0

      await trx('bingo_items').whereIn('card_id', ids).del()
      return trx('bingo_cards').whereIn('id', ids).del()
    })
  }

  /**
   * Summary of the card that would collide with a new (year, title) card,
   * or null when the slot is free.
   */
  async checkForConflict(ownerId: number, year: number, title?: string | null): Promise<CardSummary | null> {
    const normalized = normalizeTitle(title)
    return this.transaction(async (trx) => {
      const row = await this.findConflict(trx, ownerId, year, normalized)
      return row ? this.summarize(trx, row) : null
    })
  }

  /**
   * Copies a card's item contents into a new draft, optionally on a different
   * grid. Items beyond the new capacity are dropped from the highest
   * positions down.
   */
  async clone(ownerId: number, sourceCardId: string, params: CloneParams = {}): Promise<CloneResult> {
    let title: string | null = null

    try {
      return await this.transaction(async (trx) => {
        const source = await this.loadOwnedCard(trx, ownerId, sourceCardId)

        const grid = createGridConfig({
          size: params.gridSize ?? source.grid.size,
          hasFreeSpace: params.hasFreeSpace ?? source.grid.hasFreeSpace,
          headerText: params.headerText,
        })
        const year = params.year === undefined ? source.year : this.validateYear(params.year)
        const category =
          params.category === undefined ? source.category : normalizeCategory(params.category)

        title = normalizeTitle(params.title)
        if (title === null) {
          const suffix = ' (Copy)'
          title = truncateText(source.displayName, MAX_TITLE_LENGTH - suffix.length) + suffix
        }

        await this.assertNoConflict(trx, ownerId, year, title)
        const row = await this.insertCard(trx, ownerId, { year, title, category, grid })

        const slots = usablePositions(grid)
        const kept = source.items.slice(0, slots.length)
        const items = kept.map((item, i) => this.newItem(row.id, slots[i], item.content))
        if (items.length > 0) {
          await trx('bingo_items').insert(items.map(toItemRow))
        }

        return {
          card: toCard(row, items.map(toItemRow)),
          truncatedItemCount: Math.max(0, source.items.length - slots.length),
        }
      })
    } catch (error) {
      if (isUniqueViolation(error)) throw cardConflictError(title)
      throw error
    }
  }

  /**
   * Creates a card and all of its items in one transaction, optionally
   * finalized straight away. A (year, title) collision leaves everything
   * untouched and reports the card that is already there.
   */
  async importCard(ownerId: number, params: ImportCardParams, random: RandomSource = this.random): Promise<BingoCard> {
    const category = normalizeCategory(params.category)
    const title = normalizeTitle(params.title)
    const year = this.validateYear(params.year)
    let grid = createGridConfig({
      size: params.gridSize,
      hasFreeSpace: params.hasFreeSpace,
      headerText: params.headerText,
    })

    const items = params.items.map((item) => ({
      position: item.position,
      content: normalizeContent(item.content),
    }))
    const occupied = new Set<number>()
    for (const item of items) {
      if (!isPositionInRange(grid, item.position)) {
        throw new CardServiceError('INVALID_POSITION')
      }
      if (occupied.has(item.position)) {
        throw new CardServiceError('POSITION_OCCUPIED')
      }
      occupied.add(item.position)
    }

    // Even grids have no true center, so FREE steps aside for imported content
    if (grid.freeSpacePosition !== null && grid.size % 2 === 0 && occupied.has(grid.freeSpacePosition)) {
      const empties: number[] = []
      for (let p = 0; p < totalSquares(grid.size); p++) {
        if (!occupied.has(p)) empties.push(p)
      }
      const picked = pickRandom(empties, random)
      if (picked === undefined) {
        throw new CardServiceError('NO_SPACE_FOR_FREE')
      }
      grid = { ...grid, freeSpacePosition: picked }
    }

    if (items.some((item) => isFreeSpacePosition(grid, item.position))) {
      throw new CardServiceError('INVALID_POSITION')
    }
    if (params.finalize && items.length !== capacity(grid)) {
      throw new IncompleteGridError(capacity(grid), items.length, missingPositions(grid, occupied))
    }

    try {
      return await this.transaction(async (trx) => {
        const existing = await this.findConflict(trx, ownerId, year, title)
        if (existing) {
          throw new CardExistsError(await this.summarize(trx, existing))
        }

        const row = await this.insertCard(trx, ownerId, {
          year,
          title,
          category,
          grid,
          isFinalized: params.finalize ?? false,
          visibleToFriends: params.visibleToFriends,
        })
        const created = items.map((item) => this.newItem(row.id, item.position, item.content))
        if (created.length > 0) {
          await trx('bingo_items').insert(created.map(toItemRow))
        }
        return toCard(row, created.map(toItemRow))
      })
    } catch (error) {
      if (isUniqueViolation(error)) throw cardConflictError(title)
      throw error
    }
  }
}

export const cardService = new CardService()

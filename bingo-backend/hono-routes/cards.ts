import { Hono } from 'hono'
import { requireAuth, type AuthVariables } from '../hono-middleware/auth'
import { cardService } from '../services/cardService'
import {
  AddItemSchema,
  ArchiveSchema,
  BulkArchiveSchema,
  BulkDeleteSchema,
  BulkVisibilitySchema,
  CloneSchema,
  CompleteItemSchema,
  CreateCardSchema,
  FinalizeSchema,
  ImportCardSchema,
  SwapSchema,
  UpdateConfigSchema,
  UpdateItemSchema,
  UpdateMetaSchema,
  UpdateNotesSchema,
  VisibilitySchema,
  parseBody,
  parseIntParam,
} from '../utils/cardSchema'

const cards = new Hono<{ Variables: AuthVariables }>()

// GET /api/cards - All cards of the authenticated user
cards.get('/', async (c) => {
  const user = requireAuth(c)
  return c.json(await cardService.listByUser(user.id))
})

// POST /api/cards - Create an empty draft
cards.post('/', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, CreateCardSchema)
  return c.json(await cardService.create(user.id, body), 201)
})

// GET /api/cards/archive - Finalized cards from past years
cards.get('/archive', async (c) => {
  const user = requireAuth(c)
  return c.json(await cardService.getArchive(user.id))
})

// GET /api/cards/conflict?year=2026&title=... - Would an import collide?
cards.get('/conflict', async (c) => {
  const user = requireAuth(c)
  const year = parseIntParam(c.req.query('year') ?? '', 'year')
  const existing = await cardService.checkForConflict(user.id, year, c.req.query('title'))
  return c.json({ hasConflict: existing !== null, existingCard: existing })
})

// POST /api/cards/import - Create a card with all of its items at once
cards.post('/import', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, ImportCardSchema)
  return c.json(await cardService.importCard(user.id, body), 201)
})

// Bulk operations only ever touch the caller's own cards
cards.post('/bulk/visibility', async (c) => {
  const user = requireAuth(c)
  const { cardIds, visibleToFriends } = await parseBody(c, BulkVisibilitySchema)
  const count = await cardService.bulkUpdateVisibility(user.id, cardIds, visibleToFriends)
  return c.json({ success: true, count })
})

cards.post('/bulk/archive', async (c) => {
  const user = requireAuth(c)
  const { cardIds, isArchived } = await parseBody(c, BulkArchiveSchema)
  const count = await cardService.bulkUpdateArchive(user.id, cardIds, isArchived)
  return c.json({ success: true, count })
})

cards.post('/bulk/delete', async (c) => {
  const user = requireAuth(c)
  const { cardIds } = await parseBody(c, BulkDeleteSchema)
  const count = await cardService.bulkDelete(user.id, cardIds)
  return c.json({ success: true, count })
})

// GET /api/cards/friends/:friendId - A friend's shared, finalized cards
cards.get('/friends/:friendId', async (c) => {
  const user = requireAuth(c)
  const friendId = parseIntParam(c.req.param('friendId'), 'friendId')
  return c.json(await cardService.listFriendCards(user.id, friendId))
})

cards.get('/:id', async (c) => {
  const user = requireAuth(c)
  return c.json(await cardService.getCard(user.id, c.req.param('id')))
})

cards.delete('/:id', async (c) => {
  const user = requireAuth(c)
  await cardService.deleteCard(user.id, c.req.param('id'))
  return c.json({ success: true })
})

cards.patch('/:id/meta', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, UpdateMetaSchema)
  return c.json(await cardService.updateMeta(user.id, c.req.param('id'), body))
})

cards.patch('/:id/config', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, UpdateConfigSchema)
  return c.json(await cardService.updateConfig(user.id, c.req.param('id'), body))
})

cards.put('/:id/visibility', async (c) => {
  const user = requireAuth(c)
  const { visibleToFriends } = await parseBody(c, VisibilitySchema)
  return c.json(await cardService.updateVisibility(user.id, c.req.param('id'), visibleToFriends))
})

cards.put('/:id/archive', async (c) => {
  const user = requireAuth(c)
  const { isArchived } = await parseBody(c, ArchiveSchema)
  return c.json(await cardService.setArchived(user.id, c.req.param('id'), isArchived))
})

// Items

cards.post('/:id/items', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, AddItemSchema)
  return c.json(await cardService.addItem(user.id, c.req.param('id'), body), 201)
})

cards.put('/:id/items/:position', async (c) => {
  const user = requireAuth(c)
  const position = parseIntParam(c.req.param('position'), 'position')
  const body = await parseBody(c, UpdateItemSchema)
  return c.json(await cardService.updateItem(user.id, c.req.param('id'), position, body))
})

cards.delete('/:id/items/:position', async (c) => {
  const user = requireAuth(c)
  const position = parseIntParam(c.req.param('position'), 'position')
  await cardService.removeItem(user.id, c.req.param('id'), position)
  return c.json({ success: true })
})

cards.put('/:id/items/:position/complete', async (c) => {
  const user = requireAuth(c)
  const position = parseIntParam(c.req.param('position'), 'position')
  const body = await parseBody(c, CompleteItemSchema)
  return c.json(await cardService.completeItem(user.id, c.req.param('id'), position, body))
})

cards.put('/:id/items/:position/uncomplete', async (c) => {
  const user = requireAuth(c)
  const position = parseIntParam(c.req.param('position'), 'position')
  return c.json(await cardService.uncompleteItem(user.id, c.req.param('id'), position))
})

cards.put('/:id/items/:position/notes', async (c) => {
  const user = requireAuth(c)
  const position = parseIntParam(c.req.param('position'), 'position')
  const body = await parseBody(c, UpdateNotesSchema)
  return c.json(await cardService.updateNotes(user.id, c.req.param('id'), position, body))
})

// Layout and lifecycle

cards.post('/:id/shuffle', async (c) => {
  const user = requireAuth(c)
  return c.json(await cardService.shuffle(user.id, c.req.param('id')))
})

cards.post('/:id/swap', async (c) => {
  const user = requireAuth(c)
  const { position1, position2 } = await parseBody(c, SwapSchema)
  return c.json(await cardService.swap(user.id, c.req.param('id'), position1, position2))
})

cards.post('/:id/finalize', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, FinalizeSchema)
  return c.json(await cardService.finalize(user.id, c.req.param('id'), body))
})

cards.post('/:id/clone', async (c) => {
  const user = requireAuth(c)
  const body = await parseBody(c, CloneSchema)
  return c.json(await cardService.clone(user.id, c.req.param('id'), body), 201)
})

cards.get('/:id/stats', async (c) => {
  const user = requireAuth(c)
  return c.json(await cardService.getStats(user.id, c.req.param('id')))
})

export { cards }

import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { AuthVariables } from '../hono-middleware/auth'
import { suggestionService } from '../services/suggestionService'
import { isValidCategory } from '../utils/categories'

const suggestions = new Hono<{ Variables: AuthVariables }>()

// GET /api/suggestions?category=health | ?grouped=true - Curated goal ideas, no login needed
suggestions.get('/', async (c) => {
  if (c.req.query('grouped') === 'true') {
    return c.json({ grouped: await suggestionService.getGroupedByCategory() })
  }

  const category = c.req.query('category')
  if (category) {
    if (!isValidCategory(category)) {
      throw new HTTPException(400, { message: `Unknown category: ${category}` })
    }
    return c.json({ suggestions: await suggestionService.getByCategory(category) })
  }

  return c.json({ suggestions: await suggestionService.getAll() })
})

suggestions.get('/categories', async (c) => {
  return c.json({ categories: await suggestionService.getCategories() })
})

export { suggestions }

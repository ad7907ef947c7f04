import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { verifyToken, type AuthVariables } from './hono-middleware/auth'
import { cards } from './hono-routes/cards'
import { createAiRoutes, type AiRouteDeps } from './hono-routes/ai'
import { suggestions } from './hono-routes/suggestions'
import {
  CardExistsError,
  CardServiceError,
  IncompleteGridError,
  QuotaError,
  type ErrorKind,
} from './services/errors'

const STATUS_BY_KIND: Record<ErrorKind, ContentfulStatusCode> = {
  not_found: 404,
  ownership: 403,
  state_conflict: 400,
  validation: 400,
  conflict: 409,
  quota_exhausted: 403,
  unavailable: 503,
}

export function createApp(deps: AiRouteDeps = {}) {
  const app = new Hono<{ Variables: AuthVariables }>()

  // Logging middleware - single line per request (Morgan dev-style) with ANSI colors
  app.use('*', async (c, next) => {
    const start = Date.now()
    const method = c.req.method
    const urlObj = new URL(c.req.url)
    const url = urlObj.pathname + (urlObj.search || '')

    await next()

    const status = c.res.status || 0
    const time = Date.now() - start
    const user = c.get('user')

    // ANSI color helpers
    const RESET = '\u001b[0m'
    const colorStatus = (s: number) =>
      s >= 500 ? '\u001b[31m' : s >= 400 ? '\u001b[33m' : s >= 300 ? '\u001b[36m' : '\u001b[32m'
    const colorMethod = (m: string) =>
      m === 'GET' ? '\u001b[34m' : m === 'POST' ? '\u001b[35m' : m === 'PUT' ? '\u001b[33m' : '\u001b[36m'

    const methodStr = `${colorMethod(method)}${method}${RESET}`
    const statusStr = `${colorStatus(status)}${status}${RESET}`
    const userStr = user ? ` user=${user.id}` : ''

    console.log(`${methodStr} ${url} ${statusStr} ${time}ms${userStr}`)
  })

  // Auth middleware - extract user from JWT if present
  app.use('/api/*', async (c, next) => {
    c.set('user', verifyToken(c.req.header('authorization')))
    await next()
  })

  app.route('/api/cards', cards)
  app.route('/api/ai', createAiRoutes(deps))
  app.route('/api/suggestions', suggestions)

  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

  app.onError((err, c) => {
    if (err instanceof CardExistsError) {
      return c.json({ error: err.message, code: err.code, existingCard: err.existing }, 409)
    }
    if (err instanceof IncompleteGridError) {
      return c.json(
        { error: err.message, code: err.code, missingPositions: err.missingPositions },
        STATUS_BY_KIND[err.kind],
      )
    }
    if (err instanceof CardServiceError) {
      return c.json({ error: err.message, code: err.code }, STATUS_BY_KIND[err.kind])
    }
    if (err instanceof QuotaError) {
      if (err.code === 'QUOTA_EXHAUSTED') {
        return c.json({ error: err.message, code: err.code, freeRemaining: 0 }, 403)
      }
      return c.json({ error: err.message, code: err.code }, STATUS_BY_KIND[err.kind])
    }
    if (err instanceof HTTPException) {
      const code = err.status === 401 ? 'UNAUTHORIZED' : 'INVALID_REQUEST'
      return c.json({ error: err.message, code }, err.status)
    }

    console.error('\n=== UNHANDLED ERROR DETAILS ===')
    console.error('URL:', c.req.path)
    console.error('Method:', c.req.method)
    console.error('Error Name:', err.name)
    console.error('Error Message:', err.message)
    if (err.stack) {
      console.error('Stack Trace:')
      console.error(err.stack)
    }
    console.error('=================================\n')
    return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
  })

  return app
}

export const app = createApp()

export default app

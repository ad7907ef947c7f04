import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { requireAuth, type AuthVariables } from '../hono-middleware/auth'
import { quotaService as defaultQuotaService, type QuotaService } from '../services/quotaService'
import { userService as defaultUserService, type UserService } from '../services/userService'
import { GoalPromptSchema } from '../utils/goalSchema'
import {
  GenerationError,
  OpenAIGoalGenerator,
  type GenerationErrorKind,
  type GoalGenerator,
} from '../utils/openai'
import { parseBody } from '../utils/cardSchema'

const STATUS_BY_GENERATION_KIND: Record<GenerationErrorKind, ContentfulStatusCode> = {
  provider_unavailable: 503,
  not_configured: 503,
  rate_limited: 429,
  safety_violation: 400,
  invalid_input: 400,
}

export interface AiRouteDeps {
  generator?: GoalGenerator
  quota?: QuotaService
  users?: UserService
}

export function createAiRoutes(deps: AiRouteDeps = {}) {
  const generator = deps.generator ?? new OpenAIGoalGenerator()
  const quota = deps.quota ?? defaultQuotaService
  const users = deps.users ?? defaultUserService

  const ai = new Hono<{ Variables: AuthVariables }>()

  async function refundQuietly(userId: number): Promise<boolean> {
    try {
      const refunded = await quota.refund(userId)
      if (!refunded) {
        console.warn(`[ai] Nothing to refund for user ${userId}`)
      }
      return refunded
    } catch (error) {
      console.error(`[ai] Failed to refund free generation for user ${userId}:`, error)
      return false
    }
  }

  // POST /api/ai/generate - Suggest goals; unverified users spend a free generation
  ai.post('/generate', async (c) => {
    const authUser = requireAuth(c)
    const prompt = await parseBody(c, GoalPromptSchema)

    const user = await users.getUser(authUser.id)
    if (!user) {
      throw new HTTPException(401, { message: 'Unauthorized' })
    }

    let freeRemaining = user.emailVerified ? null : await quota.consume(user.id)

    try {
      const goals = await generator.generateGoals(prompt)
      return c.json({ goals, freeRemaining })
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error

      if (freeRemaining !== null && error.refundable && (await refundQuietly(user.id))) {
        freeRemaining += 1
      }
      const body = { error: error.message, code: error.kind.toUpperCase() }
      return c.json(
        freeRemaining === null ? body : { ...body, freeRemaining },
        STATUS_BY_GENERATION_KIND[error.kind],
      )
    }
  })

  // GET /api/ai/quota - Free generations left for the current user
  ai.get('/quota', async (c) => {
    const authUser = requireAuth(c)
    const user = await users.getUser(authUser.id)
    if (!user) {
      throw new HTTPException(401, { message: 'Unauthorized' })
    }

    return c.json({
      emailVerified: user.emailVerified,
      limit: quota.ceiling,
      freeRemaining: user.emailVerified ? null : await quota.remaining(user.id),
    })
  })

  return ai
}

import { HTTPException } from 'hono/http-exception'
import type { Context } from 'hono'
import jwt from 'jsonwebtoken'
import { z } from 'zod'
import { JWT_SECRET } from '../config'

const TokenPayloadSchema = z.object({
  id: z.number().int().positive(),
  username: z.string().min(1),
})

export type AuthUser = z.infer<typeof TokenPayloadSchema>

export type AuthVariables = {
  user: AuthUser | null
}

/**
 * Verifies a bearer token and returns the user it names, or null when the
 * token is missing, expired or malformed.
 */
export function verifyToken(authHeader: string | undefined): AuthUser | null {
  const header = authHeader || ''
  const token = header.startsWith('Bearer ') ? header.slice(7) : null
  if (!token) return null

  try {
    const decoded = jwt.verify(token, JWT_SECRET)
    const parsed = TokenPayloadSchema.safeParse(decoded)
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}

/**
 * Get user from context (set by auth middleware in hono-app.ts)
 */
export function getUser(c: Context<{ Variables: AuthVariables }>): AuthUser | null {
  return c.get('user')
}

/**
 * Require authentication - throws 401 if not authenticated
 */
export function requireAuth(c: Context<{ Variables: AuthVariables }>): AuthUser {
  const user = getUser(c)
  if (!user) {
    throw new HTTPException(401, { message: 'Unauthorized' })
  }
  return user
}

import { z } from 'zod'

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(8921),
  JWT_SECRET: z.string().min(1).default('dev-jwt-secret'),
  DATABASE_FILE: z.string().min(1).default('./bingo.db'),
  // Free AI generations an unverified user gets before verification is required
  FREE_GENERATION_LIMIT: z.coerce.number().int().min(0).default(5),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
})

const env = EnvSchema.parse(process.env)

export const NODE_ENV = env.NODE_ENV
export const PORT = env.PORT
export const JWT_SECRET = env.JWT_SECRET
export const DATABASE_FILE = env.DATABASE_FILE
export const FREE_GENERATION_LIMIT = env.FREE_GENERATION_LIMIT
export const OPENAI_API_KEY = env.OPENAI_API_KEY
export const OPENAI_MODEL = env.OPENAI_MODEL

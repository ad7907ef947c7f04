import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'

export const MAX_GOALS_PER_REQUEST = 24

export const GoalPromptSchema = z
  .object({
    category: z.enum(['hobbies', 'health', 'career', 'social', 'travel', 'mix']),
    focus: z.string().trim().max(100, 'Focus is too long (max 100 chars)').default(''),
    difficulty: z.enum(['easy', 'medium', 'hard']),
    budget: z.enum(['free', 'low', 'medium', 'high']),
    context: z.string().trim().max(500, 'Context is too long (max 500 chars)').default(''),
    count: z
      .number()
      .int()
      .min(1, 'Count must be between 1 and 24')
      .max(MAX_GOALS_PER_REQUEST, 'Count must be between 1 and 24')
      .default(MAX_GOALS_PER_REQUEST),
  })
  .strict()

// Length checks run after parsing only; strict structured output rejects string-length keywords
const GeneratedGoalsWireSchema = z
  .object({
    goals: z.array(z.string()),
  })
  .strict()

export const GeneratedGoalsSchema = z
  .object({
    goals: z.array(z.string().min(1).max(500)),
  })
  .strict()

const jsonSchema = zodToJsonSchema(GeneratedGoalsWireSchema, {
  $refStrategy: 'none',
  target: 'openAi',
})

const schema: Record<string, unknown> = { ...jsonSchema }

export const generatedGoalsJsonSchema = {
  name: 'bingo_goals',
  strict: true,
  schema,
}

export type GoalPrompt = z.infer<typeof GoalPromptSchema>

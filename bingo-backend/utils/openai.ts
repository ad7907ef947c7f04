import OpenAI from 'openai'
import { OPENAI_API_KEY, OPENAI_MODEL } from '../config'
import { GeneratedGoalsSchema, generatedGoalsJsonSchema, type GoalPrompt } from './goalSchema'

export type GenerationErrorKind =
  | 'provider_unavailable'
  | 'not_configured'
  | 'rate_limited'
  | 'safety_violation'
  | 'invalid_input'

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GenerationError'
    this.kind = kind
  }

  /** Failures that are not the user's fault and give the free unit back */
  get refundable(): boolean {
    return (
      this.kind === 'provider_unavailable' ||
      this.kind === 'not_configured' ||
      this.kind === 'rate_limited'
    )
  }
}

export interface GoalGenerator {
  generateGoals(prompt: GoalPrompt): Promise<string[]>
}

const instructions = `
You write goals for a yearly bingo card.

Rules:
- Each goal is one concrete, achievable activity that fits in a single bingo square.
- Keep every goal under 80 characters.
- No duplicates, no numbering, no commentary.
- Respect the budget and difficulty you are given.
`

function buildUserPrompt(prompt: GoalPrompt): string {
  const lines = [
    `Category: ${prompt.category}`,
    `Difficulty: ${prompt.difficulty}`,
    `Budget: ${prompt.budget}`,
    `Number of goals: ${prompt.count}`,
  ]
  if (prompt.focus) lines.push(`Focus: ${prompt.focus}`)
  if (prompt.context) lines.push(`About me: ${prompt.context}`)
  return lines.join('\n')
}

export class OpenAIGoalGenerator implements GoalGenerator {
  private readonly client: OpenAI | null

  constructor(
    apiKey: string | undefined = OPENAI_API_KEY,
    private readonly model: string = OPENAI_MODEL,
    client?: OpenAI,
  ) {
    this.client = client ?? (apiKey ? new OpenAI({ apiKey }) : null)
  }

  async generateGoals(prompt: GoalPrompt): Promise<string[]> {
    if (!this.client) {
      throw new GenerationError('not_configured', 'OPENAI_API_KEY is not set')
    }

    let response: OpenAI.Chat.ChatCompletion
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: instructions },
          { role: 'user', content: buildUserPrompt(prompt) },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: generatedGoalsJsonSchema,
        },
      })
    } catch (error) {
      if (error instanceof OpenAI.RateLimitError) {
        throw new GenerationError('rate_limited', 'AI provider rate limit exceeded', { cause: error })
      }
      if (error instanceof OpenAI.BadRequestError) {
        // Prompts are validated before this call, so a 400 points at the request we built
        console.error('[ai] Provider rejected the goal request:', error.message)
        throw new GenerationError('provider_unavailable', 'AI provider is currently unavailable', {
          cause: error,
        })
      }
      console.error('[ai] Goal generation request failed:', error)
      throw new GenerationError('provider_unavailable', 'AI provider is currently unavailable', {
        cause: error,
      })
    }

    const choice = response.choices[0]
    if (!choice || choice.finish_reason === 'content_filter' || choice.message.refusal) {
      throw new GenerationError('safety_violation', 'generated content violated safety policies')
    }

    const outputText = choice.message.content
    if (!outputText) {
      throw new GenerationError('provider_unavailable', 'No content received from OpenAI')
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(outputText)
    } catch (error) {
      throw new GenerationError('provider_unavailable', 'AI provider returned malformed JSON', {
        cause: error,
      })
    }
    const result = GeneratedGoalsSchema.safeParse(parsed)
    if (!result.success) {
      throw new GenerationError('provider_unavailable', 'AI provider returned an unexpected shape')
    }

    return result.data.goals
      .map((goal) => goal.trim())
      .filter((goal) => goal !== '')
      .slice(0, prompt.count)
  }
}

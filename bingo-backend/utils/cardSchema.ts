import { z } from 'zod'
import { HTTPException } from 'hono/http-exception'
import type { Context } from 'hono'

// Shape checks only; the card engine owns the domain rules and their error codes
const optionalText = z.string().nullable().optional()
const position = z.number().int()
const cardIds = z.array(z.string().min(1)).max(100)

export const CreateCardSchema = z.object({
  year: z.number().int(),
  title: optionalText,
  category: optionalText,
  gridSize: z.number().int().optional(),
  hasFreeSpace: z.boolean().optional(),
  headerText: optionalText,
})

export const AddItemSchema = z.object({
  content: z.string(),
  position: position.optional(),
})

export const UpdateItemSchema = z
  .object({
    content: z.string().optional(),
    position: position.optional(),
  })
  .refine((body) => body.content !== undefined || body.position !== undefined, {
    message: 'Nothing to update',
  })

export const SwapSchema = z.object({
  position1: position,
  position2: position,
})

export const UpdateMetaSchema = z.object({
  title: optionalText,
  category: optionalText,
})

export const UpdateConfigSchema = z.object({
  headerText: z.string().optional(),
  hasFreeSpace: z.boolean().optional(),
})

export const FinalizeSchema = z.object({
  visibleToFriends: z.boolean().optional(),
})

export const VisibilitySchema = z.object({ visibleToFriends: z.boolean() })
export const ArchiveSchema = z.object({ isArchived: z.boolean() })

export const CompleteItemSchema = z.object({
  notes: optionalText,
  proofUrl: optionalText,
})

export const UpdateNotesSchema = CompleteItemSchema

export const CloneSchema = z.object({
  year: z.number().int().optional(),
  title: optionalText,
  category: optionalText,
  gridSize: z.number().int().optional(),
  headerText: optionalText,
  hasFreeSpace: z.boolean().optional(),
})

export const ImportCardSchema = CreateCardSchema.extend({
  items: z.array(z.object({ position, content: z.string() })).max(25),
  finalize: z.boolean().optional(),
  visibleToFriends: z.boolean().optional(),
})

export const BulkVisibilitySchema = z.object({ cardIds, visibleToFriends: z.boolean() })
export const BulkArchiveSchema = z.object({ cardIds, isArchived: z.boolean() })
export const BulkDeleteSchema = z.object({ cardIds })

/**
 * Reads the JSON body and validates it, answering 400 with the first zod
 * issue when it does not match.
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const body: unknown = await c.req.json().catch(() => ({}))
  const result = schema.safeParse(body)
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new HTTPException(400, { message: `${path}${issue?.message ?? 'Invalid request body'}` })
  }
  return result.data
}

/** Route params like `:position` come in as strings. */
export function parseIntParam(value: string, name: string): number {
  const trimmed = value.trim()
  const parsed = Number(trimmed)
  if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new HTTPException(400, { message: `${name} must be an integer` })
  }
  return parsed
}

import type { Knex } from "knex";
import fs from 'fs'
import { z } from 'zod'
import { isValidCategory } from '../utils/categories'

const SeedSchema = z.array(
  z.object({
    category: z.string().refine(isValidCategory, 'unknown category'),
    content: z.string().min(1).max(500),
  }),
)

function loadSeedRows() {
  const file = new URL('../data/suggestions.json', import.meta.url)
  return SeedSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')))
}


export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('suggestions', (table) => {
    table.increments('id').primary()
    table.string('category').notNullable().index()
    table.text('content').notNullable()
    table.boolean('is_active').notNullable().defaultTo(true)
  })

  await knex('suggestions').insert(loadSeedRows())
}


export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('suggestions')
}

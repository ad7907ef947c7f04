import type { Knex } from 'knex'
import * as initialSchema from './20261005090000_initial_schema'
import * as generationQuotas from './20261005091500_add_generation_quotas'
import * as friendships from './20261005093000_add_friendships'
import * as suggestions from './20261005094500_add_suggestions'

interface MigrationEntry {
  name: string
  migration: Knex.Migration
}

// Listed explicitly so migrations load the same way under tsx and vitest,
// neither of which knex's file loader can import .ts through.
const migrations: MigrationEntry[] = [
  { name: '20261005090000_initial_schema', migration: initialSchema },
  { name: '20261005091500_add_generation_quotas', migration: generationQuotas },
  { name: '20261005093000_add_friendships', migration: friendships },
  { name: '20261005094500_add_suggestions', migration: suggestions },
]

export const migrationSource: Knex.MigrationSource<MigrationEntry> = {
  async getMigrations() {
    return migrations
  },
  getMigrationName(entry) {
    return entry.name
  },
  async getMigration(entry) {
    return entry.migration
  },
}

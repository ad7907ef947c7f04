import type { Knex } from 'knex'
import { DATABASE_FILE } from './config'
import { migrationSource } from './migrations'

const unifiedConfig: Knex.Config = {
  client: 'sqlite3',
  connection: {
    filename: DATABASE_FILE,
  },
  useNullAsDefault: true,
  migrations: {
    migrationSource,
  },
}

const config: { [key: string]: Knex.Config } = {
  development: unifiedConfig,

  staging: unifiedConfig,

  production: unifiedConfig,

  test: {
    client: 'sqlite3',
    connection: {
      filename: ':memory:',
    },
    useNullAsDefault: true,
    migrations: {
      tableName: 'knex_migrations',
      migrationSource,
    },
  },
}

export default config

import { serve } from '@hono/node-server'
import app from '../hono-app'
import db from '../db-knex'
import { PORT } from '../config'

async function main() {
  const [, applied] = await db.migrate.latest()
  if (applied.length > 0) {
    console.log(`[db] Applied migrations: ${applied.join(', ')}`)
  }

  serve({ fetch: app.fetch, port: PORT }, (info) => {
    console.log(`Backend server running at http://localhost:${info.port}`)
  })
}

main().catch(async (error) => {
  console.error('Failed to start server:', error)
  await db.destroy()
  process.exit(1)
})

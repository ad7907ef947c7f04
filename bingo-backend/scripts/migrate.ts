import db from '../db-knex'

async function main() {
  const direction = process.argv[2] ?? 'latest'

  if (direction === 'rollback') {
    const [batch, rolledBack] = await db.migrate.rollback()
    console.log(`Rolled back batch ${batch}: ${rolledBack.join(', ') || 'nothing to roll back'}`)
  } else if (direction === 'latest') {
    const [batch, applied] = await db.migrate.latest()
    console.log(`Batch ${batch}: ${applied.join(', ') || 'already up to date'}`)
  } else {
    console.error('Usage: migrate.ts [latest|rollback]')
    process.exitCode = 1
  }
}

main()
  .catch((error) => {
    console.error('Migration failed:', error)
    process.exitCode = 1
  })
  .finally(() => db.destroy())

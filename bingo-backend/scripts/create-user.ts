import jwt from 'jsonwebtoken'
import { createInterface } from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import db from '../db-knex'
import { JWT_SECRET } from '../config'
import { userService } from '../services/userService'

async function main() {
  const rl = createInterface({ input, output })

  try {
    console.log('--- Create New User ---')

    const username = (await rl.question('Username: ')).trim()
    if (!username) {
      console.error('Error: Username is required.')
      process.exitCode = 1
      return
    }

    const verified = (await rl.question('Email verified? [y/N]: ')).trim().toLowerCase() === 'y'

    const user = await userService.createUser(username, { emailVerified: verified })
    const token = jwt.sign({ id: user.id, username: user.username }, JWT_SECRET, {
      expiresIn: '30d',
    })

    console.log(`Success! User '${username}' created with id ${user.id}.`)
    console.log(`Bearer token (30 days):\n${token}`)
  } catch (error) {
    console.error('An error occurred:', error)
    process.exitCode = 1
  } finally {
    rl.close()
    await db.destroy()
  }
}

main()

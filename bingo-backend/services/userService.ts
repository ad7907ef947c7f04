import type { Knex } from 'knex'
import defaultDb from '../db-knex'

export interface User {
  id: number
  username: string
  emailVerified: boolean
}

interface UserRow {
  id: number
  username: string
  email_verified: boolean | number
}

function toUser(row: UserRow): User {
  return { id: row.id, username: row.username, emailVerified: Boolean(row.email_verified) }
}

export class UserService {
  constructor(private readonly db: Knex = defaultDb) {}

  async createUser(username: string, options: { emailVerified?: boolean } = {}): Promise<User> {
    const existingUser = await this.db('users').where({ username }).first()
    if (existingUser) {
      throw new Error('Username already exists')
    }

    const [id] = await this.db('users').insert({
      username,
      email_verified: options.emailVerified ?? false,
    })
    if (!id) {
      throw new Error('Failed to create user')
    }

    return { id, username, emailVerified: options.emailVerified ?? false }
  }

  async getUser(id: number): Promise<User | null> {
    const row: UserRow | undefined = await this.db('users').where({ id }).first()
    return row ? toUser(row) : null
  }

  async getUserByUsername(username: string): Promise<User | null> {
    const row: UserRow | undefined = await this.db('users').where({ username }).first()
    return row ? toUser(row) : null
  }
}

export const userService = new UserService()

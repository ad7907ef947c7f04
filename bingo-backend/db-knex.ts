import knex from 'knex'
import config from './knexfile'
import { NODE_ENV } from './config'

const dbConfig = config[NODE_ENV] || config['development']

const db = knex(dbConfig)

export default db

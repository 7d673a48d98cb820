import { drizzle } from 'drizzle-orm/node-postgres'
import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'

export * from './schema/_common'
export * from './schema/enums'
export * from './schema/users'
export * from './schema/roles'
export * from './schema/posts'
export * from './schema/unavailability'
export * from './schema/roster'
export * from './schema/swaps'
export * from './schema/auth'
export { generateId, type IdTag } from './id'

import * as enumsSchema from './schema/enums'
import * as usersSchema from './schema/users'
import * as rolesSchema from './schema/roles'
import * as postsSchema from './schema/posts'
import * as unavailabilitySchema from './schema/unavailability'
import * as rosterSchema from './schema/roster'
import * as swapsSchema from './schema/swaps'
import * as authSchemaModule from './schema/auth'

/**
 * Unified Drizzle schema registry.
 *
 * Order is intentional:
 * 1) identity + auth
 * 2) reference data (posts, unavailability)
 * 3) roster state (days, allocations, swaps)
 */
export const schema = {
  ...enumsSchema,
  ...usersSchema,
  ...rolesSchema,
  ...authSchemaModule.authSchema,
  ...postsSchema,
  ...unavailabilitySchema,
  ...rosterSchema,
  ...swapsSchema,
}

export type Schema = typeof schema
export type Database = NodePgDatabase<Schema>

/** Transaction handle handed to `db.transaction` callbacks. */
export type DatabaseTransaction = Parameters<Parameters<Database['transaction']>[0]>[0]

export type DatabaseHandle = {
  db: Database
  pool: Pool
}

/**
 * Open a pooled connection and bind the schema registry.
 *
 * Connection is explicit (no import-time side effects) so schema types can be
 * imported by code that never touches PostgreSQL.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to initialize @escala/db')
  }

  const pool = new Pool({ connectionString })
  const db = drizzle(pool, { schema })
  return { db, pool }
}

export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}

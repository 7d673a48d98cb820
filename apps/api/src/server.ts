import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDatabase } from '@escala/db'
import { createApp } from './app.js'
import { createAuth, sessionIdentityResolver } from './auth.js'
import { loadConfig } from './config.js'
import { createLogger } from './lib/logger.js'
import { createRoleDirectory } from './services/roles.js'
import {
  createDrizzleRosterReadModel,
  createDrizzleRosterStore,
} from './services/roster/drizzle-store.js'
import { createRosterEngine } from './services/roster/engine.js'

const config = loadConfig()
const logger = createLogger({ level: config.logLevel })
const { db, pool } = createDatabase(config.databaseUrl)
const auth = createAuth(db, config)

const engine = createRosterEngine({
  store: createDrizzleRosterStore(db),
  readModel: createDrizzleRosterReadModel(db),
  logger,
})

const app = createApp({
  engine,
  logger,
  resolveIdentity: sessionIdentityResolver(auth),
  roles: createRoleDirectory(db),
  authHandler: (request) => auth.handler(request),
  checkHealth: () => checkDatabaseConnection(pool).catch(() => false),
})

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info({ event: 'server.started', port: info.port })
  },
)

const shutdown = (signal: string) => {
  logger.info({ event: 'server.stopping', signal })
  pool
    .end()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ event: 'server.stop_failed', message: String(error) })
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { errorMessage, type Logger } from './lib/logger.js'
import { createAuthGuards, requestId, type IdentityResolver } from './middleware/auth.js'
import { createCoreApiRoutes, SERVICE_NAME, SERVICE_VERSION } from './routes/core-api.js'
import { fail, ok } from './routes/_api.js'
import type { RoleDirectory } from './services/roles.js'
import type { RosterEngine } from './services/roster/engine.js'

export type AppDeps = {
  engine: RosterEngine
  logger: Logger
  resolveIdentity: IdentityResolver
  roles: RoleDirectory
  /** Better Auth request handler, mounted under `/api/auth/*` when present. */
  authHandler?: (request: Request) => Promise<Response>
  /** Liveness check for `/health`; defaults to always healthy. */
  checkHealth?: () => Promise<boolean>
}

export function createApp(deps: AppDeps) {
  const app = new Hono()
  const guards = createAuthGuards({ resolveIdentity: deps.resolveIdentity, roles: deps.roles })

  app.use('/*', cors())
  app.use('/*', requestId)

  app.use('/*', async (c, next) => {
    const startedAt = Date.now()
    await next()
    deps.logger.info({
      event: 'http.request',
      request_id: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startedAt,
    })
  })

  const authHandler = deps.authHandler
  if (authHandler) {
    app.on(['GET', 'POST'], '/api/auth/*', (c) => authHandler(c.req.raw))
  }

  app.route('/api/v1', createCoreApiRoutes({ engine: deps.engine, guards }))

  app.get('/health', async (c) => {
    const healthy = deps.checkHealth ? await deps.checkHealth() : true
    if (!healthy) {
      return fail(c, 'UNAVAILABLE', 'Database unreachable.', 503)
    }
    return ok(c, { service: SERVICE_NAME, status: 'ok', version: SERVICE_VERSION })
  })

  app.onError((err, c) => {
    deps.logger.error({
      event: 'http.unhandled_error',
      request_id: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      message: errorMessage(err),
    })
    return fail(c, 'INTERNAL_ERROR', 'Unexpected server error.', 500)
  })

  app.notFound((c) => {
    return fail(c, 'NOT_FOUND', 'Route not found.', 404)
  })

  return app
}

export type App = ReturnType<typeof createApp>

/**
 * Canonical API router.
 *
 * Route modules are split by domain but share the same auth/role guards.
 */

import { Hono } from 'hono'
import type { AuthGuards } from '../middleware/auth.js'
import type { RosterEngine } from '../services/roster/engine.js'
import { ok } from './_api.js'
import { createRosterRoutes } from './roster.js'
import { createSwapRoutes } from './swaps.js'

export const SERVICE_NAME = 'escala-core-api'
export const SERVICE_VERSION = '0.1.0'

export function createCoreApiRoutes(deps: { engine: RosterEngine; guards: AuthGuards }) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createRosterRoutes(deps))
  coreApiRoutes.route('/', createSwapRoutes(deps))

  coreApiRoutes.get('/health', (c) => {
    return ok(c, {
      service: SERVICE_NAME,
      status: 'healthy',
      version: SERVICE_VERSION,
    })
  })

  return coreApiRoutes
}

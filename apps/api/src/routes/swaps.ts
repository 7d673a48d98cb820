/**
 * Swap routes.
 *
 * The requester and responder are always the session user; schedulers
 * approve or reject.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { idSchema, swapDebtStatusSchema, swapResponseActionSchema } from '@escala/schema'
import { getCurrentUser, type AuthGuards } from '../middleware/auth.js'
import { SCHEDULER_ROLES } from '../services/roles.js'
import type { RosterEngine } from '../services/roster/engine.js'
import { fail, readJson, respond } from './_api.js'

const createSwapBodySchema = z.object({
  allocationId: idSchema,
  substituteId: idSchema,
  reason: z.string(),
  counterAllocationId: idSchema.optional(),
})

const respondBodySchema = z.object({
  action: swapResponseActionSchema,
})

const debtsQuerySchema = z.object({
  status: swapDebtStatusSchema.optional(),
})

export function createSwapRoutes(deps: { engine: RosterEngine; guards: AuthGuards }) {
  const { engine, guards } = deps
  const requireScheduler = guards.requireRole(SCHEDULER_ROLES)
  const swapRoutes = new Hono()

  swapRoutes.post('/swaps', guards.requireAuth, async (c) => {
    const parsed = createSwapBodySchema.safeParse(await readJson(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
    }
    const user = getCurrentUser(c)
    return respond(c, () => engine.requestSwap({ ...parsed.data, requesterId: user.id }), 201)
  })

  swapRoutes.post('/swaps/:swapId/respond', guards.requireAuth, async (c) => {
    const parsed = respondBodySchema.safeParse(await readJson(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
    }
    const user = getCurrentUser(c)
    const swapId = c.req.param('swapId')
    return respond(c, () =>
      engine.respondToSwap({ swapId, responderId: user.id, action: parsed.data.action }),
    )
  })

  swapRoutes.post('/swaps/:swapId/approve', guards.requireAuth, requireScheduler, async (c) => {
    const swapId = c.req.param('swapId')
    return respond(c, () => engine.approveSwap({ swapId }))
  })

  swapRoutes.post('/swaps/:swapId/reject', guards.requireAuth, requireScheduler, async (c) => {
    const swapId = c.req.param('swapId')
    return respond(c, () => engine.rejectSwap({ swapId }))
  })

  swapRoutes.get('/swaps/inbox', guards.requireAuth, async (c) => {
    const user = getCurrentUser(c)
    return respond(c, () => engine.swapInbox(user.id))
  })

  swapRoutes.get('/swaps/queue', guards.requireAuth, requireScheduler, async (c) => {
    return respond(c, () => engine.schedulerQueue())
  })

  swapRoutes.get('/swaps/debts', guards.requireAuth, requireScheduler, async (c) => {
    const parsed = debtsQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }
    return respond(c, () => engine.swapDebts(parsed.data.status))
  })

  return swapRoutes
}

/**
 * Roster routes: generation, publication/errata and the roster views.
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { dutyTypeSchema, isoDateSchema } from '@escala/schema'
import { getCurrentUser, type AuthGuards } from '../middleware/auth.js'
import { SCHEDULER_ROLES } from '../services/roles.js'
import type { RosterEngine } from '../services/roster/engine.js'
import { fail, readJson, respond } from './_api.js'

const generateDayBodySchema = z.object({
  dutyType: dutyTypeSchema,
})

const boardQuerySchema = z.object({
  from: isoDateSchema.optional(),
})

export function createRosterRoutes(deps: { engine: RosterEngine; guards: AuthGuards }) {
  const { engine, guards } = deps
  const requireScheduler = guards.requireRole(SCHEDULER_ROLES)
  const rosterRoutes = new Hono()

  rosterRoutes.post(
    '/roster/periods/generate',
    guards.requireAuth,
    requireScheduler,
    async (c) => {
      const body = await readJson(c)
      return respond(c, () => engine.generatePeriod(body), 201)
    },
  )

  rosterRoutes.post(
    '/roster/days/:date/generate',
    guards.requireAuth,
    requireScheduler,
    async (c) => {
      const parsed = generateDayBodySchema.safeParse(await readJson(c))
      if (!parsed.success) {
        return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
      }
      const date = c.req.param('date')
      return respond(c, () => engine.generateDay({ date, dutyType: parsed.data.dutyType }), 201)
    },
  )

  rosterRoutes.post('/roster/publish', guards.requireAuth, requireScheduler, async (c) => {
    const body = await readJson(c)
    return respond(c, () => engine.publishRange(body))
  })

  rosterRoutes.post(
    '/roster/days/:date/reopen',
    guards.requireAuth,
    requireScheduler,
    async (c) => {
      const date = c.req.param('date')
      return respond(c, () => engine.reopenDay({ date }))
    },
  )

  rosterRoutes.get('/roster/days', guards.requireAuth, async (c) => {
    const parsed = boardQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }
    const user = getCurrentUser(c)
    return respond(c, () => engine.rosterBoard(user.id, parsed.data.from))
  })

  rosterRoutes.get('/roster/me/duties', guards.requireAuth, async (c) => {
    const user = getCurrentUser(c)
    return respond(c, () => engine.upcomingDuties(user.id))
  })

  rosterRoutes.get('/roster/punishments', guards.requireAuth, requireScheduler, async (c) => {
    return respond(c, () => engine.punishmentBoard())
  })

  return rosterRoutes
}

/**
 * @fileoverview Roster route tests
 *
 * @description
 * Drives the Hono app through `app.request()` with an in-memory store,
 * header-based identity and a static role directory.
 */

import { describe, it, expect } from 'vitest'
import { MemoryRosterStore, makePerson, makePost } from '../../services/__tests__/helpers/memory-roster-store'
import type { RosterStore } from '../../services/roster/store'
import { buildTestApp, call, SCHEDULER_ID } from './helpers'

function rosterStore() {
  const store = new MemoryRosterStore()
  store.addPosts(makePost('gate', { name: 'Gate' }))
  store.addPeople(makePerson('1001', { name: 'Ana' }), makePerson('1002', { name: 'Bruno' }))
  return store
}

describe('roster routes', () => {
  it('should require a session', async () => {
    const app = buildTestApp(rosterStore())

    const res = await call(app, 'GET', '/api/v1/roster/days')
    const body = await res.json()

    expect(res.status).toBe(401)
    expect(body).toMatchObject({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Authentication required.' },
    })
    expect(typeof body.meta.requestId).toBe('string')
  })

  it('should keep generation to schedulers', async () => {
    const app = buildTestApp(rosterStore())

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-03-04/generate', {
      user: '1001',
      body: { dutyType: 'RN' },
    })

    expect(res.status).toBe(403)
    expect((await res.json()).error.code).toBe('FORBIDDEN')
  })

  it('should generate a day for a scheduler', async () => {
    const store = rosterStore()
    const app = buildTestApp(store)

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-03-04/generate', {
      user: SCHEDULER_ID,
      body: { dutyType: 'RN' },
    })
    const body = await res.json()

    expect(res.status).toBe(201)
    expect(body.success).toBe(true)
    expect(body.data).toMatchObject({ date: '2025-03-04', dutyType: 'RN', replacedAllocations: 0 })
    expect(body.data.allocations).toHaveLength(1)
    expect(store.allocationsOn('2025-03-04').map((row) => row.userId)).toEqual(['1001'])
  })

  it('should reject a malformed body', async () => {
    const app = buildTestApp(rosterStore())

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-03-04/generate', {
      user: SCHEDULER_ID,
      body: { dutyType: 'weekend' },
    })
    const body = await res.json()

    expect(res.status).toBe(400)
    expect(body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid request body.' })
  })

  it('should report engine validation with its category', async () => {
    const app = buildTestApp(rosterStore())

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-13-01/generate', {
      user: SCHEDULER_ID,
      body: { dutyType: 'RN' },
    })
    const body = await res.json()

    expect(res.status).toBe(400)
    expect(body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Invalid day generation request.',
      details: { category: 'validation' },
    })
  })

  it('should surface staffing failures of a period', async () => {
    const store = new MemoryRosterStore()
    store.addPosts(makePost('gate', { name: 'Gate', eligibleYears: '3' }))
    store.addPeople(makePerson('1001'))
    const app = buildTestApp(store)

    const res = await call(app, 'POST', '/api/v1/roster/periods/generate', {
      user: SCHEDULER_ID,
      body: { startDate: '2025-03-03', endDate: '2025-03-05' },
    })
    const body = await res.json()

    expect(res.status).toBe(422)
    expect(body.error).toMatchObject({
      code: 'PERIOD_GENERATION_FAILED',
      details: {
        category: 'staffing',
        failedDate: '2025-03-03',
        causeCode: 'UNFILLED_POST',
        generatedDates: [],
      },
    })
  })

  it('should publish, then refuse to publish again', async () => {
    const store = rosterStore()
    const app = buildTestApp(store)
    await call(app, 'POST', '/api/v1/roster/periods/generate', {
      user: SCHEDULER_ID,
      body: { startDate: '2025-03-03', endDate: '2025-03-04' },
    })

    const first = await call(app, 'POST', '/api/v1/roster/publish', {
      user: SCHEDULER_ID,
      body: { startDate: '2025-03-03', endDate: '2025-03-04' },
    })
    const second = await call(app, 'POST', '/api/v1/roster/publish', {
      user: SCHEDULER_ID,
      body: { startDate: '2025-03-03', endDate: '2025-03-04' },
    })

    expect(first.status).toBe(200)
    expect((await first.json()).data.published).toBe(2)
    expect(second.status).toBe(409)
    expect((await second.json()).error.code).toBe('NOTHING_TO_PUBLISH')
  })

  it('should reopen a published day', async () => {
    const store = rosterStore()
    store.addDay({ date: '2025-03-04', dutyType: 'RN', status: 'Published' })
    const app = buildTestApp(store)

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-03-04/reopen', { user: SCHEDULER_ID })

    expect(res.status).toBe(200)
    expect((await res.json()).data).toEqual({ date: '2025-03-04', status: 'Draft' })
  })

  it('should show the board and my duties to any signed-in person', async () => {
    const store = rosterStore()
    store.addDay({ date: '2025-03-04', dutyType: 'RN', status: 'Published' })
    store.addAllocation({ userId: '1002', postId: 'gate', date: '2025-03-04' })
    const app = buildTestApp(store)

    const board = await (await call(app, 'GET', '/api/v1/roster/days?from=2025-03-02', { user: '1002' })).json()
    const duties = await (await call(app, 'GET', '/api/v1/roster/me/duties', { user: '1002' })).json()

    expect(board.data.fromDate).toBe('2025-03-02')
    expect(board.data.published[0].allocations[0]).toMatchObject({ personName: 'Bruno', isMine: true })
    expect(duties.data).toEqual([
      expect.objectContaining({ date: '2025-03-04', postName: 'Gate', status: 'Published' }),
    ])
  })

  it('should validate the board query', async () => {
    const app = buildTestApp(rosterStore())

    const res = await call(app, 'GET', '/api/v1/roster/days?from=tomorrow', { user: '1001' })

    expect(res.status).toBe(400)
    expect((await res.json()).error.message).toBe('Invalid query parameters.')
  })

  it('should keep the punishment board to schedulers', async () => {
    const store = rosterStore()
    store.addPeople(makePerson('1003', { name: 'Caio', punishmentBalance: 2 }))
    const app = buildTestApp(store)

    const denied = await call(app, 'GET', '/api/v1/roster/punishments', { user: '1001' })
    const allowed = await call(app, 'GET', '/api/v1/roster/punishments', { user: SCHEDULER_ID })

    expect(denied.status).toBe(403)
    expect((await allowed.json()).data).toEqual([
      { userId: '1003', name: 'Caio', classLabel: 'A', punishmentBalance: 2 },
    ])
  })

  it('should answer unexpected failures with a 500 envelope', async () => {
    const outage: RosterStore = {
      transaction: async () => {
        throw new Error('connection terminated')
      },
    }
    const app = buildTestApp(rosterStore(), { writeStore: outage })

    const res = await call(app, 'POST', '/api/v1/roster/days/2025-03-04/reopen', { user: SCHEDULER_ID })

    expect(res.status).toBe(500)
    expect((await res.json()).error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Unexpected server error.',
    })
  })

  it('should answer health checks and unknown routes', async () => {
    const app = buildTestApp(rosterStore())

    const health = await call(app, 'GET', '/health')
    const missing = await call(app, 'GET', '/api/v1/nowhere')

    expect(health.status).toBe(200)
    expect((await health.json()).data).toEqual({ service: 'escala-core-api', status: 'ok', version: '0.1.0' })
    expect(missing.status).toBe(404)
    expect((await missing.json()).error.code).toBe('NOT_FOUND')
  })
})

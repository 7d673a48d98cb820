/**
 * @fileoverview Day allocator unit tests
 *
 * @description
 * Generation, regeneration bookkeeping, the Published guard and rollback
 * of a date that cannot be fully staffed.
 */

import { describe, it, expect } from 'vitest'
import type { RosterStore } from '../roster/store'
import { generateDay } from '../roster/day-allocator'
import { RosterError } from '../roster/errors'
import { silentLogger } from '../../lib/logger'
import { captureLogger, createTestEngine, fixedClock, TODAY } from './helpers/engine'
import { MemoryRosterStore, makePerson, makePost } from './helpers/memory-roster-store'

function counters(store: MemoryRosterStore) {
  return Array.from(store.state.people.values()).map((person) => ({
    id: person.id,
    normalDuties: person.normalDuties,
    weekendDuties: person.weekendDuties,
    punishmentBalance: person.punishmentBalance,
  }))
}

function threePostRoster() {
  const store = new MemoryRosterStore()
  store.addPosts(
    makePost('gate', { name: 'Gate', priorityWeight: 3 }),
    makePost('desk', { name: 'Desk', priorityWeight: 2 }),
    makePost('patrol', { name: 'Patrol', priorityWeight: 1 }),
  )
  store.addPeople(
    makePerson('1001', { normalDuties: 2 }),
    makePerson('1002', { normalDuties: 0 }),
    makePerson('1003', { normalDuties: 1, punishmentBalance: 1 }),
    makePerson('1004', { normalDuties: 4 }),
    makePerson('1005', { normalDuties: 3 }),
  )
  return store
}

describe('day-allocator.ts', () => {
  it('should pick the punished candidate and leave the counter alone', async () => {
    const store = new MemoryRosterStore()
    store.addPosts(makePost('p1', { eligibleYears: '1,2' }))
    store.addPeople(
      makePerson('A', { year: 1, punishmentBalance: 0, normalDuties: 3 }),
      makePerson('B', { year: 2, punishmentBalance: 1, normalDuties: 5 }),
    )
    const engine = createTestEngine(store)

    const result = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(result.allocations).toHaveLength(1)
    expect(result.allocations[0].userId).toBe('B')
    expect(result.allocations[0].isPunishment).toBe(true)
    expect(store.person('B').punishmentBalance).toBe(0)
    expect(store.person('B').normalDuties).toBe(5)
    expect(store.person('A').normalDuties).toBe(3)
  })

  it('should fill every post exactly once, heaviest post first', async () => {
    const store = threePostRoster()
    const engine = createTestEngine(store)

    const result = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(result.allocations.map((row) => [row.postId, row.userId, row.isPunishment])).toEqual([
      ['gate', '1003', true],
      ['desk', '1002', false],
      ['patrol', '1001', false],
    ])
    expect(store.allocationsOn('2025-03-04')).toHaveLength(3)
    expect(store.state.days.get('2025-03-04')).toMatchObject({ dutyType: 'RN', status: 'Draft' })
    expect(counters(store)).toEqual([
      { id: '1001', normalDuties: 3, weekendDuties: 0, punishmentBalance: 0 },
      { id: '1002', normalDuties: 1, weekendDuties: 0, punishmentBalance: 0 },
      { id: '1003', normalDuties: 1, weekendDuties: 0, punishmentBalance: 0 },
      { id: '1004', normalDuties: 4, weekendDuties: 0, punishmentBalance: 0 },
      { id: '1005', normalDuties: 3, weekendDuties: 0, punishmentBalance: 0 },
    ])
  })

  it('should keep counters stable across repeated regeneration', async () => {
    const store = threePostRoster()
    const engine = createTestEngine(store)

    await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })
    const afterFirst = counters(store)

    const second = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })
    const third = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(second.replacedAllocations).toBe(3)
    expect(third.replacedAllocations).toBe(3)
    expect(counters(store)).toEqual(afterFirst)
    expect(store.allocationsOn('2025-03-04')).toHaveLength(3)
  })

  it('should undo with the duty type the day was generated with', async () => {
    const store = new MemoryRosterStore()
    store.addPosts(makePost('p1'))
    store.addPeople(makePerson('1001'))
    const engine = createTestEngine(store)

    await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })
    await engine.generateDay({ date: '2025-03-04', dutyType: 'RD' })

    expect(store.person('1001')).toMatchObject({ normalDuties: 0, weekendDuties: 1 })
    expect(store.state.days.get('2025-03-04')?.dutyType).toBe('RD')
  })

  it('should refuse a published day and change nothing', async () => {
    const store = threePostRoster()
    store.addDay({ date: '2025-03-04', dutyType: 'RN', status: 'Published' })
    store.addAllocation({ userId: '1001', postId: 'gate', date: '2025-03-04' })
    const before = structuredClone(store.state)
    const engine = createTestEngine(store)

    await expect(engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })).rejects.toMatchObject({
      code: 'DAY_ALREADY_PUBLISHED',
      status: 409,
      details: { date: '2025-03-04' },
    })
    expect(store.state).toEqual(before)
  })

  it('should roll the whole date back when a post cannot be filled', async () => {
    const store = new MemoryRosterStore()
    store.addPosts(
      makePost('gate', { name: 'Gate', priorityWeight: 2, eligibleYears: '1' }),
      makePost('tower', { name: 'Tower', priorityWeight: 1, eligibleYears: '4' }),
    )
    store.addPeople(makePerson('1001', { year: 1 }), makePerson('1002', { year: 2 }))
    const before = structuredClone(store.state)
    const engine = createTestEngine(store)

    const failure = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' }).catch((error) => error)

    expect(failure).toBeInstanceOf(RosterError)
    expect(failure).toMatchObject({
      code: 'UNFILLED_POST',
      details: { postId: 'tower', postName: 'Tower', requiredYears: [4], date: '2025-03-04' },
    })
    expect(store.state).toEqual(before)
  })

  it('should not double-book one person on the same date', async () => {
    const store = new MemoryRosterStore()
    store.addPosts(makePost('gate', { priorityWeight: 2 }), makePost('desk', { name: 'Desk' }))
    store.addPeople(makePerson('1001'))
    const engine = createTestEngine(store)

    await expect(engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })).rejects.toMatchObject({
      code: 'UNFILLED_POST',
      details: { postId: 'desk' },
    })
  })

  it('should reject open swaps on allocations it removes', async () => {
    const store = threePostRoster()
    const engine = createTestEngine(store)
    const first = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })
    const gate = first.allocations[0]
    const swap = await engine.requestSwap({
      requesterId: gate.userId,
      allocationId: gate.id,
      substituteId: '1004',
      reason: 'Exam',
    })

    const second = await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(second.cancelledSwaps).toBe(1)
    expect(store.swap(swap.id)).toMatchObject({
      status: 'Rejected',
      respondedAt: TODAY,
      allocationId: null,
    })
  })

  it('should lock the date and its neighbours before reading', async () => {
    const store = threePostRoster()
    const engine = createTestEngine(store)

    await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(store.lockCalls).toEqual([['2025-03-03', '2025-03-04', '2025-03-05']])
  })

  it('should validate input before opening a unit of work', async () => {
    const store = threePostRoster()
    const engine = createTestEngine(store)

    await expect(engine.generateDay({ date: '2025-02-30', dutyType: 'RN' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      category: 'validation',
    })
    await expect(engine.generateDay({ date: '2025-03-04', dutyType: 'XX' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
    })
    expect(store.lockCalls).toEqual([])
  })

  it('should pass store failures through untouched', async () => {
    const outage = new Error('connection terminated')
    const store: RosterStore = {
      transaction: async () => {
        throw outage
      },
    }

    await expect(
      generateDay({ store, logger: silentLogger, clock: fixedClock }, { date: '2025-03-04', dutyType: 'RN' }),
    ).rejects.toBe(outage)
  })

  it('should log one line per generated day', async () => {
    const store = threePostRoster()
    const { logger, lines } = captureLogger()
    const engine = createTestEngine(store, { logger })

    await engine.generateDay({ date: '2025-03-04', dutyType: 'RN' })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 'info',
      event: 'roster.day.generated',
      date: '2025-03-04',
      duty_type: 'RN',
      allocations: 3,
      replaced_allocations: 0,
      cancelled_swaps: 0,
    })
  })
})

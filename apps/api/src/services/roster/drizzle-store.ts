/**
 * PostgreSQL implementation of the roster store and read model.
 *
 * Concurrency model:
 * - every unit of work is one `read committed` transaction;
 * - callers take transaction-scoped advisory locks keyed by date
 *   (`lockDates`) before reading anything a decision depends on;
 * - keys are acquired in ascending order, so two units that need
 *   overlapping dates never wait on each other in a cycle.
 */

import { and, asc, desc, eq, gt, gte, inArray, lte, or, sql, type SQL } from 'drizzle-orm'
import { alias } from 'drizzle-orm/pg-core'
import {
  allocations,
  posts,
  rosterDays,
  swapDebts,
  swapRequests,
  unavailabilityWindows,
  users,
  type Database,
  type DatabaseTransaction,
} from '@escala/db'
import type {
  RosterReadModel,
  RosterStore,
  RosterUnitOfWork,
  SwapListRow,
} from './store.js'
import type { PersonCounter, PersonDelta, RosterPerson } from './types.js'

const OPEN_SWAP_STATUSES = ['Pending', 'AwaitingScheduler'] as const

const PERSON_COUNTERS: readonly PersonCounter[] = [
  'normalDuties',
  'weekendDuties',
  'punishmentBalance',
]

const personColumns = {
  id: users.id,
  name: users.name,
  gender: users.gender,
  classLabel: users.classLabel,
  year: users.year,
  normalDuties: users.normalDuties,
  weekendDuties: users.weekendDuties,
  punishmentBalance: users.punishmentBalance,
}

export function advisoryLockKey(date: string): string {
  return `roster:${date}`
}

function createUnitOfWork(tx: DatabaseTransaction): RosterUnitOfWork {
  return {
    async lockDates(dates) {
      for (const date of Array.from(new Set(dates)).sort()) {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${advisoryLockKey(date)}))`)
      }
    },

    async listPosts() {
      return tx
        .select()
        .from(posts)
        .orderBy(desc(posts.priorityWeight), asc(posts.name), asc(posts.id))
    },

    async listPeople(): Promise<RosterPerson[]> {
      return tx.select(personColumns).from(users).orderBy(asc(users.id))
    },

    async findPerson(userId) {
      const [row] = await tx.select(personColumns).from(users).where(eq(users.id, userId)).limit(1)
      return row ?? null
    },

    async listUnavailabilityOn(date) {
      return tx
        .select()
        .from(unavailabilityWindows)
        .where(and(lte(unavailabilityWindows.startsOn, date), gte(unavailabilityWindows.endsOn, date)))
    },

    async findDay(date) {
      const [row] = await tx.select().from(rosterDays).where(eq(rosterDays.date, date)).limit(1)
      return row ?? null
    },

    async upsertDraftDay(date, dutyType) {
      const [row] = await tx
        .insert(rosterDays)
        .values({ date, dutyType, status: 'Draft' })
        .onConflictDoUpdate({
          target: rosterDays.date,
          set: { dutyType, status: 'Draft', updatedAt: new Date() },
        })
        .returning()
      return row
    },

    async setDayStatus(date, status) {
      await tx.update(rosterDays).set({ status }).where(eq(rosterDays.date, date))
    },

    async publishDraftDays(startDate, endDate) {
      const rows = await tx
        .update(rosterDays)
        .set({ status: 'Published', publishedAt: new Date() })
        .where(
          and(
            eq(rosterDays.status, 'Draft'),
            gte(rosterDays.date, startDate),
            lte(rosterDays.date, endDate),
          ),
        )
        .returning({ date: rosterDays.date })
      return rows.length
    },

    async findAllocation(allocationId) {
      const [row] = await tx
        .select()
        .from(allocations)
        .where(eq(allocations.id, allocationId))
        .limit(1)
      return row ?? null
    },

    async listAllocationsOn(date) {
      return tx.select().from(allocations).where(eq(allocations.date, date)).orderBy(asc(allocations.id))
    },

    async listAllocationsForUserBetween(userId, from, to) {
      return tx
        .select()
        .from(allocations)
        .where(
          and(eq(allocations.userId, userId), gte(allocations.date, from), lte(allocations.date, to)),
        )
    },

    async insertAllocation(input) {
      const [row] = await tx.insert(allocations).values(input).returning()
      return row
    },

    async deleteAllocationsOn(date) {
      // swap_requests.allocation_id / counter_allocation_id are ON DELETE SET NULL.
      const rows = await tx
        .delete(allocations)
        .where(eq(allocations.date, date))
        .returning({ id: allocations.id })
      return rows.length
    },

    async reassignAllocation(allocationId, userId) {
      await tx.update(allocations).set({ userId }).where(eq(allocations.id, allocationId))
    },

    async adjustPerson(userId, delta: PersonDelta) {
      const set: Partial<Record<PersonCounter, SQL>> = {}
      for (const field of PERSON_COUNTERS) {
        const amount = delta[field]
        if (!amount) continue
        set[field] = sql`${users[field]} + ${amount}`
      }
      if (Object.keys(set).length === 0) return
      await tx.update(users).set(set).where(eq(users.id, userId))
    },

    async findSwap(swapId) {
      const [row] = await tx.select().from(swapRequests).where(eq(swapRequests.id, swapId)).limit(1)
      return row ?? null
    },

    async listOpenSwapsTouching(allocationIds) {
      if (allocationIds.length === 0) return []
      return tx
        .select()
        .from(swapRequests)
        .where(
          and(
            inArray(swapRequests.status, [...OPEN_SWAP_STATUSES]),
            or(
              inArray(swapRequests.allocationId, allocationIds),
              inArray(swapRequests.counterAllocationId, allocationIds),
            ),
          ),
        )
    },

    async insertSwap(input) {
      const [row] = await tx.insert(swapRequests).values(input).returning()
      return row
    },

    async updateSwap(swapId, patch) {
      await tx.update(swapRequests).set(patch).where(eq(swapRequests.id, swapId))
    },

    async findPendingDebt(debtorId, creditorId) {
      const [row] = await tx
        .select()
        .from(swapDebts)
        .where(
          and(
            eq(swapDebts.debtorId, debtorId),
            eq(swapDebts.creditorId, creditorId),
            eq(swapDebts.status, 'pending'),
          ),
        )
        .orderBy(asc(swapDebts.createdAt), asc(swapDebts.id))
        .limit(1)
      return row ?? null
    },

    async insertDebt(input) {
      const [row] = await tx.insert(swapDebts).values(input).returning()
      return row
    },

    async settleDebt(debtId, settledBySwapId, paidAt) {
      await tx
        .update(swapDebts)
        .set({ status: 'paid', paidAt, settledBySwapId })
        .where(eq(swapDebts.id, debtId))
    },
  }
}

export function createDrizzleRosterStore(db: Database): RosterStore {
  return {
    transaction(work) {
      return db.transaction((tx) => work(createUnitOfWork(tx)), {
        isolationLevel: 'read committed',
      })
    },
  }
}

const requester = alias(users, 'requester')
const substitute = alias(users, 'substitute')
const debtor = alias(users, 'debtor')
const creditor = alias(users, 'creditor')

export function createDrizzleRosterReadModel(db: Database): RosterReadModel {
  const swapListQuery = () =>
    db
      .select({
        swapId: swapRequests.id,
        status: swapRequests.status,
        reason: swapRequests.reason,
        createdAt: swapRequests.createdAt,
        requesterId: swapRequests.requesterId,
        requesterName: requester.name,
        substituteId: swapRequests.substituteId,
        substituteName: substitute.name,
        allocationId: allocations.id,
        date: allocations.date,
        postName: posts.name,
        counterAllocationId: swapRequests.counterAllocationId,
      })
      .from(swapRequests)
      .innerJoin(requester, eq(requester.id, swapRequests.requesterId))
      .innerJoin(substitute, eq(substitute.id, swapRequests.substituteId))
      .leftJoin(allocations, eq(allocations.id, swapRequests.allocationId))
      .leftJoin(posts, eq(posts.id, allocations.postId))

  return {
    async listBoardRows(fromDate) {
      return db
        .select({
          date: rosterDays.date,
          dutyType: rosterDays.dutyType,
          status: rosterDays.status,
          allocationId: allocations.id,
          userId: allocations.userId,
          personName: users.name,
          classLabel: users.classLabel,
          postName: posts.name,
          isPunishment: allocations.isPunishment,
        })
        .from(rosterDays)
        .leftJoin(allocations, eq(allocations.date, rosterDays.date))
        .leftJoin(posts, eq(posts.id, allocations.postId))
        .leftJoin(users, eq(users.id, allocations.userId))
        .where(gte(rosterDays.date, fromDate))
        .orderBy(asc(rosterDays.date), desc(posts.priorityWeight), asc(posts.name))
    },

    async listUpcomingDuties(userId, fromDate, limit) {
      return db
        .select({
          allocationId: allocations.id,
          date: allocations.date,
          postName: posts.name,
          dutyType: rosterDays.dutyType,
          status: rosterDays.status,
          isPunishment: allocations.isPunishment,
        })
        .from(allocations)
        .innerJoin(posts, eq(posts.id, allocations.postId))
        .innerJoin(rosterDays, eq(rosterDays.date, allocations.date))
        .where(and(eq(allocations.userId, userId), gte(allocations.date, fromDate)))
        .orderBy(asc(allocations.date))
        .limit(limit)
    },

    async listInboundSwaps(substituteId): Promise<SwapListRow[]> {
      return swapListQuery()
        .where(and(eq(swapRequests.substituteId, substituteId), eq(swapRequests.status, 'Pending')))
        .orderBy(desc(swapRequests.createdAt))
    },

    async listSchedulerQueue(): Promise<SwapListRow[]> {
      return swapListQuery()
        .where(eq(swapRequests.status, 'AwaitingScheduler'))
        .orderBy(asc(allocations.date), asc(swapRequests.createdAt))
    },

    async listPunishedPeople() {
      return db
        .select({
          userId: users.id,
          name: users.name,
          classLabel: users.classLabel,
          punishmentBalance: users.punishmentBalance,
        })
        .from(users)
        .where(gt(users.punishmentBalance, 0))
        .orderBy(desc(users.punishmentBalance), asc(users.name))
    },

    async listDebts(status) {
      return db
        .select({
          debtId: swapDebts.id,
          status: swapDebts.status,
          debtorId: swapDebts.debtorId,
          debtorName: debtor.name,
          creditorId: swapDebts.creditorId,
          creditorName: creditor.name,
          originSwapId: swapDebts.originSwapId,
          settledBySwapId: swapDebts.settledBySwapId,
          createdAt: swapDebts.createdAt,
          paidAt: swapDebts.paidAt,
        })
        .from(swapDebts)
        .innerJoin(debtor, eq(debtor.id, swapDebts.debtorId))
        .innerJoin(creditor, eq(creditor.id, swapDebts.creditorId))
        .where(status ? eq(swapDebts.status, status) : undefined)
        .orderBy(desc(swapDebts.createdAt))
    },
  }
}

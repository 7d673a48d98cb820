/**
 * Day allocator.
 *
 * Lifecycle of a day header:
 * - no header -> Draft (first generation)
 * - Draft -> Draft (regeneration: undo bookkeeping, delete, allocate again)
 * - Draft -> Published (publication.ts)
 * - Published -> Draft (errata, publication.ts)
 *
 * Regenerating a Published day is refused; the caller must reopen it first.
 */

import { generateDaySchema } from '@escala/schema'
import { errorMessage } from '../../lib/logger.js'
import { selectCandidate, unfilledPostError } from './candidate-selector.js'
import type { RosterContext } from './context.js'
import { loadCandidatePool } from './eligibility.js'
import { RosterError, isRosterError, validationError } from './errors.js'
import { fatigueLockDates } from './fatigue.js'
import type { RosterUnitOfWork } from './store.js'
import { fairnessDelta, type Allocation, type DutyType, type RosterDay } from './types.js'

export type GenerateDayResult = {
  date: string
  dutyType: DutyType
  allocations: Allocation[]
  /** Allocations removed from a previous Draft of the same day. */
  replacedAllocations: number
  /** Open swap requests cancelled because their allocation was removed. */
  cancelledSwaps: number
}

type Teardown = {
  removed: number
  cancelledSwaps: number
}

/**
 * Undo everything a previous generation of `day` did, then delete its
 * allocations. The inverse of the bookkeeping in `allocatePosts`: a
 * punishment duty gives the punishment back to whoever it was charged to,
 * an ordinary duty takes one off the counter of the duty type the day was
 * generated with. Approval moves ordinary credit with the allocation, so the
 * current holder is the one to debit.
 *
 * Swap debts recorded by approved swaps on these allocations are left as
 * they are: the debt is between two people, not tied to a roster row.
 */
async function tearDownDraftDay(
  uow: RosterUnitOfWork,
  day: RosterDay,
  now: Date,
): Promise<Teardown> {
  const existing = await uow.listAllocationsOn(day.date)
  if (existing.length === 0) {
    return { removed: 0, cancelledSwaps: 0 }
  }

  for (const allocation of existing) {
    if (allocation.isPunishment) {
      await uow.adjustPerson(allocation.punishedUserId ?? allocation.userId, { punishmentBalance: 1 })
    } else {
      await uow.adjustPerson(allocation.userId, fairnessDelta(day.dutyType, -1))
    }
  }

  const openSwaps = await uow.listOpenSwapsTouching(existing.map((allocation) => allocation.id))
  for (const swap of openSwaps) {
    await uow.updateSwap(swap.id, { status: 'Rejected', respondedAt: now })
  }

  const removed = await uow.deleteAllocationsOn(day.date)
  return { removed, cancelledSwaps: openSwaps.length }
}

async function allocatePosts(
  uow: RosterUnitOfWork,
  date: string,
  dutyType: DutyType,
): Promise<Allocation[]> {
  const posts = await uow.listPosts()
  const created: Allocation[] = []

  for (const post of posts) {
    const pool = await loadCandidatePool(uow, post, date, dutyType)
    const chosen = await selectCandidate(uow, post, date, pool)
    if (!chosen) {
      throw unfilledPostError(post, date)
    }

    const isPunishment = chosen.punishmentBalance > 0
    const allocation = await uow.insertAllocation({
      userId: chosen.id,
      postId: post.id,
      date,
      isPunishment,
      punishedUserId: isPunishment ? chosen.id : null,
    })
    await uow.adjustPerson(
      chosen.id,
      isPunishment ? { punishmentBalance: -1 } : fairnessDelta(dutyType, 1),
    )
    created.push(allocation)
  }

  return created
}

/**
 * Generate (or regenerate) the roster of one date in a single unit of work.
 * Any failure rolls the whole date back.
 */
export async function generateDay(ctx: RosterContext, input: unknown): Promise<GenerateDayResult> {
  const parsed = generateDaySchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid day generation request.')
  }
  const { date, dutyType } = parsed.data
  const now = ctx.clock()

  try {
    const result = await ctx.store.transaction(async (uow) => {
      await uow.lockDates(fatigueLockDates([date]))

      const existing = await uow.findDay(date)
      if (existing?.status === 'Published') {
        throw new RosterError(
          'DAY_ALREADY_PUBLISHED',
          `The roster for ${date} is already published. Reopen it before generating again.`,
          { date },
        )
      }

      const teardown = existing
        ? await tearDownDraftDay(uow, existing, now)
        : { removed: 0, cancelledSwaps: 0 }

      await uow.upsertDraftDay(date, dutyType)
      const allocations = await allocatePosts(uow, date, dutyType)

      return {
        date,
        dutyType,
        allocations,
        replacedAllocations: teardown.removed,
        cancelledSwaps: teardown.cancelledSwaps,
      }
    })

    ctx.logger.info({
      event: 'roster.day.generated',
      date,
      duty_type: dutyType,
      allocations: result.allocations.length,
      replaced_allocations: result.replacedAllocations,
      cancelled_swaps: result.cancelledSwaps,
    })
    return result
  } catch (error) {
    if (isRosterError(error)) {
      ctx.logger.warn({
        event: 'roster.day.failed',
        date,
        duty_type: dutyType,
        error_code: error.code,
        message: error.message,
      })
    } else {
      ctx.logger.error({
        event: 'roster.day.failed',
        date,
        duty_type: dutyType,
        message: errorMessage(error),
      })
    }
    throw error
  }
}

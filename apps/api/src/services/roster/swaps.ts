/**
 * Swap workflow.
 *
 * Pending --accept--> AwaitingScheduler --approve--> Approved
 *    |                        \--reject--> Rejected
 *    \--decline--> Rejected
 *
 * The substitute consents first; only a scheduler moves allocations and
 * fairness credit. Fatigue is checked at request time and again at approval.
 */

import {
  swapDecisionSchema,
  swapRequestSchema,
  swapResponseSchema,
  type SwapResponseAction,
} from '@escala/schema'
import type { RosterContext } from './context.js'
import { toDateKey } from './dates.js'
import { RosterError, validationError } from './errors.js'
import { fatigueLockDates, isFatigued } from './fatigue.js'
import type { RosterUnitOfWork } from './store.js'
import { fairnessDelta, type Allocation, type SwapRequest, type SwapStatus } from './types.js'

export type SwapTransitionResult = {
  swapId: string
  status: SwapStatus
}

export type DebtOutcome =
  | { action: 'created'; debtId: string }
  | { action: 'settled'; debtId: string }
  | { action: 'none' }

export type ApproveSwapResult = SwapTransitionResult & {
  allocationId: string
  substituteId: string
  counterAllocationId: string | null
  debt: DebtOutcome
}

function notFound(message: string, details: Record<string, unknown>) {
  return new RosterError('NOT_FOUND', message, details)
}

async function requireAllocation(uow: RosterUnitOfWork, allocationId: string): Promise<Allocation> {
  const allocation = await uow.findAllocation(allocationId)
  if (!allocation) {
    throw notFound('Allocation not found.', { allocationId })
  }
  return allocation
}

/** Only upcoming duties on Draft days can change hands by request. */
async function assertSwappable(uow: RosterUnitOfWork, allocation: Allocation, today: string) {
  if (allocation.date <= today) {
    throw new RosterError(
      'ALLOCATION_NOT_UPCOMING',
      `The duty on ${allocation.date} is not upcoming.`,
      { allocationId: allocation.id, date: allocation.date, today },
    )
  }
  const day = await uow.findDay(allocation.date)
  if (!day) {
    throw new RosterError('DAY_NOT_FOUND', `No roster exists for ${allocation.date}.`, {
      date: allocation.date,
    })
  }
  if (day.status === 'Published') {
    throw new RosterError(
      'DAY_ALREADY_PUBLISHED',
      `The roster for ${allocation.date} is published; swaps need an errata first.`,
      { allocationId: allocation.id, date: allocation.date },
    )
  }
}

/**
 * Both rows of a same-date exchange would have to change owner at once;
 * `allocations_user_date_unique` sees the first move as a second duty.
 */
function assertDistinctDates(allocation: Allocation, counter: Allocation) {
  if (allocation.date === counter.date) {
    throw new RosterError(
      'VALIDATION_ERROR',
      'A mutual swap needs duties on different dates.',
      { allocationId: allocation.id, counterAllocationId: counter.id, date: allocation.date },
    )
  }
}

function fatigueViolation(userId: string, date: string, stage: 'request' | 'approval') {
  return new RosterError(
    'FATIGUE_VIOLATION',
    `${userId} already has a duty within one day of ${date}.`,
    { userId, date, stage },
  )
}

type LockedSwap = {
  swap: SwapRequest
  allocation: Allocation | null
  counter: Allocation | null
}

/**
 * Load a swap and take the date locks its allocations need, then read it
 * again so every decision sees rows committed before the lock was granted.
 */
async function loadLockedSwap(uow: RosterUnitOfWork, swapId: string): Promise<LockedSwap> {
  const first = await uow.findSwap(swapId)
  if (!first) {
    throw notFound('Swap request not found.', { swapId })
  }

  const dates: string[] = []
  for (const allocationId of [first.allocationId, first.counterAllocationId]) {
    if (!allocationId) continue
    const allocation = await uow.findAllocation(allocationId)
    if (allocation) dates.push(allocation.date)
  }
  if (dates.length > 0) {
    await uow.lockDates(fatigueLockDates(dates))
  }

  const swap = await uow.findSwap(swapId)
  if (!swap) {
    throw notFound('Swap request not found.', { swapId })
  }
  return {
    swap,
    allocation: swap.allocationId ? await uow.findAllocation(swap.allocationId) : null,
    counter: swap.counterAllocationId ? await uow.findAllocation(swap.counterAllocationId) : null,
  }
}

/** Move one allocation to `toUserId`, carrying its fairness credit along. */
async function transferAllocation(
  uow: RosterUnitOfWork,
  allocation: Allocation,
  toUserId: string,
): Promise<void> {
  await uow.reassignAllocation(allocation.id, toUserId)
  if (allocation.isPunishment) return

  const day = await uow.findDay(allocation.date)
  if (!day) {
    throw new RosterError('DAY_NOT_FOUND', `No roster exists for ${allocation.date}.`, {
      date: allocation.date,
    })
  }
  await uow.adjustPerson(allocation.userId, fairnessDelta(day.dutyType, -1))
  await uow.adjustPerson(toUserId, fairnessDelta(day.dutyType, 1))
}

/**
 * A one-way swap leaves the requester owing the substitute. If the
 * substitute already owed the requester, that older debt is paid instead.
 */
async function recordSwapDebt(
  uow: RosterUnitOfWork,
  swap: SwapRequest,
  now: Date,
): Promise<DebtOutcome> {
  const reverse = await uow.findPendingDebt(swap.substituteId, swap.requesterId)
  if (reverse) {
    await uow.settleDebt(reverse.id, swap.id, now)
    return { action: 'settled', debtId: reverse.id }
  }

  const debt = await uow.insertDebt({
    debtorId: swap.requesterId,
    creditorId: swap.substituteId,
    originSwapId: swap.id,
    createdAt: now,
  })
  return { action: 'created', debtId: debt.id }
}

/**
 * Requester asks `substituteId` to take one of their upcoming Draft duties,
 * optionally offering one of the substitute's duties in return.
 */
export async function requestSwap(ctx: RosterContext, input: unknown): Promise<SwapRequest> {
  const parsed = swapRequestSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid swap request.')
  }
  const { requesterId, allocationId, substituteId, reason, counterAllocationId } = parsed.data
  const now = ctx.clock()
  const today = toDateKey(now)

  const swap = await ctx.store.transaction(async (uow) => {
    const lockTargets = [await requireAllocation(uow, allocationId)]
    if (counterAllocationId) {
      lockTargets.push(await requireAllocation(uow, counterAllocationId))
    }
    await uow.lockDates(fatigueLockDates(lockTargets.map((allocation) => allocation.date)))

    const allocation = await requireAllocation(uow, allocationId)
    if (allocation.userId !== requesterId) {
      throw new RosterError('FORBIDDEN', 'Only the holder of a duty can offer it.', {
        allocationId,
        requesterId,
      })
    }
    await assertSwappable(uow, allocation, today)

    const substitute = await uow.findPerson(substituteId)
    if (!substitute) {
      throw notFound('Substitute not found.', { substituteId })
    }

    let counter: Allocation | null = null
    if (counterAllocationId) {
      counter = await requireAllocation(uow, counterAllocationId)
      if (counter.userId !== substituteId) {
        throw new RosterError(
          'VALIDATION_ERROR',
          'The counter allocation is not held by the substitute.',
          { counterAllocationId, substituteId },
        )
      }
      assertDistinctDates(allocation, counter)
      await assertSwappable(uow, counter, today)
    }

    const touched = counter ? [allocation.id, counter.id] : [allocation.id]
    const open = await uow.listOpenSwapsTouching(touched)
    if (open.length > 0) {
      throw new RosterError('SWAP_ALREADY_OPEN', 'A swap for this duty is already open.', {
        allocationId,
        openSwapIds: open.map((existing) => existing.id),
      })
    }

    const substituteExcludes = counter ? [counter.id] : []
    if (
      await isFatigued(uow, substituteId, allocation.date, {
        excludeAllocationIds: substituteExcludes,
      })
    ) {
      throw fatigueViolation(substituteId, allocation.date, 'request')
    }
    if (
      counter &&
      (await isFatigued(uow, requesterId, counter.date, { excludeAllocationIds: [allocation.id] }))
    ) {
      throw fatigueViolation(requesterId, counter.date, 'request')
    }

    return uow.insertSwap({
      requesterId,
      substituteId,
      allocationId,
      counterAllocationId: counter?.id ?? null,
      reason,
      createdAt: now,
    })
  })

  ctx.logger.info({
    event: 'swap.requested',
    swap_id: swap.id,
    allocation_id: allocationId,
    user_id: requesterId,
    substitute_id: substituteId,
    mutual: swap.counterAllocationId !== null,
  })
  return swap
}

const RESPONSE_STATUS: Record<SwapResponseAction, SwapStatus> = {
  accept: 'AwaitingScheduler',
  decline: 'Rejected',
}

/** Substitute accepts (hand-off to a scheduler) or declines (final). */
export async function respondToSwap(
  ctx: RosterContext,
  input: unknown,
): Promise<SwapTransitionResult> {
  const parsed = swapResponseSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid swap response.')
  }
  const { swapId, responderId, action } = parsed.data
  const now = ctx.clock()

  const status = await ctx.store.transaction(async (uow) => {
    const { swap } = await loadLockedSwap(uow, swapId)
    if (swap.substituteId !== responderId) {
      throw new RosterError('FORBIDDEN', 'This swap request is addressed to someone else.', {
        swapId,
        responderId,
      })
    }
    if (swap.status !== 'Pending') {
      throw new RosterError('SWAP_ALREADY_RESOLVED', 'This swap request was already answered.', {
        swapId,
        status: swap.status,
      })
    }

    const next = RESPONSE_STATUS[action]
    await uow.updateSwap(
      swapId,
      next === 'Rejected' ? { status: next, respondedAt: now } : { status: next },
    )
    return next
  })

  ctx.logger.info({ event: 'swap.responded', swap_id: swapId, user_id: responderId, action })
  return { swapId, status }
}

/**
 * Scheduler approval: re-check fatigue against current allocations, move
 * the duty (and the counter duty, if any) and the fairness credit.
 *
 * Only swaps the substitute accepted (`AwaitingScheduler`) can be approved.
 * There is no scheduler shortcut from `Pending`: a duty never moves without
 * the substitute's consent.
 */
export async function approveSwap(ctx: RosterContext, input: unknown): Promise<ApproveSwapResult> {
  const parsed = swapDecisionSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid swap id.')
  }
  const { swapId } = parsed.data
  const now = ctx.clock()

  const result = await ctx.store.transaction(async (uow) => {
    const { swap, allocation, counter } = await loadLockedSwap(uow, swapId)
    if (swap.status !== 'AwaitingScheduler') {
      throw new RosterError(
        'SWAP_NOT_PENDING',
        'Only swaps accepted by the substitute can be approved.',
        { swapId, status: swap.status },
      )
    }
    if (!allocation) {
      throw notFound('The allocation of this swap no longer exists.', {
        swapId,
        allocationId: swap.allocationId,
      })
    }
    if (swap.counterAllocationId && !counter) {
      throw notFound('The counter allocation of this swap no longer exists.', {
        swapId,
        counterAllocationId: swap.counterAllocationId,
      })
    }
    if (allocation.userId !== swap.requesterId || (counter && counter.userId !== swap.substituteId)) {
      throw new RosterError('STALE_SWAP', 'The duties of this swap changed hands since it was requested.', {
        swapId,
        allocationId: allocation.id,
        counterAllocationId: counter?.id ?? null,
      })
    }
    if (counter) {
      assertDistinctDates(allocation, counter)
    }

    if (
      await isFatigued(uow, swap.substituteId, allocation.date, {
        excludeAllocationIds: counter ? [allocation.id, counter.id] : [allocation.id],
      })
    ) {
      throw fatigueViolation(swap.substituteId, allocation.date, 'approval')
    }
    if (
      counter &&
      (await isFatigued(uow, swap.requesterId, counter.date, {
        excludeAllocationIds: [allocation.id, counter.id],
      }))
    ) {
      throw fatigueViolation(swap.requesterId, counter.date, 'approval')
    }

    await transferAllocation(uow, allocation, swap.substituteId)
    if (counter) {
      await transferAllocation(uow, counter, swap.requesterId)
    }
    const debt: DebtOutcome = counter ? { action: 'none' } : await recordSwapDebt(uow, swap, now)

    await uow.updateSwap(swapId, { status: 'Approved', respondedAt: now })

    return {
      swapId,
      status: 'Approved' as const,
      allocationId: allocation.id,
      substituteId: swap.substituteId,
      counterAllocationId: counter?.id ?? null,
      debt,
    }
  })

  ctx.logger.info({
    event: 'swap.approved',
    swap_id: swapId,
    allocation_id: result.allocationId,
    user_id: result.substituteId,
    debt: result.debt.action,
  })
  return result
}

/** Scheduler turns down a swap the substitute already accepted. */
export async function rejectSwap(ctx: RosterContext, input: unknown): Promise<SwapTransitionResult> {
  const parsed = swapDecisionSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid swap id.')
  }
  const { swapId } = parsed.data
  const now = ctx.clock()

  await ctx.store.transaction(async (uow) => {
    const { swap } = await loadLockedSwap(uow, swapId)
    if (swap.status !== 'AwaitingScheduler') {
      throw new RosterError('SWAP_NOT_PENDING', 'Only swaps awaiting a scheduler can be rejected.', {
        swapId,
        status: swap.status,
      })
    }
    await uow.updateSwap(swapId, { status: 'Rejected', respondedAt: now })
  })

  ctx.logger.info({ event: 'swap.rejected', swap_id: swapId })
  return { swapId, status: 'Rejected' }
}

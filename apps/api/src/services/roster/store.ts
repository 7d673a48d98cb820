/**
 * Persistence seam for the roster engine.
 *
 * The engine never talks to Drizzle directly: every operation runs inside
 * `RosterStore.transaction`, and every read/write goes through the unit of
 * work handed to the callback. Reads observe writes made earlier in the same
 * unit (allocations inserted for one post are visible to the fatigue check of
 * the next post).
 */

import type {
  Allocation,
  DutyType,
  Post,
  PersonDelta,
  RosterDay,
  RosterDayStatus,
  RosterPerson,
  SwapDebt,
  SwapRequest,
  SwapStatus,
  UnavailabilityWindow,
} from './types.js'

export type NewAllocationInput = {
  userId: string
  postId: string
  date: string
  isPunishment: boolean
  /** Set exactly when `isPunishment` is. */
  punishedUserId: string | null
}

export type NewSwapInput = {
  requesterId: string
  substituteId: string
  allocationId: string
  counterAllocationId: string | null
  reason: string
  createdAt: Date
}

export type SwapPatch = {
  status: SwapStatus
  respondedAt?: Date | null
}

export type NewSwapDebtInput = {
  debtorId: string
  creditorId: string
  originSwapId: string
  createdAt: Date
}

export interface RosterUnitOfWork {
  /**
   * Serialize against every other unit that touches the same dates.
   * Call once, before the first read that a decision depends on.
   */
  lockDates(dates: string[]): Promise<void>

  // Eligibility store (read path)
  /** Posts ordered by priority weight DESC, name ASC, id ASC. */
  listPosts(): Promise<Post[]>
  listPeople(): Promise<RosterPerson[]>
  findPerson(userId: string): Promise<RosterPerson | null>
  /** Windows whose inclusive range covers `date`. */
  listUnavailabilityOn(date: string): Promise<UnavailabilityWindow[]>

  // Days
  findDay(date: string): Promise<RosterDay | null>
  /** Insert or overwrite the header as Draft with the given duty type. */
  upsertDraftDay(date: string, dutyType: DutyType): Promise<RosterDay>
  setDayStatus(date: string, status: RosterDayStatus): Promise<void>
  /** Flip every Draft day in the inclusive range to Published; returns the count. */
  publishDraftDays(startDate: string, endDate: string): Promise<number>

  // Allocations
  findAllocation(allocationId: string): Promise<Allocation | null>
  listAllocationsOn(date: string): Promise<Allocation[]>
  /** Allocations held by `userId` dated within the inclusive range. */
  listAllocationsForUserBetween(userId: string, from: string, to: string): Promise<Allocation[]>
  insertAllocation(input: NewAllocationInput): Promise<Allocation>
  deleteAllocationsOn(date: string): Promise<number>
  reassignAllocation(allocationId: string, userId: string): Promise<void>

  // People bookkeeping
  adjustPerson(userId: string, delta: PersonDelta): Promise<void>

  // Swaps
  findSwap(swapId: string): Promise<SwapRequest | null>
  /** Pending/AwaitingScheduler swaps targeting or offering any of the allocations. */
  listOpenSwapsTouching(allocationIds: string[]): Promise<SwapRequest[]>
  insertSwap(input: NewSwapInput): Promise<SwapRequest>
  updateSwap(swapId: string, patch: SwapPatch): Promise<void>

  // Swap debts
  /** Oldest pending debt from `debtorId` to `creditorId`. */
  findPendingDebt(debtorId: string, creditorId: string): Promise<SwapDebt | null>
  insertDebt(input: NewSwapDebtInput): Promise<SwapDebt>
  settleDebt(debtId: string, settledBySwapId: string, paidAt: Date): Promise<void>
}

export interface RosterStore {
  /** Run `work` atomically: commit when it resolves, roll back when it throws. */
  transaction<T>(work: (uow: RosterUnitOfWork) => Promise<T>): Promise<T>
}

// -----------------------------------------------------------------------------
// Read model (views outside the write path)
// -----------------------------------------------------------------------------

export type RosterBoardRow = {
  date: string
  dutyType: DutyType
  status: RosterDayStatus
  allocationId: string | null
  userId: string | null
  personName: string | null
  classLabel: string | null
  postName: string | null
  isPunishment: boolean | null
}

export type UpcomingDutyRow = {
  allocationId: string
  date: string
  postName: string
  dutyType: DutyType
  status: RosterDayStatus
  isPunishment: boolean
}

export type SwapListRow = {
  swapId: string
  status: SwapStatus
  reason: string | null
  createdAt: Date
  requesterId: string
  requesterName: string
  substituteId: string
  substituteName: string
  allocationId: string | null
  date: string | null
  postName: string | null
  counterAllocationId: string | null
}

export type PunishedPersonRow = {
  userId: string
  name: string
  classLabel: string
  punishmentBalance: number
}

export type SwapDebtRow = {
  debtId: string
  status: SwapDebt['status']
  debtorId: string
  debtorName: string
  creditorId: string
  creditorName: string
  originSwapId: string | null
  settledBySwapId: string | null
  createdAt: Date
  paidAt: Date | null
}

export interface RosterReadModel {
  /**
   * Day headers from `fromDate` on, left-joined with their allocations.
   * Ordered by date ASC, post weight DESC, post name ASC.
   */
  listBoardRows(fromDate: string): Promise<RosterBoardRow[]>
  listUpcomingDuties(userId: string, fromDate: string, limit: number): Promise<UpcomingDutyRow[]>
  /** Pending swaps addressed to the substitute, newest first. */
  listInboundSwaps(substituteId: string): Promise<SwapListRow[]>
  /** AwaitingScheduler swaps ordered by duty date. */
  listSchedulerQueue(): Promise<SwapListRow[]>
  /** Positive punishment balances, balance DESC, name ASC. */
  listPunishedPeople(): Promise<PunishedPersonRow[]>
  listDebts(status?: SwapDebt['status']): Promise<SwapDebtRow[]>
}

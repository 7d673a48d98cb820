import type { SwapDebtStatus } from '@escala/schema'
import type { RosterViewContext } from './context.js'
import { shortDateLabel, toDateKey, weekdayLabel } from './dates.js'
import type {
  PunishedPersonRow,
  RosterBoardRow,
  SwapDebtRow,
  SwapListRow,
  UpcomingDutyRow,
} from './store.js'
import type { DutyType, RosterDayStatus } from './types.js'

export const UPCOMING_DUTIES_LIMIT = 5

export type BoardAllocation = {
  allocationId: string
  userId: string
  personName: string
  classLabel: string
  postName: string
  isPunishment: boolean
  isMine: boolean
}

export type BoardDay = {
  date: string
  weekday: string
  label: string
  dutyType: DutyType
  status: RosterDayStatus
  allocations: BoardAllocation[]
}

export type RosterBoard = {
  fromDate: string
  published: BoardDay[]
  drafts: BoardDay[]
}

/**
 * Fold joined rows (one per allocation, or one empty row for a day without
 * allocations) into days. Row order is kept, so the read model decides the
 * post order.
 */
export function groupBoardRows(rows: RosterBoardRow[], viewerId: string | null): BoardDay[] {
  const days = new Map<string, BoardDay>()

  for (const row of rows) {
    let day = days.get(row.date)
    if (!day) {
      day = {
        date: row.date,
        weekday: weekdayLabel(row.date),
        label: shortDateLabel(row.date),
        dutyType: row.dutyType,
        status: row.status,
        allocations: [],
      }
      days.set(row.date, day)
    }

    if (row.allocationId === null || row.userId === null) continue
    day.allocations.push({
      allocationId: row.allocationId,
      userId: row.userId,
      personName: row.personName ?? '',
      classLabel: row.classLabel ?? '',
      postName: row.postName ?? '',
      isPunishment: row.isPunishment ?? false,
      isMine: viewerId !== null && row.userId === viewerId,
    })
  }

  return Array.from(days.values())
}

export function splitBoard(fromDate: string, days: BoardDay[]): RosterBoard {
  return {
    fromDate,
    published: days.filter((day) => day.status === 'Published'),
    drafts: days.filter((day) => day.status === 'Draft'),
  }
}

export async function getRosterBoard(
  ctx: RosterViewContext,
  viewerId: string | null,
  fromDate?: string,
): Promise<RosterBoard> {
  const from = fromDate ?? toDateKey(ctx.clock())
  const rows = await ctx.readModel.listBoardRows(from)
  return splitBoard(from, groupBoardRows(rows, viewerId))
}

export async function getUpcomingDuties(
  ctx: RosterViewContext,
  userId: string,
): Promise<UpcomingDutyRow[]> {
  return ctx.readModel.listUpcomingDuties(userId, toDateKey(ctx.clock()), UPCOMING_DUTIES_LIMIT)
}

export async function getSwapInbox(ctx: RosterViewContext, userId: string): Promise<SwapListRow[]> {
  return ctx.readModel.listInboundSwaps(userId)
}

export async function getSchedulerQueue(ctx: RosterViewContext): Promise<SwapListRow[]> {
  return ctx.readModel.listSchedulerQueue()
}

export async function getPunishmentBoard(ctx: RosterViewContext): Promise<PunishedPersonRow[]> {
  return ctx.readModel.listPunishedPeople()
}

export async function getSwapDebts(
  ctx: RosterViewContext,
  status?: SwapDebtStatus,
): Promise<SwapDebtRow[]> {
  return ctx.readModel.listDebts(status)
}

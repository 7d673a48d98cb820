import { shiftDateKey } from './dates.js'
import type { RosterUnitOfWork } from './store.js'

/** Minimum rest, in days, on either side of a duty. */
export const FATIGUE_WINDOW_DAYS = 1

export type FatigueWindow = {
  from: string
  to: string
}

export function fatigueWindow(date: string): FatigueWindow {
  return {
    from: shiftDateKey(date, -FATIGUE_WINDOW_DAYS),
    to: shiftDateKey(date, FATIGUE_WINDOW_DAYS),
  }
}

/**
 * Every date whose allocations a decision about `dates` can read or change,
 * deduplicated and ascending (the order advisory locks are taken in).
 */
export function fatigueLockDates(dates: string[]): string[] {
  const keys = new Set<string>()
  for (const date of dates) {
    for (let offset = -FATIGUE_WINDOW_DAYS; offset <= FATIGUE_WINDOW_DAYS; offset += 1) {
      keys.add(shiftDateKey(date, offset))
    }
  }
  return Array.from(keys).sort()
}

export type FatigueCheckOptions = {
  /** Allocations to ignore, e.g. the one being handed over in a swap. */
  excludeAllocationIds?: string[]
}

/**
 * True when `userId` already holds an allocation within one day of `date`
 * (the same day included). Reads through the unit of work, so allocations
 * written earlier in the same transaction count.
 */
export async function isFatigued(
  uow: RosterUnitOfWork,
  userId: string,
  date: string,
  options: FatigueCheckOptions = {},
): Promise<boolean> {
  const window = fatigueWindow(date)
  const held = await uow.listAllocationsForUserBetween(userId, window.from, window.to)
  const excluded = new Set(options.excludeAllocationIds ?? [])
  return held.some((allocation) => !excluded.has(allocation.id))
}

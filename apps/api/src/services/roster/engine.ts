import type { SwapDebtStatus } from '@escala/schema'
import { silentLogger, type Logger } from '../../lib/logger.js'
import type { RosterContext, RosterViewContext } from './context.js'
import { generateDay } from './day-allocator.js'
import { generatePeriod } from './period.js'
import { publishRange, reopenDay } from './publication.js'
import type { RosterReadModel, RosterStore } from './store.js'
import { approveSwap, rejectSwap, requestSwap, respondToSwap } from './swaps.js'
import type { Clock } from './types.js'
import {
  getPunishmentBoard,
  getRosterBoard,
  getSchedulerQueue,
  getSwapDebts,
  getSwapInbox,
  getUpcomingDuties,
} from './views.js'

export type RosterEngineDeps = {
  store: RosterStore
  readModel: RosterReadModel
  logger?: Logger
  clock?: Clock
}

/**
 * Bind the roster operations to one store/read model pair.
 *
 * Write operations accept unparsed input and validate it themselves, so
 * routes and scripts can hand over request bodies directly.
 */
export function createRosterEngine(deps: RosterEngineDeps) {
  const ctx: RosterContext = {
    store: deps.store,
    logger: deps.logger ?? silentLogger,
    clock: deps.clock ?? (() => new Date()),
  }
  const views: RosterViewContext = { readModel: deps.readModel, clock: ctx.clock }

  return {
    generateDay: (input: unknown) => generateDay(ctx, input),
    generatePeriod: (input: unknown) => generatePeriod(ctx, input),
    publishRange: (input: unknown) => publishRange(ctx, input),
    reopenDay: (input: unknown) => reopenDay(ctx, input),
    requestSwap: (input: unknown) => requestSwap(ctx, input),
    respondToSwap: (input: unknown) => respondToSwap(ctx, input),
    approveSwap: (input: unknown) => approveSwap(ctx, input),
    rejectSwap: (input: unknown) => rejectSwap(ctx, input),

    rosterBoard: (viewerId: string | null, fromDate?: string) =>
      getRosterBoard(views, viewerId, fromDate),
    upcomingDuties: (userId: string) => getUpcomingDuties(views, userId),
    swapInbox: (userId: string) => getSwapInbox(views, userId),
    schedulerQueue: () => getSchedulerQueue(views),
    punishmentBoard: () => getPunishmentBoard(views),
    swapDebts: (status?: SwapDebtStatus) => getSwapDebts(views, status),
  }
}

export type RosterEngine = ReturnType<typeof createRosterEngine>

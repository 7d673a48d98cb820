import { publishRangeSchema, reopenDaySchema } from '@escala/schema'
import type { RosterContext } from './context.js'
import { eachDateKey } from './dates.js'
import { RosterError, validationError } from './errors.js'

export type PublishResult = {
  startDate: string
  endDate: string
  published: number
}

/**
 * Publish every Draft day in the inclusive range.
 *
 * Nothing to publish is reported as `NOTHING_TO_PUBLISH`; callers may treat it
 * as a notice rather than a failure.
 */
export async function publishRange(ctx: RosterContext, input: unknown): Promise<PublishResult> {
  const parsed = publishRangeSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid publication range.')
  }
  const { startDate, endDate } = parsed.data

  const published = await ctx.store.transaction(async (uow) => {
    await uow.lockDates(eachDateKey(startDate, endDate))
    return uow.publishDraftDays(startDate, endDate)
  })

  if (published === 0) {
    throw new RosterError(
      'NOTHING_TO_PUBLISH',
      `No draft days between ${startDate} and ${endDate}.`,
      { startDate, endDate },
    )
  }

  ctx.logger.info({
    event: 'roster.published',
    start_date: startDate,
    end_date: endDate,
    published,
  })
  return { startDate, endDate, published }
}

export type ReopenResult = {
  date: string
  status: 'Draft'
}

/** Errata: move a Published day back to Draft so it can be regenerated. */
export async function reopenDay(ctx: RosterContext, input: unknown): Promise<ReopenResult> {
  const parsed = reopenDaySchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid date.')
  }
  const { date } = parsed.data

  await ctx.store.transaction(async (uow) => {
    await uow.lockDates([date])
    const day = await uow.findDay(date)
    if (!day) {
      throw new RosterError('DAY_NOT_FOUND', `No roster exists for ${date}.`, { date })
    }
    if (day.status !== 'Published') {
      throw new RosterError('DAY_NOT_PUBLISHED', `The roster for ${date} is not published.`, {
        date,
      })
    }
    await uow.setDayStatus(date, 'Draft')
  })

  ctx.logger.info({ event: 'roster.reopened', date })
  return { date, status: 'Draft' }
}

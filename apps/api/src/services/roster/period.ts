import { generatePeriodSchema } from '@escala/schema'
import { errorMessage } from '../../lib/logger.js'
import type { RosterContext } from './context.js'
import { dutyTypeForDate, eachDateKey } from './dates.js'
import { generateDay } from './day-allocator.js'
import { RosterError, isRosterError, validationError } from './errors.js'

export type GeneratePeriodResult = {
  startDate: string
  endDate: string
  daysGenerated: number
  generatedDates: string[]
}

/**
 * Generate every date of an inclusive range, one unit of work per date.
 *
 * Stops at the first date that fails. Dates generated before it stay
 * committed; the failure lists them so the operator knows where to resume.
 */
export async function generatePeriod(
  ctx: RosterContext,
  input: unknown,
): Promise<GeneratePeriodResult> {
  const parsed = generatePeriodSchema.safeParse(input)
  if (!parsed.success) {
    throw validationError(parsed.error, 'Invalid period.')
  }
  const { startDate, endDate } = parsed.data

  ctx.logger.info({ event: 'roster.period.started', start_date: startDate, end_date: endDate })

  const generatedDates: string[] = []
  for (const date of eachDateKey(startDate, endDate)) {
    try {
      await generateDay(ctx, { date, dutyType: dutyTypeForDate(date) })
    } catch (error) {
      if (!isRosterError(error)) {
        ctx.logger.error({
          event: 'roster.period.aborted',
          date,
          generated_days: generatedDates.length,
          message: errorMessage(error),
        })
        throw error
      }

      ctx.logger.warn({
        event: 'roster.period.failed',
        date,
        error_code: error.code,
        generated_days: generatedDates.length,
      })
      throw new RosterError(
        'PERIOD_GENERATION_FAILED',
        `Period generation stopped at ${date}: ${error.message}`,
        {
          failedDate: date,
          reason: error.message,
          causeCode: error.code,
          cause: error.details,
          generatedDates,
        },
        error.category,
      )
    }
    generatedDates.push(date)
  }

  ctx.logger.info({
    event: 'roster.period.generated',
    start_date: startDate,
    end_date: endDate,
    generated_days: generatedDates.length,
  })

  return {
    startDate,
    endDate,
    daysGenerated: generatedDates.length,
    generatedDates,
  }
}

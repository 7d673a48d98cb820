import { z } from 'zod'

/** Longest range accepted by one period generation or publication call. */
export const MAX_RANGE_DAYS = 366

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * True for a real calendar date written as `YYYY-MM-DD`
 * (rejects `2025-02-30` and friends).
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value)
  if (!match) return false
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const parsed = new Date(Date.UTC(year, month - 1, day))
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  )
}

function daysBetween(startDate: string, endDate: string): number {
  const start = Date.parse(`${startDate}T00:00:00Z`)
  const end = Date.parse(`${endDate}T00:00:00Z`)
  return Math.round((end - start) / 86_400_000)
}

// Common schemas
export const idSchema = z.string().trim().min(1).max(120)

export const isoDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a calendar date formatted as YYYY-MM-DD.' })

export const dutyTypeSchema = z.enum(['RN', 'RD'])

export const genderSchema = z.enum(['M', 'F'])

export const genderRestrictionSchema = z.enum(['M', 'F', 'Mixed'])

export const rosterDayStatusSchema = z.enum(['Draft', 'Published'])

export const swapStatusSchema = z.enum(['Pending', 'AwaitingScheduler', 'Approved', 'Rejected'])

export const swapDebtStatusSchema = z.enum(['pending', 'paid'])

export const dateRangeSchema = z
  .object({
    startDate: isoDateSchema,
    endDate: isoDateSchema,
  })
  .superRefine((value, ctx) => {
    if (!isCalendarDate(value.startDate) || !isCalendarDate(value.endDate)) return
    const span = daysBetween(value.startDate, value.endDate)
    if (span < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: 'endDate must be on or after startDate.',
      })
      return
    }
    if (span + 1 > MAX_RANGE_DAYS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: `Range may not exceed ${MAX_RANGE_DAYS} days.`,
      })
    }
  })

// Roster generation
export const generatePeriodSchema = dateRangeSchema

export const generateDaySchema = z.object({
  date: isoDateSchema,
  dutyType: dutyTypeSchema,
})

export const publishRangeSchema = dateRangeSchema

export const reopenDaySchema = z.object({
  date: isoDateSchema,
})

// Swaps
export const swapRequestSchema = z
  .object({
    requesterId: idSchema,
    allocationId: idSchema,
    substituteId: idSchema,
    reason: z.string().trim().min(1, 'A reason is required.').max(500),
    counterAllocationId: idSchema.optional(),
  })
  .superRefine((value, ctx) => {
    if (value.requesterId === value.substituteId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['substituteId'],
        message: 'The substitute must be someone other than the requester.',
      })
    }
    if (value.counterAllocationId && value.counterAllocationId === value.allocationId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['counterAllocationId'],
        message: 'The counter allocation must differ from the requested allocation.',
      })
    }
  })

export const swapResponseActionSchema = z.enum(['accept', 'decline'])

export const swapResponseSchema = z.object({
  swapId: idSchema,
  responderId: idSchema,
  action: swapResponseActionSchema,
})

export const swapDecisionSchema = z.object({
  swapId: idSchema,
})

export type DutyType = z.infer<typeof dutyTypeSchema>
export type Gender = z.infer<typeof genderSchema>
export type GenderRestriction = z.infer<typeof genderRestrictionSchema>
export type RosterDayStatus = z.infer<typeof rosterDayStatusSchema>
export type SwapStatus = z.infer<typeof swapStatusSchema>
export type SwapDebtStatus = z.infer<typeof swapDebtStatusSchema>
export type SwapResponseAction = z.infer<typeof swapResponseActionSchema>

import { addDays, eachDayOfInterval, format, getDay, parseISO } from 'date-fns'
import type { DutyType } from './types.js'

const DATE_KEY_FORMAT = 'yyyy-MM-dd'

/** Friday, Saturday, Sunday (date-fns weekday numbers). */
const WEEKEND_ROUTINE_WEEKDAYS = new Set([5, 6, 0])

export function toDateKey(date: Date): string {
  return format(date, DATE_KEY_FORMAT)
}

export function shiftDateKey(dateKey: string, days: number): string {
  return toDateKey(addDays(parseISO(dateKey), days))
}

export function eachDateKey(startDate: string, endDate: string): string[] {
  return eachDayOfInterval({ start: parseISO(startDate), end: parseISO(endDate) }).map(toDateKey)
}

/** Weekend/holiday routine on Friday through Sunday, normal routine otherwise. */
export function dutyTypeForDate(dateKey: string): DutyType {
  return WEEKEND_ROUTINE_WEEKDAYS.has(getDay(parseISO(dateKey))) ? 'RD' : 'RN'
}

export function weekdayLabel(dateKey: string): string {
  return format(parseISO(dateKey), 'EEEE')
}

export function shortDateLabel(dateKey: string): string {
  return format(parseISO(dateKey), 'EEE, dd/MM')
}

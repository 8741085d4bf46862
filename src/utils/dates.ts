import { format, isAfter, isValid, lastDayOfMonth, parse, parseISO } from 'date-fns'

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/
const ISO_DATE_FORMAT = 'yyyy-MM-dd'
const DISPLAY_DATE_FORMAT = 'dd/MM/yyyy'

/**
 * True for a real calendar date written as yyyy-MM-dd
 */
export function isIsoDate(value: string): boolean {
  return ISO_DATE_REGEX.test(value) && isValid(parseISO(value))
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT)
}

export function todayIso(now: Date = new Date()): string {
  return toIsoDate(now)
}

/**
 * Parses a DD/MM/YYYY answer typed in chat, returns undefined when it is not a real date
 */
export function parseDisplayDate(value: string): string | undefined {
  const trimmed = value.trim()
  if (!/^\d{2}\/\d{2}\/\d{4}$/.test(trimmed)) {
    return undefined
  }

  const parsed = parse(trimmed, DISPLAY_DATE_FORMAT, new Date())

  return isValid(parsed) ? toIsoDate(parsed) : undefined
}

export function formatDisplayDate(isoDate: string): string {
  return format(parseISO(isoDate), DISPLAY_DATE_FORMAT)
}

export function isFutureDate(isoDate: string, now: Date = new Date()): boolean {
  return isAfter(parseISO(isoDate), parseISO(todayIso(now)))
}

/**
 * First and last day of a calendar month (month is 1-12)
 */
export function monthRange(year: number, month: number): { from: string, to: string } {
  const first = new Date(year, month - 1, 1)

  return {
    from: toIsoDate(first),
    to: toIsoDate(lastDayOfMonth(first)),
  }
}

/**
 * yyyy-MM key of an ISO date
 */
export function monthKey(isoDate: string): string {
  return isoDate.slice(0, 7)
}

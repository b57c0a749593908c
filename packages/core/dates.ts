/**
 * Calendar date and clock time helpers
 *
 * Dates travel as `YYYY-MM-DD` strings and times as `HH:MM`, so they compare
 * correctly as plain strings once validated.
 */

export interface CalendarDate {
  year: number
  month: number   // 1-12
  day: number
}

export interface ClockTime {
  hour: number    // 0-23
  minute: number
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const CLOCK_TIME = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

export function parseIsoDate(value: string | null | undefined): CalendarDate | null {
  if (!value) return null
  const match = ISO_DATE.exec(value.trim())
  if (!match) return null

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  // Reject dates like 2026-02-30 that Date.UTC would roll over
  const probe = new Date(Date.UTC(year, month - 1, day))
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null
  }

  return { year, month, day }
}

export function parseClockTime(value: string | null | undefined): ClockTime | null {
  if (!value) return null
  const match = CLOCK_TIME.exec(value.trim())
  if (!match) return null

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] === undefined ? 0 : Number(match[3])
  if (hour > 23 || minute > 59 || second > 59) return null

  return { hour, minute }
}

/**
 * Canonical `HH:MM` form of a clock time, or null when it does not parse
 */
export function toClockString(value: string | null | undefined): string | null {
  const time = parseClockTime(value)
  if (!time) return null
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`
}

/** Day of week for a calendar date, 0 = Sunday */
export function dayOfWeek(date: CalendarDate): number {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay()
}

/** Current date as `YYYY-MM-DD`, in UTC */
export function utcToday(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10)
}

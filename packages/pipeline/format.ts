/**
 * Display formatting for prices and dates
 *
 * Built from fixed English name tables rather than Intl/toLocaleString so the
 * output is identical on every host regardless of locale or ICU data.
 */

import { dayOfWeek, parseClockTime, parseIsoDate } from '../core/dates.js'

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const

export const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
  USD: '$',
  EUR: '€',
  GBP: '£',
  CAD: 'CA$',
  AUD: 'A$'
}

/**
 * Format an amount with its currency
 *
 * @example
 * formatPrice(25, 'USD')   // "$25.00"
 * formatPrice(100, 'JPY')  // "JPY 100.00"
 * formatPrice(12.5, null)  // "12.50"
 */
export function formatPrice(amount: number, currency: string | null): string {
  const value = amount.toFixed(2)
  if (!currency) return value

  const code = currency.toUpperCase()
  const symbol = CURRENCY_SYMBOLS[code]
  return symbol ? `${symbol}${value}` : `${code} ${value}`
}

/**
 * Human-readable start date, e.g. "Thu, Feb 27, 2026 at 12:00 PM"
 *
 * A missing time formats as midnight.
 * @returns null when the date (or a present time) does not parse
 */
export function formatDisplayDate(startDate: string | null, startTime: string | null): string | null {
  const date = parseIsoDate(startDate)
  if (!date) return null

  const time = startTime ? parseClockTime(startTime) : { hour: 0, minute: 0 }
  if (!time) return null

  const weekday = WEEKDAYS[dayOfWeek(date)]
  const month = MONTHS[date.month - 1]
  const hour12 = time.hour % 12 === 0 ? 12 : time.hour % 12
  const period = time.hour < 12 ? 'AM' : 'PM'
  const minute = String(time.minute).padStart(2, '0')

  return `${weekday}, ${month} ${date.day}, ${date.year} at ${hour12}:${minute} ${period}`
}

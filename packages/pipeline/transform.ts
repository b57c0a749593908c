/**
 * Transform pipeline: filter, enrich, classify and sort extracted events
 *
 * Every stage takes the whole collection and returns a new one; input
 * records are never modified.
 */

import type { EnrichedEventRecord, EventRecord, EventType } from '../core/types.js'
import { parseIsoDate, utcToday } from '../core/dates.js'
import { ValidationError } from '../core/errors.js'
import { classifyEventType } from './classify.js'
import { formatDisplayDate, formatPrice } from './format.js'

export interface TransformOptions {
  /** Reference date (YYYY-MM-DD) for dropping past events; defaults to today in UTC */
  today?: string
}

function logRemoved(before: number, after: number, reason: string): void {
  const removed = before - after
  if (removed > 0) {
    console.log(`[transform] Removed ${removed} ${reason} event(s)`)
  }
}

// ── Filtering ────────────────────────────────────────────────────────

export function filterCancelled<T extends EventRecord>(events: readonly T[]): T[] {
  const result = events.filter(event => !event.isCancelled)
  logRemoved(events.length, result.length, 'cancelled')
  return result
}

/**
 * Remove events starting strictly before `today`
 *
 * Events without a parseable start date are kept here; the date
 * formatting stage reports and drops them.
 */
export function filterPastEvents<T extends EventRecord>(events: readonly T[], today: string): T[] {
  if (!parseIsoDate(today)) {
    throw new ValidationError(`today must be a YYYY-MM-DD date, got "${today}"`)
  }

  const result = events.filter(event => {
    if (!event.startDate || !parseIsoDate(event.startDate)) return true
    return event.startDate >= today
  })
  logRemoved(events.length, result.length, 'past')
  return result
}

/**
 * Keep the first event seen for each id
 */
export function deduplicate<T extends Pick<EventRecord, 'id'>>(events: readonly T[]): T[] {
  const seen = new Set<string>()
  const result: T[] = []
  for (const event of events) {
    if (seen.has(event.id)) continue
    seen.add(event.id)
    result.push(event)
  }
  logRemoved(events.length, result.length, 'duplicate')
  return result
}

// ── Enrichment ───────────────────────────────────────────────────────

/**
 * Zero-priced events become free, free events lose their price, and every
 * event gets a `displayPrice`
 */
export function normalizePricing<T extends EventRecord>(events: readonly T[]): Array<T & { displayPrice: string }> {
  return events.map((event): T & { displayPrice: string } => {
    if (event.isFree || event.price === 0) {
      return { ...event, isFree: true, price: null, currency: null, displayPrice: 'Free' }
    }
    const displayPrice = event.price === null ? 'Paid' : formatPrice(event.price, event.currency)
    return { ...event, displayPrice }
  })
}

/**
 * Drop blank and case-insensitively repeated tags, keeping the first
 * spelling and the original order
 */
export function cleanTags<T extends EventRecord>(events: readonly T[]): T[] {
  return events.map((event): T => {
    const seen = new Set<string>()
    const tags: string[] = []
    for (const tag of event.tags) {
      const trimmed = tag.trim()
      const key = trimmed.toLowerCase()
      if (!trimmed || seen.has(key)) continue
      seen.add(key)
      tags.push(trimmed)
    }
    return { ...event, tags }
  })
}

export function classifyEvents<T extends EventRecord>(events: readonly T[]): Array<T & { eventType: EventType }> {
  return events.map(event => ({ ...event, eventType: classifyEventType(event) }))
}

export function describeLocation(event: Pick<EventRecord, 'isOnline' | 'venueName'>): string {
  if (event.isOnline) return 'Online'
  return event.venueName || 'Location TBD'
}

/**
 * Add `displayDate` and `location`
 *
 * Events whose start date is missing or invalid, or whose start time is
 * present but invalid, are dropped with a warning.
 */
export function formatDisplayFields<T extends EventRecord>(
  events: readonly T[]
): Array<T & { displayDate: string; location: string }> {
  const result: Array<T & { displayDate: string; location: string }> = []
  for (const event of events) {
    const displayDate = formatDisplayDate(event.startDate, event.startTime)
    if (displayDate === null) {
      const when = [event.startDate ?? 'no date', event.startTime].filter(Boolean).join(' ')
      console.warn(`[transform] Skipping event ${event.id} ("${event.title}"): unusable start date/time (${when})`)
      continue
    }
    result.push({ ...event, displayDate, location: describeLocation(event) })
  }
  return result
}

/**
 * Stable ascending sort on start date, then start time; missing dates last
 */
export function sortByDate<T extends EventRecord>(events: readonly T[]): T[] {
  const key = (event: T): string => `${event.startDate ?? '9999-99-99'} ${event.startTime ?? '00:00'}`
  return [...events].sort((a, b) => {
    const left = key(a)
    const right = key(b)
    return left < right ? -1 : left > right ? 1 : 0
  })
}

// ── Full Pipeline ────────────────────────────────────────────────────

/**
 * Run the full transform pipeline
 *
 * Steps:
 *   1. Remove cancelled events
 *   2. Remove past events
 *   3. Deduplicate
 *   4. Normalize pricing
 *   5. Clean tags
 *   6. Classify event type
 *   7. Format display date and location
 *   8. Sort by start date and time
 */
export function transformEvents(
  events: readonly EventRecord[],
  options: TransformOptions = {}
): EnrichedEventRecord[] {
  const today = options.today ?? utcToday()
  console.log(`[transform] Transforming ${events.length} raw event(s)...`)

  const filtered = deduplicate(filterPastEvents(filterCancelled(events), today))
  const enriched = formatDisplayFields(classifyEvents(cleanTags(normalizePricing(filtered))))
  const sorted: EnrichedEventRecord[] = sortByDate(enriched)

  console.log(`[transform] Transform complete: ${sorted.length} event(s) ready`)
  return sorted
}

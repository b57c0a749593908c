/**
 * Eventbrite Event Normalization
 *
 * Transforms raw destination search results into EventRecord values
 */

import type { EventRecord } from '../../core/types.js'
import { parseIsoDate, toClockString } from '../../core/dates.js'
import type { RawEvent } from './schema.js'

/** Tag prefix Eventbrite uses for the primary category */
const CATEGORY_PREFIX = 'EventbriteCategory'

/**
 * Normalize a single Eventbrite event
 * @param raw - Validated search result
 * @returns Immutable event record
 */
export function normalizeEvent(raw: RawEvent): EventRecord {
  const isOnline = raw.is_online_event === true
  // Malformed dates are kept verbatim so the pipeline can report them
  const startDate = clean(raw.start_date)
  const startTime = toClockString(raw.start_time) ?? clean(raw.start_time)
  let endDate = clean(raw.end_date)
  let endTime = toClockString(raw.end_time) ?? clean(raw.end_time)

  // An end before the start is unusable; keep the start only
  if (startDate && endDate && parseIsoDate(startDate) && parseIsoDate(endDate) && endDate < startDate) {
    console.warn(`[eventbrite] Event ${raw.id} ends (${endDate}) before it starts (${startDate}), dropping end`)
    endDate = null
    endTime = null
  }

  const tickets = raw.ticket_availability
  const price = parsePrice(tickets?.minimum_ticket_price?.major_value)
  const currency = clean(tickets?.minimum_ticket_price?.currency)?.toUpperCase() ?? null

  return Object.freeze({
    id: raw.id,
    title: clean(raw.name) ?? '',
    summary: clean(raw.summary) ?? '',
    startDate,
    startTime,
    endDate,
    endTime,
    timezone: clean(raw.timezone),

    isOnline,
    venueName: isOnline ? null : clean(raw.primary_venue?.name),
    venueAddress: isOnline ? null : buildAddress(raw),

    organizerName: clean(raw.primary_organizer?.name),

    isFree: tickets?.is_free === true,
    price,
    currency: price === null ? null : currency,

    category: extractCategory(raw),
    tags: Object.freeze(extractTags(raw)),

    url: clean(raw.url),
    imageUrl: clean(raw.image?.url),

    isCancelled: isCancelled(raw)
  })
}

// Helper functions

function clean(value: string | null | undefined): string | null {
  if (!value) return null
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

function parsePrice(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null
  const amount = typeof value === 'number' ? value : Number(value.replace(/,/g, ''))
  return Number.isFinite(amount) && amount >= 0 ? amount : null
}

function buildAddress(raw: RawEvent): string | null {
  const address = raw.primary_venue?.address
  if (!address) return null

  const display = clean(address.localized_address_display)
  if (display) return display

  const parts = [address.address_1, address.city, address.region]
    .map(clean)
    .filter((part): part is string => part !== null)
  return parts.length > 0 ? parts.join(', ') : null
}

function extractCategory(raw: RawEvent): string | null {
  const tag = raw.tags?.find(item => item.prefix === CATEGORY_PREFIX)
  return clean(tag?.display_name)
}

function extractTags(raw: RawEvent): string[] {
  return (raw.tags ?? [])
    .map(item => clean(item.display_name) ?? clean(item.tag))
    .filter((tag): tag is string => tag !== null)
}

function isCancelled(raw: RawEvent): boolean {
  if (raw.is_cancelled === true) return true
  const status = raw.status?.toLowerCase()
  return status === 'canceled' || status === 'cancelled'
}

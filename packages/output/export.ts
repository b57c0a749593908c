/**
 * JSON and CSV export of enriched events
 */

import fs from 'fs'
import path from 'path'
import type { EnrichedEventRecord } from '../core/types.js'
import { ExportError, toError } from '../core/errors.js'

export type EventRow = Record<string, string | number | boolean | string[] | null>

export const CSV_COLUMNS = [
  'id',
  'title',
  'summary',
  'start_date',
  'start_time',
  'end_date',
  'end_time',
  'timezone',
  'is_online',
  'venue_name',
  'venue_address',
  'organizer_name',
  'is_free',
  'price',
  'currency',
  'category',
  'tags',
  'url',
  'image_url',
  'is_cancelled',
  'event_type',
  'display_date',
  'display_price',
  'location'
] as const

/**
 * Transform an enriched event to its serialized (snake_case) row
 */
export function eventToRow(event: EnrichedEventRecord): EventRow {
  return {
    id: event.id,
    title: event.title,
    summary: event.summary,
    start_date: event.startDate,
    start_time: event.startTime,
    end_date: event.endDate,
    end_time: event.endTime,
    timezone: event.timezone,

    is_online: event.isOnline,
    venue_name: event.venueName,
    venue_address: event.venueAddress,
    organizer_name: event.organizerName,

    is_free: event.isFree,
    price: event.price,
    currency: event.currency,

    category: event.category,
    tags: [...event.tags],
    url: event.url,
    image_url: event.imageUrl,
    is_cancelled: event.isCancelled,

    event_type: event.eventType,
    display_date: event.displayDate,
    display_price: event.displayPrice,
    location: event.location
  }
}

function writeOutput(filepath: string, contents: string): string {
  const resolved = path.resolve(filepath)
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true })
    fs.writeFileSync(resolved, contents, 'utf8')
  } catch (error) {
    throw new ExportError(resolved, toError(error))
  }
  return resolved
}

/**
 * Write events as a pretty-printed UTF-8 JSON array
 * @returns Absolute path written
 */
export function exportToJson(events: readonly EnrichedEventRecord[], filepath: string): string {
  const json = JSON.stringify(events.map(eventToRow), null, 2)
  const written = writeOutput(filepath, `${json}\n`)
  console.log(`[export] JSON saved to ${written} (${events.length} event(s))`)
  return written
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: EventRow[string]): string {
  if (value === null) return ''
  const text = Array.isArray(value) ? value.join(', ') : String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/**
 * Write events as CSV: a header row, then one row per event with tags
 * joined by ", "
 * @returns Absolute path written
 */
export function exportToCsv(events: readonly EnrichedEventRecord[], filepath: string): string {
  const lines = [CSV_COLUMNS.join(',')]
  for (const event of events) {
    const row = eventToRow(event)
    lines.push(CSV_COLUMNS.map(column => escapeCsvField(row[column])).join(','))
  }

  const written = writeOutput(filepath, `${lines.join('\r\n')}\r\n`)
  console.log(`[export] CSV saved to ${written} (${events.length} event(s))`)
  return written
}

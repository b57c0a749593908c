/**
 * Newsletter rendering
 *
 * Groups enriched events by type, picks a featured event and hands the
 * result to one of the HTML templates.
 */

import fs from 'fs'
import path from 'path'
import type { EnrichedEventRecord } from '../core/types.js'
import { parseIsoDate, utcToday } from '../core/dates.js'
import { ExportError, RenderError, toError } from '../core/errors.js'
import { TEMPLATES, isTemplateName, type EventGroup, type NewsletterContext } from './templates.js'

/** Display order of event type sections; types not listed follow alphabetically */
export const TYPE_ORDER = [
  'Conference',
  'Workshop',
  'Hackathon',
  'Course',
  'Talk',
  'Webinar',
  'Meetup',
  'Event'
] as const

const PRIORITY_TYPES = new Set(['Conference', 'Workshop', 'Hackathon'])

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
] as const

export const DEFAULT_TITLE = 'AI in NYC Weekly'
export const DEFAULT_SUBTITLE = 'Your curated guide to AI events across New York City'

export interface RenderOptions {
  /** Template id: "newsletter" (default) or "digest" */
  template?: string
  title?: string
  subtitle?: string
  introText?: string
  /** Date printed in the footer (YYYY-MM-DD); defaults to today in UTC */
  generatedOn?: string
}

/**
 * Bucket events by type in TYPE_ORDER; unknown types follow alphabetically.
 * Each group keeps the input order.
 */
export function groupEvents(events: readonly EnrichedEventRecord[]): EventGroup[] {
  const buckets = new Map<string, EnrichedEventRecord[]>()
  for (const event of events) {
    const bucket = buckets.get(event.eventType)
    if (bucket) {
      bucket.push(event)
    } else {
      buckets.set(event.eventType, [event])
    }
  }

  const groups: EventGroup[] = []
  for (const type of TYPE_ORDER) {
    const bucket = buckets.get(type)
    if (bucket) {
      groups.push({ type, events: bucket })
      buckets.delete(type)
    }
  }

  const remaining = [...buckets.keys()].sort()
  for (const type of remaining) {
    groups.push({ type, events: buckets.get(type) ?? [] })
  }

  return groups
}

/**
 * Pick the event shown at the top of the newsletter
 *
 * Priority: conferences, workshops and hackathons first, then free events,
 * then events with a summary, then the earliest date. Ties keep input order.
 */
export function pickFeaturedEvent(events: readonly EnrichedEventRecord[]): EnrichedEventRecord | null {
  const score = (event: EnrichedEventRecord): [number, number, number, string] => [
    PRIORITY_TYPES.has(event.eventType) ? 0 : 1,
    event.displayPrice === 'Free' ? 0 : 1,
    event.summary ? 0 : 1,
    event.startDate ?? '9999-99-99'
  ]

  let best: EnrichedEventRecord | null = null
  let bestScore: [number, number, number, string] | null = null
  for (const event of events) {
    const current = score(event)
    if (bestScore === null || compareScores(current, bestScore) < 0) {
      best = event
      bestScore = current
    }
  }
  return best
}

function compareScores(a: [number, number, number, string], b: [number, number, number, string]): number {
  for (let i = 0; i < 3; i++) {
    const diff = Number(a[i]) - Number(b[i])
    if (diff !== 0) return diff
  }
  return a[3] < b[3] ? -1 : a[3] > b[3] ? 1 : 0
}

function joinWithAnd(items: string[]): string {
  if (items.length === 0) return ''
  if (items.length === 1) return items[0]
  if (items.length === 2) return `${items[0]} and ${items[1]}`
  return `${items.slice(0, -1).join(', ')}, and ${items[items.length - 1]}`
}

/**
 * Default intro paragraph, built from the event counts and group names
 */
export function buildIntroText(events: readonly EnrichedEventRecord[], title: string): string {
  const groups = groupEvents(events)
  const typeNames = groups.map(group => (group.type === 'Event' ? 'events' : `${group.type.toLowerCase()}s`))
  const types = joinWithAnd(typeNames) || 'events'
  const freeCount = events.filter(event => event.displayPrice === 'Free').length
  const freeNote = freeCount > 0 ? ` ${freeCount} of them are free.` : ''

  return `Welcome to this edition of ${title}, your guide to the best ${types} coming up. ` +
    `This time we found ${events.length} event(s).${freeNote}`
}

/** "2026-10-18" → "October 18, 2026" */
export function formatLongDate(isoDate: string): string {
  const date = parseIsoDate(isoDate)
  if (!date) return isoDate
  return `${MONTH_NAMES[date.month - 1]} ${date.day}, ${date.year}`
}

/**
 * Render enriched events into an HTML newsletter
 * @throws RenderError for an unknown template id
 */
export function renderNewsletter(events: readonly EnrichedEventRecord[], options: RenderOptions = {}): string {
  const templateName = options.template ?? 'newsletter'
  if (!isTemplateName(templateName)) {
    throw new RenderError(
      `Unknown template "${templateName}" (available: ${Object.keys(TEMPLATES).join(', ')})`
    )
  }

  const title = options.title ?? DEFAULT_TITLE
  const groups = groupEvents(events)
  const context: NewsletterContext = {
    title,
    subtitle: options.subtitle ?? DEFAULT_SUBTITLE,
    introText: options.introText ?? buildIntroText(events, title),
    featured: pickFeaturedEvent(events),
    groups,
    totalEvents: events.length,
    generatedDate: formatLongDate(options.generatedOn ?? utcToday())
  }

  const html = TEMPLATES[templateName](context)
  console.log(`[render] Rendered ${templateName} with ${events.length} event(s) in ${groups.length} group(s)`)
  return html
}

/**
 * Render and save the newsletter to an HTML file
 * @returns Absolute path written
 */
export function renderNewsletterToFile(
  events: readonly EnrichedEventRecord[],
  filepath: string,
  options: RenderOptions = {}
): string {
  const html = renderNewsletter(events, options)
  const resolved = path.resolve(filepath)

  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true })
    fs.writeFileSync(resolved, html, 'utf8')
  } catch (error) {
    throw new ExportError(resolved, toError(error))
  }

  console.log(`[render] Newsletter saved to ${resolved}`)
  return resolved
}

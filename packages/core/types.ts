/**
 * Core types for the event extraction pipeline
 */

export interface EventRecord {
  // Identifiers
  readonly id: string                      // Source event ID, dedup key

  // Core event data
  readonly title: string
  readonly summary: string
  readonly startDate: string | null        // YYYY-MM-DD
  readonly startTime: string | null        // HH:MM
  readonly endDate: string | null
  readonly endTime: string | null
  readonly timezone: string | null         // IANA zone as reported by the source

  // Location
  readonly isOnline: boolean
  readonly venueName: string | null
  readonly venueAddress: string | null

  readonly organizerName: string | null

  // Pricing
  readonly isFree: boolean
  readonly price: number | null            // Lowest ticket price, major units
  readonly currency: string | null         // ISO 4217 code

  // Classification inputs
  readonly category: string | null
  readonly tags: readonly string[]

  readonly url: string | null
  readonly imageUrl: string | null

  readonly isCancelled: boolean
}

export const EVENT_TYPES = [
  'Conference',
  'Workshop',
  'Meetup',
  'Webinar',
  'Seminar',
  'Hackathon',
  'Course',
  'Talk',
  'Event'
] as const

export type EventType = typeof EVENT_TYPES[number]

/**
 * Event record plus display fields added by the transform pipeline
 */
export interface EnrichedEventRecord extends EventRecord {
  readonly eventType: EventType
  readonly displayDate: string
  readonly displayPrice: string
  readonly location: string
}

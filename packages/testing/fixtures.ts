/**
 * Test helpers: record factories and an in-process fetch stand-in
 */

import type { EnrichedEventRecord, EventRecord } from '../core/types.js'

export function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: '1',
    title: 'AI Workshop',
    summary: '',
    startDate: '2026-06-01',
    startTime: '10:00',
    endDate: '2026-06-01',
    endTime: '12:00',
    timezone: 'America/New_York',
    isOnline: false,
    venueName: null,
    venueAddress: null,
    organizerName: null,
    isFree: false,
    price: null,
    currency: null,
    category: null,
    tags: [],
    url: null,
    imageUrl: null,
    isCancelled: false,
    ...overrides
  }
}

export function makeEnrichedEvent(overrides: Partial<EnrichedEventRecord> = {}): EnrichedEventRecord {
  return {
    ...makeEvent(),
    eventType: 'Workshop',
    displayDate: 'Mon, Jun 1, 2026 at 10:00 AM',
    displayPrice: 'Free',
    location: 'Location TBD',
    ...overrides
  }
}

/** A destination search result as the API sends it */
export function makeRawEvent(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '1001',
    name: 'AI Workshop',
    summary: 'Build a retrieval app in an afternoon',
    url: 'https://www.eventbrite.com/e/1001',
    start_date: '2026-11-05',
    start_time: '18:00',
    end_date: '2026-11-05',
    end_time: '20:00',
    timezone: 'America/New_York',
    is_online_event: false,
    is_cancelled: false,
    primary_venue: {
      name: 'Civic Hall',
      address: { localized_address_display: '124 E 14th St, New York, NY 10003' }
    },
    primary_organizer: { name: 'NYC AI Guild' },
    ticket_availability: {
      is_free: false,
      minimum_ticket_price: { currency: 'USD', major_value: '25.00' }
    },
    tags: [
      { prefix: 'EventbriteCategory', tag: 'EventbriteCategory/102', display_name: 'Science & Technology' },
      { prefix: 'OrganizerTag', tag: 'OrganizerTag/ai', display_name: 'AI' }
    ],
    image: { url: 'https://img.test/1001.jpg' },
    ...overrides
  }
}

export function searchPage(
  results: Array<Record<string, unknown>>,
  continuation?: string
): Record<string, unknown> {
  return {
    events: {
      results,
      pagination: {
        object_count: results.length,
        continuation: continuation ?? null,
        has_more_items: continuation !== undefined
      }
    }
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}

export interface RecordedRequest {
  url: string
  method: string
  headers: Headers
  body: unknown
}

type FetchInit = Parameters<typeof fetch>[1]

/**
 * Fetch stand-in answering each call with the next responder. A responder
 * may throw to simulate a network failure.
 */
export function createFakeFetch(responders: Array<() => Response>): {
  fetch: typeof fetch
  requests: RecordedRequest[]
} {
  const requests: RecordedRequest[] = []

  const fakeFetch = async (input: string | URL | Request, init?: FetchInit): Promise<Response> => {
    const responder = responders[requests.length]
    requests.push({
      url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null
    })
    if (!responder) {
      throw new Error(`Unexpected request #${requests.length}`)
    }
    return responder()
  }

  return { fetch: fakeFetch, requests }
}

/** Sleep stand-in that records requested delays and returns immediately */
export function createRecordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = []
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms)
    }
  }
}

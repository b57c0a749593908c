/**
 * Eventbrite search client
 *
 * Walks the destination search endpoint page by page using its continuation
 * token, retries rate-limited pages with exponential backoff and drops
 * events already seen on an earlier page.
 */

import type { EventbriteConfig } from '../../../config.js'
import type { EventRecord } from '../../core/types.js'
import {
  ApiError,
  AuthenticationError,
  RateLimitError,
  ResponseParseError,
  ValidationError,
  toError
} from '../../core/errors.js'
import { retry, sleep as defaultSleep, type Sleep } from '../../core/retry.js'
import { normalizeEvent } from './normalize.js'
import { SearchResponseSchema, type SearchRequestBody, type SearchResponse } from './schema.js'

export const DEFAULT_MAX_PAGES = 3
export const MAX_PAGE_SIZE = 50

const EXPANSIONS = ['primary_venue', 'image', 'ticket_availability', 'primary_organizer']

export interface SearchOptions {
  keyword: string
  /** Who's On First place ID; omitted uses the configured default, null searches worldwide */
  placeId?: string | null
  /** Upper bound on pages requested (default: 3) */
  maxPages?: number
  pageSize?: number
  onlineOnly?: boolean
}

export interface SearchStats {
  pagesFetched: number
  /** HTTP requests sent, retries included */
  requests: number
  retries: number
  duplicatesDropped: number
}

export interface SearchResult {
  events: EventRecord[]
  stats: SearchStats
}

export interface ClientDependencies {
  fetch?: typeof fetch
  sleep?: Sleep
}

export class EventbriteClient {
  private readonly config: EventbriteConfig
  private readonly fetchImpl: typeof fetch
  private readonly sleep: Sleep

  constructor(config: EventbriteConfig, deps: ClientDependencies = {}) {
    this.config = config
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init))
    this.sleep = deps.sleep ?? defaultSleep
  }

  get searchUrl(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/destination/search/`
  }

  /**
   * Search events matching a keyword, following continuation tokens
   * @returns Unique events in the order they were first returned
   */
  async searchEvents(options: SearchOptions): Promise<EventRecord[]> {
    const { events } = await this.searchEventsWithStats(options)
    return events
  }

  async searchEventsWithStats(options: SearchOptions): Promise<SearchResult> {
    const keyword = options.keyword.trim()
    if (!keyword) {
      throw new ValidationError('keyword must be a non-empty string')
    }

    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new ValidationError(`maxPages must be a positive integer, got ${maxPages}`)
    }

    const pageSize = options.pageSize ?? this.config.pageSize
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`)
    }

    const placeId = options.placeId === undefined ? this.config.defaultPlaceId : options.placeId
    const onlineOnly = options.onlineOnly ?? false

    const stats: SearchStats = { pagesFetched: 0, requests: 0, retries: 0, duplicatesDropped: 0 }
    const seen = new Set<string>()
    const events: EventRecord[] = []
    let continuation: string | undefined

    for (let page = 1; page <= maxPages; page++) {
      const body = buildRequestBody({ keyword, placeId, pageSize, onlineOnly, continuation })
      const response = await this.fetchPage(body, page, stats)
      stats.pagesFetched++

      let added = 0
      for (const raw of response.events.results) {
        if (seen.has(raw.id)) {
          stats.duplicatesDropped++
          continue
        }
        seen.add(raw.id)
        events.push(normalizeEvent(raw))
        added++
      }

      console.log(`[eventbrite] Page ${page}: ${added} new event(s), ${response.events.results.length - added} duplicate(s)`)

      const pagination = response.events.pagination
      const next = pagination?.continuation?.trim()
      if (!next || pagination?.has_more_items === false) {
        break
      }
      continuation = next
    }

    console.log(`[eventbrite] Fetched ${events.length} unique event(s) from ${stats.pagesFetched} page(s)`)

    return { events, stats }
  }

  /**
   * Request one page, retrying only while the API keeps answering 429
   * @private
   */
  private fetchPage(body: SearchRequestBody, page: number, stats: SearchStats): Promise<SearchResponse> {
    return retry(
      () => {
        stats.requests++
        return this.requestPage(body)
      },
      {
        maxAttempts: this.config.maxAttempts,
        initialDelay: this.config.initialRetryDelayMs,
        backoffMultiplier: 2,
        shouldRetry: error => error instanceof RateLimitError,
        onRetry: (error, attempt, delay) => {
          stats.retries++
          console.warn(
            `[eventbrite] Page ${page} rate limited (attempt ${attempt}/${this.config.maxAttempts}), retrying in ${delay}ms`
          )
        },
        sleep: this.sleep
      }
    )
  }

  /**
   * Single POST to the search endpoint
   * @private
   */
  private async requestPage(body: SearchRequestBody): Promise<SearchResponse> {
    const response = await this.fetchImpl(this.searchUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
        Accept: 'application/json'
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs)
    })

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(response.status, await readExcerpt(response))
    }
    if (response.status === 429) {
      throw new RateLimitError(await readExcerpt(response))
    }
    if (!response.ok) {
      throw new ApiError(response.status, await readExcerpt(response))
    }

    const text = await response.text()
    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      throw new ResponseParseError('Search response is not valid JSON', toError(error))
    }

    const parsed = SearchResponseSchema.safeParse(json)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue.path.length > 0 ? issue.path.join('.') : 'body'
      throw new ResponseParseError(`Unexpected search response at ${where}: ${issue.message}`, parsed.error)
    }

    return parsed.data
  }
}

interface RequestParams {
  keyword: string
  placeId: string | null
  pageSize: number
  onlineOnly: boolean
  continuation?: string
}

export function buildRequestBody(params: RequestParams): SearchRequestBody {
  const search: SearchRequestBody['event_search'] = {
    q: params.keyword,
    page_size: params.pageSize,
    dates: 'current_future',
    online_events_only: params.onlineOnly
  }
  if (params.placeId) {
    search.places = [params.placeId]
  }
  if (params.continuation) {
    search.continuation = params.continuation
  }

  return {
    event_search: search,
    'expand.destination_event': [...EXPANSIONS]
  }
}

async function readExcerpt(response: Response): Promise<string> {
  const text = await response.text().catch(() => '')
  return text.length > 200 ? `${text.slice(0, 200)}…` : text
}

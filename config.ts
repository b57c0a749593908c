/**
 * Root configuration
 *
 * Builds the explicit configuration value that the search client and the
 * CLI are constructed with. Values come from the environment (the CLI loads
 * `.env` through dotenv before calling `loadConfig`).
 */

import { z } from 'zod'
import { ConfigError } from './packages/core/errors.js'

/** Who's On First place ID for New York City */
export const NYC_PLACE_ID = '85977539'

export const DEFAULT_BASE_URL = 'https://www.eventbriteapi.com/v3'

export interface EventbriteConfig {
  /** Private token, sent as a bearer credential */
  apiKey: string
  baseUrl: string
  /** Place searched when the caller does not pass one */
  defaultPlaceId: string
  /** Results per page (API maximum is 50) */
  pageSize: number
  requestTimeoutMs: number
  /** Attempts per page, first try included, before a 429 becomes fatal */
  maxAttempts: number
  /** Backoff before the first retry; doubles on every retry */
  initialRetryDelayMs: number
}

export interface Config {
  eventbrite: EventbriteConfig
}

const EnvSchema = z.object({
  EVENTBRITE_API_KEY: z.string({
    required_error: 'EVENTBRITE_API_KEY is not set. Copy .env.example to .env and add your Eventbrite private token.'
  }).trim().min(1, 'EVENTBRITE_API_KEY is empty'),
  EVENTBRITE_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  EVENTBRITE_PLACE_ID: z.string().trim().min(1).default(NYC_PLACE_ID),
  EVENTBRITE_PAGE_SIZE: z.coerce.number().int().min(1).max(50).default(20),
  EVENTBRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EVENTBRITE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  EVENTBRITE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000)
})

/**
 * Read configuration from an environment map
 * @throws ConfigError when a value is missing or malformed
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  // Blank entries in .env count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )

  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigError(issue.message.includes(field) ? issue.message : `${field}: ${issue.message}`)
  }

  const values = parsed.data
  return {
    eventbrite: {
      apiKey: values.EVENTBRITE_API_KEY,
      baseUrl: values.EVENTBRITE_BASE_URL.replace(/\/+$/, ''),
      defaultPlaceId: values.EVENTBRITE_PLACE_ID,
      pageSize: values.EVENTBRITE_PAGE_SIZE,
      requestTimeoutMs: values.EVENTBRITE_TIMEOUT_MS,
      maxAttempts: values.EVENTBRITE_MAX_ATTEMPTS,
      initialRetryDelayMs: values.EVENTBRITE_RETRY_DELAY_MS
    }
  }
}

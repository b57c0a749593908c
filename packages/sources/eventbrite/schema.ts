/**
 * Eventbrite destination search response shapes
 *
 * Only the fields the normalizer reads are declared; everything else the
 * API sends passes through untouched. Optional fields are nullable because
 * the API sends explicit nulls for unset values.
 */

import { z } from 'zod'

const TextOrNull = z.string().nullish()

const AddressSchema = z.object({
  localized_address_display: TextOrNull,
  address_1: TextOrNull,
  city: TextOrNull,
  region: TextOrNull
}).passthrough()

const VenueSchema = z.object({
  name: TextOrNull,
  address: AddressSchema.nullish()
}).passthrough()

const TicketPriceSchema = z.object({
  currency: TextOrNull,
  major_value: z.union([z.string(), z.number()]).nullish()
}).passthrough()

const TicketAvailabilitySchema = z.object({
  is_free: z.boolean().nullish(),
  is_sold_out: z.boolean().nullish(),
  minimum_ticket_price: TicketPriceSchema.nullish()
}).passthrough()

const TagSchema = z.object({
  prefix: TextOrNull,
  tag: TextOrNull,
  display_name: TextOrNull
}).passthrough()

export const RawEventSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number()]).transform(String),
  name: TextOrNull,
  summary: TextOrNull,
  url: TextOrNull,
  start_date: TextOrNull,
  start_time: TextOrNull,
  end_date: TextOrNull,
  end_time: TextOrNull,
  timezone: TextOrNull,
  is_online_event: z.boolean().nullish(),
  is_cancelled: z.boolean().nullish(),
  status: TextOrNull,
  primary_venue: VenueSchema.nullish(),
  primary_organizer: z.object({ name: TextOrNull }).passthrough().nullish(),
  ticket_availability: TicketAvailabilitySchema.nullish(),
  tags: z.array(TagSchema).nullish(),
  image: z.object({ url: TextOrNull }).passthrough().nullish()
}).passthrough()

export const PaginationSchema = z.object({
  continuation: TextOrNull,
  has_more_items: z.boolean().nullish(),
  object_count: z.number().nullish(),
  page_count: z.number().nullish(),
  page_size: z.number().nullish()
}).passthrough()

export const SearchResponseSchema = z.object({
  events: z.object({
    results: z.array(RawEventSchema),
    pagination: PaginationSchema.nullish()
  }).passthrough()
}).passthrough()

export type RawEvent = z.infer<typeof RawEventSchema>
export type SearchResponse = z.infer<typeof SearchResponseSchema>

/** Request body of `POST /destination/search/` */
export interface SearchRequestBody {
  event_search: {
    q: string
    places?: string[]
    page_size: number
    dates: 'current_future'
    online_events_only: boolean
    continuation?: string
  }
  'expand.destination_event': string[]
}

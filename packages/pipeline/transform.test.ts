import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import {
  cleanTags,
  deduplicate,
  describeLocation,
  filterCancelled,
  filterPastEvents,
  formatDisplayFields,
  normalizePricing,
  sortByDate,
  transformEvents
} from './transform.js'
import { ValidationError } from '../core/errors.js'
import { makeEvent } from '../testing/fixtures.js'

const TODAY = '2026-01-01'

describe('filterCancelled', () => {
  it('removes cancelled events', () => {
    const result = filterCancelled([makeEvent(), makeEvent({ id: '2', isCancelled: true })])
    assert.deepEqual(result.map(event => event.id), ['1'])
  })

  it('keeps everything when nothing is cancelled', () => {
    assert.equal(filterCancelled([makeEvent(), makeEvent({ id: '2' })]).length, 2)
  })
})

describe('filterPastEvents', () => {
  it('removes events that start before the reference date', () => {
    const events = [
      makeEvent({ id: 'old', startDate: '2020-01-01' }),
      makeEvent({ id: 'new', startDate: '2030-01-01' })
    ]
    assert.deepEqual(filterPastEvents(events, '2025-01-01').map(event => event.id), ['new'])
  })

  it('keeps events on the reference date', () => {
    assert.equal(filterPastEvents([makeEvent({ startDate: '2026-03-01' })], '2026-03-01').length, 1)
  })

  it('leaves events without a usable date for the formatting stage', () => {
    const events = [makeEvent({ id: 'a', startDate: null }), makeEvent({ id: 'b', startDate: 'soon' })]
    assert.equal(filterPastEvents(events, TODAY).length, 2)
  })

  it('rejects a malformed reference date', () => {
    assert.throws(() => filterPastEvents([], '01/01/2026'), ValidationError)
  })
})

describe('deduplicate', () => {
  it('keeps the first occurrence of each id in order', () => {
    const events = [
      makeEvent({ id: 'a', title: 'first' }),
      makeEvent({ id: 'b' }),
      makeEvent({ id: 'a', title: 'second' })
    ]
    const result = deduplicate(events)
    assert.deepEqual(result.map(event => event.id), ['a', 'b'])
    assert.equal(result[0].title, 'first')
  })

  it('is idempotent', () => {
    const events = ['x', 'y', 'x', 'z', 'y', 'x'].map(id => makeEvent({ id }))
    const once = deduplicate(events)
    assert.deepEqual(deduplicate(once), once)
  })
})

describe('normalizePricing', () => {
  it('turns a zero price into a free event', () => {
    const [event] = normalizePricing([makeEvent({ price: 0, currency: 'USD' })])
    assert.equal(event.isFree, true)
    assert.equal(event.price, null)
    assert.equal(event.currency, null)
    assert.equal(event.displayPrice, 'Free')
  })

  it('clears the price of free events', () => {
    const [event] = normalizePricing([makeEvent({ isFree: true, price: 10, currency: 'USD' })])
    assert.equal(event.price, null)
    assert.equal(event.currency, null)
    assert.equal(event.displayPrice, 'Free')
  })

  it('formats paid prices with the currency symbol', () => {
    const events = normalizePricing([
      makeEvent({ id: 'usd', price: 25, currency: 'USD' }),
      makeEvent({ id: 'eur', price: 50, currency: 'EUR' }),
      makeEvent({ id: 'jpy', price: 100, currency: 'JPY' })
    ])
    assert.deepEqual(events.map(event => event.displayPrice), ['$25.00', '€50.00', 'JPY 100.00'])
    assert.equal(events[0].price, 25)
    assert.equal(events[0].isFree, false)
  })

  it('shows "Paid" when the amount is unknown', () => {
    const [event] = normalizePricing([makeEvent({ isFree: false, price: null })])
    assert.equal(event.displayPrice, 'Paid')
  })

  it('does not modify its input', () => {
    const input = makeEvent({ price: 0, currency: 'USD' })
    normalizePricing([input])
    assert.equal(input.price, 0)
    assert.equal(input.isFree, false)
  })
})

describe('cleanTags', () => {
  it('removes case-insensitive duplicates keeping order and first spelling', () => {
    const [event] = cleanTags([makeEvent({ tags: ['Science', 'Tech', 'science', 'AI', 'tech'] })])
    assert.deepEqual(event.tags, ['Science', 'Tech', 'AI'])
  })

  it('drops blank tags and trims the rest', () => {
    const [event] = cleanTags([makeEvent({ tags: [' Machine Learning ', '', 'machine learning', '  '] })])
    assert.deepEqual(event.tags, ['Machine Learning'])
  })
})

describe('describeLocation', () => {
  it('prefers Online, then the venue, then a placeholder', () => {
    assert.equal(describeLocation({ isOnline: true, venueName: 'Civic Hall' }), 'Online')
    assert.equal(describeLocation({ isOnline: false, venueName: 'Civic Hall' }), 'Civic Hall')
    assert.equal(describeLocation({ isOnline: false, venueName: null }), 'Location TBD')
  })
})

describe('formatDisplayFields', () => {
  it('adds the display date and location', () => {
    const [event] = formatDisplayFields([makeEvent({ startDate: '2026-03-01', startTime: '14:00', venueName: 'Loft' })])
    assert.equal(event.displayDate, 'Sun, Mar 1, 2026 at 2:00 PM')
    assert.equal(event.location, 'Loft')
  })

  it('skips events whose date cannot be formatted and keeps the rest', () => {
    const result = formatDisplayFields([
      makeEvent({ id: 'bad-date', startDate: '2026-13-01' }),
      makeEvent({ id: 'no-date', startDate: null }),
      makeEvent({ id: 'bad-time', startTime: '7pm' }),
      makeEvent({ id: 'ok' })
    ])
    assert.deepEqual(result.map(event => event.id), ['ok'])
  })
})

describe('sortByDate', () => {
  it('orders by start date, then start time', () => {
    const events = [
      makeEvent({ id: 'c', startDate: '2026-09-01', startTime: '09:00' }),
      makeEvent({ id: 'b', startDate: '2026-03-01', startTime: '18:00' }),
      makeEvent({ id: 'a', startDate: '2026-03-01', startTime: '08:30' })
    ]
    assert.deepEqual(sortByDate(events).map(event => event.id), ['a', 'b', 'c'])
  })

  it('keeps the relative order of events with equal keys', () => {
    const events = [
      makeEvent({ id: 'late', startDate: '2026-05-01' }),
      makeEvent({ id: 'first', startDate: '2026-04-01', startTime: '10:00' }),
      makeEvent({ id: 'second', startDate: '2026-04-01', startTime: '10:00' }),
      makeEvent({ id: 'third', startDate: '2026-04-01', startTime: '10:00' })
    ]
    assert.deepEqual(sortByDate(events).map(event => event.id), ['first', 'second', 'third', 'late'])
  })

  it('treats a missing time as midnight', () => {
    const events = [
      makeEvent({ id: 'timed', startDate: '2026-04-01', startTime: '00:01' }),
      makeEvent({ id: 'untimed', startDate: '2026-04-01', startTime: null })
    ]
    assert.deepEqual(sortByDate(events).map(event => event.id), ['untimed', 'timed'])
  })
})

describe('transformEvents', () => {
  it('runs every stage in order', () => {
    const events = [
      makeEvent({
        id: '1',
        startDate: '2026-06-01',
        price: 0,
        currency: 'USD',
        tags: ['Science', 'science', 'AI']
      }),
      makeEvent({ id: '2', isCancelled: true }),
      makeEvent({ id: '1', title: 'Duplicate' }),
      makeEvent({ id: '3', startDate: '2020-01-01' })
    ]

    const result = transformEvents(events, { today: '2025-01-01' })

    assert.equal(result.length, 1)
    const [event] = result
    assert.equal(event.id, '1')
    assert.equal(event.title, 'AI Workshop')
    assert.equal(event.isFree, true)
    assert.equal(event.price, null)
    assert.equal(event.displayPrice, 'Free')
    assert.equal(event.eventType, 'Workshop')
    assert.equal(event.displayDate, 'Mon, Jun 1, 2026 at 10:00 AM')
    assert.equal(event.location, 'Location TBD')
    assert.deepEqual(event.tags, ['Science', 'AI'])
  })

  it('sorts the result by date', () => {
    const result = transformEvents([
      makeEvent({ id: 'b', startDate: '2026-09-01' }),
      makeEvent({ id: 'a', startDate: '2026-03-01' })
    ], { today: TODAY })
    assert.deepEqual(result.map(event => event.id), ['a', 'b'])
  })

  it('derives location and price for online free events', () => {
    const [event] = transformEvents([makeEvent({ isOnline: true, isFree: true })], { today: TODAY })
    assert.equal(event.location, 'Online')
    assert.equal(event.displayPrice, 'Free')
  })

  it('drops a record with a bad date without failing the batch', () => {
    const result = transformEvents([
      makeEvent({ id: 'bad', startDate: 'TBA' }),
      makeEvent({ id: 'good', startDate: '2026-06-02' })
    ], { today: TODAY })
    assert.deepEqual(result.map(event => event.id), ['good'])
  })

  it('gives the same output when run twice on the same input', () => {
    const input = [
      makeEvent({ id: 'x', startDate: '2026-07-01', price: 15, currency: 'GBP', tags: ['A', 'a'] }),
      makeEvent({ id: 'y', startDate: '2026-05-01', title: 'Founders Meetup' })
    ]
    const snapshot = JSON.stringify(input)

    const first = transformEvents(input, { today: TODAY })
    const second = transformEvents(input, { today: TODAY })

    assert.deepEqual(first, second)
    assert.equal(JSON.stringify(input), snapshot)
  })
})

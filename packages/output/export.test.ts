import assert from 'node:assert/strict'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { after, describe, it } from 'node:test'
import { CSV_COLUMNS, escapeCsvField, eventToRow, exportToCsv, exportToJson } from './export.js'
import { ExportError } from '../core/errors.js'
import { makeEnrichedEvent } from '../testing/fixtures.js'

const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'event-export-'))

after(() => {
  fs.rmSync(workDir, { recursive: true, force: true })
})

const paidEvent = makeEnrichedEvent({
  id: '42',
  title: 'Prompting, "Properly"',
  summary: 'Line one\nLine two',
  tags: ['AI', 'LLM'],
  price: 25,
  currency: 'USD',
  displayPrice: '$25.00',
  venueName: 'Civic Hall',
  location: 'Civic Hall',
  url: 'https://e.test/42'
})

describe('eventToRow', () => {
  it('uses snake_case keys in column order', () => {
    assert.deepEqual(Object.keys(eventToRow(paidEvent)), [...CSV_COLUMNS])
  })
})

describe('exportToJson', () => {
  it('writes every field and creates missing directories', () => {
    const target = path.join(workDir, 'nested', 'deeper', 'events.json')
    const written = exportToJson([paidEvent, makeEnrichedEvent({ id: '43', displayPrice: '€50.00' })], target)

    assert.equal(written, path.resolve(target))
    const contents = fs.readFileSync(target, 'utf8')
    assert.ok(contents.includes('"display_price": "€50.00"'))

    const parsed: unknown = JSON.parse(contents)
    assert.ok(Array.isArray(parsed))
    assert.equal(parsed.length, 2)
    assert.deepEqual(parsed[0], {
      id: '42',
      title: 'Prompting, "Properly"',
      summary: 'Line one\nLine two',
      start_date: '2026-06-01',
      start_time: '10:00',
      end_date: '2026-06-01',
      end_time: '12:00',
      timezone: 'America/New_York',
      is_online: false,
      venue_name: 'Civic Hall',
      venue_address: null,
      organizer_name: null,
      is_free: false,
      price: 25,
      currency: 'USD',
      category: null,
      tags: ['AI', 'LLM'],
      url: 'https://e.test/42',
      image_url: null,
      is_cancelled: false,
      event_type: 'Workshop',
      display_date: 'Mon, Jun 1, 2026 at 10:00 AM',
      display_price: '$25.00',
      location: 'Civic Hall'
    })
  })

  it('fails with ExportError when the path is unwritable', () => {
    const blocker = path.join(workDir, 'blocker')
    fs.writeFileSync(blocker, 'not a directory')

    assert.throws(() => exportToJson([paidEvent], path.join(blocker, 'events.json')), error => {
      assert.ok(error instanceof ExportError)
      assert.equal(error.path, path.resolve(blocker, 'events.json'))
      return true
    })
  })
})

describe('exportToCsv', () => {
  it('writes a header and one quoted row per event', () => {
    const target = path.join(workDir, 'csv', 'events.csv')
    exportToCsv([paidEvent], target)

    const contents = fs.readFileSync(target, 'utf8')
    assert.equal(
      contents,
      `${CSV_COLUMNS.join(',')}\r\n` +
      '42,"Prompting, ""Properly""","Line one\nLine two",2026-06-01,10:00,2026-06-01,12:00,' +
      'America/New_York,false,Civic Hall,,,false,25,USD,,"AI, LLM",https://e.test/42,,false,' +
      'Workshop,"Mon, Jun 1, 2026 at 10:00 AM",$25.00,Civic Hall\r\n'
    )
  })

  it('writes only the header for an empty list', () => {
    const target = path.join(workDir, 'empty.csv')
    exportToCsv([], target)
    assert.equal(fs.readFileSync(target, 'utf8'), `${CSV_COLUMNS.join(',')}\r\n`)
  })

  it('fails with ExportError when the path is unwritable', () => {
    const blocker = path.join(workDir, 'csv-blocker')
    fs.writeFileSync(blocker, 'not a directory')
    assert.throws(() => exportToCsv([paidEvent], path.join(blocker, 'out', 'events.csv')), ExportError)
  })
})

describe('escapeCsvField', () => {
  it('leaves plain values alone and renders null as empty', () => {
    assert.equal(escapeCsvField('plain'), 'plain')
    assert.equal(escapeCsvField(12.5), '12.5')
    assert.equal(escapeCsvField(true), 'true')
    assert.equal(escapeCsvField(null), '')
  })

  it('joins lists and quotes when needed', () => {
    assert.equal(escapeCsvField(['one']), 'one')
    assert.equal(escapeCsvField(['a', 'b']), '"a, b"')
    assert.equal(escapeCsvField('say "hi"'), '"say ""hi"""')
  })
})

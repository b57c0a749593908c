#!/usr/bin/env node
/**
 * CLI entry point: extract, transform and export events
 *
 * Usage:
 *   tsx apps/cli/run.ts -q "machine learning" --pages 5 --format json
 *   tsx apps/cli/run.ts --place-id none --online-only --newsletter
 *   tsx apps/cli/run.ts --help
 */

import 'dotenv/config'
import { loadConfig, NYC_PLACE_ID } from '../../config.js'
import { EventbriteClient } from '../../packages/sources/eventbrite/client.js'
import { runPipeline } from '../../packages/orchestrator/runner.js'
import type { EnrichedEventRecord } from '../../packages/core/types.js'
import { USAGE, describeFailure, parseCliArgs } from './args.js'

function printSummary(events: EnrichedEventRecord[], locationLabel: string): void {
  console.log(`\n${'='.repeat(64)}`)
  console.log(`  ${events.length} event(s) in ${locationLabel} (from Eventbrite)`)
  console.log(`${'='.repeat(64)}\n`)

  events.forEach((event, index) => {
    console.log(`  ${index + 1}. [${event.eventType}] ${event.title}`)
    console.log(`     ${event.displayDate}`)
    console.log(`     Location: ${event.location}`)
    console.log(`     Price: ${event.displayPrice}`)
    if (event.url) console.log(`     ${event.url}`)
    console.log()
  })
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2))
  if (options.help) {
    console.log(USAGE)
    return 0
  }

  const config = loadConfig()
  const client = new EventbriteClient(config.eventbrite)

  const placeId = options.placeId === undefined ? config.eventbrite.defaultPlaceId : options.placeId
  const locationLabel = placeId === null ? 'worldwide' : placeId === NYC_PLACE_ID ? 'NYC' : `place ${placeId}`

  const result = await runPipeline(client, {
    search: {
      keyword: options.query,
      placeId,
      maxPages: options.pages,
      pageSize: options.pageSize,
      onlineOnly: options.onlineOnly
    },
    format: options.format,
    outputDir: options.outputDir,
    newsletter: options.newsletter,
    render: {
      template: options.template,
      title: options.title
    }
  })

  if (result.rawCount === 0) {
    console.warn(`⚠️  No events found for query '${options.query}'`)
    return 0
  }

  printSummary(result.events, locationLabel)

  const failed = result.steps.filter(step => !step.success)
  for (const step of failed) {
    console.error(`❌ ${describeFailure(step.error)}`)
  }
  return failed.length === 0 ? 0 : 1
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(`\n❌ ${describeFailure(error)}`)
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack)
    }
    process.exitCode = 1
  })

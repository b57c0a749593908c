/**
 * Pipeline Orchestrator
 *
 * Runs search → transform → outputs. Output steps are independent: one
 * failing does not undo or skip the others, and each is reported on its own.
 */

import path from 'path'
import type { EnrichedEventRecord } from '../core/types.js'
import type { SearchOptions, SearchResult, SearchStats } from '../sources/eventbrite/client.js'
import { transformEvents } from '../pipeline/transform.js'
import { exportToCsv, exportToJson } from '../output/export.js'
import { renderNewsletterToFile, type RenderOptions } from '../output/render.js'
import { toError } from '../core/errors.js'

export type OutputFormat = 'json' | 'csv' | 'both'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'both']

export type StepName = 'json' | 'csv' | 'newsletter'

export interface PipelineOptions {
  search: SearchOptions
  format: OutputFormat
  outputDir: string
  /** Also render the HTML newsletter */
  newsletter?: boolean
  render?: RenderOptions
  /** Reference date for the past-event filter (YYYY-MM-DD) */
  today?: string
}

export interface EventSearcher {
  searchEventsWithStats(options: SearchOptions): Promise<SearchResult>
}

export interface StepResult {
  step: StepName
  success: boolean
  path?: string
  error?: Error
}

export interface PipelineResult {
  rawCount: number
  events: EnrichedEventRecord[]
  stats: SearchStats
  steps: StepResult[]
  success: boolean
  duration: number
}

export const OUTPUT_FILES: Record<StepName, string> = {
  json: 'events.json',
  csv: 'events.csv',
  newsletter: 'newsletter.html'
}

function plannedSteps(options: PipelineOptions): StepName[] {
  const steps: StepName[] = []
  if (options.format === 'json' || options.format === 'both') steps.push('json')
  if (options.format === 'csv' || options.format === 'both') steps.push('csv')
  if (options.newsletter) steps.push('newsletter')
  return steps
}

function runStep(step: StepName, events: EnrichedEventRecord[], options: PipelineOptions): string {
  const target = path.join(options.outputDir, OUTPUT_FILES[step])
  switch (step) {
    case 'json':
      return exportToJson(events, target)
    case 'csv':
      return exportToCsv(events, target)
    case 'newsletter':
      return renderNewsletterToFile(events, target, options.render)
  }
}

/**
 * Run the full extract → transform → output pipeline
 *
 * Search failures propagate. Output failures are collected in `steps` and
 * make `success` false.
 */
export async function runPipeline(client: EventSearcher, options: PipelineOptions): Promise<PipelineResult> {
  const startTime = Date.now()

  console.log(`\n🚀 Searching for '${options.search.keyword}' (max ${options.search.maxPages ?? 'default'} page(s))\n`)

  const { events: raw, stats } = await client.searchEventsWithStats(options.search)
  const events = transformEvents(raw, { today: options.today })

  const result: PipelineResult = {
    rawCount: raw.length,
    events,
    stats,
    steps: [],
    success: true,
    duration: 0
  }

  if (events.length === 0) {
    console.log('⚠️  No events remaining after transform, nothing to write')
    result.duration = Date.now() - startTime
    return result
  }

  for (const step of plannedSteps(options)) {
    try {
      const written = runStep(step, events, options)
      result.steps.push({ step, success: true, path: written })
    } catch (error) {
      const failure = toError(error)
      console.error(`\n❌ Step ${step} failed:`, failure.message)
      result.steps.push({ step, success: false, error: failure })
      result.success = false
    }
  }

  result.duration = Date.now() - startTime

  console.log(`\n✨ Pipeline complete in ${(result.duration / 1000).toFixed(1)}s`)
  console.log(`   Raw events: ${result.rawCount}`)
  console.log(`   Ready events: ${events.length}`)

  return result
}

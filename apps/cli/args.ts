/**
 * CLI argument parsing and error reporting
 */

import { parseArgs } from 'util'
import {
  ApiError,
  AuthenticationError,
  ConfigError,
  ExportError,
  RateLimitError,
  RenderError,
  ResponseParseError,
  RetryExhaustedError,
  ValidationError
} from '../../packages/core/errors.js'
import { OUTPUT_FORMATS, type OutputFormat } from '../../packages/orchestrator/runner.js'
import { TEMPLATES, isTemplateName } from '../../packages/output/templates.js'

export const USAGE = `Usage: event-extractor [options]

Options:
  -q, --query <text>       Search keyword (default: "AI")
      --pages <n>          Max pages to fetch (default: 3)
      --page-size <n>      Results per page, 1-50 (default: from config, 20)
      --place-id <id>      Who's On First place ID (default: from config, NYC);
                           "none" searches worldwide
      --online-only        Only include online events
      --format <fmt>       json | csv | both (default: both)
  -o, --output-dir <dir>   Output directory (default: output)
      --newsletter         Also render newsletter.html
      --template <name>    Newsletter template: newsletter | digest
      --title <text>       Newsletter title
  -h, --help               Show this help`

export interface CliOptions {
  help: boolean
  query: string
  pages: number
  pageSize?: number
  /** undefined = configured default, null = worldwide */
  placeId?: string | null
  onlineOnly: boolean
  format: OutputFormat
  outputDir: string
  newsletter: boolean
  template?: string
  title?: string
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(`--${flag} must be a positive integer, got "${value}"`)
  }
  return parsed
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      strict: true,
      options: {
        query: { type: 'string', short: 'q' },
        pages: { type: 'string' },
        'page-size': { type: 'string' },
        'place-id': { type: 'string' },
        'online-only': { type: 'boolean' },
        format: { type: 'string' },
        'output-dir': { type: 'string', short: 'o' },
        newsletter: { type: 'boolean' },
        template: { type: 'string' },
        title: { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      }
    })
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error))
  }
}

/**
 * Parse command-line arguments (without the node and script entries)
 * @throws ValidationError on unknown flags or bad values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = readArgs(argv)

  const query = (values.query ?? 'AI').trim()
  if (!query) {
    throw new ValidationError('--query must not be empty')
  }

  const format = values.format ?? 'both'
  if (!isOutputFormat(format)) {
    throw new ValidationError(`--format must be one of ${OUTPUT_FORMATS.join(', ')}, got "${format}"`)
  }

  const placeArg = values['place-id']?.trim()
  const placeId = placeArg === undefined || placeArg === ''
    ? undefined
    : placeArg.toLowerCase() === 'none' ? null : placeArg

  const template = values.template
  if (template !== undefined && !isTemplateName(template)) {
    throw new ValidationError(
      `--template must be one of ${Object.keys(TEMPLATES).join(', ')}, got "${template}"`
    )
  }

  const pageSizeArg = values['page-size']

  return {
    help: values.help ?? false,
    query,
    pages: parsePositiveInt('pages', values.pages ?? '3'),
    pageSize: pageSizeArg === undefined ? undefined : parsePositiveInt('page-size', pageSizeArg),
    placeId,
    onlineOnly: values['online-only'] ?? false,
    format,
    outputDir: values['output-dir'] ?? 'output',
    newsletter: values.newsletter ?? false,
    template,
    title: values.title
  }
}

/**
 * One-line, user-facing message for a failure
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ConfigError) return `Configuration error: ${error.message}`
  if (error instanceof ValidationError) return `Invalid arguments: ${error.message}`
  if (error instanceof AuthenticationError) {
    return `${error.message}. Check that EVENTBRITE_API_KEY holds a valid private token.`
  }
  if (error instanceof RetryExhaustedError && error.cause instanceof RateLimitError) {
    return `Eventbrite kept rate limiting the search (${error.attempts} attempts). Wait a few minutes and try again.`
  }
  if (error instanceof ResponseParseError) return `Could not read the Eventbrite response: ${error.message}`
  if (error instanceof ApiError) return `Eventbrite request failed: ${error.message}`
  if (error instanceof ExportError) return `Output failed: ${error.message}`
  if (error instanceof RenderError) return `Newsletter rendering failed: ${error.message}`
  if (error instanceof Error) return `Unexpected error: ${error.message}`
  return `Unexpected error: ${String(error)}`
}

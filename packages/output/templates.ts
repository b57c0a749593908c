/**
 * Newsletter HTML templates
 *
 * Each template is a pure function from the render context to a complete,
 * self-contained HTML document. Every interpolated value goes through
 * escapeHtml.
 */

import type { EnrichedEventRecord, EventType } from '../core/types.js'

export interface EventGroup {
  type: EventType | string
  events: EnrichedEventRecord[]
}

export interface NewsletterContext {
  title: string
  subtitle: string
  introText: string
  featured: EnrichedEventRecord | null
  groups: EventGroup[]
  totalEvents: number
  generatedDate: string
}

export type Template = (context: NewsletterContext) => string

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
}

export function escapeHtml(value: string | null | undefined): string {
  if (!value) return ''
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char)
}

/** Only http(s) links are emitted; anything else becomes "#" */
export function safeUrl(value: string | null | undefined): string {
  if (!value) return '#'
  return /^https?:\/\//i.test(value.trim()) ? escapeHtml(value.trim()) : '#'
}

export function groupHeading(type: string): string {
  return type === 'Event' ? 'Other Events' : `${type}s`
}

function layout(context: NewsletterContext, style: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(context.title)}</title>`,
    `<style>${style}</style>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
    ''
  ].join('\n')
}

// ── newsletter ───────────────────────────────────────────────────────

const NEWSLETTER_STYLE = [
  'body{margin:0;background:#f4f4f7;font-family:Helvetica,Arial,sans-serif;color:#1f2933}',
  '.wrapper{max-width:640px;margin:0 auto;background:#fff}',
  'header{padding:32px 24px;background:#1f2933;color:#fff}',
  'header h1{margin:0 0 8px;font-size:28px}',
  'header p{margin:0;color:#cbd2d9}',
  '.intro{padding:24px;line-height:1.5}',
  '.featured{margin:0 24px 24px;padding:16px;border:2px solid #3e4c59;border-radius:8px}',
  '.featured img{max-width:100%;border-radius:4px}',
  'section h2{margin:24px 24px 8px;font-size:20px;border-bottom:1px solid #e4e7eb;padding-bottom:4px}',
  '.event{padding:12px 24px}',
  '.event h3{margin:0 0 4px;font-size:16px}',
  '.event a{color:#2563eb;text-decoration:none}',
  '.meta{margin:0;font-size:13px;color:#52606d}',
  '.summary{margin:6px 0 0;font-size:14px}',
  'footer{padding:24px;font-size:12px;color:#7b8794;text-align:center}'
].join('\n')

function renderEventMeta(event: EnrichedEventRecord): string {
  const parts = [event.displayDate, event.location, event.displayPrice]
  if (event.organizerName) parts.push(`by ${event.organizerName}`)
  return `<p class="meta">${parts.map(escapeHtml).join(' &middot; ')}</p>`
}

function renderEventCard(event: EnrichedEventRecord): string {
  const summary = event.summary ? `\n<p class="summary">${escapeHtml(event.summary)}</p>` : ''
  return [
    '<article class="event">',
    `<h3><a href="${safeUrl(event.url)}">${escapeHtml(event.title)}</a></h3>`,
    renderEventMeta(event) + summary,
    '</article>'
  ].join('\n')
}

function renderFeatured(event: EnrichedEventRecord | null): string {
  if (!event) return ''
  const image = event.imageUrl && safeUrl(event.imageUrl) !== '#'
    ? `<img src="${safeUrl(event.imageUrl)}" alt="${escapeHtml(event.title)}">\n`
    : ''
  const summary = event.summary ? `\n<p class="summary">${escapeHtml(event.summary)}</p>` : ''
  return [
    '<div class="featured">',
    `<p class="meta">Featured ${escapeHtml(event.eventType.toLowerCase())}</p>`,
    `${image}<h2><a href="${safeUrl(event.url)}">${escapeHtml(event.title)}</a></h2>`,
    renderEventMeta(event) + summary,
    '</div>'
  ].join('\n')
}

export const newsletterTemplate: Template = context => {
  const sections = context.groups.map(group => [
    '<section>',
    `<h2>${escapeHtml(groupHeading(group.type))} (${group.events.length})</h2>`,
    ...group.events.map(renderEventCard),
    '</section>'
  ].join('\n'))

  const body = [
    '<div class="wrapper">',
    '<header>',
    `<h1>${escapeHtml(context.title)}</h1>`,
    `<p>${escapeHtml(context.subtitle)}</p>`,
    '</header>',
    `<p class="intro">${escapeHtml(context.introText)}</p>`,
    renderFeatured(context.featured),
    ...sections,
    `<footer>${context.totalEvents} event(s) &middot; Generated ${escapeHtml(context.generatedDate)}</footer>`,
    '</div>'
  ].filter(line => line !== '').join('\n')

  return layout(context, NEWSLETTER_STYLE, body)
}

// ── digest ───────────────────────────────────────────────────────────

const DIGEST_STYLE = [
  'body{font-family:Helvetica,Arial,sans-serif;max-width:720px;margin:24px auto;color:#111}',
  'li{margin:4px 0}',
  '.meta{color:#555}'
].join('\n')

export const digestTemplate: Template = context => {
  const sections = context.groups.map(group => [
    `<h2>${escapeHtml(groupHeading(group.type))}</h2>`,
    '<ul>',
    ...group.events.map(event =>
      `<li><a href="${safeUrl(event.url)}">${escapeHtml(event.title)}</a> ` +
      `<span class="meta">${escapeHtml(event.displayDate)} &middot; ${escapeHtml(event.location)} &middot; ${escapeHtml(event.displayPrice)}</span></li>`
    ),
    '</ul>'
  ].join('\n'))

  const body = [
    `<h1>${escapeHtml(context.title)}</h1>`,
    `<p>${escapeHtml(context.introText)}</p>`,
    ...sections,
    `<p class="meta">Generated ${escapeHtml(context.generatedDate)}</p>`
  ].join('\n')

  return layout(context, DIGEST_STYLE, body)
}

export const TEMPLATES = {
  newsletter: newsletterTemplate,
  digest: digestTemplate
} as const satisfies Record<string, Template>

export type TemplateName = keyof typeof TEMPLATES

export function isTemplateName(value: string): value is TemplateName {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, value)
}

/**
 * Event type classification
 *
 * Keyword rules are checked in table order; the first type with a keyword
 * found anywhere in the event's title, summary, category or tags wins.
 */

import type { EventRecord, EventType } from '../core/types.js'

export interface ClassificationRule {
  type: Exclude<EventType, 'Event'>
  keywords: readonly string[]
}

export const DEFAULT_EVENT_TYPE: EventType = 'Event'

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { type: 'Conference', keywords: ['conference', 'summit', 'symposium', 'forum'] },
  { type: 'Workshop', keywords: ['workshop', 'hands-on', 'bootcamp', 'training', 'masterclass'] },
  { type: 'Meetup', keywords: ['meetup', 'meet-up', 'networking', 'mixer', 'happy hour'] },
  { type: 'Webinar', keywords: ['webinar', 'online session', 'virtual talk', 'livestream'] },
  { type: 'Seminar', keywords: ['seminar', 'lecture', 'panel'] },
  { type: 'Hackathon', keywords: ['hackathon', 'hack day', 'buildathon'] },
  { type: 'Course', keywords: ['course', 'class', 'certification', 'program'] },
  { type: 'Talk', keywords: ['talk', 'keynote', 'fireside chat', 'presentation'] }
]

type ClassifiableFields = Pick<EventRecord, 'title' | 'summary' | 'category' | 'tags'>

function searchableText(event: ClassifiableFields): string {
  return [event.title, event.summary, event.category ?? '', ...event.tags]
    .join(' \n ')
    .toLowerCase()
}

/**
 * Determine the event type from its text fields
 * @returns The first matching type, or "Event" when nothing matches
 */
export function classifyEventType(
  event: ClassifiableFields,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): EventType {
  const haystack = searchableText(event)

  for (const rule of rules) {
    if (rule.keywords.some(keyword => haystack.includes(keyword.toLowerCase()))) {
      return rule.type
    }
  }

  return DEFAULT_EVENT_TYPE
}

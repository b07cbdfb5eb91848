/**
 * ICS Reader
 *
 * Parses a published or freshly generated calendar back into event records
 * so two versions of the same file can be compared.
 */

import IcalExpander from 'ical-expander'
import { GenerationError, errorMessage } from '../errors.js'
import type { CalendarEventRecord } from './types.js'

const MAX_ITERATIONS = 365 // Limit recurring event expansion

function expand(ics: string) {
  try {
    return new IcalExpander({ ics, maxIterations: MAX_ITERATIONS }).all()
  } catch (err) {
    throw new GenerationError(`Could not parse calendar: ${errorMessage(err)}`, { cause: err })
  }
}

export function readCalendarEvents(ics: string): CalendarEventRecord[] {
  return expand(ics).events.map((event) => ({
    uid: event.uid,
    summary: event.summary,
    // All-day values print as YYYY-MM-DD
    start: event.startDate.toString(),
    end: event.endDate.toString(),
  }))
}

function unescapeText(value: string): string {
  return value.replace(/\\([\;,nN])/g, (_, char: string) => (char === 'n' || char === 'N' ? '\n' : char))
}

/**
 * X-WR-CALNAME of a document, or null when it has none.
 */
export function readCalendarTitle(ics: string): string | null {
  const unfolded = ics.replace(/\r?\n[ \t]/g, '')
  const match = /^X-WR-CALNAME:(.*)$/m.exec(unfolded)
  return match ? unescapeText(match[1].replace(/\r$/, '')) : null
}

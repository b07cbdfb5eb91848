/**
 * ICS Writer
 *
 * Renders a calendar target as an RFC 5545 document: one all-day,
 * transparent VEVENT per block of consecutive session days.
 */

import { DateTime } from 'luxon'
import { compactDate, exclusiveEnd, generateSessionDays, groupConsecutiveDays } from '../sessions/session-days.js'
import type { Jurisdiction, SessionBlock, SessionData } from '../sessions/types.js'
import { jurisdictionLabel } from './targets.js'
import type { CalendarOptions, CalendarTarget } from './types.js'

export const DEFAULT_CALENDAR_OPTIONS: CalendarOptions = {
  prodId: '-//Legislative Calendars//Session Calendar//EN',
  uidDomain: 'legislative-calendars.invalid',
  timezone: 'America/New_York',
  description: 'Legislative session periods (excludes weekends, holidays, recesses)',
  now: () => new Date(),
}

const MAX_LINE_OCTETS = 75
const CRLF = '\r\n'

export interface JurisdictionSummary {
  id: string
  name: string
  blocks: number
  days: number
}

export interface BuiltCalendar {
  content: string
  /** VEVENT count */
  events: number
  blocks: number
  days: number
  jurisdictions: JurisdictionSummary[]
}

/**
 * Escape a TEXT property value.
 */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n')
}

/**
 * Fold a content line to at most 75 octets per physical line.
 * Continuation lines start with a single space.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line
  }

  const parts: string[] = []
  let current = ''
  let currentOctets = 0
  // Continuation lines lose one octet to the leading space
  let limit = MAX_LINE_OCTETS

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8')
    if (currentOctets + octets > limit) {
      parts.push(current)
      current = ''
      currentOctets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    currentOctets += octets
  }
  parts.push(current)

  return parts.join(`${CRLF} `)
}

export function eventSummary(jurisdiction: Jurisdiction, block: SessionBlock): string {
  const label = jurisdictionLabel(jurisdiction)
  return block.days === 1 ? `${label} - In Session` : `${label} - In Session (${block.days} days)`
}

export function eventUid(jurisdiction: Jurisdiction, year: number, index: number, domain: string): string {
  return `${jurisdiction.id}-${year}-block-${index}@${domain}`
}

function formatStamp(date: Date): string {
  return DateTime.fromJSDate(date).toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")
}

function eventLines(
  jurisdiction: Jurisdiction,
  block: SessionBlock,
  index: number,
  year: number,
  options: CalendarOptions,
  stamp: string,
): string[] {
  const description = jurisdiction.description
    ? `${jurisdiction.name} in session (${jurisdiction.description})`
    : `${jurisdiction.name} in session`

  return [
    'BEGIN:VEVENT',
    `UID:${eventUid(jurisdiction, year, index, options.uidDomain)}`,
    `DTSTAMP:${stamp}`,
    `DTSTART;VALUE=DATE:${compactDate(block.start)}`,
    `DTEND;VALUE=DATE:${compactDate(exclusiveEnd(block))}`,
    `SUMMARY:${escapeText(eventSummary(jurisdiction, block))}`,
    `DESCRIPTION:${escapeText(description)}`,
    'TRANSP:TRANSPARENT',
    'END:VEVENT',
  ]
}

/**
 * Render one target. Event order follows the target's jurisdiction order,
 * then block order within each jurisdiction.
 */
export function buildCalendar(
  target: CalendarTarget,
  data: SessionData,
  options: Partial<CalendarOptions> = {},
): BuiltCalendar {
  const resolved: CalendarOptions = { ...DEFAULT_CALENDAR_OPTIONS, ...options }
  const stamp = formatStamp(resolved.now())

  const lines: string[] = [
    'BEGIN:VCALENDAR',
    `PRODID:${resolved.prodId}`,
    'VERSION:2.0',
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeText(target.title)}`,
    `X-WR-TIMEZONE:${resolved.timezone}`,
    `X-WR-CALDESC:${escapeText(resolved.description)}`,
  ]

  const jurisdictions: JurisdictionSummary[] = []
  let events = 0
  let totalBlocks = 0
  let totalDays = 0

  for (const jurisdiction of target.jurisdictions) {
    const days = generateSessionDays(jurisdiction, data.holidays)
    const blocks = groupConsecutiveDays(days)

    blocks.forEach((block, index) => {
      lines.push(...eventLines(jurisdiction, block, index, data.year, resolved, stamp))
      events++
    })

    jurisdictions.push({ id: jurisdiction.id, name: jurisdiction.name, blocks: blocks.length, days: days.length })
    totalBlocks += blocks.length
    totalDays += days.length
  }

  lines.push('END:VCALENDAR')

  return {
    content: lines.map(foldLine).join(CRLF) + CRLF,
    events,
    blocks: totalBlocks,
    days: totalDays,
    jurisdictions,
  }
}

/**
 * Calendar File Types
 *
 * A calendar file is one static ICS document per target. Its name is derived
 * from the target's kind, slug and year only, so every regeneration
 * overwrites the same file and subscription URLs keep working.
 */

import type { Jurisdiction, SessionData } from '../sessions/types.js'

export type CalendarTargetKind = 'jurisdiction' | 'federal' | 'combined' | 'region'

/**
 * One output file and the jurisdictions whose sessions it contains.
 */
export interface CalendarTarget {
  kind: CalendarTargetKind
  slug: string
  /** X-WR-CALNAME */
  title: string
  /** e.g. california_legislative_calendar_2026.ics */
  fileName: string
  jurisdictions: Jurisdiction[]
}

/**
 * Calendar-level properties shared by every generated file.
 */
export interface CalendarOptions {
  /** PRODID value */
  prodId: string

  /** Domain part of every event UID */
  uidDomain: string

  /** X-WR-TIMEZONE hint for clients */
  timezone: string

  /** X-WR-CALDESC */
  description: string

  /** DTSTAMP source */
  now: () => Date
}

/**
 * An event as read back from an ICS document.
 */
export interface CalendarEventRecord {
  uid: string
  summary: string
  /** YYYY-MM-DD */
  start: string
  /** YYYY-MM-DD, exclusive */
  end: string
}

export interface CalendarDiff {
  added: CalendarEventRecord[]
  removed: CalendarEventRecord[]
  changed: Array<{ before: CalendarEventRecord; after: CalendarEventRecord }>
}

export interface GeneratedFile {
  fileName: string
  path: string
  title: string
  events: number
  blocks: number
  days: number
}

export interface GenerationReport {
  year: number
  outputDir: string
  files: GeneratedFile[]
}

export interface GenerateCalendarsInput {
  data: SessionData
  outputDir: string
  calendar?: Partial<CalendarOptions>
}

/**
 * Session Data Types
 *
 * Legislative session schedules per jurisdiction, as loaded from
 * the bundled data file (data/sessions-<year>.json).
 */

/** Calendar date in YYYY-MM-DD form */
export type IsoDate = string

/**
 * A recess inside a session. Both bounds are inclusive.
 */
export interface RecessPeriod {
  start: IsoDate
  end: IsoDate
  label?: string
}

export interface Holiday {
  date: IsoDate
  name: string
}

export type JurisdictionKind = 'federal' | 'state'

/**
 * A legislative body with one session period in the data year.
 */
export interface Jurisdiction {
  /** Stable identifier, e.g. "California", "New_York", "US_House" */
  id: string

  /** Full name, e.g. "California State Legislature" */
  name: string

  kind: JurisdictionKind

  /** Postal abbreviation for states; used as the event label */
  abbreviation?: string

  /** Null when the body does not meet this year (biennial legislatures) */
  start: IsoDate | null
  end: IsoDate | null

  /** e.g. "2026 Regular Session" */
  description: string

  recesses: RecessPeriod[]
}

export type CalendarGroupKind = 'federal' | 'combined' | 'region'

/**
 * A calendar file aggregating several jurisdictions.
 * `members: 'all'` means every federal body followed by every state in session.
 */
export interface CalendarGroup {
  slug: string
  kind: CalendarGroupKind
  title: string
  members: string[] | 'all'
}

export interface SessionData {
  year: number
  holidays: Holiday[]
  jurisdictions: Jurisdiction[]
  groups: CalendarGroup[]
}

/**
 * A run of consecutive session days, shown as one multi-day event.
 */
export interface SessionBlock {
  start: IsoDate
  /** Inclusive */
  end: IsoDate
  days: number
}

/**
 * Session Day Expansion
 *
 * Turns a session period into the individual days the body sits,
 * then groups those days into consecutive blocks.
 */

import { DateTime } from 'luxon'
import type { Holiday, IsoDate, Jurisdiction, RecessPeriod, SessionBlock } from './types.js'

const SATURDAY = 6

function toDate(value: IsoDate): DateTime {
  return DateTime.fromISO(value, { zone: 'utc' })
}

function toIso(value: DateTime): IsoDate {
  return value.toFormat('yyyy-MM-dd')
}

export function isWeekday(day: IsoDate): boolean {
  return toDate(day).weekday < SATURDAY
}

export function isInRecess(day: IsoDate, recesses: RecessPeriod[]): boolean {
  // ISO dates compare correctly as strings
  return recesses.some((recess) => recess.start <= day && day <= recess.end)
}

/**
 * Every day from start to end (inclusive) that is a weekday, not a holiday,
 * and not inside a recess. Bodies with no session this year yield [].
 */
export function generateSessionDays(
  jurisdiction: Pick<Jurisdiction, 'start' | 'end' | 'recesses'>,
  holidays: Array<Holiday | IsoDate> = [],
): IsoDate[] {
  if (jurisdiction.start === null || jurisdiction.end === null) {
    return []
  }

  const holidaySet = new Set(holidays.map((h) => (typeof h === 'string' ? h : h.date)))
  const end = toDate(jurisdiction.end)
  const days: IsoDate[] = []

  for (let current = toDate(jurisdiction.start); current <= end; current = current.plus({ days: 1 })) {
    const day = toIso(current)
    if (isWeekday(day) && !holidaySet.has(day) && !isInRecess(day, jurisdiction.recesses)) {
      days.push(day)
    }
  }

  return days
}

/**
 * Group sorted session days into runs of consecutive calendar days.
 */
export function groupConsecutiveDays(days: IsoDate[]): SessionBlock[] {
  if (days.length === 0) {
    return []
  }

  const blocks: SessionBlock[] = []
  let start = days[0]
  let end = days[0]
  let count = 1

  for (const day of days.slice(1)) {
    if (day === toIso(toDate(end).plus({ days: 1 }))) {
      end = day
      count++
    } else {
      blocks.push({ start, end, days: count })
      start = day
      end = day
      count = 1
    }
  }

  blocks.push({ start, end, days: count })
  return blocks
}

/**
 * Exclusive end date for an all-day event covering the block.
 */
export function exclusiveEnd(block: SessionBlock): IsoDate {
  return toIso(toDate(block.end).plus({ days: 1 }))
}

export function compactDate(day: IsoDate): string {
  return day.replace(/-/g, '')
}

import type { CalendarDiff, CalendarEventRecord } from './types.js'

/**
 * Compare two versions of a calendar by event UID.
 */
export function diffCalendars(before: CalendarEventRecord[], after: CalendarEventRecord[]): CalendarDiff {
  const previous = new Map(before.map((e) => [e.uid, e]))
  const next = new Map(after.map((e) => [e.uid, e]))

  const diff: CalendarDiff = { added: [], removed: [], changed: [] }

  for (const event of after) {
    const old = previous.get(event.uid)
    if (!old) {
      diff.added.push(event)
    } else if (old.summary !== event.summary || old.start !== event.start || old.end !== event.end) {
      diff.changed.push({ before: old, after: event })
    }
  }

  for (const event of before) {
    if (!next.has(event.uid)) {
      diff.removed.push(event)
    }
  }

  return diff
}

export function isEmptyDiff(diff: CalendarDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0
}

export function describeDiff(diff: CalendarDiff): string {
  if (isEmptyDiff(diff)) {
    return 'no event changes'
  }
  return `${diff.added.length} added, ${diff.changed.length} changed, ${diff.removed.length} removed`
}

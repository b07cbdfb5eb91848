/**
 * Calendar Target Planning
 *
 * Decides which files a generation run writes and what each is called.
 */

import { GenerationError } from '../errors.js'
import type { CalendarGroup, Jurisdiction, SessionData } from '../sessions/types.js'
import type { CalendarTarget, CalendarTargetKind } from './types.js'

/**
 * Stable file name for a target. Never derived from content.
 */
export function calendarFileName(kind: CalendarTargetKind, slug: string, year: number): string {
  const stem = slug.toLowerCase()
  switch (kind) {
    case 'jurisdiction':
    case 'federal':
      return `${stem}_legislative_calendar_${year}.ics`
    case 'combined':
      return `${stem}_legislative_sessions_${year}.ics`
    case 'region':
      return `${stem}_states_${year}.ics`
  }
}

export function hasSession(jurisdiction: Jurisdiction): boolean {
  return jurisdiction.start !== null && jurisdiction.end !== null
}

/** Abbreviation if the body has one, else its full name */
export function jurisdictionLabel(jurisdiction: Jurisdiction): string {
  return jurisdiction.abbreviation ?? jurisdiction.name
}

function statesInSession(data: SessionData): Jurisdiction[] {
  return data.jurisdictions
    .filter((j) => j.kind === 'state' && hasSession(j))
    .sort((a, b) => a.id.localeCompare(b.id))
}

function resolveMembers(group: CalendarGroup, data: SessionData): Jurisdiction[] {
  if (group.members === 'all') {
    const federal = data.jurisdictions.filter((j) => j.kind === 'federal' && hasSession(j))
    return [...federal, ...statesInSession(data)]
  }

  const byId = new Map(data.jurisdictions.map((j) => [j.id, j]))
  return group.members.map((id) => {
    const jurisdiction = byId.get(id)
    if (!jurisdiction) {
      throw new GenerationError(`Group "${group.slug}" references unknown jurisdiction "${id}"`)
    }
    return jurisdiction
  })
}

function groupTarget(group: CalendarGroup, data: SessionData): CalendarTarget {
  return {
    kind: group.kind,
    slug: group.slug,
    title: group.title,
    fileName: calendarFileName(group.kind, group.slug, data.year),
    jurisdictions: resolveMembers(group, data),
  }
}

/**
 * Ordered list of files to generate: federal groups, one per state in
 * session (alphabetical), combined groups, then regions.
 */
export function planCalendarTargets(data: SessionData): CalendarTarget[] {
  const groupsOfKind = (kind: CalendarGroup['kind']) =>
    data.groups.filter((g) => g.kind === kind).map((g) => groupTarget(g, data))

  const states: CalendarTarget[] = statesInSession(data).map((state) => ({
    kind: 'jurisdiction',
    slug: state.id.toLowerCase(),
    title: `${jurisdictionLabel(state)} - ${data.year} Legislative Session`,
    fileName: calendarFileName('jurisdiction', state.id, data.year),
    jurisdictions: [state],
  }))

  const targets = [
    ...groupsOfKind('federal'),
    ...states,
    ...groupsOfKind('combined'),
    ...groupsOfKind('region'),
  ]

  const seen = new Set<string>()
  for (const target of targets) {
    if (seen.has(target.fileName)) {
      throw new GenerationError(`Two calendars would be written to ${target.fileName}`)
    }
    seen.add(target.fileName)
  }

  return targets
}

/**
 * Calendar Files
 *
 * Planning, rendering and reading the generated ICS files.
 */

// Types
export type {
  CalendarTarget,
  CalendarTargetKind,
  CalendarOptions,
  CalendarEventRecord,
  CalendarDiff,
  GeneratedFile,
  GenerationReport,
  GenerateCalendarsInput,
} from './types.js'

// Implementation
export { calendarFileName, planCalendarTargets, jurisdictionLabel, hasSession } from './targets.js'
export {
  buildCalendar,
  escapeText,
  foldLine,
  eventSummary,
  eventUid,
  DEFAULT_CALENDAR_OPTIONS,
} from './ics.js'
export type { BuiltCalendar, JurisdictionSummary } from './ics.js'
export { generateCalendars } from './generator.js'
export { readCalendarEvents, readCalendarTitle } from './reader.js'
export { diffCalendars, describeDiff, isEmptyDiff } from './diff.js'

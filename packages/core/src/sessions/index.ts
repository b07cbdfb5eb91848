/**
 * Session Data
 *
 * Jurisdictions, holidays and calendar groups for one year.
 */

export type {
  IsoDate,
  RecessPeriod,
  Holiday,
  Jurisdiction,
  JurisdictionKind,
  CalendarGroup,
  CalendarGroupKind,
  SessionData,
  SessionBlock,
} from './types.js'

export { parseSessionData, loadSessionData, defaultSessionDataPath } from './loader.js'
export {
  generateSessionDays,
  groupConsecutiveDays,
  isWeekday,
  isInRecess,
  exclusiveEnd,
  compactDate,
} from './session-days.js'

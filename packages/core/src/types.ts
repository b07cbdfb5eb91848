import type { CalendarOptions } from './calendar/types.js'

export interface PublishConfig {
  /** Git working tree the calendars are committed into */
  repoDir: string

  /** Directory inside repoDir (and inside the public URL) holding the files */
  pathPrefix: string

  remote: string
  branch: string

  /** Hosting account and repository, used to derive the raw file URL */
  owner?: string
  repo?: string

  /** Overrides the derived URL base, e.g. a GitHub Pages domain */
  baseUrl?: string

  commitMessage: string

  /** Extra push attempts after the first one fails */
  pushRetries: number

  /** Initial delay between push attempts */
  retryDelayMs: number
}

export interface ScheduleConfig {
  /** Cron expression for the scheduled regeneration workflow */
  cron: string
  nodeVersion: string
  /** Relative to the project directory */
  workflowPath: string
}

export interface LegcalConfig {
  projectDir: string
  sessionsPath: string
  outputDir: string
  calendar: Pick<CalendarOptions, 'prodId' | 'uidDomain' | 'timezone'>
  publish: PublishConfig
  schedule: ScheduleConfig
}

/**
 * Publisher Types
 */

import type { CalendarDiff } from '../calendar/types.js'

/**
 * Runs a git command in a working tree and resolves with its stdout.
 * Rejects when git exits non-zero.
 */
export interface GitRunner {
  run(args: string[], cwd: string): Promise<string>
}

export interface ManifestEntry {
  /** sha256 of the file with DTSTAMP lines removed */
  digest: string
  url: string
  title: string
  events: number
  updatedAt: string
}

/**
 * Record of what is currently published, kept next to the calendars.
 */
export interface PublishManifest {
  year: number | null
  updatedAt: string
  files: Record<string, ManifestEntry>
}

export interface PublishOptions {
  /** Drop previously published files that the new output no longer has */
  allowRemovals?: boolean

  /** Stop before touching git */
  dryRun?: boolean

  /** Overrides the configured commit message */
  message?: string

  /** Data year recorded in the manifest */
  year?: number
}

export interface FileChange {
  fileName: string
  status: 'added' | 'updated'
  diff: CalendarDiff
}

export interface PublishResult {
  changed: FileChange[]
  unchanged: string[]
  removed: string[]
  committed: boolean
  pushed: boolean
  /** Subscription URL per published file name */
  urls: Record<string, string>
}

/**
 * Makes a directory of calendar files publicly fetchable at stable URLs.
 */
export interface Publisher {
  publish(outputDir: string, options?: PublishOptions): Promise<PublishResult>
}

export interface SubscriptionEntry {
  fileName: string
  title: string
  url: string
}

export interface VerifyResult {
  url: string
  ok: boolean
  status: number | null
  error?: string
}

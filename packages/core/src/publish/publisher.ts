/**
 * Git Publisher
 *
 * Synchronizes a directory of generated calendars into a git working tree
 * and pushes it, so the hosting service serves each file at a fixed URL.
 * Single operator, sequential runs: there is no locking and no rollback.
 * A rejected push is retried with backoff, then reported.
 */

import { existsSync } from 'node:fs'
import { copyFile, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { describeDiff, diffCalendars } from '../calendar/diff.js'
import { readCalendarEvents, readCalendarTitle } from '../calendar/reader.js'
import { PublishError, StableNameError, errorMessage } from '../errors.js'
import type { PublishConfig } from '../types.js'
import { computeBackoff, sleep, type RetryPolicy } from '../utils/backoff.js'
import { ExecGitRunner } from './git.js'
import { contentDigest, findRemovedFiles, loadManifest, saveManifest, MANIFEST_FILENAME } from './manifest.js'
import { INDEX_FILENAME, renderSubscriptionIndex } from './subscription-index.js'
import { subscriptionUrl } from './urls.js'
import type { CalendarEventRecord } from '../calendar/types.js'
import type {
  FileChange,
  GitRunner,
  ManifestEntry,
  PublishManifest,
  PublishOptions,
  PublishResult,
  Publisher,
} from './types.js'

/** Push retry growth; first delay and attempt count come from config */
const PUSH_BACKOFF: Pick<RetryPolicy, 'maxMs' | 'factor' | 'jitter'> = {
  maxMs: 30000,
  factor: 1.8,
  jitter: 0.25,
}

export interface GitPublisherOptions {
  config: PublishConfig
  git?: GitRunner
  now?: () => Date
  /** Jitter source for push retries */
  random?: () => number
}

export async function listCalendarFiles(dir: string): Promise<string[]> {
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (err) {
    throw new PublishError(`Cannot read output directory ${dir}: ${errorMessage(err)}`, { cause: err })
  }
  return entries.filter((name) => name.endsWith('.ics')).sort()
}

export class GitPublisher implements Publisher {
  private config: PublishConfig
  private git: GitRunner
  private now: () => Date
  private random: () => number

  constructor(options: GitPublisherOptions) {
    this.config = options.config
    this.git = options.git ?? new ExecGitRunner()
    this.now = options.now ?? (() => new Date())
    this.random = options.random ?? Math.random
  }

  /** Directory inside the working tree that holds the published files */
  get targetDir(): string {
    return path.join(this.config.repoDir, this.config.pathPrefix)
  }

  async publish(outputDir: string, options: PublishOptions = {}): Promise<PublishResult> {
    const names = await listCalendarFiles(outputDir)
    if (names.length === 0) {
      throw new PublishError(`No .ics files in ${outputDir}. Run generate first.`)
    }

    const targetDir = this.targetDir
    const inPlace = path.resolve(outputDir) === path.resolve(targetDir)

    const previous = await loadManifest(targetDir)
    const removed = findRemovedFiles(previous, names)
    if (removed.length > 0 && !options.allowRemovals) {
      throw new StableNameError(removed)
    }

    const updatedAt = this.now().toISOString()
    const next: PublishManifest = {
      year: options.year ?? previous.year,
      updatedAt,
      files: {},
    }
    const changed: FileChange[] = []
    const unchanged: string[] = []
    const relinked: string[] = []
    const urls: Record<string, string> = {}

    for (const name of names) {
      const destination = path.join(targetDir, name)
      const content = await readFile(path.join(outputDir, name), 'utf-8')
      const digest = contentDigest(content)
      const events = readCalendarEvents(content)
      const url = subscriptionUrl(this.config, name)
      const prior = previous.files[name]
      urls[name] = url

      if (prior && prior.digest === digest && existsSync(destination)) {
        unchanged.push(name)
        if (prior.url !== url) relinked.push(name)
        next.files[name] = { ...prior, url }
        continue
      }

      const diff = diffCalendars(await this.previousEvents(name, destination, inPlace), events)
      const status = prior ? 'updated' : 'added'
      changed.push({ fileName: name, status, diff })
      console.log(`[Publisher] ${status === 'added' ? 'Added' : 'Updated'} ${name}: ${describeDiff(diff)}`)

      const entry: ManifestEntry = {
        digest,
        url,
        title: readCalendarTitle(content) ?? name,
        events: events.length,
        updatedAt,
      }
      next.files[name] = entry
    }

    const result: PublishResult = { changed, unchanged, removed, committed: false, pushed: false, urls }
    const message = options.message ?? this.config.commitMessage

    if (changed.length === 0 && removed.length === 0 && relinked.length === 0 && next.year === previous.year) {
      if (options.dryRun) {
        console.log(`[Publisher] Dry run: ${unchanged.length} calendars unchanged`)
        return result
      }
      return this.finishPending(result, message)
    }

    if (relinked.length > 0) {
      console.log(`[Publisher] Subscription URL changed for ${relinked.length} calendar(s), rewriting the index`)
    }

    // Nothing below runs on a dry run, including the manifest write
    if (options.dryRun) {
      console.log(`[Publisher] Dry run: ${changed.length} changed, ${removed.length} removed, nothing written`)
      return result
    }

    await mkdir(targetDir, { recursive: true })
    if (!inPlace) {
      for (const change of changed) {
        await copyFile(path.join(outputDir, change.fileName), path.join(targetDir, change.fileName))
      }
    }
    for (const name of removed) {
      await rm(path.join(targetDir, name), { force: true })
      console.warn(`[Publisher] Removed ${name}; subscribers to ${previous.files[name].url} will stop receiving updates`)
    }

    await saveManifest(targetDir, next)
    await writeFile(
      path.join(targetDir, INDEX_FILENAME),
      renderSubscriptionIndex(
        names.map((name) => ({ fileName: name, title: next.files[name].title, url: urls[name] })),
        next.year,
      ),
      'utf-8',
    )

    const paths = [
      ...changed.map((c) => c.fileName),
      ...removed,
      MANIFEST_FILENAME,
      INDEX_FILENAME,
    ].map((name) => this.repoPath(name))

    await this.gitStep('stage files', ['add', '--', ...paths])
    await this.gitStep('commit', ['commit', '-m', message])
    result.committed = true

    await this.pushWithRetry()
    result.pushed = true
    console.log(`[Publisher] Pushed ${changed.length + removed.length} file change(s) to ${this.config.remote}/${this.config.branch}`)

    return result
  }

  /**
   * Nothing new was generated, but an earlier run may have stopped between
   * writing the manifest and pushing. Commit what it left staged, and push
   * any commit the remote does not have yet.
   */
  private async finishPending(result: PublishResult, message: string): Promise<PublishResult> {
    const { remote, branch } = this.config
    const status = await this.gitStep('status', [
      'status',
      '--porcelain',
      '--',
      this.repoPath(MANIFEST_FILENAME),
      this.repoPath(INDEX_FILENAME),
    ])

    if (status !== '') {
      console.log('[Publisher] Committing changes left by an interrupted publish')
      await this.gitStep('stage files', ['add', '-A', '--', this.config.pathPrefix || '.'])
      await this.gitStep('commit', ['commit', '-m', message])
      result.committed = true
    } else if (!(await this.isAhead())) {
      console.log(`[Publisher] Nothing to publish, ${result.unchanged.length} calendars unchanged`)
      return result
    }

    await this.pushWithRetry()
    result.pushed = true
    console.log(`[Publisher] Pushed pending commit(s) to ${remote}/${branch}`)
    return result
  }

  private async isAhead(): Promise<boolean> {
    const { remote, branch } = this.config
    try {
      const count = await this.git.run(['rev-list', '--count', `${remote}/${branch}..HEAD`], this.config.repoDir)
      return Number.parseInt(count, 10) > 0
    } catch (err) {
      console.warn(`[Publisher] Cannot compare with ${remote}/${branch} (${errorMessage(err)}), pushing anyway`)
      return true
    }
  }

  private repoPath(name: string): string {
    return path.posix.join(this.config.pathPrefix || '.', name)
  }

  /**
   * Events of the currently published version. When the output directory is
   * the published directory the file is already overwritten, so the last
   * committed version is read from git instead.
   */
  private async previousEvents(
    name: string,
    destination: string,
    inPlace: boolean,
  ): Promise<CalendarEventRecord[]> {
    if (!inPlace) {
      return existsSync(destination) ? readCalendarEvents(await readFile(destination, 'utf-8')) : []
    }
    try {
      const committed = await this.git.run(['show', `HEAD:${this.repoPath(name)}`], this.config.repoDir)
      return readCalendarEvents(committed)
    } catch {
      // Not committed yet
      return []
    }
  }

  private async gitStep(description: string, args: string[]): Promise<string> {
    try {
      return await this.git.run(args, this.config.repoDir)
    } catch (err) {
      throw new PublishError(`git ${description} failed: ${errorMessage(err)}`, { cause: err })
    }
  }

  private async pushWithRetry(): Promise<void> {
    const { remote, branch } = this.config
    const policy: RetryPolicy = {
      ...PUSH_BACKOFF,
      initialMs: this.config.retryDelayMs,
      maxAttempts: this.config.pushRetries,
    }

    for (let attempt = 0; ; attempt++) {
      try {
        await this.git.run(['push', remote, `HEAD:${branch}`], this.config.repoDir)
        return
      } catch (err) {
        const delay = computeBackoff(policy, attempt, this.random)
        if (delay === null) {
          throw new PublishError(
            `Push to ${remote}/${branch} failed after ${attempt + 1} attempt(s): ${errorMessage(err)}. ` +
              'The commit is kept locally; fix access and re-run publish to push it.',
            { cause: err },
          )
        }
        console.warn(`[Publisher] Push failed (${errorMessage(err)}), retrying in ${delay}ms`)
        await sleep(delay)
      }
    }
  }
}

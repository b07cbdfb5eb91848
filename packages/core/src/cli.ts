/**
 * Command Handlers
 *
 * Each command loads configuration, does one job, and throws a LegcalError
 * subclass on failure so the entrypoint can map it to an exit status.
 */

import * as path from 'node:path'
import { generateCalendars } from './calendar/generator.js'
import { planCalendarTargets } from './calendar/targets.js'
import type { GenerationReport } from './calendar/types.js'
import { loadConfig } from './config.js'
import { VerificationError } from './errors.js'
import { loadManifest } from './publish/manifest.js'
import { GitPublisher } from './publish/publisher.js'
import { renderSubscriptionIndex } from './publish/subscription-index.js'
import type { GitRunner, PublishResult, SubscriptionEntry } from './publish/types.js'
import { subscriptionUrl } from './publish/urls.js'
import { verifyPublished, type Fetcher } from './publish/verify.js'
import { writeWorkflow } from './schedule/workflow.js'
import { loadSessionData } from './sessions/loader.js'
import type { LegcalConfig } from './types.js'

export const COMMANDS = ['generate', 'publish', 'run', 'urls', 'verify', 'workflow', 'help'] as const

export type CommandName = (typeof COMMANDS)[number]

export interface CliArgs {
  command: CommandName
  dryRun: boolean
  allowRemovals: boolean
  message?: string
}

export interface CliContext {
  config?: LegcalConfig
  git?: GitRunner
  fetch?: Fetcher
}

export const USAGE = `Usage: legcal <command> [options]

Commands:
  generate     Write every calendar file into the output directory
  publish      Commit and push the output directory to the public repository
  run          generate, then publish (what the scheduled job calls)
  urls         Print the subscription URL of every calendar
  verify       Check that every published URL still serves its calendar
  workflow     Write the scheduled regeneration workflow file
  help         Show this message

Options:
  --dry-run          publish: report what would change without writing or pushing
  --allow-removals   publish: allow previously published files to disappear
  --message <text>   publish: commit message
`

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value)
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', dryRun: false, allowRemovals: false }
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '--dry-run':
        args.dryRun = true
        break
      case '--allow-removals':
        args.allowRemovals = true
        break
      case '--message':
      case '-m': {
        const value = argv[i + 1]
        if (value === undefined) {
          throw new Error(`${arg} needs a value`)
        }
        args.message = value
        i++
        break
      }
      case '--help':
      case '-h':
        positional.unshift('help')
        break
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`)
        }
        positional.push(arg)
    }
  }

  const [command] = positional
  if (command !== undefined) {
    if (!isCommand(command)) {
      throw new Error(`Unknown command: ${command}`)
    }
    args.command = command
  }
  return args
}

export async function generate(config: LegcalConfig): Promise<GenerationReport> {
  const data = loadSessionData(config.sessionsPath)
  const report = await generateCalendars({ data, outputDir: config.outputDir, calendar: config.calendar })
  console.log(`[Generator] ${report.files.length} calendars generated for ${report.year}`)
  return report
}

export async function publish(
  config: LegcalConfig,
  args: Pick<CliArgs, 'dryRun' | 'allowRemovals' | 'message'>,
  context: Pick<CliContext, 'git'> = {},
): Promise<PublishResult> {
  const data = loadSessionData(config.sessionsPath)
  const publisher = new GitPublisher({ config: config.publish, git: context.git })
  return publisher.publish(config.outputDir, {
    dryRun: args.dryRun,
    allowRemovals: args.allowRemovals,
    message: args.message,
    year: data.year,
  })
}

/**
 * Subscription entries for every planned calendar.
 */
export function subscriptionEntries(config: LegcalConfig): SubscriptionEntry[] {
  const data = loadSessionData(config.sessionsPath)
  return planCalendarTargets(data).map((target) => ({
    fileName: target.fileName,
    title: target.title,
    url: subscriptionUrl(config.publish, target.fileName),
  }))
}

/**
 * Verify every planned URL plus any URL the manifest says was published
 * before, since those are the ones subscribers already hold.
 */
export async function verify(config: LegcalConfig, context: Pick<CliContext, 'fetch'> = {}): Promise<void> {
  const urls = new Set(subscriptionEntries(config).map((e) => e.url))
  const manifest = await loadManifest(path.join(config.publish.repoDir, config.publish.pathPrefix))
  for (const entry of Object.values(manifest.files)) {
    urls.add(entry.url)
  }

  const results = await verifyPublished([...urls], { fetch: context.fetch })
  const failed = results.filter((r) => !r.ok).map((r) => r.url)
  if (failed.length > 0) {
    throw new VerificationError(failed)
  }
  console.log(`[Verify] All ${results.length} calendar URLs resolve`)
}

export async function runCommand(args: CliArgs, context: CliContext = {}): Promise<void> {
  if (args.command === 'help') {
    console.log(USAGE)
    return
  }

  const config = context.config ?? loadConfig()

  switch (args.command) {
    case 'generate':
      await generate(config)
      break
    case 'publish':
      await publish(config, args, context)
      break
    case 'run':
      await generate(config)
      await publish(config, args, context)
      break
    case 'urls': {
      const data = loadSessionData(config.sessionsPath)
      console.log(renderSubscriptionIndex(subscriptionEntries(config), data.year))
      break
    }
    case 'verify':
      await verify(config, context)
      break
    case 'workflow': {
      const target = await writeWorkflow(config)
      console.log(`Wrote ${target} (cron: ${config.schedule.cron})`)
      break
    }
  }
}

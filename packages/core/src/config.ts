import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CALENDAR_OPTIONS } from './calendar/ics.js'
import { ConfigError, errorMessage } from './errors.js'
import { defaultSessionDataPath } from './sessions/loader.js'
import type { LegcalConfig } from './types.js'

export const CONFIG_FILENAME = 'calendars.yaml'

const DEFAULT_OUTPUT_DIR = 'output'
const DEFAULT_CRON = '0 6 * * 1' // Mondays 06:00 UTC
const DEFAULT_WORKFLOW_PATH = '.github/workflows/update-calendars.yml'

export function findProjectDir(): string {
  // Walk up from cwd looking for calendars.yaml
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, CONFIG_FILENAME))) return dir
    dir = path.dirname(dir)
  }
  // No config found — default to the repository root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) return dir
    dir = path.dirname(dir)
  }
  return process.cwd()
}

const yamlSchema = z
  .object({
    sessions: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    calendar: z
      .object({
        prodId: z.string().min(1).optional(),
        uidDomain: z
          .string()
          .regex(/^[A-Za-z0-9.-]+$/, 'expected a domain name')
          .optional(),
        timezone: z.string().min(1).optional(),
      })
      .optional(),
    publish: z
      .object({
        repoDir: z.string().min(1).optional(),
        pathPrefix: z.string().optional(),
        remote: z.string().min(1).optional(),
        branch: z.string().min(1).optional(),
        owner: z.string().min(1).optional(),
        repo: z.string().min(1).optional(),
        baseUrl: z.string().url().optional(),
        commitMessage: z.string().min(1).optional(),
        pushRetries: z.number().int().min(0).max(10).optional(),
        retryDelayMs: z.number().int().min(0).optional(),
      })
      .optional(),
    schedule: z
      .object({
        cron: z
          .string()
          .refine((value) => value.trim().split(/\s+/).length === 5, 'expected five cron fields')
          .optional(),
        nodeVersion: z.union([z.string(), z.number()]).transform(String).optional(),
        workflowPath: z.string().min(1).optional(),
      })
      .optional(),
  })
  .nullish()

type YamlConfig = NonNullable<z.infer<typeof yamlSchema>>

function loadYamlConfig(projectDir: string): YamlConfig {
  const configPath = path.join(projectDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(`Warning: Could not parse ${configPath}: ${errorMessage(err)}. Using defaults.`)
    return {}
  }

  const parsed = yamlSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid ${configPath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }
  return parsed.data ?? {}
}

function stripSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '')
}

/**
 * Load calendars.yaml merged over defaults. Environment variables
 * LEGCAL_OUTPUT_DIR, LEGCAL_PUBLISH_REMOTE and LEGCAL_PUBLISH_BRANCH win
 * over the file.
 */
export function loadConfig(projectDir?: string, env: NodeJS.ProcessEnv = process.env): LegcalConfig {
  const dir = path.resolve(projectDir ?? env.LEGCAL_DIR ?? findProjectDir())
  const yaml = loadYamlConfig(dir)
  const resolve = (value: string) => path.resolve(dir, value)

  const publish: NonNullable<YamlConfig['publish']> = yaml.publish ?? {}

  return {
    projectDir: dir,
    sessionsPath: yaml.sessions ? resolve(yaml.sessions) : defaultSessionDataPath(),
    outputDir: resolve(env.LEGCAL_OUTPUT_DIR ?? yaml.outputDir ?? DEFAULT_OUTPUT_DIR),
    calendar: {
      prodId: yaml.calendar?.prodId ?? DEFAULT_CALENDAR_OPTIONS.prodId,
      uidDomain: yaml.calendar?.uidDomain ?? DEFAULT_CALENDAR_OPTIONS.uidDomain,
      timezone: yaml.calendar?.timezone ?? DEFAULT_CALENDAR_OPTIONS.timezone,
    },
    publish: {
      repoDir: resolve(publish.repoDir ?? '.'),
      pathPrefix: stripSlashes(publish.pathPrefix ?? DEFAULT_OUTPUT_DIR),
      remote: env.LEGCAL_PUBLISH_REMOTE ?? publish.remote ?? 'origin',
      branch: env.LEGCAL_PUBLISH_BRANCH ?? publish.branch ?? 'main',
      owner: publish.owner,
      repo: publish.repo,
      baseUrl: publish.baseUrl,
      commitMessage: publish.commitMessage ?? 'Update legislative calendars',
      pushRetries: publish.pushRetries ?? 2,
      retryDelayMs: publish.retryDelayMs ?? 2000,
    },
    schedule: {
      cron: yaml.schedule?.cron ?? DEFAULT_CRON,
      nodeVersion: yaml.schedule?.nodeVersion ?? '20',
      workflowPath: yaml.schedule?.workflowPath ?? DEFAULT_WORKFLOW_PATH,
    },
  }
}

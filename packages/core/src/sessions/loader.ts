/**
 * Session Data Loader
 *
 * Reads and validates the session data file. The bundled data set lives
 * in packages/core/data and is located relative to this module.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { DateTime } from 'luxon'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../errors.js'
import type { SessionData } from './types.js'

const DEFAULT_YEAR = 2026

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => DateTime.fromISO(value).isValid, 'not a valid calendar date')

const recessSchema = z
  .object({
    start: isoDate,
    end: isoDate,
    label: z.string().optional(),
  })
  .refine((r) => r.start <= r.end, 'recess ends before it starts')

const jurisdictionSchema = z
  .object({
    id: z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'ids use letters, digits and underscores'),
    name: z.string().min(1),
    kind: z.enum(['federal', 'state']),
    abbreviation: z.string().min(1).optional(),
    start: isoDate.nullable(),
    end: isoDate.nullable(),
    description: z.string().default(''),
    recesses: z.array(recessSchema).default([]),
  })
  .refine((j) => (j.start === null) === (j.end === null), 'start and end must both be set or both be null')
  .refine((j) => j.start === null || j.end === null || j.start <= j.end, 'session ends before it starts')

const groupSchema = z.object({
  slug: z.string().regex(/^[a-z][a-z0-9_]*$/, 'slugs are lower-case letters, digits and underscores'),
  kind: z.enum(['federal', 'combined', 'region']),
  title: z.string().min(1),
  members: z.union([z.literal('all'), z.array(z.string()).min(1)]),
})

const sessionDataSchema = z
  .object({
    year: z.number().int().min(1900).max(9999),
    holidays: z.array(z.object({ date: isoDate, name: z.string() })).default([]),
    jurisdictions: z.array(jurisdictionSchema),
    groups: z.array(groupSchema).default([]),
  })
  .superRefine((data, ctx) => {
    const ids = new Set<string>()
    data.jurisdictions.forEach((j, index) => {
      if (ids.has(j.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jurisdictions', index, 'id'],
          message: `duplicate jurisdiction id "${j.id}"`,
        })
      }
      ids.add(j.id)
    })

    data.groups.forEach((group, index) => {
      if (group.members === 'all') return
      group.members.forEach((member, memberIndex) => {
        if (!ids.has(member)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['groups', index, 'members', memberIndex],
            message: `unknown jurisdiction "${member}"`,
          })
        }
      })
    })
  })

/**
 * Validate raw session data.
 * @throws ConfigError listing every issue with its path
 */
export function parseSessionData(raw: unknown, source = 'session data'): SessionData {
  const parsed = sessionDataSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    throw new ConfigError(`Invalid ${source}`, issues)
  }
  return parsed.data
}

/**
 * Load and validate a session data JSON file.
 */
export function loadSessionData(filePath: string): SessionData {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not read session data ${filePath}: ${errorMessage(err)}`, [], {
      cause: err,
    })
  }
  return parseSessionData(raw, filePath)
}

/**
 * Path of the data file shipped with this package.
 */
export function defaultSessionDataPath(year = DEFAULT_YEAR): string {
  return fileURLToPath(new URL(`../../data/sessions-${year}.json`, import.meta.url))
}

/**
 * Publish Manifest
 *
 * Tracks which files are published and a content digest for each, so
 * unchanged calendars are not recommitted and vanished names are caught.
 */

import { createHash } from 'node:crypto'
import { existsSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { errorMessage } from '../errors.js'
import type { PublishManifest } from './types.js'

export const MANIFEST_FILENAME = 'manifest.json'

/**
 * Digest of an ICS document ignoring DTSTAMP, which changes on every run.
 */
export function contentDigest(ics: string): string {
  const normalized = ics
    .split(/\r?\n/)
    .filter((line) => !line.startsWith('DTSTAMP:'))
    .join('\n')
  return createHash('sha256').update(normalized).digest('hex')
}

export function emptyManifest(): PublishManifest {
  return { year: null, updatedAt: new Date(0).toISOString(), files: {} }
}

function isManifest(value: unknown): value is PublishManifest {
  if (typeof value !== 'object' || value === null) return false
  const files: unknown = Reflect.get(value, 'files')
  return typeof files === 'object' && files !== null && !Array.isArray(files)
}

export async function loadManifest(dir: string): Promise<PublishManifest> {
  const manifestPath = path.join(dir, MANIFEST_FILENAME)
  if (!existsSync(manifestPath)) {
    return emptyManifest()
  }

  try {
    const parsed: unknown = JSON.parse(await readFile(manifestPath, 'utf-8'))
    if (isManifest(parsed)) {
      return parsed
    }
    console.warn(`[Publisher] ${manifestPath} is not a manifest, treating as empty`)
  } catch (err) {
    console.warn(`[Publisher] Could not read ${manifestPath}: ${errorMessage(err)}, treating as empty`)
  }
  return emptyManifest()
}

export async function saveManifest(dir: string, manifest: PublishManifest): Promise<string> {
  const manifestPath = path.join(dir, MANIFEST_FILENAME)
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8')
  return manifestPath
}

/**
 * Names published before that are missing from the next set.
 */
export function findRemovedFiles(previous: PublishManifest, nextNames: Iterable<string>): string[] {
  const next = new Set(nextNames)
  return Object.keys(previous.files)
    .filter((name) => !next.has(name))
    .sort()
}

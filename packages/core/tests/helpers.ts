import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { Jurisdiction, SessionData } from '../src/sessions/types.js'

export function createTempDir(prefix = 'legcal-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function cleanDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

export function jurisdiction(overrides: Partial<Jurisdiction> & Pick<Jurisdiction, 'id'>): Jurisdiction {
  return {
    name: `${overrides.id} Legislature`,
    kind: 'state',
    start: '2026-01-05',
    end: '2026-01-16',
    description: '2026 Regular Session',
    recesses: [],
    ...overrides,
  }
}

/**
 * Small data set: two states, one biennial state with no session,
 * one federal body and one region.
 */
export function sampleData(): SessionData {
  return {
    year: 2026,
    holidays: [{ date: '2026-01-19', name: 'Martin Luther King Jr. Day' }],
    jurisdictions: [
      jurisdiction({ id: 'US_House', name: 'U.S. House of Representatives', kind: 'federal', description: '' }),
      jurisdiction({ id: 'Oregon', name: 'Oregon Legislative Assembly', abbreviation: 'OR' }),
      jurisdiction({
        id: 'California',
        name: 'California State Legislature',
        abbreviation: 'CA',
        end: '2026-01-23',
      }),
      jurisdiction({ id: 'Texas', name: 'Texas Legislature', abbreviation: 'TX', start: null, end: null }),
    ],
    groups: [
      { slug: 'federal', kind: 'federal', title: 'Federal - 2026 Legislative Session', members: ['US_House'] },
      { slug: 'all', kind: 'combined', title: 'All Legislative Sessions - 2026', members: 'all' },
      { slug: 'west', kind: 'region', title: 'West States - 2026 Legislative Sessions', members: ['California', 'Oregon'] },
    ],
  }
}

export const FIXED_NOW = () => new Date('2026-03-01T12:00:00Z')

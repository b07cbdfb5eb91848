/**
 * Integration Tests — Calendar Generation
 *
 * Writes calendars into a temp directory and reads them back, covering
 * the stable-name guarantee across regenerations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import { generateCalendars } from '../src/calendar/generator.js'
import { readCalendarEvents, readCalendarTitle } from '../src/calendar/reader.js'
import { diffCalendars, describeDiff } from '../src/calendar/diff.js'
import { GenerationError } from '../src/errors.js'
import { cleanDir, createTempDir, FIXED_NOW, sampleData } from './helpers.js'

const calendar = { uidDomain: 'calendars.test', now: FIXED_NOW }

describe('generateCalendars', () => {
  let tempDir: string
  let outputDir: string

  beforeEach(() => {
    tempDir = createTempDir()
    outputDir = path.join(tempDir, 'output')
  })

  afterEach(() => {
    cleanDir(tempDir)
  })

  it('creates the output directory and writes every planned file', async () => {
    const report = await generateCalendars({ data: sampleData(), outputDir, calendar })

    expect(report.year).toBe(2026)
    expect(report.files.map((f) => f.fileName)).toEqual([
      'federal_legislative_calendar_2026.ics',
      'california_legislative_calendar_2026.ics',
      'oregon_legislative_calendar_2026.ics',
      'all_legislative_sessions_2026.ics',
      'west_states_2026.ics',
    ])
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      'all_legislative_sessions_2026.ics',
      'california_legislative_calendar_2026.ics',
      'federal_legislative_calendar_2026.ics',
      'oregon_legislative_calendar_2026.ics',
      'west_states_2026.ics',
    ])
    expect(report.files[1]).toEqual({
      fileName: 'california_legislative_calendar_2026.ics',
      path: path.join(outputDir, 'california_legislative_calendar_2026.ics'),
      title: 'CA - 2026 Legislative Session',
      events: 3,
      blocks: 3,
      days: 14,
    })
  })

  it('writes calendars that parse back into session blocks', async () => {
    await generateCalendars({ data: sampleData(), outputDir, calendar })
    const ics = fs.readFileSync(path.join(outputDir, 'california_legislative_calendar_2026.ics'), 'utf-8')

    expect(readCalendarTitle(ics)).toBe('CA - 2026 Legislative Session')
    expect(readCalendarEvents(ics)).toEqual([
      {
        uid: 'California-2026-block-0@calendars.test',
        summary: 'CA - In Session (5 days)',
        start: '2026-01-05',
        end: '2026-01-10',
      },
      {
        uid: 'California-2026-block-1@calendars.test',
        summary: 'CA - In Session (5 days)',
        start: '2026-01-12',
        end: '2026-01-17',
      },
      {
        uid: 'California-2026-block-2@calendars.test',
        summary: 'CA - In Session (4 days)',
        start: '2026-01-20',
        end: '2026-01-24',
      },
    ])
  })

  it('overwrites in place under the same name when session dates change', async () => {
    const data = sampleData()
    await generateCalendars({ data, outputDir, calendar })
    const file = path.join(outputDir, 'california_legislative_calendar_2026.ics')
    const before = readCalendarEvents(fs.readFileSync(file, 'utf-8'))

    const california = data.jurisdictions.find((j) => j.id === 'California')
    if (!california) throw new Error('sample data changed')
    california.end = '2026-01-30'

    const report = await generateCalendars({ data, outputDir, calendar })
    const after = readCalendarEvents(fs.readFileSync(file, 'utf-8'))

    expect(report.files[1].fileName).toBe('california_legislative_calendar_2026.ics')
    expect(fs.readdirSync(outputDir)).toHaveLength(5)
    expect(after).toHaveLength(4)

    const diff = diffCalendars(before, after)
    expect(diff.added.map((e) => e.uid)).toEqual(['California-2026-block-3@calendars.test'])
    expect(diff.changed).toEqual([])
    expect(diff.removed).toEqual([])
    expect(describeDiff(diff)).toBe('1 added, 0 changed, 0 removed')
  })

  it('is byte-identical across runs with the same clock', async () => {
    await generateCalendars({ data: sampleData(), outputDir, calendar })
    const first = fs.readFileSync(path.join(outputDir, 'all_legislative_sessions_2026.ics'), 'utf-8')
    await generateCalendars({ data: sampleData(), outputDir, calendar })
    const second = fs.readFileSync(path.join(outputDir, 'all_legislative_sessions_2026.ics'), 'utf-8')

    expect(second).toBe(first)
  })

  it('fails with a GenerationError when the output path is a file', async () => {
    fs.writeFileSync(outputDir, 'not a directory')
    await expect(generateCalendars({ data: sampleData(), outputDir, calendar })).rejects.toThrow(GenerationError)
  })
})

describe('diffCalendars', () => {
  const base = { uid: 'a', summary: 'CA - In Session (5 days)', start: '2026-01-05', end: '2026-01-10' }

  it('detects changed dates and removed events', () => {
    const moved = { ...base, start: '2026-01-06', summary: 'CA - In Session (4 days)' }
    const gone = { ...base, uid: 'b' }
    const diff = diffCalendars([base, gone], [moved])

    expect(diff.changed).toEqual([{ before: base, after: moved }])
    expect(diff.removed).toEqual([gone])
    expect(diff.added).toEqual([])
  })

  it('reports no changes for identical events', () => {
    expect(describeDiff(diffCalendars([base], [{ ...base }]))).toBe('no event changes')
  })
})

describe('readCalendarEvents', () => {
  it('reads all-day events as dates', () => {
    const ics = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//Test//EN',
      'BEGIN:VEVENT',
      'UID:one@calendars.test',
      'DTSTAMP:20260301T120000Z',
      'DTSTART;VALUE=DATE:20260105',
      'DTEND;VALUE=DATE:20260110',
      'SUMMARY:OR - In Session (5 days)',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ].join('\r\n')

    expect(readCalendarEvents(ics)).toEqual([
      { uid: 'one@calendars.test', summary: 'OR - In Session (5 days)', start: '2026-01-05', end: '2026-01-10' },
    ])
  })

  it('wraps parser failures', () => {
    expect(() => readCalendarEvents('not a calendar')).toThrow(GenerationError)
  })
})

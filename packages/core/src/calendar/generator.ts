/**
 * Calendar Generator
 *
 * Writes one ICS file per planned target into the output directory,
 * overwriting whatever the previous run left there.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { GenerationError, errorMessage } from '../errors.js'
import { buildCalendar } from './ics.js'
import { planCalendarTargets } from './targets.js'
import type { GeneratedFile, GenerateCalendarsInput, GenerationReport } from './types.js'

export async function generateCalendars(input: GenerateCalendarsInput): Promise<GenerationReport> {
  const { data, outputDir } = input
  const targets = planCalendarTargets(data)

  try {
    await mkdir(outputDir, { recursive: true })
  } catch (err) {
    throw new GenerationError(`Could not create output directory ${outputDir}: ${errorMessage(err)}`, {
      cause: err,
    })
  }

  console.log(`[Generator] Generating ${targets.length} calendars for ${data.year} into ${outputDir}`)

  const files: GeneratedFile[] = []

  for (const target of targets) {
    const built = buildCalendar(target, data, input.calendar)
    const filePath = path.join(outputDir, target.fileName)

    try {
      await writeFile(filePath, built.content, 'utf-8')
    } catch (err) {
      throw new GenerationError(`Could not write ${filePath}: ${errorMessage(err)}`, { cause: err })
    }

    if (target.kind === 'jurisdiction') {
      console.log(`[Generator]   ${target.title}: ${built.blocks} blocks, ${built.days} session days`)
    } else {
      for (const j of built.jurisdictions) {
        console.log(`[Generator]   ${j.name}: ${j.blocks} blocks, ${j.days} session days`)
      }
    }
    console.log(`[Generator] Wrote ${target.fileName} (${built.blocks} blocks, ${built.days} total days)`)

    files.push({
      fileName: target.fileName,
      path: filePath,
      title: target.title,
      events: built.events,
      blocks: built.blocks,
      days: built.days,
    })
  }

  const skipped = data.jurisdictions.filter((j) => j.kind === 'state' && (j.start === null || j.end === null))
  if (skipped.length > 0) {
    console.log(`[Generator] No ${data.year} session: ${skipped.map((j) => j.name).join(', ')}`)
  }

  return { year: data.year, outputDir, files }
}

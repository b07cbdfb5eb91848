/**
 * Subscription Index
 *
 * Markdown listing of every published calendar and how to subscribe.
 * Written as README.md next to the files and printed by `legcal urls`.
 */

import { webcalUrl } from './urls.js'
import type { SubscriptionEntry } from './types.js'

export const INDEX_FILENAME = 'README.md'

function cell(value: string): string {
  return value.replace(/\|/g, '\\|')
}

export function renderSubscriptionIndex(entries: SubscriptionEntry[], year: number | null): string {
  const heading = year === null ? '# Legislative Session Calendars' : `# ${year} Legislative Session Calendars`

  const lines = [
    heading,
    '',
    'Subscribe to a calendar by URL in your calendar client (Google Calendar: "Other calendars" → "From URL";',
    'Outlook: "Add calendar" → "Subscribe from web"; Apple Calendar: "File" → "New Calendar Subscription").',
    'The URLs below do not change when the calendars are regenerated. Clients poll them on their own',
    'schedule, so updates can take up to 24 hours to appear.',
    '',
    '| Calendar | URL | Subscribe |',
    '| --- | --- | --- |',
    ...entries.map((e) => `| ${cell(e.title)} | ${e.url} | [webcal](${webcalUrl(e.url)}) |`),
    '',
  ]

  return lines.join('\n')
}

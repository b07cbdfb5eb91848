/**
 * Published URL Verification
 *
 * Checks that each subscription URL still answers 200 with a calendar body.
 */

import { errorMessage } from '../errors.js'
import type { VerifyResult } from './types.js'

export type Fetcher = (url: string) => Promise<Pick<Response, 'status' | 'text'>>

export interface VerifyOptions {
  fetch?: Fetcher
}

async function verifyOne(url: string, fetcher: Fetcher): Promise<VerifyResult> {
  try {
    const response = await fetcher(url)
    if (response.status !== 200) {
      return { url, ok: false, status: response.status, error: `HTTP ${response.status}` }
    }
    const body = await response.text()
    if (!body.trimStart().startsWith('BEGIN:VCALENDAR')) {
      return { url, ok: false, status: response.status, error: 'response is not an iCalendar document' }
    }
    return { url, ok: true, status: response.status }
  } catch (err) {
    return { url, ok: false, status: null, error: errorMessage(err) }
  }
}

export async function verifyPublished(urls: string[], options: VerifyOptions = {}): Promise<VerifyResult[]> {
  const fetcher: Fetcher = options.fetch ?? ((url) => fetch(url))
  const results: VerifyResult[] = []

  for (const url of urls) {
    const result = await verifyOne(url, fetcher)
    if (result.ok) {
      console.log(`[Verify] OK   ${url}`)
    } else {
      console.error(`[Verify] FAIL ${url}: ${result.error}`)
    }
    results.push(result)
  }

  return results
}

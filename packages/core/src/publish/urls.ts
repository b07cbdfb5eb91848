/**
 * Subscription URLs
 *
 * A file's public URL depends only on configuration and its name,
 * so it never changes between syncs.
 */

import { ConfigError } from '../errors.js'
import type { PublishConfig } from '../types.js'

type UrlConfig = Pick<PublishConfig, 'baseUrl' | 'owner' | 'repo' | 'branch' | 'pathPrefix'>

export function publicBaseUrl(config: UrlConfig): string {
  if (config.baseUrl) {
    return config.baseUrl.replace(/\/+$/, '')
  }
  if (config.owner && config.repo) {
    return `https://raw.githubusercontent.com/${config.owner}/${config.repo}/${config.branch}`
  }
  throw new ConfigError('Cannot build public URLs: set publish.baseUrl, or publish.owner and publish.repo')
}

export function subscriptionUrl(config: UrlConfig, fileName: string): string {
  const segments = [...config.pathPrefix.split('/').filter(Boolean), fileName]
  return `${publicBaseUrl(config)}/${segments.map(encodeURIComponent).join('/')}`
}

/**
 * webcal:// form, which most calendar clients open as a subscription.
 */
export function webcalUrl(url: string): string {
  return url.replace(/^https?:\/\//, 'webcal://')
}

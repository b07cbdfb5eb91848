/**
 * Publishing
 *
 * Stable-URL synchronization of generated calendars to a public git host.
 */

export type {
  GitRunner,
  ManifestEntry,
  PublishManifest,
  PublishOptions,
  PublishResult,
  FileChange,
  Publisher,
  SubscriptionEntry,
  VerifyResult,
} from './types.js'

export { GitPublisher, listCalendarFiles } from './publisher.js'
export type { GitPublisherOptions } from './publisher.js'
export { ExecGitRunner } from './git.js'
export {
  contentDigest,
  loadManifest,
  saveManifest,
  findRemovedFiles,
  emptyManifest,
  MANIFEST_FILENAME,
} from './manifest.js'
export { publicBaseUrl, subscriptionUrl, webcalUrl } from './urls.js'
export { renderSubscriptionIndex, INDEX_FILENAME } from './subscription-index.js'
export { verifyPublished } from './verify.js'
export type { Fetcher, VerifyOptions } from './verify.js'

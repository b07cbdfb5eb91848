/**
 * Error Taxonomy
 *
 * Every failure the operator can act on maps to a process exit status.
 * Nothing here is retried automatically except a rejected push.
 */

export class LegcalError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.exitCode = exitCode
  }
}

/** calendars.yaml or the session data file is invalid */
export class ConfigError extends LegcalError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, 2, options)
    this.issues = issues
  }
}

/** Calendar files could not be planned or written */
export class GenerationError extends LegcalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options)
  }
}

/** Files could not be synchronized to the public store */
export class PublishError extends LegcalError {
  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, options?.exitCode ?? 4, options)
  }
}

/**
 * A previously published file is missing from the new output.
 * Subscribers reference files by URL, so a rename breaks them silently.
 */
export class StableNameError extends PublishError {
  readonly missing: string[]

  constructor(missing: string[]) {
    super(
      `Refusing to publish: ${missing.length} previously published file(s) missing from output (${missing.join(', ')}). ` +
        'Existing subscriptions point at these names. Re-run with --allow-removals to drop them.',
      { exitCode: 5 },
    )
    this.missing = missing
  }
}

/** One or more published URLs did not resolve to a calendar */
export class VerificationError extends LegcalError {
  readonly failed: string[]

  constructor(failed: string[]) {
    super(`${failed.length} published calendar URL(s) failed verification`, 6)
    this.failed = failed
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

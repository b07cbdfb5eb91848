// Public API for use outside the CLI

export type { LegcalConfig, PublishConfig, ScheduleConfig } from './types.js'
export { loadConfig, findProjectDir, CONFIG_FILENAME } from './config.js'
export {
  LegcalError,
  ConfigError,
  GenerationError,
  PublishError,
  StableNameError,
  VerificationError,
} from './errors.js'

export * from './sessions/index.js'
export * from './calendar/index.js'
export * from './publish/index.js'
export * from './schedule/index.js'

export { parseArgs, runCommand, USAGE, COMMANDS } from './cli.js'
export type { CliArgs, CliContext, CommandName } from './cli.js'

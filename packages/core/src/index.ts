#!/usr/bin/env node
import { USAGE, parseArgs, runCommand, type CliArgs } from './cli.js'
import { LegcalError } from './errors.js'

async function main(): Promise<void> {
  let args: CliArgs
  try {
    args = parseArgs(process.argv.slice(2))
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err))
    console.error(USAGE)
    process.exit(64)
  }

  await runCommand(args)
}

main().catch((err) => {
  if (err instanceof LegcalError) {
    console.error(`Error: ${err.message}`)
    process.exit(err.exitCode)
  }
  console.error('Fatal error:', err)
  process.exit(1)
})

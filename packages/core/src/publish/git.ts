import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import type { GitRunner } from './types.js'

const execFileAsync = promisify(execFile)

/**
 * GitRunner backed by the git executable on PATH. Authentication for
 * push comes from the environment (credential helper or CI token).
 */
export class ExecGitRunner implements GitRunner {
  async run(args: string[], cwd: string): Promise<string> {
    const { stdout } = await execFileAsync('git', args, {
      cwd,
      encoding: 'utf-8',
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    })
    return stdout.trim()
  }
}

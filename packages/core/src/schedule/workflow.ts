/**
 * Scheduled Regeneration Workflow
 *
 * Renders a GitHub Actions workflow that regenerates and publishes the
 * calendars on a cron schedule. Push credentials come from the token the
 * hosting provider injects into the job.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { stringify } from 'yaml'
import type { LegcalConfig } from '../types.js'

export function renderWorkflow(config: Pick<LegcalConfig, 'schedule' | 'publish'>): string {
  const { schedule, publish } = config

  const workflow = {
    name: 'Update legislative calendars',
    on: {
      schedule: [{ cron: schedule.cron }],
      workflow_dispatch: {},
    },
    permissions: {
      contents: 'write',
    },
    jobs: {
      update: {
        'runs-on': 'ubuntu-latest',
        steps: [
          { uses: 'actions/checkout@v4', with: { ref: publish.branch } },
          { uses: 'actions/setup-node@v4', with: { 'node-version': schedule.nodeVersion } },
          { run: 'npm install' },
          {
            name: 'Configure git identity',
            run: [
              'git config user.name "github-actions[bot]"',
              'git config user.email "github-actions[bot]@users.noreply.github.com"',
            ].join('\n'),
          },
          {
            name: 'Regenerate and publish',
            run: 'npm run calendars -- run',
            env: {
              LEGCAL_PUBLISH_REMOTE: publish.remote,
              LEGCAL_PUBLISH_BRANCH: publish.branch,
            },
          },
        ],
      },
    },
  }

  return stringify(workflow, { lineWidth: 0 })
}

export async function writeWorkflow(config: Pick<LegcalConfig, 'schedule' | 'publish' | 'projectDir'>): Promise<string> {
  const target = path.resolve(config.projectDir, config.schedule.workflowPath)
  await mkdir(path.dirname(target), { recursive: true })
  await writeFile(target, renderWorkflow(config), 'utf-8')
  return target
}

/**
 * `conductor status` command
 *
 * Shows the task queue, every agent status record and the open escalation count.
 */

import type { Command } from 'commander'
import { renderStatusHuman, type StatusView } from '../formatters/status-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, withWorkspace } from '../utils/workspace.js'

export interface StatusActionOptions {
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
    },
    ({ orchestrator }) => {
      const view: StatusView = {
        queue: orchestrator.taskQueue.snapshot(),
        agents: orchestrator.monitor.snapshot(),
        openEscalations: orchestrator.escalations.getUnresolved(),
      }

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor status', view, options.version ?? '0.0.0')
      } else {
        process.stdout.write(renderStatusHuman(view) + '\n')
      }
      return EXIT_SUCCESS
    },
  )
}

export function registerStatusCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('status')
    .description('Show the task queue and agent status')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runStatusAction({
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}

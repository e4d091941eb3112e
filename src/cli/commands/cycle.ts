/**
 * `conductor cycle` command
 *
 * Runs one scheduling cycle: gate the reported completions, dispatch pending
 * work, then report blockers and stalls. Meant to be run on a schedule.
 *
 * Exit codes:
 *   0 - The queue made progress or is idle
 *   1 - System error
 *   2 - No state yet, or configuration invalid
 *   3 - Stalled: a dependency can never complete, or only escalated stories remain
 */

import type { Command } from 'commander'
import type { TaskDispatcher } from '../../modules/orchestrator/orchestrator.js'
import { renderCycleHuman } from '../formatters/cycle-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_STALLED, EXIT_SUCCESS, withWorkspace } from '../utils/workspace.js'

export interface CycleActionOptions {
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
  dispatcher?: TaskDispatcher
}

export async function runCycleAction(options: CycleActionOptions): Promise<number> {
  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
      ...(options.dispatcher !== undefined && { dispatcher: options.dispatcher }),
    },
    async ({ orchestrator }) => {
      const report = await orchestrator.runCycle()

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor cycle', report, options.version ?? '0.0.0')
      } else {
        process.stdout.write(renderCycleHuman(report) + '\n')
      }
      return report.stall === null ? EXIT_SUCCESS : EXIT_STALLED
    },
  )
}

export function registerCycleCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('cycle')
    .description('Run one scheduling cycle')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runCycleAction({
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}

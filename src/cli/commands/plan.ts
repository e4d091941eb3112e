/**
 * `conductor plan` command
 *
 * Reads a backlog file, runs the Definition of Ready on every story and
 * decomposes the ready ones into tasks. Creates the state database on first use.
 *
 * Usage:
 *   conductor plan <backlog>                         Enqueue a YAML or JSON backlog
 *   conductor plan <backlog> --sprint <id>           Record the sprint id
 *   conductor plan <backlog> --output-format json    Machine-readable report
 *
 * Exit codes:
 *   0 - Backlog processed (stories that are not ready are reported, not fatal)
 *   1 - System error
 *   2 - Backlog or configuration invalid
 */

import type { Command } from 'commander'
import { resolve } from 'path'
import { parseBacklogFile } from '../../modules/backlog/backlog-parser.js'
import type { BacklogFile } from '../../modules/backlog/schemas.js'
import type { TaskDispatcher } from '../../modules/orchestrator/orchestrator.js'
import { renderPlanHuman } from '../formatters/plan-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, reportCommandError, withWorkspace } from '../utils/workspace.js'

export interface PlanActionOptions {
  backlogPath: string
  sprintId?: string
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
  dispatcher?: TaskDispatcher
}

/**
 * Core action for the plan command. Returns the exit code.
 */
export async function runPlanAction(options: PlanActionOptions): Promise<number> {
  const { projectRoot, outputFormat, sprintId } = options

  let backlog: BacklogFile
  try {
    backlog = parseBacklogFile(resolve(projectRoot, options.backlogPath))
  } catch (err) {
    return reportCommandError(err)
  }

  return withWorkspace(
    {
      projectRoot,
      create: true,
      ...(options.env !== undefined && { env: options.env }),
      ...(options.dispatcher !== undefined && { dispatcher: options.dispatcher }),
    },
    ({ orchestrator }) => {
      const results = orchestrator.enqueueBacklog(backlog.stories, sprintId ?? backlog.sprint_id)

      if (outputFormat === 'json') {
        writeJsonOutput('conductor plan', results, options.version ?? '0.0.0')
      } else {
        process.stdout.write(renderPlanHuman(results) + '\n')
      }
      return EXIT_SUCCESS
    },
  )
}

export function registerPlanCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('plan <backlog>')
    .description('Enqueue the ready stories of a backlog file')
    .option('--sprint <id>', 'Sprint identifier to record on the queue')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (backlog: string, opts: { sprint?: string; outputFormat: string }) => {
      const exitCode = await runPlanAction({
        backlogPath: backlog,
        ...(opts.sprint !== undefined && { sprintId: opts.sprint }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
      process.exitCode = exitCode
    })
}

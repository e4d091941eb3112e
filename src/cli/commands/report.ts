/**
 * `conductor report` command
 *
 * The worker-side write: a worker records its status, and on completion the
 * deliverable document (JSON or YAML) that the next cycle gates.
 *
 * Usage:
 *   conductor report writer in_progress --task S1-2
 *   conductor report writer complete --deliverable out/S1-2.json
 *   conductor report graphics blocked
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import yaml from 'js-yaml'
import { AGENT_STATUSES, isAgentStatusValue } from '../../core/types.js'
import type { AgentStatusUpdate } from '../../modules/agent-monitor/agent-status-monitor.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, withWorkspace } from '../utils/workspace.js'

export interface ReportActionOptions {
  role: string
  status: string
  taskId?: string
  deliverablePath?: string
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
}

async function readDeliverable(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8')
  return yaml.load(raw)
}

export async function runReportAction(options: ReportActionOptions): Promise<number> {
  const { role, status } = options
  if (!isAgentStatusValue(status)) {
    process.stderr.write(
      `Error: unknown status "${status}". Expected one of: ${AGENT_STATUSES.join(', ')}\n`,
    )
    return EXIT_USAGE_ERROR
  }

  const update: AgentStatusUpdate = {}
  if (options.taskId !== undefined) update.currentTaskId = options.taskId
  if (options.deliverablePath !== undefined) {
    const path = resolve(options.projectRoot, options.deliverablePath)
    try {
      update.deliverable = await readDeliverable(path)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      process.stderr.write(`Error: cannot read deliverable ${path}: ${message}\n`)
      return EXIT_USAGE_ERROR
    }
  }

  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
    },
    ({ orchestrator }) => {
      const record = orchestrator.monitor.updateAgentStatus(role, status, update)

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor report', record, options.version ?? '0.0.0')
      } else {
        const task = record.current_task_id !== null ? ` (${record.current_task_id})` : ''
        process.stdout.write(`Recorded ${record.agent_role}: ${record.status}${task}\n`)
      }
      return EXIT_SUCCESS
    },
  )
}

export function registerReportCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('report <role> <status>')
    .description('Record a worker status (idle, in_progress, complete, blocked)')
    .option('--task <taskId>', 'Task the worker is on')
    .option('--deliverable <file>', 'Deliverable document (JSON or YAML)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        role: string,
        status: string,
        opts: { task?: string; deliverable?: string; outputFormat: string },
      ) => {
        process.exitCode = await runReportAction({
          role,
          status,
          ...(opts.task !== undefined && { taskId: opts.task }),
          ...(opts.deliverable !== undefined && { deliverablePath: opts.deliverable }),
          outputFormat: parseOutputFormat(opts.outputFormat),
          projectRoot,
          version,
        })
      },
    )
}

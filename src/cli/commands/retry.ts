/**
 * `conductor retry` command
 *
 * Requeues a failed task: a fresh copy with the next attempt number takes its
 * place in the dependency graph. This is the deliberate, operator-driven retry.
 *
 * Exit codes:
 *   0 - Task requeued
 *   1 - System error
 *   2 - Unknown task, or the task has not failed
 */

import type { Command } from 'commander'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, withWorkspace } from '../utils/workspace.js'

export interface RetryActionOptions {
  taskId: string
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
}

export async function runRetryAction(options: RetryActionOptions): Promise<number> {
  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
    },
    ({ orchestrator }) => {
      const task = orchestrator.taskQueue.requeue(options.taskId)

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor retry', task, options.version ?? '0.0.0')
      } else {
        process.stdout.write(
          `Requeued ${options.taskId} as ${task.task_id} (attempt ${String(task.attempt)}, ${task.status})\n`,
        )
      }
      return EXIT_SUCCESS
    },
  )
}

export function registerRetryCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('retry <taskId>')
    .description('Requeue a failed task')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (taskId: string, opts: { outputFormat: string }) => {
      process.exitCode = await runRetryAction({
        taskId,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}

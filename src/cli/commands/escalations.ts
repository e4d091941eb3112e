/**
 * `conductor escalations` command group
 *
 * Subcommands:
 *   - `conductor escalations list [--all]`                   open (or all) escalations
 *   - `conductor escalations resolve <id> <resolution...>`   record the decision
 *
 * `resolve --approve` completes the escalated task and routes its story onwards;
 * `resolve --reject` fails it and applies the rejection policy.
 */

import type { Command } from 'commander'
import type { EscalationVerdict } from '../../modules/orchestrator/orchestrator.js'
import { renderEscalationsHuman } from '../formatters/status-formatter.js'
import { parseOutputFormat, writeJsonOutput, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, withWorkspace } from '../utils/workspace.js'

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export interface EscalationsListOptions {
  all: boolean
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
}

export async function runEscalationsListAction(options: EscalationsListOptions): Promise<number> {
  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
    },
    ({ orchestrator }) => {
      const escalations = options.all
        ? orchestrator.escalations.list()
        : orchestrator.escalations.getUnresolved()

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor escalations list', escalations, options.version ?? '0.0.0')
      } else {
        process.stdout.write(renderEscalationsHuman(escalations, options.all) + '\n')
      }
      return EXIT_SUCCESS
    },
  )
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

export interface EscalationsResolveOptions {
  escalationId: string
  resolution: string
  approve: boolean
  reject: boolean
  outputFormat: OutputFormat
  projectRoot: string
  version?: string
  env?: Readonly<Record<string, string | undefined>>
}

export async function runEscalationsResolveAction(
  options: EscalationsResolveOptions,
): Promise<number> {
  if (options.approve && options.reject) {
    process.stderr.write('Error: choose at most one of --approve and --reject\n')
    return EXIT_USAGE_ERROR
  }
  if (options.resolution.trim() === '') {
    process.stderr.write('Error: a resolution text is required\n')
    return EXIT_USAGE_ERROR
  }

  let verdict: EscalationVerdict | undefined
  if (options.approve) verdict = 'approve'
  if (options.reject) verdict = 'reject'

  return withWorkspace(
    {
      projectRoot: options.projectRoot,
      ...(options.env !== undefined && { env: options.env }),
    },
    ({ orchestrator }) => {
      const result = orchestrator.resolveEscalation(options.escalationId, options.resolution, verdict)

      if (options.outputFormat === 'json') {
        writeJsonOutput('conductor escalations resolve', result, options.version ?? '0.0.0')
        return EXIT_SUCCESS
      }

      const lines = [`Resolved ${result.escalation.escalation_id}: ${options.resolution}`]
      if (result.verdict !== null && result.taskId !== null) {
        lines.push(`Task ${result.taskId}: ${result.verdict === 'approve' ? 'approved' : 'rejected'}`)
      }
      if (result.followOnTaskId !== null) lines.push(`Created ${result.followOnTaskId}`)
      if (result.requeuedTaskId !== null) lines.push(`Requeued as ${result.requeuedTaskId}`)
      process.stdout.write(lines.join('\n') + '\n')
      return EXIT_SUCCESS
    },
  )
}

export function registerEscalationsCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  const escalationsCmd = program
    .command('escalations')
    .description('List and resolve questions raised for human review')

  escalationsCmd
    .command('list')
    .description('List open escalations')
    .option('--all', 'Include resolved escalations', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { all: boolean; outputFormat: string }) => {
      process.exitCode = await runEscalationsListAction({
        all: opts.all,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  escalationsCmd
    .command('resolve <id> <resolution...>')
    .description('Resolve an escalation')
    .option('--approve', 'Complete the escalated task and route it onwards', false)
    .option('--reject', 'Fail the escalated task', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        id: string,
        resolution: string[],
        opts: { approve: boolean; reject: boolean; outputFormat: string },
      ) => {
        process.exitCode = await runEscalationsResolveAction({
          escalationId: id,
          resolution: resolution.join(' '),
          approve: opts.approve,
          reject: opts.reject,
          outputFormat: parseOutputFormat(opts.outputFormat),
          projectRoot,
          version,
        })
      },
    )
}

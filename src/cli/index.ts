#!/usr/bin/env node
/**
 * Conductor CLI - Main entry point
 * Provides the `conductor` command-line interface
 */

import { Command } from 'commander'
import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerPlanCommand } from './commands/plan.js'
import { registerCycleCommand } from './commands/cycle.js'
import { registerStatusCommand } from './commands/status.js'
import { registerEscalationsCommand } from './commands/escalations.js'
import { registerReportCommand } from './commands/report.js'
import { registerRetryCommand } from './commands/retry.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'sprint-conductor' && pkg.version !== undefined) {
        return pkg.version
      }
    } catch (err) {
      logger.trace({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('conductor')
    .description('Conductor - sprint orchestration for a content pipeline')
    .version(version, '-v, --version', 'Output the current version')

  registerPlanCommand(program, version, projectRoot)
  registerCycleCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerEscalationsCommand(program, version, projectRoot)
  registerReportCommand(program, version, projectRoot)
  registerRetryCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1]
  if (invoked === undefined) return false
  try {
    return realpathSync(invoked) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  void main()
}

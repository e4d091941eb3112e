/**
 * `conductor config` command group
 *
 * Subcommands:
 *   - `conductor config show`         display the merged configuration
 *   - `conductor config get <key>`    print one value by dot-notation key
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { join } from 'path'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { DEFAULT_STATE_DIR } from '../../modules/config/defaults.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigCommandOptions {
  projectRoot: string
  env?: Readonly<Record<string, string | undefined>>
}

/** Load configuration or report the failure; returns an exit code on failure */
async function loadSystem(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    projectConfigDir: join(opts.projectRoot, DEFAULT_STATE_DIR),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
  return system
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const config = system.getConfig()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write(yaml.dump(config))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: unknown configuration key "${key}"\n`)
    return CONFIG_EXIT_INVALID
  }
  process.stdout.write(
    (typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value)) + '\n',
  )
  return CONFIG_EXIT_SUCCESS
}

export function registerConfigCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  const configCmd = program
    .command('config')
    .description('View the merged configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }) => {
      process.exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        projectRoot,
      })
    })

  configCmd
    .command('get <key>')
    .description('Print one value by dot-notation key (e.g. orchestrator.rejection_policy)')
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key, { projectRoot })
    })
}

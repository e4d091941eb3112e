/**
 * Workspace: everything a CLI command needs, opened from configuration.
 *
 * Loads the layered configuration, applies its log level, opens
 * `<state_dir>/state.db` and builds the orchestrator over it. Services are
 * started through a ServiceRegistry so `close()` shuts them down in reverse.
 */

import { existsSync } from 'fs'
import { mkdir } from 'fs/promises'
import { join, resolve } from 'path'
import { ConductorError } from '../../core/errors.js'
import { ServiceRegistry } from '../../core/di.js'
import { createDatabaseService } from '../../persistence/database.js'
import type { ConductorConfig, PartialConductorConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { DEFAULT_STATE_DIR } from '../../modules/config/defaults.js'
import { FileDispatcher } from '../../modules/orchestrator/file-dispatcher.js'
import { createOrchestrator } from '../../modules/orchestrator/orchestrator-impl.js'
import type { Orchestrator, TaskDispatcher } from '../../modules/orchestrator/orchestrator.js'
import { createPipeline } from '../../modules/pipeline/pipeline-definition.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli:workspace')

// ---------------------------------------------------------------------------
// Exit codes shared by every command
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2
/** `cycle` only: the queue cannot progress without outside action */
export const EXIT_STALLED = 3

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorkspaceOptions {
  projectRoot: string
  /** Create the state directory and database when missing */
  create?: boolean
  env?: Readonly<Record<string, string | undefined>>
  cliOverrides?: PartialConductorConfig
  /** Replaces the inbox file dispatcher */
  dispatcher?: TaskDispatcher
}

export interface Workspace {
  config: ConductorConfig
  stateDir: string
  inboxDir: string
  orchestrator: Orchestrator
  close(): Promise<void>
}

/** Raised when a command needs state that `plan` has not created yet */
export class MissingStateError extends ConductorError {
  constructor(dbPath: string) {
    super(
      `No conductor state found at ${dbPath}. Run 'conductor plan <backlog>' first.`,
      'MISSING_STATE',
      { dbPath },
    )
    this.name = 'MissingStateError'
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function resolveStateDir(projectRoot: string, config: ConductorConfig): string {
  return resolve(projectRoot, config.global.state_dir)
}

export function stateDbPath(stateDir: string): string {
  return join(stateDir, 'state.db')
}

export function inboxDir(stateDir: string): string {
  return join(stateDir, 'inbox')
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export async function loadConfig(options: WorkspaceOptions): Promise<ConductorConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(options.projectRoot, DEFAULT_STATE_DIR),
    ...(options.env !== undefined && { env: options.env }),
    ...(options.cliOverrides !== undefined && { cliOverrides: options.cliOverrides }),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

/**
 * Open the workspace for a command.
 *
 * @throws {ConfigError} for invalid configuration
 * @throws {MissingStateError} when the database is absent and `create` is not set
 */
export async function openWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  const config = await loadConfig(options)
  const stateDir = resolveStateDir(options.projectRoot, config)
  const dbPath = stateDbPath(stateDir)

  if (!existsSync(dbPath)) {
    if (options.create !== true) {
      throw new MissingStateError(dbPath)
    }
    await mkdir(stateDir, { recursive: true })
  }

  const registry = new ServiceRegistry()
  let orchestrator: Orchestrator
  try {
    const database = await registry.start('database', createDatabaseService(dbPath))
    orchestrator = await registry.start(
      'orchestrator',
      createOrchestrator({
        db: database.db,
        pipeline: createPipeline(config.pipeline.phases),
        dispatcher: options.dispatcher ?? new FileDispatcher(inboxDir(stateDir)),
        settings: config.orchestrator,
      }),
    )
  } catch (err) {
    await registry.shutdownAll()
    throw err
  }

  logger.debug({ stateDir, services: registry.serviceNames }, 'Workspace opened')

  return {
    config,
    stateDir,
    inboxDir: inboxDir(stateDir),
    orchestrator,
    close: () => registry.shutdownAll(),
  }
}

// ---------------------------------------------------------------------------
// Command plumbing
// ---------------------------------------------------------------------------

/**
 * Map an error to an exit code and report it on stderr. Conductor errors are
 * refusals of the request (exit 2); anything else is a system error (exit 1).
 */
export function reportCommandError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${message}\n`)
  if (err instanceof ConductorError) {
    logger.debug({ code: err.code, context: err.context }, 'Command refused')
    return EXIT_USAGE_ERROR
  }
  logger.error({ err }, 'Command failed')
  return EXIT_ERROR
}

/**
 * Open the workspace, run `action` and always close it again.
 * Errors from either step become exit codes via reportCommandError.
 */
export async function withWorkspace(
  options: WorkspaceOptions,
  action: (workspace: Workspace) => Promise<number> | number,
): Promise<number> {
  let workspace: Workspace
  try {
    workspace = await openWorkspace(options)
  } catch (err) {
    return reportCommandError(err)
  }

  try {
    return await action(workspace)
  } catch (err) {
    return reportCommandError(err)
  } finally {
    await workspace.close()
  }
}

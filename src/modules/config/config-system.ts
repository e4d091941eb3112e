/**
 * Layered configuration for the conductor.
 *
 * Layers, later ones winning: built-in defaults, `<state_dir>/config.yaml`,
 * CONDUCTOR_* environment variables, CLI flag overrides. The merged result
 * is validated once by `load()`.
 */

import type { ConductorConfig, PartialConductorConfig } from './config-schema.js'

/** A layer that contributed values to the loaded configuration */
export type ConfigSource = 'defaults' | 'project' | 'env' | 'cli'

export interface ConfigSystemOptions {
  /** Directory holding config.yaml; `<cwd>/.conductor` when omitted */
  projectConfigDir?: string
  env?: Readonly<Record<string, string | undefined>>
  cliOverrides?: PartialConductorConfig
}

export interface ConfigSystem {
  /** @throws {ConfigError} for an unreadable file or a config that fails validation */
  load(): Promise<void>

  /** @throws {ConfigError} before `load()` */
  getConfig(): ConductorConfig

  /** Dot-path lookup such as `orchestrator.max_attempts`; undefined for unknown keys */
  get(key: string): unknown

  /** Layers that were present at the last `load()`, in merge order */
  readonly sources: readonly ConfigSource[]

  readonly isLoaded: boolean
}

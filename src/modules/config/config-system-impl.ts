/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (./.conductor/config.yaml)
 *     → environment vars    (CONDUCTOR_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import {
  ConductorConfigSchema,
  PartialConductorConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type ConductorConfig,
  type PartialConductorConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG, DEFAULT_STATE_DIR } from './defaults.js'
import type { ConfigSource, ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Merge `override` into `base`. Nested objects merge key by key; arrays and
 * scalars replace; undefined values are skipped.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of CONDUCTOR_ environment variable names to config paths.
 * `CONDUCTOR_PHASES` takes a comma-separated list.
 */
const ENV_VAR_MAP: Record<string, string> = {
  CONDUCTOR_LOG_LEVEL: 'global.log_level',
  CONDUCTOR_STATE_DIR: 'global.state_dir',
  CONDUCTOR_PHASES: 'pipeline.phases',
  CONDUCTOR_MAX_DISPATCH_PER_CYCLE: 'orchestrator.max_dispatch_per_cycle',
  CONDUCTOR_ESCALATE_DOR_GAPS: 'orchestrator.escalate_dor_gaps',
  CONDUCTOR_REJECTION_POLICY: 'orchestrator.rejection_policy',
  CONDUCTOR_MAX_REQUEUES: 'orchestrator.max_requeues',
}

const LIST_PATHS = new Set(['pipeline.phases'])

function coerceEnvValue(configPath: string, rawValue: string): unknown {
  if (LIST_PATHS.has(configPath)) {
    return rawValue
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  }
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
function readEnvOverrides(env: Readonly<Record<string, string | undefined>>): PartialConductorConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = deepMerge(overrides, setByPath({}, configPath, coerceEnvValue(configPath, rawValue)))
  }

  const parsed = PartialConductorConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: ConductorConfig | null = null
  private _sources: ConfigSource[] = []
  private readonly _projectConfigDir: string
  private readonly _env: Readonly<Record<string, string | undefined>>
  private readonly _cliOverrides: PartialConductorConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), DEFAULT_STATE_DIR)
    this._env = options.env ?? process.env
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get sources(): readonly ConfigSource[] {
    return this._sources
  }

  async load(): Promise<void> {
    const layers: [ConfigSource, PartialConductorConfig | null][] = [
      ['project', await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))],
      ['env', readEnvOverrides(this._env)],
      ['cli', this._cliOverrides],
    ]

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    const sources: ConfigSource[] = ['defaults']
    for (const [source, layer] of layers) {
      // A present but empty config.yaml still counts as the project layer
      if (layer === null || (source !== 'project' && Object.keys(layer).length === 0)) continue
      merged = deepMerge(merged, layer)
      sources.push(source)
    }

    const result = ConductorConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    this._sources = sources
    logger.debug({ sources }, 'Configuration loaded')
  }

  getConfig(): ConductorConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialConductorConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const version = getByPath(parsed, 'config_format_version')
    if (version !== undefined && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))) {
      throw new ConfigError(
        `Config file at ${filePath} has format version ${String(version)}; ` +
          `supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
        { filePath, version },
      )
    }

    const result = PartialConductorConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ projectConfigDir: '.conductor' })
 * await config.load()
 * const { orchestrator } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem, deepMerge } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `conductor-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.conductor')
  await mkdir(projectConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createSystem(overrides: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeProjectConfig(content: string): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns the built-in defaults when no config file exists', async () => {
    const system = createSystem()
    await system.load()

    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
    expect(system.getConfig().pipeline.phases).toEqual(['research', 'writing', 'editing'])
    expect(system.getConfig().orchestrator.rejection_policy).toBe('fail')
  })

  it('throws ConfigError if getConfig is called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeProjectConfig('')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
    expect(system.sources).toEqual(['defaults', 'project'])
  })
})

describe('ConfigSystem - sources', () => {
  it('lists only the defaults when nothing else is present', async () => {
    const system = createSystem()
    expect(system.sources).toEqual([])
    await system.load()
    expect(system.sources).toEqual(['defaults'])
  })

  it('lists every contributing layer in merge order', async () => {
    await writeProjectConfig('orchestrator:\n  max_requeues: 3\n')
    const system = createSystem({
      env: { CONDUCTOR_LOG_LEVEL: 'debug' },
      cliOverrides: { orchestrator: { rejection_policy: 'requeue' } },
    })
    await system.load()
    expect(system.sources).toEqual(['defaults', 'project', 'env', 'cli'])
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('project config overrides defaults and keeps the rest', async () => {
    await writeProjectConfig('orchestrator:\n  max_dispatch_per_cycle: 2\n')

    const system = createSystem()
    await system.load()
    const config = system.getConfig()

    expect(config.orchestrator.max_dispatch_per_cycle).toBe(2)
    expect(config.orchestrator.escalate_dor_gaps).toBe(true)
    expect(config.global.state_dir).toBe('.conductor')
  })

  it('replaces the phase list instead of merging it', async () => {
    await writeProjectConfig('pipeline:\n  phases: [research, writing, editing, graphics, final-review]\n')

    const system = createSystem()
    await system.load()

    expect(system.getConfig().pipeline.phases).toEqual([
      'research',
      'writing',
      'editing',
      'graphics',
      'final-review',
    ])
  })

  it('env vars override project config', async () => {
    await writeProjectConfig('global:\n  log_level: info\n')

    const system = createSystem({
      env: {
        CONDUCTOR_LOG_LEVEL: 'error',
        CONDUCTOR_ESCALATE_DOR_GAPS: 'false',
        CONDUCTOR_MAX_REQUEUES: '4',
        CONDUCTOR_PHASES: 'writing, editing',
      },
    })
    await system.load()
    const config = system.getConfig()

    expect(config.global.log_level).toBe('error')
    expect(config.orchestrator.escalate_dor_gaps).toBe(false)
    expect(config.orchestrator.max_requeues).toBe(4)
    expect(config.pipeline.phases).toEqual(['writing', 'editing'])
  })

  it('ignores invalid env overrides', async () => {
    const system = createSystem({ env: { CONDUCTOR_REJECTION_POLICY: 'shrug' } })
    await system.load()
    expect(system.getConfig().orchestrator.rejection_policy).toBe('fail')
  })

  it('CLI overrides take highest priority', async () => {
    await writeProjectConfig('global:\n  log_level: warn\n')

    const system = createSystem({
      env: { CONDUCTOR_LOG_LEVEL: 'error' },
      cliOverrides: { global: { log_level: 'trace' } },
    })
    await system.load()

    expect(system.getConfig().global.log_level).toBe('trace')
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('throws ConfigError for an invalid value in the project config', async () => {
    await writeProjectConfig('orchestrator:\n  rejection_policy: retry-forever\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for an unknown key', async () => {
    await writeProjectConfig('workers:\n  research: {}\n')
    await expect(createSystem().load()).rejects.toThrow(/Invalid config file/)
  })

  it('throws ConfigError for an unknown phase', async () => {
    await writeProjectConfig('pipeline:\n  phases: [research, translation]\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for an unsupported format version', async () => {
    await writeProjectConfig('config_format_version: "7"\n')
    await expect(createSystem().load()).rejects.toThrow(/format version 7/)
  })

  it('throws ConfigError for malformed YAML', async () => {
    await writeProjectConfig('global: [unclosed\n')
    await expect(createSystem().load()).rejects.toThrow(/Failed to read config file/)
  })
})

// ---------------------------------------------------------------------------
// get()
// ---------------------------------------------------------------------------

describe('ConfigSystem - get', () => {
  it('reads values by dot-notation key', async () => {
    const system = createSystem()
    await system.load()

    expect(system.get('orchestrator.max_dispatch_per_cycle')).toBe(5)
    expect(system.get('global')).toEqual({ log_level: 'warn', state_dir: '.conductor' })
  })

  it('returns undefined for unknown keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('global.nope')).toBeUndefined()
    expect(system.get('global.log_level.deeper')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// deepMerge
// ---------------------------------------------------------------------------

describe('deepMerge', () => {
  it('merges nested objects, replaces arrays and skips undefined', () => {
    const merged = deepMerge(
      { a: { x: 1, y: 2 }, list: [1, 2], keep: 'yes' },
      { a: { y: 3 }, list: [9], keep: undefined },
    )
    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: 'yes' })
  })
})

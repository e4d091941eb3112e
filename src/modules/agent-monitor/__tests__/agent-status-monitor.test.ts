/**
 * Unit tests for AgentStatusMonitorImpl.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { NotFoundError } from '../../../core/errors.js'
import { openMemoryDatabase } from '../../../persistence/database.js'
import { createPipeline } from '../../pipeline/pipeline-definition.js'
import { AgentStatusMonitorImpl } from '../agent-status-monitor-impl.js'

let db: BetterSqlite3Database
let clock: Date
let monitor: AgentStatusMonitorImpl

beforeEach(() => {
  db = openMemoryDatabase()
  clock = new Date('2026-03-02T10:00:00.000Z')
  monitor = new AgentStatusMonitorImpl(db, createPipeline(), { now: () => clock })
})

describe('ensureAgents', () => {
  it('seeds an idle record for every role once', () => {
    expect(monitor.ensureAgents()).toEqual(['research', 'writer', 'editor', 'graphics', 'final-review'])
    expect(monitor.ensureAgents()).toEqual([])

    const agents = monitor.listAgents()
    expect(agents).toHaveLength(5)
    expect(agents.every((a) => a.status === 'idle' && a.current_task_id === null)).toBe(true)
  })
})

describe('pollStatusUpdates', () => {
  beforeEach(() => {
    monitor.ensureAgents()
  })

  it('reports a completion exactly once', () => {
    monitor.updateAgentStatus('writer', 'complete', {
      currentTaskId: 'S1-2',
      deliverable: { output: { path: 'drafts/s1.md' } },
    })

    const first = monitor.pollStatusUpdates()
    const second = monitor.pollStatusUpdates()

    expect(first).toHaveLength(1)
    expect(first[0]?.agent_role).toBe('writer')
    expect(first[0]?.current_task_id).toBe('S1-2')
    expect(first[0]?.deliverable).toEqual({ output: { path: 'drafts/s1.md' } })
    expect(second).toEqual([])
    expect(monitor.getAgent('writer')?.processed).toBe(true)
  })

  it('reports the same role again after a new completion', () => {
    monitor.updateAgentStatus('research', 'complete', { currentTaskId: 'S1-1' })
    monitor.pollStatusUpdates()

    monitor.updateAgentStatus('research', 'complete', { currentTaskId: 'S2-1' })
    const next = monitor.pollStatusUpdates()

    expect(next.map((r) => r.current_task_id)).toEqual(['S2-1'])
  })

  it('ignores records that are not complete', () => {
    monitor.updateAgentStatus('editor', 'in_progress', { currentTaskId: 'S1-3' })
    expect(monitor.pollStatusUpdates()).toEqual([])
  })

  it('stamps the poll time', () => {
    monitor.pollStatusUpdates()
    expect(monitor.snapshot().last_poll).toBe('2026-03-02T10:00:00.000Z')
  })

  it('does not let a second monitor on the same database re-report a claim', () => {
    const other = new AgentStatusMonitorImpl(db, createPipeline(), { now: () => clock })
    monitor.updateAgentStatus('graphics', 'complete', { currentTaskId: 'S1-4' })

    expect(monitor.pollStatusUpdates()).toHaveLength(1)
    expect(other.pollStatusUpdates()).toEqual([])
  })
})

describe('determineNextAgent', () => {
  it('follows the routing table', () => {
    expect(monitor.determineNextAgent('research')).toBe('writer')
    expect(monitor.determineNextAgent('editor')).toBe('graphics')
  })

  it('returns null for the terminal role', () => {
    expect(monitor.determineNextAgent('final-review')).toBeNull()
  })

  it('throws NotFoundError for an unknown role', () => {
    expect(() => monitor.determineNextAgent('translator')).toThrow(NotFoundError)
  })
})

describe('detectBlockers', () => {
  it('lists blocked records without modifying them', () => {
    monitor.ensureAgents()
    monitor.updateAgentStatus('graphics', 'blocked', { currentTaskId: 'S1-4' })

    const before = monitor.snapshot()
    const blockers = monitor.detectBlockers()

    expect(blockers.map((b) => b.agent_role)).toEqual(['graphics'])
    expect(monitor.snapshot()).toEqual(before)
  })
})

describe('updateAgentStatus', () => {
  it('throws NotFoundError for an unknown role', () => {
    expect(() => monitor.updateAgentStatus('translator', 'idle')).toThrow(NotFoundError)
  })

  it('keeps stored fields that the update leaves out', () => {
    monitor.updateAgentStatus('writer', 'in_progress', { currentTaskId: 'S1-2' })
    clock = new Date('2026-03-02T10:05:00.000Z')
    const record = monitor.updateAgentStatus('writer', 'complete', { deliverable: { ok: true } })

    expect(record.current_task_id).toBe('S1-2')
    expect(record.deliverable).toEqual({ ok: true })
    expect(record.updated_at).toBe('2026-03-02T10:05:00.000Z')
  })
})

describe('isAvailable', () => {
  beforeEach(() => {
    monitor.ensureAgents()
  })

  it('is true for idle roles and false while a task runs', () => {
    expect(monitor.isAvailable('editor')).toBe(true)
    monitor.recordDispatch('editor', 'S1-3')
    expect(monitor.isAvailable('editor')).toBe(false)
    expect(monitor.getAgent('editor')?.current_task_id).toBe('S1-3')
  })

  it('becomes true again only once the completion has been polled', () => {
    monitor.updateAgentStatus('editor', 'complete', { currentTaskId: 'S1-3' })
    expect(monitor.isAvailable('editor')).toBe(false)
    monitor.pollStatusUpdates()
    expect(monitor.isAvailable('editor')).toBe(true)
  })

  it('is false for a blocked role', () => {
    monitor.updateAgentStatus('graphics', 'blocked')
    expect(monitor.isAvailable('graphics')).toBe(false)
  })
})

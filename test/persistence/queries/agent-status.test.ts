/**
 * Tests for the agent status query functions.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openMemoryDatabase } from '../../../src/persistence/database.js'
import {
  claimCompletion,
  getAgentStatus,
  getAgentStatusesByStatus,
  getAllAgentStatuses,
  getLastPoll,
  insertAgentIfMissing,
  setLastPoll,
  upsertAgentStatus,
} from '../../../src/persistence/queries/agent-status.js'

const AT = '2026-03-02T09:00:00.000Z'

let db: BetterSqlite3Database

beforeEach(() => {
  db = openMemoryDatabase()
})

describe('insertAgentIfMissing', () => {
  it('creates an idle record once', () => {
    expect(insertAgentIfMissing(db, 'writer', AT)).toBe(true)
    expect(insertAgentIfMissing(db, 'writer', AT)).toBe(false)

    expect(getAgentStatus(db, 'writer')).toEqual({
      agent_role: 'writer',
      status: 'idle',
      current_task_id: null,
      processed: false,
      deliverable: null,
      updated_at: AT,
    })
  })
})

describe('upsertAgentStatus', () => {
  it('round-trips the deliverable document', () => {
    const deliverable = { output: { path: 'drafts/a.md' }, self_validation: { passed: true } }
    upsertAgentStatus(db, {
      agent_role: 'editor',
      status: 'complete',
      current_task_id: 'S1-3',
      processed: false,
      deliverable,
      updated_at: AT,
    })

    expect(getAgentStatus(db, 'editor')?.deliverable).toEqual(deliverable)
    expect(getAgentStatusesByStatus(db, 'complete').map((a) => a.agent_role)).toEqual(['editor'])
  })

  it('overwrites an existing record', () => {
    insertAgentIfMissing(db, 'research', AT)
    upsertAgentStatus(db, {
      agent_role: 'research',
      status: 'blocked',
      current_task_id: 'S1-1',
      processed: false,
      deliverable: null,
      updated_at: '2026-03-02T09:10:00.000Z',
    })

    expect(getAllAgentStatuses(db)).toHaveLength(1)
    expect(getAgentStatus(db, 'research')?.status).toBe('blocked')
  })
})

describe('claimCompletion', () => {
  it('succeeds once per completion', () => {
    upsertAgentStatus(db, {
      agent_role: 'writer',
      status: 'complete',
      current_task_id: 'S1-2',
      processed: false,
      deliverable: null,
      updated_at: AT,
    })

    expect(claimCompletion(db, 'writer')).toBe(true)
    expect(claimCompletion(db, 'writer')).toBe(false)
    expect(getAgentStatus(db, 'writer')?.processed).toBe(true)
  })

  it('ignores records that are not complete', () => {
    insertAgentIfMissing(db, 'graphics', AT)

    expect(claimCompletion(db, 'graphics')).toBe(false)
  })
})

describe('last poll', () => {
  it('is null until set', () => {
    expect(getLastPoll(db)).toBeNull()
    setLastPoll(db, AT)
    setLastPoll(db, '2026-03-02T09:05:00.000Z')
    expect(getLastPoll(db)).toBe('2026-03-02T09:05:00.000Z')
  })
})

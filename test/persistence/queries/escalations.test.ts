/**
 * Tests for the escalation and story query functions.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openMemoryDatabase } from '../../../src/persistence/database.js'
import {
  countUnresolvedForStory,
  getAllEscalations,
  getEscalation,
  getUnresolvedEscalations,
  insertEscalation,
  markEscalationResolved,
  type CreateEscalationInput,
} from '../../../src/persistence/queries/escalations.js'
import { getStory, insertStory } from '../../../src/persistence/queries/stories.js'

function escalation(storyId: string): CreateEscalationInput {
  return {
    story_id: storyId,
    type: 'gate_review',
    question: 'Approve the draft?',
    context: { task_id: `${storyId}-2`, issues: ['Missing output'] },
    recommendation: null,
    raised_by: 'conductor',
    created_at: '2026-03-02T09:00:00.000Z',
  }
}

let db: BetterSqlite3Database

beforeEach(() => {
  db = openMemoryDatabase()
})

describe('escalations', () => {
  it('issues sequential ids', () => {
    expect(insertEscalation(db, escalation('S1'))).toBe('ESC-1')
    expect(insertEscalation(db, escalation('S2'))).toBe('ESC-2')
    expect(getAllEscalations(db).map((e) => e.escalation_id)).toEqual(['ESC-1', 'ESC-2'])
  })

  it('round-trips the context document', () => {
    insertEscalation(db, escalation('S1'))

    expect(getEscalation(db, 'ESC-1')?.context).toEqual({ task_id: 'S1-2', issues: ['Missing output'] })
  })

  it('resolves an escalation once', () => {
    insertEscalation(db, escalation('S1'))

    expect(markEscalationResolved(db, 'ESC-1', 'Approved', '2026-03-02T10:00:00.000Z')).toBe(true)
    expect(markEscalationResolved(db, 'ESC-1', 'Again', '2026-03-02T11:00:00.000Z')).toBe(false)
    expect(getEscalation(db, 'ESC-1')).toMatchObject({
      resolved: true,
      resolution: 'Approved',
      resolved_at: '2026-03-02T10:00:00.000Z',
    })
  })

  it('counts and lists only unresolved escalations', () => {
    insertEscalation(db, escalation('S1'))
    insertEscalation(db, escalation('S1'))
    insertEscalation(db, escalation('S2'))
    markEscalationResolved(db, 'ESC-1', 'Done', '2026-03-02T10:00:00.000Z')

    expect(countUnresolvedForStory(db, 'S1')).toBe(1)
    expect(countUnresolvedForStory(db, 'S3')).toBe(0)
    expect(getUnresolvedEscalations(db).map((e) => e.escalation_id)).toEqual(['ESC-2', 'ESC-3'])
  })

  it('wraps a non-object context', () => {
    insertEscalation(db, { ...escalation('S1'), context: { value: 'raw' } })
    db.prepare("UPDATE escalations SET context = '[1,2]' WHERE escalation_id = 'ESC-1'").run()

    expect(getEscalation(db, 'ESC-1')?.context).toEqual({ value: [1, 2] })
  })
})

describe('stories', () => {
  it('keeps the backlog entry verbatim', () => {
    const document = { story_id: 'S1', priority: 'P1', audience: 'beginners' }
    insertStory(db, 'S1', document, '2026-03-02T09:00:00.000Z')

    expect(getStory(db, 'S1')).toEqual({
      story_id: 'S1',
      document,
      enqueued_at: '2026-03-02T09:00:00.000Z',
    })
    expect(getStory(db, 'S2')).toBeUndefined()
  })
})

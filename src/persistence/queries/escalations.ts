/**
 * Escalation log query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { EscalationId, StoryId } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Escalation {
  escalation_id: EscalationId
  story_id: StoryId
  type: string
  question: string
  context: Record<string, unknown>
  recommendation: string | null
  raised_by: string
  resolved: boolean
  created_at: string
  resolved_at: string | null
  resolution: string | null
}

export type CreateEscalationInput = Omit<
  Escalation,
  'escalation_id' | 'resolved' | 'resolved_at' | 'resolution'
>

interface EscalationRow {
  seq: number
  escalation_id: string
  story_id: string
  type: string
  question: string
  context: string
  recommendation: string | null
  raised_by: string
  resolved: number
  created_at: string
  resolved_at: string | null
  resolution: string | null
}

function parseContext(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw)
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { value: parsed }
  }
  return { ...parsed }
}

function toEscalation(row: EscalationRow): Escalation {
  return {
    escalation_id: row.escalation_id,
    story_id: row.story_id,
    type: row.type,
    question: row.question,
    context: parseContext(row.context),
    recommendation: row.recommendation,
    raised_by: row.raised_by,
    resolved: row.resolved === 1,
    created_at: row.created_at,
    resolved_at: row.resolved_at,
    resolution: row.resolution,
  }
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Append an unresolved escalation and return its `ESC-N` id.
 * N is one past the highest sequence ever issued, so ids are never reused.
 * Callers run this inside a transaction.
 */
export function insertEscalation(
  db: BetterSqlite3Database,
  input: CreateEscalationInput,
): EscalationId {
  const next = db.prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM escalations').get() as {
    next: number
  }
  const escalationId = `ESC-${String(next.next)}`

  db.prepare(`
    INSERT INTO escalations (
      seq, escalation_id, story_id, type, question, context, recommendation, raised_by, resolved, created_at
    ) VALUES (
      @seq, @escalation_id, @story_id, @type, @question, @context, @recommendation, @raised_by, 0, @created_at
    )
  `).run({
    seq: next.next,
    escalation_id: escalationId,
    story_id: input.story_id,
    type: input.type,
    question: input.question,
    context: JSON.stringify(input.context),
    recommendation: input.recommendation,
    raised_by: input.raised_by,
    created_at: input.created_at,
  })

  return escalationId
}

export function getEscalation(
  db: BetterSqlite3Database,
  escalationId: EscalationId,
): Escalation | undefined {
  const row = db.prepare('SELECT * FROM escalations WHERE escalation_id = ?').get(escalationId) as
    | EscalationRow
    | undefined
  return row === undefined ? undefined : toEscalation(row)
}

export function getAllEscalations(db: BetterSqlite3Database): Escalation[] {
  const rows = db.prepare('SELECT * FROM escalations ORDER BY seq ASC').all() as EscalationRow[]
  return rows.map(toEscalation)
}

export function getUnresolvedEscalations(db: BetterSqlite3Database): Escalation[] {
  const rows = db
    .prepare('SELECT * FROM escalations WHERE resolved = 0 ORDER BY seq ASC')
    .all() as EscalationRow[]
  return rows.map(toEscalation)
}

export function countUnresolvedForStory(db: BetterSqlite3Database, storyId: StoryId): number {
  const row = db
    .prepare('SELECT COUNT(*) AS cnt FROM escalations WHERE story_id = ? AND resolved = 0')
    .get(storyId) as { cnt: number }
  return row.cnt
}

/**
 * Mark an escalation resolved. Returns false when no unresolved row matched.
 */
export function markEscalationResolved(
  db: BetterSqlite3Database,
  escalationId: EscalationId,
  resolution: string,
  resolvedAt: string,
): boolean {
  const result = db
    .prepare(
      'UPDATE escalations SET resolved = 1, resolution = ?, resolved_at = ? WHERE escalation_id = ? AND resolved = 0',
    )
    .run(resolution, resolvedAt, escalationId)
  return result.changes === 1
}

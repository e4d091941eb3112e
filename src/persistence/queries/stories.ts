/**
 * Story document query functions.
 *
 * The backlog entry a story's tasks were decomposed from is kept verbatim so
 * the dispatcher can hand workers the full story context.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { StoryId } from '../../core/types.js'

export interface StoredStory {
  story_id: StoryId
  /** Backlog entry as written, including unknown fields */
  document: unknown
  enqueued_at: string
}

interface StoryRow {
  story_id: string
  document: string
  enqueued_at: string
}

export function insertStory(
  db: BetterSqlite3Database,
  storyId: StoryId,
  document: unknown,
  enqueuedAt: string,
): void {
  db.prepare('INSERT INTO stories (story_id, document, enqueued_at) VALUES (?, ?, ?)').run(
    storyId,
    JSON.stringify(document),
    enqueuedAt,
  )
}

export function getStory(db: BetterSqlite3Database, storyId: StoryId): StoredStory | undefined {
  const row = db.prepare('SELECT * FROM stories WHERE story_id = ?').get(storyId) as
    | StoryRow
    | undefined
  if (row === undefined) return undefined
  return {
    story_id: row.story_id,
    document: JSON.parse(row.document) as unknown,
    enqueued_at: row.enqueued_at,
  }
}

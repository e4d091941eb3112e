/**
 * Migration 001: Initial schema.
 *
 * Creates the three independently persisted structures:
 *  - task_queue (singleton sprint metadata) + tasks + task_dependencies
 *    + stories (the backlog document each task set was decomposed from)
 *  - agent_status (+ agent_status_meta for the last poll time)
 *  - escalations
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_queue (
        id           INTEGER PRIMARY KEY CHECK (id = 1),
        sprint_id    TEXT,
        last_updated TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tasks (
        seq          INTEGER PRIMARY KEY AUTOINCREMENT,
        task_id      TEXT NOT NULL UNIQUE,
        story_id     TEXT NOT NULL,
        title        TEXT NOT NULL,
        phase        TEXT NOT NULL,
        status       TEXT NOT NULL,
        priority     TEXT NOT NULL,
        assigned_to  TEXT,
        attempt      INTEGER NOT NULL DEFAULT 1,
        created_at   TEXT NOT NULL,
        assigned_at  TEXT,
        completed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS task_dependencies (
        task_id    TEXT NOT NULL REFERENCES tasks(task_id),
        depends_on TEXT NOT NULL,
        position   INTEGER NOT NULL,
        PRIMARY KEY (task_id, depends_on)
      );

      CREATE TABLE IF NOT EXISTS stories (
        story_id    TEXT PRIMARY KEY,
        document    TEXT NOT NULL,
        enqueued_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      CREATE INDEX IF NOT EXISTS idx_tasks_story ON tasks(story_id);
      CREATE INDEX IF NOT EXISTS idx_task_deps_depends_on ON task_dependencies(depends_on);

      CREATE TABLE IF NOT EXISTS agent_status (
        agent_role      TEXT PRIMARY KEY,
        status          TEXT NOT NULL DEFAULT 'idle',
        current_task_id TEXT,
        processed       INTEGER NOT NULL DEFAULT 0,
        deliverable     TEXT,
        updated_at      TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS agent_status_meta (
        id        INTEGER PRIMARY KEY CHECK (id = 1),
        last_poll TEXT
      );

      CREATE TABLE IF NOT EXISTS escalations (
        seq            INTEGER PRIMARY KEY AUTOINCREMENT,
        escalation_id  TEXT NOT NULL UNIQUE,
        story_id       TEXT NOT NULL,
        type           TEXT NOT NULL,
        question       TEXT NOT NULL,
        context        TEXT NOT NULL DEFAULT '{}',
        recommendation TEXT,
        raised_by      TEXT NOT NULL,
        resolved       INTEGER NOT NULL DEFAULT 0,
        created_at     TEXT NOT NULL,
        resolved_at    TEXT,
        resolution     TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_escalations_resolved ON escalations(resolved);
      CREATE INDEX IF NOT EXISTS idx_escalations_story ON escalations(story_id);
    `)
  },
}

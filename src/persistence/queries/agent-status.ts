/**
 * Agent status query functions for the SQLite persistence layer.
 *
 * One row per worker role. Workers write their own row; the status monitor
 * reads rows and flips the `processed` flag.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  isAgentRole,
  isAgentStatusValue,
  type AgentRole,
  type AgentStatusValue,
  type TaskId,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AgentStatus {
  agent_role: AgentRole
  status: AgentStatusValue
  current_task_id: TaskId | null
  processed: boolean
  /** Worker-written deliverable document (opaque JSON) */
  deliverable: unknown
  updated_at: string
}

export interface UpsertAgentStatusInput {
  agent_role: AgentRole
  status: AgentStatusValue
  current_task_id: TaskId | null
  processed: boolean
  deliverable: unknown
  updated_at: string
}

interface AgentStatusRow {
  agent_role: string
  status: string
  current_task_id: string | null
  processed: number
  deliverable: string | null
  updated_at: string
}

function toAgentStatus(row: AgentStatusRow): AgentStatus {
  if (!isAgentRole(row.agent_role) || !isAgentStatusValue(row.status)) {
    throw new Error(`Corrupt agent status row: role=${row.agent_role} status=${row.status}`)
  }
  return {
    agent_role: row.agent_role,
    status: row.status,
    current_task_id: row.current_task_id,
    processed: row.processed === 1,
    deliverable: row.deliverable === null ? null : (JSON.parse(row.deliverable) as unknown),
    updated_at: row.updated_at,
  }
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function getAgentStatus(
  db: BetterSqlite3Database,
  role: AgentRole,
): AgentStatus | undefined {
  const row = db.prepare('SELECT * FROM agent_status WHERE agent_role = ?').get(role) as
    | AgentStatusRow
    | undefined
  return row === undefined ? undefined : toAgentStatus(row)
}

export function getAllAgentStatuses(db: BetterSqlite3Database): AgentStatus[] {
  const rows = db.prepare('SELECT * FROM agent_status ORDER BY rowid ASC').all() as AgentStatusRow[]
  return rows.map(toAgentStatus)
}

export function getAgentStatusesByStatus(
  db: BetterSqlite3Database,
  status: AgentStatusValue,
): AgentStatus[] {
  const rows = db
    .prepare('SELECT * FROM agent_status WHERE status = ? ORDER BY rowid ASC')
    .all(status) as AgentStatusRow[]
  return rows.map(toAgentStatus)
}

/**
 * Insert an idle row for a role unless one already exists.
 * Returns true when a row was created.
 */
export function insertAgentIfMissing(
  db: BetterSqlite3Database,
  role: AgentRole,
  updatedAt: string,
): boolean {
  const result = db
    .prepare(
      "INSERT OR IGNORE INTO agent_status (agent_role, status, processed, updated_at) VALUES (?, 'idle', 0, ?)",
    )
    .run(role, updatedAt)
  return result.changes === 1
}

export function upsertAgentStatus(db: BetterSqlite3Database, input: UpsertAgentStatusInput): void {
  db.prepare(`
    INSERT INTO agent_status (agent_role, status, current_task_id, processed, deliverable, updated_at)
    VALUES (@agent_role, @status, @current_task_id, @processed, @deliverable, @updated_at)
    ON CONFLICT(agent_role) DO UPDATE SET
      status = excluded.status,
      current_task_id = excluded.current_task_id,
      processed = excluded.processed,
      deliverable = excluded.deliverable,
      updated_at = excluded.updated_at
  `).run({
    agent_role: input.agent_role,
    status: input.status,
    current_task_id: input.current_task_id,
    processed: input.processed ? 1 : 0,
    deliverable:
      input.deliverable === null || input.deliverable === undefined
        ? null
        : JSON.stringify(input.deliverable),
    updated_at: input.updated_at,
  })
}

/**
 * Claim an unprocessed completion for a role.
 *
 * Compare-and-swap on `processed`: only the caller whose UPDATE flips the flag
 * from 0 to 1 gets `true`.
 */
export function claimCompletion(db: BetterSqlite3Database, role: AgentRole): boolean {
  const result = db
    .prepare(
      "UPDATE agent_status SET processed = 1 WHERE agent_role = ? AND status = 'complete' AND processed = 0",
    )
    .run(role)
  return result.changes === 1
}

// ---------------------------------------------------------------------------
// Poll metadata
// ---------------------------------------------------------------------------

export function getLastPoll(db: BetterSqlite3Database): string | null {
  const row = db.prepare('SELECT last_poll FROM agent_status_meta WHERE id = 1').get() as
    | { last_poll: string | null }
    | undefined
  return row?.last_poll ?? null
}

export function setLastPoll(db: BetterSqlite3Database, lastPoll: string): void {
  db.prepare(`
    INSERT INTO agent_status_meta (id, last_poll) VALUES (1, ?)
    ON CONFLICT(id) DO UPDATE SET last_poll = excluded.last_poll
  `).run(lastPoll)
}

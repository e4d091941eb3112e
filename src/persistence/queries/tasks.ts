/**
 * Task query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements; no string interpolation of values, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  isAgentRole,
  isPhase,
  isPriority,
  isTaskStatus,
  type AgentRole,
  type Phase,
  type Priority,
  type StoryId,
  type TaskId,
  type TaskStatus,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Task types
// ---------------------------------------------------------------------------

export interface Task {
  task_id: TaskId
  story_id: StoryId
  title: string
  phase: Phase
  status: TaskStatus
  priority: Priority
  assigned_to: AgentRole | null
  depends_on: TaskId[]
  attempt: number
  created_at: string
  assigned_at: string | null
  completed_at: string | null
}

export type CreateTaskInput = Omit<Task, 'assigned_to' | 'assigned_at' | 'completed_at' | 'attempt'> & {
  attempt?: number
}

/** Sprint-level metadata stored alongside the task list */
export interface TaskQueueMeta {
  sprint_id: string | null
  last_updated: string
}

export interface UpdateTaskFields {
  status?: TaskStatus
  assigned_to?: AgentRole | null
  assigned_at?: string | null
  completed_at?: string | null
}

interface TaskRow {
  seq: number
  task_id: string
  story_id: string
  title: string
  phase: string
  status: string
  priority: string
  assigned_to: string | null
  attempt: number
  created_at: string
  assigned_at: string | null
  completed_at: string | null
}

interface DependencyRow {
  task_id: string
  depends_on: string
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toTask(row: TaskRow, dependsOn: TaskId[]): Task {
  if (!isPhase(row.phase) || !isTaskStatus(row.status) || !isPriority(row.priority)) {
    throw new Error(`Corrupt task row "${row.task_id}": phase=${row.phase} status=${row.status} priority=${row.priority}`)
  }
  let assignedTo: AgentRole | null = null
  if (row.assigned_to !== null) {
    if (!isAgentRole(row.assigned_to)) {
      throw new Error(`Corrupt task row "${row.task_id}": assigned_to=${row.assigned_to}`)
    }
    assignedTo = row.assigned_to
  }
  return {
    task_id: row.task_id,
    story_id: row.story_id,
    title: row.title,
    phase: row.phase,
    status: row.status,
    priority: row.priority,
    assigned_to: assignedTo,
    depends_on: dependsOn,
    attempt: row.attempt,
    created_at: row.created_at,
    assigned_at: row.assigned_at,
    completed_at: row.completed_at,
  }
}

function loadDependencies(db: BetterSqlite3Database, taskId: TaskId): TaskId[] {
  const rows = db
    .prepare('SELECT depends_on FROM task_dependencies WHERE task_id = ? ORDER BY position ASC')
    .all(taskId) as { depends_on: string }[]
  return rows.map((r) => r.depends_on)
}

function mapRows(db: BetterSqlite3Database, rows: TaskRow[]): Task[] {
  if (rows.length === 0) return []
  const deps = db
    .prepare('SELECT task_id, depends_on FROM task_dependencies ORDER BY task_id, position ASC')
    .all() as DependencyRow[]
  const byTask = new Map<string, TaskId[]>()
  for (const dep of deps) {
    const list = byTask.get(dep.task_id) ?? []
    list.push(dep.depends_on)
    byTask.set(dep.task_id, list)
  }
  return rows.map((row) => toTask(row, byTask.get(row.task_id) ?? []))
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a new task record together with its dependency edges.
 */
export function createTask(db: BetterSqlite3Database, task: CreateTaskInput): void {
  db.prepare(`
    INSERT INTO tasks (
      task_id, story_id, title, phase, status, priority, attempt, created_at
    ) VALUES (
      @task_id, @story_id, @title, @phase, @status, @priority, @attempt, @created_at
    )
  `).run({
    task_id: task.task_id,
    story_id: task.story_id,
    title: task.title,
    phase: task.phase,
    status: task.status,
    priority: task.priority,
    attempt: task.attempt ?? 1,
    created_at: task.created_at,
  })

  const insertDep = db.prepare(
    'INSERT INTO task_dependencies (task_id, depends_on, position) VALUES (?, ?, ?)',
  )
  task.depends_on.forEach((dep, position) => {
    insertDep.run(task.task_id, dep, position)
  })
}

/**
 * Retrieve a task by its id. Returns undefined if not found.
 */
export function getTask(db: BetterSqlite3Database, taskId: TaskId): Task | undefined {
  const row = db.prepare('SELECT * FROM tasks WHERE task_id = ?').get(taskId) as TaskRow | undefined
  if (row === undefined) return undefined
  return toTask(row, loadDependencies(db, taskId))
}

/**
 * Retrieve all tasks in insertion order.
 */
export function getAllTasks(db: BetterSqlite3Database): Task[] {
  const rows = db.prepare('SELECT * FROM tasks ORDER BY seq ASC').all() as TaskRow[]
  return mapRows(db, rows)
}

/**
 * Retrieve all tasks with a given status, in insertion order.
 */
export function getTasksByStatus(db: BetterSqlite3Database, status: TaskStatus): Task[] {
  const rows = db
    .prepare('SELECT * FROM tasks WHERE status = ? ORDER BY seq ASC')
    .all(status) as TaskRow[]
  return mapRows(db, rows)
}

/**
 * Retrieve all tasks belonging to a story, in insertion order.
 */
export function getTasksForStory(db: BetterSqlite3Database, storyId: StoryId): Task[] {
  const rows = db
    .prepare('SELECT * FROM tasks WHERE story_id = ? ORDER BY seq ASC')
    .all(storyId) as TaskRow[]
  return mapRows(db, rows)
}

/**
 * Retrieve pending tasks in scheduling order: priority label ascending
 * (P0 first), then creation time, then insertion order.
 */
export function getPendingTasksInPriorityOrder(db: BetterSqlite3Database): Task[] {
  const rows = db
    .prepare(
      "SELECT * FROM tasks WHERE status = 'pending' ORDER BY priority ASC, created_at ASC, seq ASC",
    )
    .all() as TaskRow[]
  return mapRows(db, rows)
}

/**
 * Ids of every task whose dependency list contains `taskId`.
 */
export function getDependentTaskIds(db: BetterSqlite3Database, taskId: TaskId): TaskId[] {
  const rows = db
    .prepare(`
      SELECT d.task_id FROM task_dependencies d
      JOIN tasks t ON t.task_id = d.task_id
      WHERE d.depends_on = ?
      ORDER BY t.seq ASC
    `)
    .all(taskId) as { task_id: string }[]
  return rows.map((r) => r.task_id)
}

/**
 * Update selected columns of a task.
 * @throws {Error} if no row matched.
 */
export function updateTask(
  db: BetterSqlite3Database,
  taskId: TaskId,
  fields: UpdateTaskFields,
): void {
  const setClauses: string[] = []
  const params: Record<string, unknown> = { taskId }

  if (fields.status !== undefined) { setClauses.push('status = @status'); params.status = fields.status }
  if (fields.assigned_to !== undefined) { setClauses.push('assigned_to = @assigned_to'); params.assigned_to = fields.assigned_to }
  if (fields.assigned_at !== undefined) { setClauses.push('assigned_at = @assigned_at'); params.assigned_at = fields.assigned_at }
  if (fields.completed_at !== undefined) { setClauses.push('completed_at = @completed_at'); params.completed_at = fields.completed_at }

  if (setClauses.length === 0) return

  const result = db.prepare(`UPDATE tasks SET ${setClauses.join(', ')} WHERE task_id = @taskId`).run(params)
  if (result.changes === 0) {
    throw new Error(`Task "${taskId}" not found`)
  }
}

/**
 * Re-point every dependency edge on `fromTaskId` to `toTaskId`.
 * Returns the ids of the tasks whose edges changed.
 */
export function redirectDependencies(
  db: BetterSqlite3Database,
  fromTaskId: TaskId,
  toTaskId: TaskId,
): TaskId[] {
  const dependents = getDependentTaskIds(db, fromTaskId)
  db.prepare('UPDATE task_dependencies SET depends_on = ? WHERE depends_on = ?').run(toTaskId, fromTaskId)
  return dependents
}

// ---------------------------------------------------------------------------
// Queue metadata
// ---------------------------------------------------------------------------

export function getQueueMeta(db: BetterSqlite3Database): TaskQueueMeta | undefined {
  return db.prepare('SELECT sprint_id, last_updated FROM task_queue WHERE id = 1').get() as
    | TaskQueueMeta
    | undefined
}

export function upsertQueueMeta(db: BetterSqlite3Database, meta: TaskQueueMeta): void {
  db.prepare(`
    INSERT INTO task_queue (id, sprint_id, last_updated) VALUES (1, @sprint_id, @last_updated)
    ON CONFLICT(id) DO UPDATE SET sprint_id = excluded.sprint_id, last_updated = excluded.last_updated
  `).run(meta)
}

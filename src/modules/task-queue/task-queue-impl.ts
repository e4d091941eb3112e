/**
 * TaskQueueImpl: SQLite-backed implementation of the TaskQueue interface.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import {
  InvalidStoryError,
  InvalidTransitionError,
  NotFoundError,
} from '../../core/errors.js'
import type { AgentRole, Phase, StoryId, TaskId, TaskStatus } from '../../core/types.js'
import {
  createTask,
  getAllTasks,
  getPendingTasksInPriorityOrder,
  getQueueMeta,
  getTask,
  getTasksByStatus,
  getTasksForStory,
  redirectDependencies,
  updateTask,
  upsertQueueMeta,
  type Task,
  type UpdateTaskFields,
} from '../../persistence/queries/tasks.js'
import { getStory as getStoredStory, insertStory } from '../../persistence/queries/stories.js'
import { StorySchema, type Story, type StoryInput } from '../backlog/schemas.js'
import type { Pipeline } from '../pipeline/pipeline-definition.js'
import { validateDoR } from '../quality-gates/quality-gate-validator.js'
import { createLogger } from '../../utils/logger.js'
import { detectCycle, dependenciesComplete, incompleteDependencies } from './dependency-resolver.js'
import { VALID_TRANSITIONS, type TaskQueue, type TaskQueueSnapshot } from './task-queue.js'

const logger = createLogger('task-queue')

/** Suffix carried by requeued copies: `<task_id>-r<k>` */
const REQUEUE_SUFFIX = /-r\d+$/

export interface TaskQueueOptions {
  /** Clock used for every timestamp the queue writes */
  now?: () => Date
}

/** Emission deferred until the surrounding transaction commits */
type PendingEvent = () => void

// ---------------------------------------------------------------------------
// TaskQueueImpl
// ---------------------------------------------------------------------------

export class TaskQueueImpl implements TaskQueue {
  private readonly _db: BetterSqlite3Database
  private readonly _pipeline: Pipeline
  private readonly _eventBus: TypedEventBus
  private readonly _now: () => Date

  constructor(
    db: BetterSqlite3Database,
    pipeline: Pipeline,
    eventBus: TypedEventBus,
    options: TaskQueueOptions = {},
  ) {
    this._db = db
    this._pipeline = pipeline
    this._eventBus = eventBus
    this._now = options.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Decomposition
  // -------------------------------------------------------------------------

  decompose(story: StoryInput): Task[] {
    const readiness = validateDoR(story)
    if (!readiness.pass) {
      throw new InvalidStoryError(story.story_id, readiness.missingFields)
    }

    const events: PendingEvent[] = []
    const created = this._db.transaction(() => {
      if (getTasksForStory(this._db, story.story_id).length > 0) {
        throw new InvalidStoryError(
          story.story_id,
          [],
          `Story "${story.story_id}" is already enqueued`,
        )
      }

      const timestamp = this._timestamp()
      insertStory(this._db, story.story_id, story, timestamp)
      const narrative = story.user_story ?? ''
      const tasks: Task[] = []
      this._pipeline.storyPhases.forEach((phase, index) => {
        const previous = tasks[index - 1]
        const task: Task = {
          task_id: `${story.story_id}-${String(index + 1)}`,
          story_id: story.story_id,
          title: this._pipeline.titleFor(phase, narrative),
          phase,
          status: previous === undefined ? 'pending' : 'blocked',
          priority: story.priority ?? 'P1',
          assigned_to: null,
          depends_on: previous === undefined ? [] : [previous.task_id],
          attempt: 1,
          created_at: timestamp,
          assigned_at: null,
          completed_at: null,
        }
        createTask(this._db, task)
        tasks.push(task)
      })
      this._touch(timestamp)

      events.push(() => {
        this._eventBus.emit('task:enqueued', {
          storyId: story.story_id,
          taskIds: tasks.map((t) => t.task_id),
        })
      })
      return tasks
    })()

    logger.info({ storyId: story.story_id, taskCount: created.length }, 'Story decomposed')
    this._flush(events)
    return created
  }

  // -------------------------------------------------------------------------
  // Assignment and status
  // -------------------------------------------------------------------------

  assignToAgent(taskId: TaskId): AgentRole {
    return this._db.transaction(() => {
      const task = this._require(taskId)
      if (task.status !== 'pending' && task.status !== 'assigned') {
        throw new InvalidTransitionError(
          `Cannot assign task "${taskId}" in status ${task.status}`,
          { taskId, from: task.status, to: 'assigned' },
        )
      }

      const role = this._pipeline.roleForPhase(task.phase)
      const timestamp = this._timestamp()
      updateTask(this._db, taskId, {
        status: 'assigned',
        assigned_to: role,
        assigned_at: timestamp,
      })
      this._touch(timestamp)
      logger.debug({ taskId, role }, 'Task assigned')
      return role
    })()
  }

  updateStatus(taskId: TaskId, status: TaskStatus): Task {
    const events: PendingEvent[] = []
    const updated = this._db.transaction(() => {
      const task = this._require(taskId)
      const allowed = VALID_TRANSITIONS[task.status]
      if (!allowed.includes(status)) {
        throw new InvalidTransitionError(
          `Invalid task transition for "${taskId}": ${task.status} → ${status}. ` +
            `Allowed from ${task.status}: [${allowed.join(', ')}]`,
          { taskId, from: task.status, to: status },
        )
      }

      if (status === 'pending') {
        const byId = this._taskMap()
        const waitingOn = incompleteDependencies(task, byId)
        if (waitingOn.length > 0) {
          throw new InvalidTransitionError(
            `Task "${taskId}" cannot become pending: waiting on ${waitingOn.join(', ')}`,
            { taskId, from: task.status, to: status, waitingOn },
          )
        }
      }

      const timestamp = this._timestamp()
      const fields: UpdateTaskFields = { status }
      if (status === 'complete') {
        fields.completed_at = timestamp
      } else if (status === 'pending') {
        fields.assigned_to = null
        fields.assigned_at = null
      }
      updateTask(this._db, taskId, fields)

      if (status === 'complete') {
        for (const unblocked of this._unblockDependents(taskId)) {
          events.push(() => {
            this._eventBus.emit('task:unblocked', { taskId: unblocked, unblockedBy: taskId })
          })
        }
      }

      this._touch(timestamp)
      return this._require(taskId)
    })()

    logger.debug({ taskId, status }, 'Task status updated')
    this._flush(events)
    return updated
  }

  /**
   * Move every blocked dependent of `taskId` whose dependencies are all
   * complete to pending. Must run inside the caller's transaction.
   */
  private _unblockDependents(taskId: TaskId): TaskId[] {
    const byId = this._taskMap()
    const unblocked: TaskId[] = []
    for (const candidate of byId.values()) {
      if (candidate.status !== 'blocked' || !candidate.depends_on.includes(taskId)) continue
      if (dependenciesComplete(candidate, byId)) {
        updateTask(this._db, candidate.task_id, { status: 'pending' })
        unblocked.push(candidate.task_id)
      }
    }
    return unblocked
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  nextTask(): Task | null {
    return this.pendingTasks()[0] ?? null
  }

  pendingTasks(): Task[] {
    return getPendingTasksInPriorityOrder(this._db)
  }

  getTask(taskId: TaskId): Task | undefined {
    return getTask(this._db, taskId)
  }

  listTasks(): Task[] {
    return getAllTasks(this._db)
  }

  tasksByStatus(status: TaskStatus): Task[] {
    return getTasksByStatus(this._db, status)
  }

  tasksForStory(storyId: StoryId): Task[] {
    return getTasksForStory(this._db, storyId)
  }

  getStory(storyId: StoryId): Story | undefined {
    const stored = getStoredStory(this._db, storyId)
    if (stored === undefined) return undefined
    const parsed = StorySchema.safeParse(stored.document)
    if (!parsed.success) {
      logger.warn({ storyId, issues: parsed.error.issues }, 'Stored story document is invalid')
      return undefined
    }
    return parsed.data
  }

  setSprintId(sprintId: string | null): void {
    upsertQueueMeta(this._db, { sprint_id: sprintId, last_updated: this._timestamp() })
  }

  snapshot(): TaskQueueSnapshot {
    return this._db.transaction(() => {
      const meta = getQueueMeta(this._db)
      return {
        sprint_id: meta?.sprint_id ?? null,
        last_updated: meta?.last_updated ?? null,
        tasks: getAllTasks(this._db),
      }
    })()
  }

  findDependencyCycle(): TaskId[] | null {
    return detectCycle(this._taskMap())
  }

  // -------------------------------------------------------------------------
  // Follow-on and requeue
  // -------------------------------------------------------------------------

  addFollowOnTask(afterTaskId: TaskId, phase: Phase): Task {
    const events: PendingEvent[] = []
    const task = this._db.transaction(() => {
      const after = this._require(afterTaskId)
      const expectedRole = this._pipeline.nextRole(this._pipeline.roleForPhase(after.phase))
      if (expectedRole !== this._pipeline.roleForPhase(phase)) {
        throw new InvalidTransitionError(
          `Phase "${phase}" does not follow "${after.phase}" for task "${afterTaskId}"`,
          { taskId: afterTaskId, phase },
        )
      }

      const timestamp = this._timestamp()
      const followOn: Task = {
        task_id: this._nextTaskId(after.story_id),
        story_id: after.story_id,
        title: this._pipeline.retitle(phase, after.title),
        phase,
        status: after.status === 'complete' ? 'pending' : 'blocked',
        priority: after.priority,
        assigned_to: null,
        depends_on: [afterTaskId],
        attempt: 1,
        created_at: timestamp,
        assigned_at: null,
        completed_at: null,
      }
      createTask(this._db, followOn)
      this._touch(timestamp)
      events.push(() => {
        this._eventBus.emit('task:enqueued', {
          storyId: followOn.story_id,
          taskIds: [followOn.task_id],
        })
      })
      return followOn
    })()

    logger.info({ taskId: task.task_id, after: afterTaskId, phase }, 'Follow-on task created')
    this._flush(events)
    return task
  }

  requeue(taskId: TaskId): Task {
    const events: PendingEvent[] = []
    const task = this._db.transaction(() => {
      const failed = this._require(taskId)
      if (failed.status !== 'failed') {
        throw new InvalidTransitionError(
          `Only failed tasks can be requeued; "${taskId}" is ${failed.status}`,
          { taskId, from: failed.status },
        )
      }

      const copyId = `${taskId.replace(REQUEUE_SUFFIX, '')}-r${String(failed.attempt)}`
      if (getTask(this._db, copyId) !== undefined) {
        throw new InvalidTransitionError(`Task "${taskId}" was already requeued as "${copyId}"`, {
          taskId,
          requeuedAs: copyId,
        })
      }

      const byId = this._taskMap()
      const timestamp = this._timestamp()
      const copy: Task = {
        task_id: copyId,
        story_id: failed.story_id,
        title: failed.title,
        phase: failed.phase,
        status: dependenciesComplete(failed, byId) ? 'pending' : 'blocked',
        priority: failed.priority,
        assigned_to: null,
        depends_on: [...failed.depends_on],
        attempt: failed.attempt + 1,
        created_at: timestamp,
        assigned_at: null,
        completed_at: null,
      }
      createTask(this._db, copy)
      const redirected = redirectDependencies(this._db, taskId, copy.task_id)
      this._touch(timestamp)
      events.push(() => {
        this._eventBus.emit('task:enqueued', {
          storyId: copy.story_id,
          taskIds: [copy.task_id],
        })
      })
      logger.info({ taskId, requeuedAs: copy.task_id, redirected }, 'Failed task requeued')
      return copy
    })()

    this._flush(events)
    return task
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _require(taskId: TaskId): Task {
    const task = getTask(this._db, taskId)
    if (task === undefined) {
      throw new NotFoundError('task', taskId)
    }
    return task
  }

  private _taskMap(): Map<TaskId, Task> {
    return new Map(getAllTasks(this._db).map((t) => [t.task_id, t]))
  }

  /** Next free `<story_id>-<n>` id for a story */
  private _nextTaskId(storyId: StoryId): TaskId {
    const prefix = `${storyId}-`
    let highest = 0
    for (const task of getTasksForStory(this._db, storyId)) {
      const suffix = task.task_id.slice(prefix.length)
      if (task.task_id.startsWith(prefix) && /^\d+$/.test(suffix)) {
        highest = Math.max(highest, Number(suffix))
      }
    }
    return `${prefix}${String(highest + 1)}`
  }

  private _timestamp(): string {
    return this._now().toISOString()
  }

  private _touch(timestamp: string): void {
    const meta = getQueueMeta(this._db)
    upsertQueueMeta(this._db, { sprint_id: meta?.sprint_id ?? null, last_updated: timestamp })
  }

  private _flush(events: PendingEvent[]): void {
    for (const emit of events) {
      emit()
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTaskQueue(
  db: BetterSqlite3Database,
  pipeline: Pipeline,
  eventBus: TypedEventBus,
  options: TaskQueueOptions = {},
): TaskQueue {
  return new TaskQueueImpl(db, pipeline, eventBus, options)
}

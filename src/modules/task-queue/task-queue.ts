/**
 * TaskQueue: interface contract for the durable task store.
 *
 * The queue owns every task derived from a backlog story:
 *  - Decomposes a story into one task per configured phase, chained by
 *    dependencies (first pending, the rest blocked)
 *  - Validates every status change against the task state machine
 *  - Unblocks dependents when a task completes; nothing else unblocks
 *  - Answers "what runs next" by priority, then age, then insertion order
 *
 * Every mutation is a single SQLite transaction. Events are emitted on the
 * TypedEventBus after the transaction commits.
 */

import type { AgentRole, Phase, StoryId, TaskId, TaskStatus } from '../../core/types.js'
import type { Task } from '../../persistence/queries/tasks.js'
import type { Story, StoryInput } from '../backlog/schemas.js'

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

/** Valid task status transitions */
export const VALID_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  blocked: ['pending'],
  pending: ['assigned', 'in_progress', 'complete', 'failed'],
  assigned: ['pending', 'in_progress', 'complete', 'failed'],
  in_progress: ['complete', 'failed'],
  complete: [],
  failed: [],
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface TaskQueueSnapshot {
  sprint_id: string | null
  last_updated: string | null
  tasks: Task[]
}

// ---------------------------------------------------------------------------
// TaskQueue interface
// ---------------------------------------------------------------------------

export interface TaskQueue {
  /**
   * Split a story into one task per configured phase.
   *
   * @returns the created tasks in phase order
   * @throws {InvalidStoryError} when the story fails the Definition of Ready,
   *         or when tasks for the story already exist. Nothing is enqueued.
   */
  decompose(story: StoryInput): Task[]

  /**
   * Assign a pending task to the role that owns its phase.
   * Calling it again on an assigned task refreshes `assigned_at`.
   *
   * @throws {NotFoundError} for an unknown task
   * @throws {InvalidTransitionError} when the task is not pending or assigned
   */
  assignToAgent(taskId: TaskId): AgentRole

  /**
   * Move a task to `status`. Completing a task moves every blocked dependent
   * whose dependencies are now all complete to pending.
   *
   * @throws {NotFoundError} for an unknown task
   * @throws {InvalidTransitionError} for a transition the state machine forbids
   */
  updateStatus(taskId: TaskId, status: TaskStatus): Task

  /** Highest priority pending task, or null when nothing is pending */
  nextTask(): Task | null

  /** All pending tasks in `nextTask` order */
  pendingTasks(): Task[]

  getTask(taskId: TaskId): Task | undefined
  listTasks(): Task[]
  tasksByStatus(status: TaskStatus): Task[]
  tasksForStory(storyId: StoryId): Task[]

  /** Backlog entry the story's tasks were decomposed from */
  getStory(storyId: StoryId): Story | undefined

  setSprintId(sprintId: string | null): void
  snapshot(): TaskQueueSnapshot

  /**
   * Create a task for `phase` that depends on `afterTaskId`. The phase must be
   * the routing successor of the earlier task's phase.
   *
   * @throws {NotFoundError} for an unknown task
   * @throws {InvalidTransitionError} when `phase` does not follow the task's phase
   */
  addFollowOnTask(afterTaskId: TaskId, phase: Phase): Task

  /**
   * Create a fresh copy of a failed task with `attempt + 1` and re-point its
   * dependents to the copy.
   *
   * @throws {NotFoundError} for an unknown task
   * @throws {InvalidTransitionError} when the task has not failed
   */
  requeue(taskId: TaskId): Task

  /** Dependency cycle among queued tasks as an id path, or null */
  findDependencyCycle(): TaskId[] | null
}

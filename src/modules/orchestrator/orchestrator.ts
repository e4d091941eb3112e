/**
 * Orchestrator interface: the public contract for the sprint scheduling loop.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createOrchestrator()` from orchestrator-impl.ts.
 *
 * One cycle:
 *  1. Poll the agent status monitor for unreported completions
 *  2. Run the Definition of Done on each deliverable and act on the gate decision
 *  3. Dispatch pending tasks to idle roles
 *  4. Report blocked agents and detect a queue that can no longer progress
 *
 * Cycles are re-entrant and idempotent with respect to already-processed
 * completions; there is no timer inside. The caller decides when to run one.
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { StallKind } from '../../core/event-bus.types.js'
import type {
  AgentRole,
  EscalationId,
  GateDecision,
  StoryId,
  TaskId,
} from '../../core/types.js'
import type { AgentStatus } from '../../persistence/queries/agent-status.js'
import type { Escalation } from '../../persistence/queries/escalations.js'
import type { Task } from '../../persistence/queries/tasks.js'
import type { AgentStatusMonitor } from '../agent-monitor/agent-status-monitor.js'
import type { Story, StoryInput } from '../backlog/schemas.js'
import type { EscalationManager } from '../escalation/escalation-manager.js'
import type { TaskQueue } from '../task-queue/task-queue.js'

// ---------------------------------------------------------------------------
// Worker boundary
// ---------------------------------------------------------------------------

/** Everything an executor needs to start a task */
export interface DispatchRequest {
  task: Task
  role: AgentRole
  /** Backlog entry the task belongs to; undefined when it was not stored */
  story: Story | undefined
  dispatchedAt: string
}

/**
 * Hands a task to whatever runs the worker for `role`. Rejecting the promise
 * returns the task to pending.
 */
export interface TaskDispatcher {
  dispatch(request: DispatchRequest): Promise<void>
}

// ---------------------------------------------------------------------------
// Rejection policy
// ---------------------------------------------------------------------------

export type RejectionAction = 'fail' | 'requeue'

/** Decides what happens after a task fails its quality gate */
export interface RejectionPolicy {
  readonly name: string
  decide(task: Task, issues: readonly string[]): RejectionAction
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export type EnqueueOutcome = 'enqueued' | 'not_ready' | 'duplicate'

export interface EnqueueResult {
  storyId: StoryId
  outcome: EnqueueOutcome
  taskIds: TaskId[]
  missingFields: string[]
  escalationId: EscalationId | null
}

export interface GateOutcome {
  taskId: TaskId
  role: AgentRole
  decision: GateDecision
  issues: string[]
  escalationId: EscalationId | null
  followOnTaskId: TaskId | null
  requeuedTaskId: TaskId | null
}

export interface SkippedCompletion {
  role: AgentRole
  taskId: TaskId | null
  reason: string
}

export interface DispatchedTask {
  taskId: TaskId
  role: AgentRole
}

export interface DispatchFailure {
  taskId: TaskId
  role: AgentRole
  error: string
}

export interface Stall {
  kind: StallKind
  taskIds: TaskId[]
  /** Dependency cycle path; empty unless kind is dependency_cycle and a cycle exists */
  cycle: TaskId[]
}

export interface CycleReport {
  completions: GateOutcome[]
  skipped: SkippedCompletion[]
  dispatched: DispatchedTask[]
  dispatchFailures: DispatchFailure[]
  blockers: AgentStatus[]
  stall: Stall | null
}

export type EscalationVerdict = 'approve' | 'reject'

export interface ResolveResult {
  escalation: Escalation
  taskId: TaskId | null
  verdict: EscalationVerdict | null
  followOnTaskId: TaskId | null
  requeuedTaskId: TaskId | null
}

// ---------------------------------------------------------------------------
// Orchestrator interface
// ---------------------------------------------------------------------------

export interface Orchestrator extends BaseService {
  readonly eventBus: TypedEventBus
  readonly taskQueue: TaskQueue
  readonly monitor: AgentStatusMonitor
  readonly escalations: EscalationManager

  /**
   * Decompose every ready story. Stories failing the Definition of Ready are
   * skipped and, when configured, raise a dor_gap escalation. Stories already
   * enqueued are skipped.
   */
  enqueueBacklog(stories: readonly StoryInput[], sprintId?: string): EnqueueResult[]

  /** Run one scheduling cycle */
  runCycle(): Promise<CycleReport>

  /**
   * Resolve an escalation. With a verdict, the escalated task is completed
   * (`approve`, then routed onwards) or failed (`reject`, then the rejection
   * policy applies).
   *
   * @throws {NotFoundError} for an unknown escalation
   * @throws {InvalidTransitionError} when already resolved, or when a verdict
   *         is given for an escalation that names no task or whose task is
   *         no longer in flight
   */
  resolveEscalation(
    escalationId: EscalationId,
    resolution: string,
    verdict?: EscalationVerdict,
  ): ResolveResult
}

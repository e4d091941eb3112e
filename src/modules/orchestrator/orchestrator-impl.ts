/**
 * OrchestratorImpl: concrete implementation of the Orchestrator interface.
 *
 * The createOrchestrator() factory builds the task queue, agent status monitor
 * and escalation manager over one database and injects them; the orchestrator
 * holds no state of its own between cycles. Everything it knows is re-read
 * from the stores at the start of each step.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  ConductorError,
  DependencyCycleError,
  InvalidTransitionError,
} from '../../core/errors.js'
import { createEventBus, type TypedEventBus } from '../../core/event-bus.js'
import type { ConductorEvents } from '../../core/event-bus.types.js'
import type { AgentRole, EscalationId, StoryId } from '../../core/types.js'
import type { AgentStatus } from '../../persistence/queries/agent-status.js'
import type { Task } from '../../persistence/queries/tasks.js'
import { createLogger } from '../../utils/logger.js'
import { createAgentStatusMonitor } from '../agent-monitor/agent-status-monitor-impl.js'
import type { AgentStatusMonitor } from '../agent-monitor/agent-status-monitor.js'
import { DeliverableSchema, type Deliverable, type StoryInput } from '../backlog/schemas.js'
import type { OrchestratorSettings } from '../config/config-schema.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import { createEscalationManager } from '../escalation/escalation-manager-impl.js'
import { DOR_GAP, GATE_REVIEW, type EscalationManager } from '../escalation/escalation-manager.js'
import type { Pipeline } from '../pipeline/pipeline-definition.js'
import { gateDecision, validateDoD, validateDoR } from '../quality-gates/quality-gate-validator.js'
import { createTaskQueue } from '../task-queue/task-queue-impl.js'
import type { TaskQueue } from '../task-queue/task-queue.js'
import type {
  CycleReport,
  DispatchFailure,
  DispatchedTask,
  EnqueueResult,
  EscalationVerdict,
  GateOutcome,
  Orchestrator,
  RejectionPolicy,
  ResolveResult,
  SkippedCompletion,
  Stall,
  TaskDispatcher,
} from './orchestrator.js'
import { rejectionPolicyFromConfig } from './rejection-policy.js'

const logger = createLogger('orchestrator')

/** Resolution recorded on a dor_gap escalation once the story passes DoR */
export const DOR_GAP_CLOSED = 'Story ready on re-plan'

/** Task statuses that mean a worker holds the task */
const IN_FLIGHT: readonly Task['status'][] = ['assigned', 'in_progress']

export interface OrchestratorDeps {
  eventBus: TypedEventBus
  pipeline: Pipeline
  taskQueue: TaskQueue
  monitor: AgentStatusMonitor
  escalations: EscalationManager
  dispatcher: TaskDispatcher
  settings: OrchestratorSettings
  rejectionPolicy: RejectionPolicy
  now: () => Date
}

interface ApprovalResult {
  followOnTaskId: string | null
}

// ---------------------------------------------------------------------------
// OrchestratorImpl
// ---------------------------------------------------------------------------

export class OrchestratorImpl implements Orchestrator {
  readonly eventBus: TypedEventBus
  readonly taskQueue: TaskQueue
  readonly monitor: AgentStatusMonitor
  readonly escalations: EscalationManager
  private readonly _pipeline: Pipeline
  private readonly _dispatcher: TaskDispatcher
  private readonly _settings: OrchestratorSettings
  private readonly _rejectionPolicy: RejectionPolicy
  private readonly _now: () => Date
  private _stopStallLog: (() => void) | null = null

  private readonly _onStalled = (payload: ConductorEvents['cycle:stalled']): void => {
    logger.warn(payload, 'Queue stalled')
  }

  constructor(deps: OrchestratorDeps) {
    this.eventBus = deps.eventBus
    this.taskQueue = deps.taskQueue
    this.monitor = deps.monitor
    this.escalations = deps.escalations
    this._pipeline = deps.pipeline
    this._dispatcher = deps.dispatcher
    this._settings = deps.settings
    this._rejectionPolicy = deps.rejectionPolicy
    this._now = deps.now
  }

  async initialize(): Promise<void> {
    const seeded = this.monitor.ensureAgents()
    this._stopStallLog ??= this.eventBus.on('cycle:stalled', this._onStalled)
    logger.debug({ seeded, rejectionPolicy: this._rejectionPolicy.name }, 'Orchestrator initialized')
  }

  async shutdown(): Promise<void> {
    this._stopStallLog?.()
    this._stopStallLog = null
  }

  // -------------------------------------------------------------------------
  // Backlog
  // -------------------------------------------------------------------------

  enqueueBacklog(stories: readonly StoryInput[], sprintId?: string): EnqueueResult[] {
    if (sprintId !== undefined) {
      this.taskQueue.setSprintId(sprintId)
    }

    return stories.map((story) => {
      const result: EnqueueResult = {
        storyId: story.story_id,
        outcome: 'enqueued',
        taskIds: [],
        missingFields: [],
        escalationId: null,
      }

      const readiness = validateDoR(story)
      if (!readiness.pass) {
        result.outcome = 'not_ready'
        result.missingFields = readiness.missingFields
        if (this._settings.escalate_dor_gaps) {
          result.escalationId = this._raiseDorGap(story.story_id, readiness.missingFields)
        }
        logger.info({ storyId: story.story_id, missing: readiness.missingFields }, 'Story not ready')
        return result
      }
      this._closeDorGap(story.story_id)

      if (this.taskQueue.tasksForStory(story.story_id).length > 0) {
        result.outcome = 'duplicate'
        return result
      }

      result.taskIds = this.taskQueue.decompose(story).map((t) => t.task_id)
      return result
    })
  }

  /** One open dor_gap escalation per story; re-planning does not repeat it */
  private _raiseDorGap(storyId: StoryId, missingFields: string[]): EscalationId {
    const open = this.escalations
      .getUnresolved()
      .find((e) => e.story_id === storyId && e.type === DOR_GAP)
    if (open !== undefined) return open.escalation_id

    return this.escalations.create({
      storyId,
      type: DOR_GAP,
      question: `Story ${storyId} is not ready: missing ${missingFields.join(', ')}. Complete it or drop it from the sprint?`,
      context: { missing_fields: missingFields },
      recommendation: 'Fill in the missing fields and run plan again',
    })
  }

  /** A story that now passes DoR no longer waits on its dor_gap escalation */
  private _closeDorGap(storyId: StoryId): void {
    for (const open of this.escalations.getUnresolved()) {
      if (open.story_id !== storyId || open.type !== DOR_GAP) continue
      this.escalations.resolve(open.escalation_id, DOR_GAP_CLOSED)
      logger.info({ storyId, escalationId: open.escalation_id }, 'Story ready on re-plan')
    }
  }

  // -------------------------------------------------------------------------
  // Cycle
  // -------------------------------------------------------------------------

  async runCycle(): Promise<CycleReport> {
    const report: CycleReport = {
      completions: [],
      skipped: [],
      dispatched: [],
      dispatchFailures: [],
      blockers: [],
      stall: null,
    }

    for (const record of this.monitor.pollStatusUpdates()) {
      const outcome = this._processCompletion(record, report.skipped)
      if (outcome !== null) report.completions.push(outcome)
    }

    await this._dispatchPending(report.dispatched, report.dispatchFailures)

    report.blockers = this.monitor.detectBlockers()
    if (report.blockers.length > 0) {
      logger.warn({ roles: report.blockers.map((b) => b.agent_role) }, 'Agents report blockers')
    }

    report.stall = this._detectStall()
    if (report.stall !== null) {
      this.eventBus.emit('cycle:stalled', report.stall)
    }

    logger.info(
      {
        completions: report.completions.length,
        dispatched: report.dispatched.length,
        stall: report.stall?.kind ?? null,
      },
      'Cycle finished',
    )
    return report
  }

  private _processCompletion(record: AgentStatus, skipped: SkippedCompletion[]): GateOutcome | null {
    const role = record.agent_role
    const taskId = record.current_task_id
    const task = taskId === null ? undefined : this.taskQueue.getTask(taskId)

    if (taskId === null || task === undefined) {
      logger.warn({ role, taskId }, 'Completion references an unknown task; skipped')
      skipped.push({ role, taskId, reason: 'unknown task' })
      return null
    }
    if (!IN_FLIGHT.includes(task.status)) {
      logger.warn({ role, taskId, status: task.status }, 'Completion for a task that is not in flight; skipped')
      skipped.push({ role, taskId, reason: `task is ${task.status}` })
      return null
    }

    const { issues } = validateDoD(parseDeliverable(record.deliverable, taskId))
    const decision = gateDecision(issues)
    const outcome: GateOutcome = {
      taskId,
      role,
      decision,
      issues,
      escalationId: null,
      followOnTaskId: null,
      requeuedTaskId: null,
    }

    try {
      switch (decision) {
        case 'APPROVE':
          outcome.followOnTaskId = this._approve(task).followOnTaskId
          break
        case 'ESCALATE':
          outcome.escalationId = this.escalations.create({
            storyId: task.story_id,
            type: GATE_REVIEW,
            question: `Deliverable for ${taskId} (${task.phase}) has ${String(issues.length)} issue(s). Approve or reject?`,
            context: { task_id: taskId, phase: task.phase, role, issues },
            recommendation: 'Review the listed issues, then resolve with approve or reject',
          })
          break
        case 'REJECT':
          outcome.requeuedTaskId = this._reject(task, issues)
          break
      }
    } catch (err) {
      if (!(err instanceof ConductorError)) throw err
      logger.error({ err, taskId, role }, 'Failed to apply gate decision; completion skipped')
      skipped.push({ role, taskId, reason: err.message })
      return null
    }

    logger.info({ taskId, role, decision, issues }, 'Gate decided')
    this.eventBus.emit('gate:decided', { taskId, role, decision, issues })
    return outcome
  }

  /** Complete the task and make sure the next phase of its story exists */
  private _approve(task: Task): ApprovalResult {
    this.taskQueue.updateStatus(task.task_id, 'complete')

    const nextRole = this.monitor.determineNextAgent(this._pipeline.roleForPhase(task.phase))
    if (nextRole === null) return { followOnTaskId: null }

    const nextPhase = this._pipeline.phaseForRole(nextRole)
    const hasNextPhase = this.taskQueue
      .tasksForStory(task.story_id)
      .some((t) => t.phase === nextPhase)
    if (hasNextPhase) return { followOnTaskId: null }

    return { followOnTaskId: this.taskQueue.addFollowOnTask(task.task_id, nextPhase).task_id }
  }

  /** Fail the task; returns the requeued copy's id when the policy asks for one */
  private _reject(task: Task, issues: readonly string[]): string | null {
    this.taskQueue.updateStatus(task.task_id, 'failed')
    const action = this._rejectionPolicy.decide(task, issues)
    if (action !== 'requeue') return null
    return this.taskQueue.requeue(task.task_id).task_id
  }

  private async _dispatchPending(
    dispatched: DispatchedTask[],
    failures: DispatchFailure[],
  ): Promise<void> {
    const busy = new Set<AgentRole>()

    for (const task of this.taskQueue.pendingTasks()) {
      if (dispatched.length >= this._settings.max_dispatch_per_cycle) break
      if (this.escalations.hasUnresolvedForStory(task.story_id)) continue

      const role = this._pipeline.roleForPhase(task.phase)
      if (busy.has(role)) continue
      if (!this.monitor.isAvailable(role)) {
        busy.add(role)
        continue
      }

      this.taskQueue.assignToAgent(task.task_id)
      const assigned = this.taskQueue.getTask(task.task_id) ?? task
      try {
        await this._dispatcher.dispatch({
          task: assigned,
          role,
          story: this.taskQueue.getStory(task.story_id),
          dispatchedAt: this._now().toISOString(),
        })
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        logger.warn({ err, taskId: task.task_id, role }, 'Dispatch failed; task returned to pending')
        this.taskQueue.updateStatus(task.task_id, 'pending')
        failures.push({ taskId: task.task_id, role, error: message })
        this.eventBus.emit('task:dispatch-failed', { taskId: task.task_id, role, error: message })
        continue
      }

      this.taskQueue.updateStatus(task.task_id, 'in_progress')
      this.monitor.recordDispatch(role, task.task_id)
      busy.add(role)
      dispatched.push({ taskId: task.task_id, role })
      this.eventBus.emit('task:dispatched', {
        taskId: task.task_id,
        storyId: task.story_id,
        phase: task.phase,
        role,
      })
    }
  }

  /**
   * A queue is stalled when nothing outside a paused story can run or is
   * running. Blocked work in unpaused stories then means a dependency that
   * can never complete; otherwise the queue waits on escalations.
   */
  private _detectStall(): Stall | null {
    const paused = new Map<StoryId, boolean>()
    const isPaused = (storyId: StoryId): boolean => {
      let value = paused.get(storyId)
      if (value === undefined) {
        value = this.escalations.hasUnresolvedForStory(storyId)
        paused.set(storyId, value)
      }
      return value
    }

    const active: Task[] = []
    const waiting: Task[] = []
    for (const task of this.taskQueue.listTasks()) {
      if (task.status === 'complete' || task.status === 'failed') continue
      if (isPaused(task.story_id)) waiting.push(task)
      else active.push(task)
    }

    const runnable = active.filter((t) => t.status === 'pending' || IN_FLIGHT.includes(t.status))
    if (runnable.length > 0) return null

    const blocked = active.filter((t) => t.status === 'blocked')
    if (blocked.length > 0) {
      const cycle = this.taskQueue.findDependencyCycle() ?? []
      const blockedIds = blocked.map((t) => t.task_id)
      const warning = new DependencyCycleError(blockedIds, cycle)
      logger.warn({ err: warning }, warning.message)
      return { kind: 'dependency_cycle', taskIds: blockedIds, cycle }
    }

    if (waiting.length > 0) {
      return { kind: 'awaiting_escalations', taskIds: waiting.map((t) => t.task_id), cycle: [] }
    }
    return null
  }

  // -------------------------------------------------------------------------
  // Escalations
  // -------------------------------------------------------------------------

  resolveEscalation(
    escalationId: EscalationId,
    resolution: string,
    verdict?: EscalationVerdict,
  ): ResolveResult {
    const existing = this.escalations.get(escalationId)
    const taskId = typeof existing?.context.task_id === 'string' ? existing.context.task_id : null
    const task = taskId === null ? undefined : this.taskQueue.getTask(taskId)
    if (verdict !== undefined && existing !== undefined && !existing.resolved) {
      if (taskId === null) {
        throw new InvalidTransitionError(
          `Escalation ${escalationId} names no task; resolve it without a verdict`,
          { escalationId, verdict },
        )
      }
      if (task !== undefined && !IN_FLIGHT.includes(task.status)) {
        throw new InvalidTransitionError(
          `Task ${taskId} is ${task.status}; resolve the escalation without a verdict`,
          { escalationId, taskId, verdict },
        )
      }
    }

    const escalation = this.escalations.resolve(escalationId, resolution)
    const result: ResolveResult = {
      escalation,
      taskId,
      verdict: verdict ?? null,
      followOnTaskId: null,
      requeuedTaskId: null,
    }
    if (verdict === undefined) return result

    if (task === undefined) {
      logger.warn({ escalationId, taskId }, 'Escalated task no longer exists; verdict ignored')
      return result
    }

    if (verdict === 'approve') {
      result.followOnTaskId = this._approve(task).followOnTaskId
    } else {
      result.requeuedTaskId = this._reject(task, [`Rejected on review: ${resolution}`])
    }
    logger.info({ escalationId, taskId, verdict }, 'Escalated task decided')
    return result
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A deliverable that is not a mapping at all counts as empty */
function parseDeliverable(raw: unknown, taskId: string): Deliverable {
  const parsed = DeliverableSchema.safeParse(raw ?? {})
  if (parsed.success) return parsed.data
  logger.warn({ taskId, issues: parsed.error.issues }, 'Malformed deliverable treated as empty')
  return {}
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateOrchestratorOptions {
  db: BetterSqlite3Database
  pipeline: Pipeline
  dispatcher: TaskDispatcher
  settings?: OrchestratorSettings
  eventBus?: TypedEventBus
  /** Overrides the policy named in settings */
  rejectionPolicy?: RejectionPolicy
  now?: () => Date
}

/**
 * Create an orchestrator and its stores over one database.
 *
 * @example
 * const orchestrator = createOrchestrator({ db, pipeline, dispatcher })
 * await orchestrator.initialize()
 * const report = await orchestrator.runCycle()
 */
export function createOrchestrator(options: CreateOrchestratorOptions): Orchestrator {
  const eventBus = options.eventBus ?? createEventBus()
  const now = options.now ?? (() => new Date())
  const settings = options.settings ?? DEFAULT_CONFIG.orchestrator

  return new OrchestratorImpl({
    eventBus,
    pipeline: options.pipeline,
    taskQueue: createTaskQueue(options.db, options.pipeline, eventBus, { now }),
    monitor: createAgentStatusMonitor(options.db, options.pipeline, { now }),
    escalations: createEscalationManager(options.db, eventBus, { now }),
    dispatcher: options.dispatcher,
    settings,
    rejectionPolicy:
      options.rejectionPolicy ??
      rejectionPolicyFromConfig(settings.rejection_policy, settings.max_requeues),
    now,
  })
}

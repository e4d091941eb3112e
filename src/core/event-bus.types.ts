/**
 * ConductorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "task:unblocked", "gate:decided")
 */

import type {
  AgentRole,
  EscalationId,
  GateDecision,
  Phase,
  StoryId,
  TaskId,
} from './types.js'

/** Why a scheduling cycle could make no further progress */
export type StallKind = 'dependency_cycle' | 'awaiting_escalations'

/**
 * Complete typed map of all events emitted on the conductor event bus.
 * Use `keyof ConductorEvents` to constrain event keys.
 */
export interface ConductorEvents {
  // -------------------------------------------------------------------------
  // Task lifecycle events
  // -------------------------------------------------------------------------

  /** Tasks were created for a story (decomposition, follow-on or requeue) */
  'task:enqueued': { storyId: StoryId; taskIds: TaskId[] }

  /** A blocked task had its last dependency complete and is now pending */
  'task:unblocked': { taskId: TaskId; unblockedBy: TaskId }

  /** A task was handed to the external executor for a role */
  'task:dispatched': { taskId: TaskId; storyId: StoryId; phase: Phase; role: AgentRole }

  /** Dispatch failed; the task went back to pending */
  'task:dispatch-failed': { taskId: TaskId; role: AgentRole; error: string }

  // -------------------------------------------------------------------------
  // Gate and escalation events
  // -------------------------------------------------------------------------

  /** The quality gate reached a verdict for a completed task */
  'gate:decided': { taskId: TaskId; role: AgentRole; decision: GateDecision; issues: string[] }

  /** An escalation was raised for human review */
  'escalation:created': { escalationId: EscalationId; storyId: StoryId; type: string }

  /** An escalation was resolved by a human */
  'escalation:resolved': { escalationId: EscalationId; storyId: StoryId }

  // -------------------------------------------------------------------------
  // Cycle events
  // -------------------------------------------------------------------------

  /** The queue cannot progress without outside action */
  'cycle:stalled': { kind: StallKind; taskIds: TaskId[]; cycle: TaskId[] }
}

/**
 * Core types for sprint-conductor
 * Shared type definitions used across all modules
 */

/** Unique identifier for a task (`<story_id>-<phase sequence>`) */
export type TaskId = string

/** Unique identifier for a backlog story */
export type StoryId = string

/** Unique identifier for an escalation (`ESC-N`) */
export type EscalationId = string

/** Stages of the content pipeline, in order */
export const PHASES = ['research', 'writing', 'editing', 'graphics', 'final-review'] as const
export type Phase = (typeof PHASES)[number]

/** Worker roles, one per phase */
export const AGENT_ROLES = ['research', 'writer', 'editor', 'graphics', 'final-review'] as const
export type AgentRole = (typeof AGENT_ROLES)[number]

/** Story priority label; P0 is the most urgent */
export const PRIORITIES = ['P0', 'P1', 'P2', 'P3'] as const
export type Priority = (typeof PRIORITIES)[number]

/** Status of a single task */
export const TASK_STATUSES = [
  'blocked',
  'pending',
  'assigned',
  'in_progress',
  'complete',
  'failed',
] as const
export type TaskStatus = (typeof TASK_STATUSES)[number]

/** Status a worker reports for its role */
export const AGENT_STATUSES = ['idle', 'in_progress', 'complete', 'blocked'] as const
export type AgentStatusValue = (typeof AGENT_STATUSES)[number]

/** Verdict of the quality gate for a deliverable */
export type GateDecision = 'APPROVE' | 'ESCALATE' | 'REJECT'

/** Allowed story point estimates */
export const STORY_POINT_VALUES = [1, 2, 3, 5, 8, 13] as const

export function isAgentRole(value: string): value is AgentRole {
  return (AGENT_ROLES as readonly string[]).includes(value)
}

export function isPhase(value: string): value is Phase {
  return (PHASES as readonly string[]).includes(value)
}

export function isTaskStatus(value: string): value is TaskStatus {
  return (TASK_STATUSES as readonly string[]).includes(value)
}

export function isAgentStatusValue(value: string): value is AgentStatusValue {
  return (AGENT_STATUSES as readonly string[]).includes(value)
}

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value)
}

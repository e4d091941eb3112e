/**
 * AgentStatusMonitor: interface contract for the per-role worker status store.
 *
 * Workers write their own status record (`updateAgentStatus`); the
 * orchestrator polls for completions, which are reported exactly once each.
 * Routing between roles is a table lookup delegated to the pipeline.
 */

import type { AgentRole, AgentStatusValue, TaskId } from '../../core/types.js'
import type { AgentStatus } from '../../persistence/queries/agent-status.js'

export interface AgentStatusSnapshot {
  last_poll: string | null
  agents: AgentStatus[]
}

/** Worker-side fields written alongside a status change */
export interface AgentStatusUpdate {
  currentTaskId?: TaskId | null
  deliverable?: unknown
}

export interface AgentStatusMonitor {
  /**
   * Seed an idle record for every pipeline role that has none.
   * @returns the roles that were created
   */
  ensureAgents(): AgentRole[]

  /**
   * Records that reached `complete` and have not been reported yet. Each is
   * claimed before it is returned, so a second poll does not repeat it.
   * Stamps `last_poll`.
   */
  pollStatusUpdates(): AgentStatus[]

  /**
   * Role that receives work after `role`, or null for the terminal role.
   * @throws {NotFoundError} for an unknown role
   */
  determineNextAgent(role: string): AgentRole | null

  /** Records currently reporting `blocked`; nothing is modified */
  detectBlockers(): AgentStatus[]

  /**
   * Write a worker's status. Resets `processed` so a new completion is
   * picked up by the next poll. Unspecified fields keep their stored values.
   * @throws {NotFoundError} for an unknown role
   */
  updateAgentStatus(role: string, status: AgentStatusValue, update?: AgentStatusUpdate): AgentStatus

  /** Mark `role` busy with `taskId` and clear its previous deliverable */
  recordDispatch(role: AgentRole, taskId: TaskId): void

  /** True when the role has no unreported or running work */
  isAvailable(role: AgentRole): boolean

  getAgent(role: AgentRole): AgentStatus | undefined
  listAgents(): AgentStatus[]
  snapshot(): AgentStatusSnapshot
}

/**
 * EscalationManager: durable log of questions that need a human decision.
 *
 * Ids are `ESC-N`, strictly increasing and never reused. Resolution is
 * one-way: an escalation cannot be resolved twice or reopened.
 */

import type { EscalationId, StoryId } from '../../core/types.js'
import type { Escalation } from '../../persistence/queries/escalations.js'

/** Escalation kinds raised by the conductor itself; callers may use others */
export const GATE_REVIEW = 'gate_review'
export const DOR_GAP = 'dor_gap'

export interface CreateEscalationRequest {
  storyId: StoryId
  type: string
  question: string
  context?: Record<string, unknown>
  recommendation?: string | null
}

export interface EscalationSnapshot {
  escalations: Escalation[]
}

export interface EscalationManager {
  /** Append an unresolved escalation and return its id */
  create(request: CreateEscalationRequest): EscalationId

  /** Unresolved escalations in creation order */
  getUnresolved(): Escalation[]

  /**
   * Record the human decision.
   * @throws {NotFoundError} for an unknown id
   * @throws {InvalidTransitionError} when already resolved
   */
  resolve(escalationId: EscalationId, resolution: string): Escalation

  get(escalationId: EscalationId): Escalation | undefined
  list(): Escalation[]
  hasUnresolvedForStory(storyId: StoryId): boolean
  snapshot(): EscalationSnapshot
}

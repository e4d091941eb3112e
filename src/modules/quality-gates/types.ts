/**
 * Shared types for the Quality Gates module.
 */

import type { Deliverable, StoryInput } from '../backlog/schemas.js'

// ---------------------------------------------------------------------------
// Definition of Ready
// ---------------------------------------------------------------------------

/** Story fields the Definition of Ready requires, in reporting order */
export const REQUIRED_STORY_FIELDS = [
  'user_story',
  'acceptance_criteria',
  'quality_requirements',
  'story_points',
] as const

export type RequiredStoryField = (typeof REQUIRED_STORY_FIELDS)[number]

export interface ReadinessResult {
  pass: boolean
  missingFields: RequiredStoryField[]
}

/** Returns true when the story satisfies the named field */
export type StoryFieldCheck = (story: StoryInput) => boolean

// ---------------------------------------------------------------------------
// Definition of Done
// ---------------------------------------------------------------------------

/**
 * A single Definition of Done check. Returns zero or more issue strings;
 * issues from every check accumulate independently.
 */
export interface DeliverableCheck {
  name: string
  evaluate(deliverable: Deliverable): string[]
}

export interface DoneResult {
  pass: boolean
  issues: string[]
}

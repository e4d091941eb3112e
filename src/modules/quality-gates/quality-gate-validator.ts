/**
 * Quality Gate Validator: pure Definition of Ready / Definition of Done checks.
 *
 * Nothing here touches storage or the clock: the same input always yields the
 * same verdict.
 *
 * Gate decision by issue count:
 *   0     → APPROVE
 *   1..2  → ESCALATE (borderline, worth a human glance)
 *   3+    → REJECT   (fundamentally unfit, no review cycle spent)
 */

import { STORY_POINT_VALUES, type GateDecision } from '../../core/types.js'
import type { Deliverable, StoryInput } from '../backlog/schemas.js'
import {
  REQUIRED_STORY_FIELDS,
  type DeliverableCheck,
  type DoneResult,
  type ReadinessResult,
  type RequiredStoryField,
  type StoryFieldCheck,
} from './types.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MIN_ACCEPTANCE_CRITERIA = 3
export const MAX_ACCEPTANCE_CRITERIA = 7

/** Highest issue count that still earns a human review instead of a rejection */
export const MAX_ESCALATION_ISSUES = 2

/** Each criterion carries a checkbox marking its state: `[ ]` open, `[x]` met */
const CRITERION_PREFIX = /^\[( |x|X)\]\s+\S/

// ---------------------------------------------------------------------------
// Definition of Ready
// ---------------------------------------------------------------------------

const STORY_FIELD_CHECKS: Record<RequiredStoryField, StoryFieldCheck> = {
  user_story: (story) => (story.user_story ?? '').trim().length > 0,

  acceptance_criteria: (story) => {
    const criteria = story.acceptance_criteria ?? []
    return (
      criteria.length >= MIN_ACCEPTANCE_CRITERIA &&
      criteria.length <= MAX_ACCEPTANCE_CRITERIA &&
      criteria.every((c) => CRITERION_PREFIX.test(c.trim()))
    )
  },

  quality_requirements: (story) => {
    const requirements = story.quality_requirements ?? {}
    return Object.keys(requirements).length > 0
  },

  story_points: (story) =>
    story.story_points !== undefined &&
    STORY_POINT_VALUES.some((value) => value === story.story_points),
}

/**
 * Definition of Ready: report every required field that is absent, empty,
 * or malformed, in declaration order.
 */
export function validateDoR(story: StoryInput): ReadinessResult {
  const missingFields = REQUIRED_STORY_FIELDS.filter((field) => !STORY_FIELD_CHECKS[field](story))
  return { pass: missingFields.length === 0, missingFields }
}

// ---------------------------------------------------------------------------
// Definition of Done
// ---------------------------------------------------------------------------

export const SELF_VALIDATION_ISSUE = 'Self-validation failed'
export const MISSING_OUTPUT_ISSUE = 'Missing output'

export const DEFINITION_OF_DONE: readonly DeliverableCheck[] = [
  {
    name: 'self-validation',
    evaluate: (d) => (d.self_validation?.passed === true ? [] : [SELF_VALIDATION_ISSUE]),
  },
  {
    name: 'output',
    evaluate: (d) => ((d.output?.path ?? '').trim().length > 0 ? [] : [MISSING_OUTPUT_ISSUE]),
  },
  {
    name: 'acceptance-criteria',
    evaluate: (d) =>
      (d.acceptance_criteria_results ?? []).flatMap((result, index) =>
        result.passed === true
          ? []
          : [`Acceptance criterion failed: ${result.criterion ?? `#${String(index + 1)}`}`],
      ),
  },
]

/**
 * Definition of Done: run every check and accumulate their issues.
 */
export function validateDoD(
  deliverable: Deliverable,
  checks: readonly DeliverableCheck[] = DEFINITION_OF_DONE,
): DoneResult {
  const issues = checks.flatMap((check) => check.evaluate(deliverable))
  return { pass: issues.length === 0, issues }
}

// ---------------------------------------------------------------------------
// Gate decision
// ---------------------------------------------------------------------------

/**
 * Coarse verdict from the number of issues; the content of the issues is ignored.
 */
export function gateDecision(issues: readonly string[]): GateDecision {
  if (issues.length === 0) return 'APPROVE'
  if (issues.length <= MAX_ESCALATION_ISSUES) return 'ESCALATE'
  return 'REJECT'
}

/**
 * quality-gates module: Definition of Ready / Done and gate decisions
 */

export type {
  RequiredStoryField,
  ReadinessResult,
  DeliverableCheck,
  DoneResult,
} from './types.js'
export { REQUIRED_STORY_FIELDS } from './types.js'

export {
  validateDoR,
  validateDoD,
  gateDecision,
  DEFINITION_OF_DONE,
  SELF_VALIDATION_ISSUE,
  MISSING_OUTPUT_ISSUE,
  MIN_ACCEPTANCE_CRITERIA,
  MAX_ACCEPTANCE_CRITERIA,
  MAX_ESCALATION_ISSUES,
} from './quality-gate-validator.js'

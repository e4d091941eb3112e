/**
 * escalation module: durable log of open questions for a human
 */

export type {
  CreateEscalationRequest,
  EscalationManager,
  EscalationSnapshot,
} from './escalation-manager.js'
export { GATE_REVIEW, DOR_GAP } from './escalation-manager.js'
export type { EscalationManagerOptions } from './escalation-manager-impl.js'
export {
  CONDUCTOR_AUTHOR,
  EscalationManagerImpl,
  createEscalationManager,
} from './escalation-manager-impl.js'

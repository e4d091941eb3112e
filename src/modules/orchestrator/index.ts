/**
 * orchestrator module: the scheduling cycle and its worker boundary
 */

export type {
  CycleReport,
  DispatchFailure,
  DispatchRequest,
  DispatchedTask,
  EnqueueOutcome,
  EnqueueResult,
  EscalationVerdict,
  GateOutcome,
  Orchestrator,
  RejectionAction,
  RejectionPolicy,
  ResolveResult,
  SkippedCompletion,
  Stall,
  TaskDispatcher,
} from './orchestrator.js'
export type { CreateOrchestratorOptions, OrchestratorDeps } from './orchestrator-impl.js'
export { OrchestratorImpl, createOrchestrator } from './orchestrator-impl.js'
export { failPolicy, requeuePolicy, rejectionPolicyFromConfig } from './rejection-policy.js'
export type { InboxMessage } from './file-dispatcher.js'
export { FileDispatcher, inboxPath } from './file-dispatcher.js'

/**
 * agent-monitor module: worker status records, idempotent completion polling, routing
 */

export type {
  AgentStatusMonitor,
  AgentStatusSnapshot,
  AgentStatusUpdate,
} from './agent-status-monitor.js'
export type { AgentStatusMonitorOptions } from './agent-status-monitor-impl.js'
export { AgentStatusMonitorImpl, createAgentStatusMonitor } from './agent-status-monitor-impl.js'

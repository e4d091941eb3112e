/**
 * Human-readable formatters for `conductor status` and `conductor escalations`.
 */

import type { Escalation } from '../../persistence/queries/escalations.js'
import type { AgentStatusSnapshot } from '../../modules/agent-monitor/agent-status-monitor.js'
import type { TaskQueueSnapshot } from '../../modules/task-queue/task-queue.js'
import { TASK_STATUSES } from '../../core/types.js'
import { formatTable, listCell } from '../utils/formatting.js'

export interface StatusView {
  queue: TaskQueueSnapshot
  agents: AgentStatusSnapshot
  openEscalations: Escalation[]
}

// ---------------------------------------------------------------------------
// renderStatusHuman
// ---------------------------------------------------------------------------

/**
 * Output sections:
 *  - Header: Sprint <id>  Updated: <ts>
 *  - Task counts by status
 *  - Task table and agent table
 *  - Footer: open escalation count
 */
export function renderStatusHuman(view: StatusView): string {
  const { queue, agents } = view
  const lines: string[] = []

  lines.push(`Sprint: ${queue.sprint_id ?? '-'}  Updated: ${queue.last_updated ?? '-'}`)
  lines.push('')

  const counts: Record<string, string> = { total: String(queue.tasks.length) }
  for (const status of TASK_STATUSES) {
    counts[status] = String(queue.tasks.filter((t) => t.status === status).length)
  }
  lines.push(
    formatTable(
      ['Blocked', 'Pending', 'Assigned', 'In progress', 'Complete', 'Failed', 'Total'],
      [counts],
      [...TASK_STATUSES, 'total'],
    ),
  )

  if (queue.tasks.length > 0) {
    lines.push('')
    lines.push(
      formatTable(
        ['Task', 'Phase', 'Status', 'Priority', 'Agent', 'Depends on'],
        queue.tasks.map((t) => ({
          task: t.task_id,
          phase: t.phase,
          status: t.status,
          priority: t.priority,
          agent: t.assigned_to ?? '-',
          deps: listCell(t.depends_on),
        })),
        ['task', 'phase', 'status', 'priority', 'agent', 'deps'],
      ),
    )
  }

  lines.push('')
  lines.push(
    formatTable(
      ['Role', 'Status', 'Task', 'Reported'],
      agents.agents.map((a) => ({
        role: a.agent_role,
        status: a.status,
        task: a.current_task_id ?? '-',
        reported: a.status === 'complete' ? (a.processed ? 'yes' : 'no') : '-',
      })),
      ['role', 'status', 'task', 'reported'],
    ),
  )

  lines.push('')
  lines.push(`Last poll: ${agents.last_poll ?? 'never'}`)
  lines.push(`Open escalations: ${String(view.openEscalations.length)}`)

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderEscalationsHuman
// ---------------------------------------------------------------------------

export function renderEscalationsHuman(escalations: readonly Escalation[], includeResolved: boolean): string {
  if (escalations.length === 0) {
    return includeResolved ? 'No escalations.' : 'No open escalations.'
  }

  const blocks = escalations.map((e) => {
    const state = e.resolved ? `resolved ${e.resolved_at ?? ''}`.trimEnd() : 'open'
    const lines = [`${e.escalation_id}  [${e.type}]  story ${e.story_id}  (${state})`, `  ${e.question}`]
    if (e.recommendation !== null) lines.push(`  Recommendation: ${e.recommendation}`)
    if (e.resolution !== null) lines.push(`  Resolution: ${e.resolution}`)
    return lines.join('\n')
  })
  return blocks.join('\n\n')
}

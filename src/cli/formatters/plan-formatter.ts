/**
 * plan-formatter.ts: human-readable output for `conductor plan`.
 */

import type { EnqueueOutcome, EnqueueResult } from '../../modules/orchestrator/orchestrator.js'
import { formatTable, listCell } from '../utils/formatting.js'

/**
 * One row per story, then a count line:
 *
 *   Story | Outcome  | Tasks            | Missing | Escalation
 *   ------+----------+------------------+---------+-----------
 *   S1    | enqueued | S1-1, S1-2, S1-3 | -       | -
 *
 *   Enqueued 1 of 1 stories (0 not ready, 0 already enqueued)
 */
export function renderPlanHuman(results: readonly EnqueueResult[]): string {
  if (results.length === 0) {
    return 'Backlog has no stories.'
  }

  const rows = results.map((r) => ({
    story: r.storyId,
    outcome: r.outcome,
    tasks: listCell(r.taskIds),
    missing: listCell(r.missingFields),
    escalation: r.escalationId ?? '-',
  }))
  const table = formatTable(
    ['Story', 'Outcome', 'Tasks', 'Missing', 'Escalation'],
    rows,
    ['story', 'outcome', 'tasks', 'missing', 'escalation'],
  )

  const count = (outcome: EnqueueOutcome): string =>
    String(results.filter((r) => r.outcome === outcome).length)

  return [
    table,
    '',
    `Enqueued ${count('enqueued')} of ${String(results.length)} stories (${count('not_ready')} not ready, ${count('duplicate')} already enqueued)`,
  ].join('\n')
}

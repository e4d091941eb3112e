/**
 * cycle-formatter.ts: human-readable output for `conductor cycle`.
 */

import type { CycleReport, GateOutcome } from '../../modules/orchestrator/orchestrator.js'

function describeOutcome(outcome: GateOutcome): string {
  let line = `  ${outcome.taskId} (${outcome.role}): ${outcome.decision}`
  if (outcome.escalationId !== null) line += ` as ${outcome.escalationId}`
  if (outcome.issues.length > 0) line += ` [${outcome.issues.join('; ')}]`
  if (outcome.followOnTaskId !== null) line += ` -> ${outcome.followOnTaskId}`
  if (outcome.requeuedTaskId !== null) line += ` -> requeued as ${outcome.requeuedTaskId}`
  return line
}

/**
 * Sections appear only when they have content, except the dispatch count.
 */
export function renderCycleHuman(report: CycleReport): string {
  const lines: string[] = []

  if (report.completions.length > 0) {
    lines.push('Completions:')
    lines.push(...report.completions.map(describeOutcome))
  }

  if (report.skipped.length > 0) {
    lines.push('Skipped completions:')
    for (const s of report.skipped) {
      lines.push(`  ${s.role} (${s.taskId ?? 'no task'}): ${s.reason}`)
    }
  }

  lines.push(`Dispatched: ${String(report.dispatched.length)}`)
  for (const d of report.dispatched) {
    lines.push(`  ${d.taskId} -> ${d.role}`)
  }

  if (report.dispatchFailures.length > 0) {
    lines.push('Dispatch failures:')
    for (const f of report.dispatchFailures) {
      lines.push(`  ${f.taskId} -> ${f.role}: ${f.error}`)
    }
  }

  if (report.blockers.length > 0) {
    lines.push(`Blocked agents: ${report.blockers.map((b) => b.agent_role).join(', ')}`)
  }

  if (report.stall !== null) {
    lines.push(`Stalled (${report.stall.kind}): ${report.stall.taskIds.join(', ')}`)
    if (report.stall.cycle.length > 0) {
      lines.push(`  cycle: ${report.stall.cycle.join(' -> ')}`)
    }
  }

  return lines.join('\n')
}

/**
 * Unit tests for the human-readable formatters.
 */

import { describe, it, expect } from 'vitest'
import type { CycleReport } from '../../../modules/orchestrator/orchestrator.js'
import type { Escalation } from '../../../persistence/queries/escalations.js'
import { formatTable, listCell, parseOutputFormat, buildJsonOutput } from '../../utils/formatting.js'
import { renderCycleHuman } from '../cycle-formatter.js'
import { renderPlanHuman } from '../plan-formatter.js'
import { renderEscalationsHuman } from '../status-formatter.js'

const EMPTY_REPORT: CycleReport = {
  completions: [],
  skipped: [],
  dispatched: [],
  dispatchFailures: [],
  blockers: [],
  stall: null,
}

describe('formatTable', () => {
  it('pads columns to the widest cell and trims trailing space', () => {
    const table = formatTable(
      ['Id', 'Name'],
      [
        { id: 'S1', name: 'Digest' },
        { id: 'S10', name: '' },
      ],
      ['id', 'name'],
    )

    expect(table.split('\n')).toEqual(['Id  | Name', '----+-------', 'S1  | Digest', 'S10 |'])
  })
})

describe('small helpers', () => {
  it('listCell renders a dash for an empty list', () => {
    expect(listCell([])).toBe('-')
    expect(listCell(['a', 'b'])).toBe('a, b')
  })

  it('parseOutputFormat falls back to human', () => {
    expect(parseOutputFormat('json')).toBe('json')
    expect(parseOutputFormat('xml')).toBe('human')
    expect(parseOutputFormat(undefined)).toBe('human')
  })

  it('buildJsonOutput wraps the data with command and version', () => {
    const out = buildJsonOutput('conductor status', { ok: true }, '0.1.0')

    expect(out).toMatchObject({ command: 'conductor status', version: '0.1.0', data: { ok: true } })
    expect(Number.isNaN(Date.parse(out.timestamp))).toBe(false)
  })
})

describe('renderPlanHuman', () => {
  it('reports an empty backlog', () => {
    expect(renderPlanHuman([])).toBe('Backlog has no stories.')
  })
})

describe('renderCycleHuman', () => {
  it('prints only the dispatch count for an idle cycle', () => {
    expect(renderCycleHuman(EMPTY_REPORT)).toBe('Dispatched: 0')
  })

  it('prints every section that has content', () => {
    const report: CycleReport = {
      completions: [
        {
          taskId: 'S1-1',
          role: 'research',
          decision: 'APPROVE',
          issues: [],
          escalationId: null,
          followOnTaskId: 'S1-2',
          requeuedTaskId: null,
        },
        {
          taskId: 'S2-2',
          role: 'writer',
          decision: 'REJECT',
          issues: ['Missing output', 'Self-validation failed', 'Acceptance criterion failed: #1'],
          escalationId: null,
          followOnTaskId: null,
          requeuedTaskId: 'S2-2-r1',
        },
      ],
      skipped: [{ role: 'editor', taskId: null, reason: 'no current task' }],
      dispatched: [],
      dispatchFailures: [],
      blockers: [
        {
          agent_role: 'graphics',
          status: 'blocked',
          current_task_id: 'S3-4',
          processed: false,
          deliverable: null,
          updated_at: '2026-03-02T09:00:00.000Z',
        },
      ],
      stall: { kind: 'dependency_cycle', taskIds: ['A', 'B'], cycle: ['A', 'B', 'A'] },
    }

    expect(renderCycleHuman(report).split('\n')).toEqual([
      'Completions:',
      '  S1-1 (research): APPROVE -> S1-2',
      '  S2-2 (writer): REJECT [Missing output; Self-validation failed; Acceptance criterion failed: #1] -> requeued as S2-2-r1',
      'Skipped completions:',
      '  editor (no task): no current task',
      'Dispatched: 0',
      'Blocked agents: graphics',
      'Stalled (dependency_cycle): A, B',
      '  cycle: A -> B -> A',
    ])
  })
})

describe('renderEscalationsHuman', () => {
  const escalation: Escalation = {
    escalation_id: 'ESC-3',
    story_id: 'S4',
    type: 'gate_review',
    question: 'Deliverable for S4-2 (writing) has 1 issue(s). Approve or reject?',
    context: { task_id: 'S4-2' },
    recommendation: null,
    created_at: '2026-03-02T09:00:00.000Z',
    raised_by: 'conductor',
    resolved: true,
    resolution: 'Approved after a second read',
    resolved_at: '2026-03-02T10:00:00.000Z',
  }

  it('says so when there is nothing to show', () => {
    expect(renderEscalationsHuman([], false)).toBe('No open escalations.')
    expect(renderEscalationsHuman([], true)).toBe('No escalations.')
  })

  it('renders a resolved escalation with its resolution', () => {
    expect(renderEscalationsHuman([escalation], true)).toBe(
      [
        'ESC-3  [gate_review]  story S4  (resolved 2026-03-02T10:00:00.000Z)',
        '  Deliverable for S4-2 (writing) has 1 issue(s). Approve or reject?',
        '  Resolution: Approved after a second read',
      ].join('\n'),
    )
  })
})

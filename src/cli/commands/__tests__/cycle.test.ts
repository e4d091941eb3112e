/**
 * Unit tests for `src/cli/commands/cycle.ts`
 *
 * Drives a planned project through report → cycle rounds and checks the
 * printed report and exit code of each round.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'fs'
import { join } from 'path'
import type { DispatchRequest, TaskDispatcher } from '../../../modules/orchestrator/orchestrator.js'
import { runCycleAction } from '../cycle.js'
import {
  BAD_DELIVERABLE,
  BORDERLINE_DELIVERABLE,
  GOOD_DELIVERABLE,
  captured,
  makeProject,
  planProject,
  removeProject,
  reportComplete,
  silenceLogs,
} from './helpers.js'

let projectRoot: string
let restoreLogs: () => void

beforeEach(async () => {
  restoreLogs = silenceLogs()
  projectRoot = await makeProject()
})

afterEach(async () => {
  restoreLogs()
  await removeProject(projectRoot)
})

function cycle(options: { json?: boolean; dispatcher?: TaskDispatcher } = {}) {
  return captured(() =>
    runCycleAction({
      outputFormat: options.json === true ? 'json' : 'human',
      projectRoot,
      env: {},
      ...(options.dispatcher !== undefined && { dispatcher: options.dispatcher }),
    }),
  )
}

describe('runCycleAction', () => {
  it('exits 2 before any plan has run', async () => {
    const { code, stderr } = await cycle()

    expect(code).toBe(2)
    expect(stderr).toBe(
      `Error: No conductor state found at ${join(projectRoot, '.conductor', 'state.db')}. ` +
        "Run 'conductor plan <backlog>' first.\n",
    )
  })

  it('dispatches the first task into the role inbox', async () => {
    await planProject(projectRoot)

    const { code, stdout } = await cycle()

    expect(code).toBe(0)
    expect(stdout).toBe('Dispatched: 1\n  S1-1 -> research\n')
    expect(existsSync(join(projectRoot, '.conductor', 'inbox', 'research', 'S1-1.json'))).toBe(true)
  })

  it('approves a clean deliverable and moves the story to the next role', async () => {
    await planProject(projectRoot)
    await cycle()
    await reportComplete(projectRoot, 'research', GOOD_DELIVERABLE)

    const { code, stdout } = await cycle()

    expect(code).toBe(0)
    expect(stdout).toBe('Completions:\n  S1-1 (research): APPROVE\nDispatched: 1\n  S1-2 -> writer\n')
  })

  it('escalates a borderline deliverable and exits 3 while the story waits', async () => {
    await planProject(projectRoot)
    await cycle()
    await reportComplete(projectRoot, 'research', BORDERLINE_DELIVERABLE)

    const { code, stdout } = await cycle()

    expect(code).toBe(3)
    expect(stdout).toBe(
      [
        'Completions:',
        '  S1-1 (research): ESCALATE as ESC-2 [Self-validation failed]',
        'Dispatched: 0',
        'Stalled (awaiting_escalations): S1-1, S1-2, S1-3',
        '',
      ].join('\n'),
    )
  })

  it('rejects a deliverable with three issues and reports the blocked dependents', async () => {
    await planProject(projectRoot)
    await cycle()
    await reportComplete(projectRoot, 'research', BAD_DELIVERABLE)

    const { code, stdout } = await cycle()

    expect(code).toBe(3)
    expect(stdout).toBe(
      [
        'Completions:',
        '  S1-1 (research): REJECT [Self-validation failed; Missing output; Acceptance criterion failed: Links checked]',
        'Dispatched: 0',
        'Stalled (dependency_cycle): S1-2, S1-3',
        '',
      ].join('\n'),
    )
  })

  it('reports a failed dispatch and leaves the task pending', async () => {
    await planProject(projectRoot)
    const failing: TaskDispatcher = {
      dispatch: (_request: DispatchRequest) => Promise.reject(new Error('inbox unavailable')),
    }

    const { code, stdout } = await cycle({ dispatcher: failing })

    expect(code).toBe(0)
    expect(stdout).toBe('Dispatched: 0\nDispatch failures:\n  S1-1 -> research: inbox unavailable\n')
  })

  it('emits the cycle report as JSON', async () => {
    await planProject(projectRoot)

    const { stdout } = await cycle({ json: true })

    const envelope = JSON.parse(stdout) as { command: string; data: Record<string, unknown> }
    expect(envelope.command).toBe('conductor cycle')
    expect(envelope.data).toEqual({
      completions: [],
      skipped: [],
      dispatched: [{ taskId: 'S1-1', role: 'research' }],
      dispatchFailures: [],
      blockers: [],
      stall: null,
    })
  })
})

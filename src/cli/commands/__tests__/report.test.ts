/**
 * Unit tests for `src/cli/commands/report.ts`
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { runReportAction, type ReportActionOptions } from '../report.js'
import {
  BORDERLINE_DELIVERABLE,
  captured,
  makeProject,
  planProject,
  removeProject,
  silenceLogs,
  writeProjectFile,
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

function report(options: Pick<ReportActionOptions, 'role' | 'status'> & Partial<ReportActionOptions>) {
  return captured(() =>
    runReportAction({ outputFormat: 'human', projectRoot, env: {}, ...options }),
  )
}

describe('runReportAction', () => {
  it('records a status with the task the worker is on', async () => {
    await planProject(projectRoot)

    const { code, stdout } = await report({ role: 'writer', status: 'in_progress', taskId: 'S1-2' })

    expect(code).toBe(0)
    expect(stdout).toBe('Recorded writer: in_progress (S1-2)\n')
  })

  it('stores a YAML deliverable as structured data', async () => {
    await planProject(projectRoot)
    await writeProjectFile(projectRoot, 'out/S1-1.yaml', BORDERLINE_DELIVERABLE)

    const { code, stdout } = await report({
      role: 'research',
      status: 'complete',
      deliverablePath: 'out/S1-1.yaml',
      outputFormat: 'json',
    })

    expect(code).toBe(0)
    const envelope = JSON.parse(stdout) as {
      command: string
      data: { agent_role: string; status: string; processed: boolean; deliverable: unknown }
    }
    expect(envelope.command).toBe('conductor report')
    expect(envelope.data.agent_role).toBe('research')
    expect(envelope.data.status).toBe('complete')
    expect(envelope.data.processed).toBe(false)
    expect(envelope.data.deliverable).toEqual({
      self_validation: { passed: false },
      output: { path: 'research/S1.md' },
    })
  })

  it('exits 2 for an unknown status without touching state', async () => {
    const { code, stderr } = await report({ role: 'writer', status: 'done' })

    expect(code).toBe(2)
    expect(stderr).toBe(
      'Error: unknown status "done". Expected one of: idle, in_progress, complete, blocked\n',
    )
  })

  it('exits 2 for an unknown role', async () => {
    await planProject(projectRoot)

    const { code, stderr } = await report({ role: 'copywriter', status: 'idle' })

    expect(code).toBe(2)
    expect(stderr).toBe('Error: Unknown agent: copywriter\n')
  })

  it('exits 2 when the deliverable cannot be read', async () => {
    await planProject(projectRoot)

    const { code, stderr } = await report({
      role: 'research',
      status: 'complete',
      deliverablePath: 'out/missing.json',
    })

    expect(code).toBe(2)
    expect(stderr).toMatch(/^Error: cannot read deliverable .*missing\.json: ENOENT/)
  })
})

/**
 * Shared fixtures for the command tests: a throwaway project directory and
 * stdout/stderr capture.
 */

import { vi } from 'vitest'
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { runPlanAction } from '../plan.js'
import { runReportAction } from '../report.js'

export interface CapturedOutput {
  getStdout: () => string
  getStderr: () => string
  restore: () => void
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

/** Run `fn` with output captured; the capture is always restored */
export async function captured(fn: () => Promise<number>): Promise<{ code: number; stdout: string; stderr: string }> {
  const output = captureOutput()
  try {
    const code = await fn()
    return { code, stdout: output.getStdout(), stderr: output.getStderr() }
  } finally {
    output.restore()
  }
}

export async function makeProject(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'conductor-cli-'))
}

export async function removeProject(projectRoot: string): Promise<void> {
  await rm(projectRoot, { recursive: true, force: true })
}

export async function writeProjectFile(projectRoot: string, relPath: string, content: string): Promise<string> {
  const target = join(projectRoot, relPath)
  await mkdir(join(target, '..'), { recursive: true })
  await writeFile(target, content, 'utf-8')
  return target
}

/** Ready story S1 and story S2, which has no story points */
export const BACKLOG_YAML = `sprint_id: sprint-7
stories:
  - story_id: S1
    user_story: As a reader I want a weekly digest so that I catch up quickly
    acceptance_criteria:
      - "[ ] Five items"
      - "[ ] One chart"
      - "[ ] Links checked"
    quality_requirements:
      tone: friendly
    story_points: 3
    priority: P1
  - story_id: S2
    user_story: As a reader I want a glossary page
    acceptance_criteria:
      - "[ ] Ten terms"
      - "[ ] Sources cited"
      - "[ ] Alphabetical"
    quality_requirements:
      tone: plain
    priority: P2
`

export const GOOD_DELIVERABLE = JSON.stringify({
  self_validation: { passed: true },
  output: { path: 'research/S1.md' },
  acceptance_criteria_results: [{ criterion: 'Five items', passed: true }],
})

/** One issue: self-validation */
export const BORDERLINE_DELIVERABLE = `self_validation:
  passed: false
output:
  path: research/S1.md
`

/** Three issues */
export const BAD_DELIVERABLE = JSON.stringify({
  acceptance_criteria_results: [{ criterion: 'Links checked', passed: false }],
})

// ---------------------------------------------------------------------------
// Project setup through the commands themselves
// ---------------------------------------------------------------------------

/** Write BACKLOG_YAML and plan it: S1 becomes S1-1..S1-3, S2 raises ESC-1 */
export async function planProject(projectRoot: string): Promise<void> {
  await writeProjectFile(projectRoot, 'backlog.yaml', BACKLOG_YAML)
  const { code } = await captured(() =>
    runPlanAction({ backlogPath: 'backlog.yaml', outputFormat: 'human', projectRoot, env: {} }),
  )
  if (code !== 0) throw new Error(`plan exited ${String(code)}`)
}

/** Report `role` complete with the given deliverable document */
export async function reportComplete(projectRoot: string, role: string, deliverable: string): Promise<void> {
  const path = await writeProjectFile(projectRoot, `out/${role}.json`, deliverable)
  const { code } = await captured(() =>
    runReportAction({
      role,
      status: 'complete',
      deliverablePath: path,
      outputFormat: 'human',
      projectRoot,
      env: {},
    }),
  )
  if (code !== 0) throw new Error(`report exited ${String(code)}`)
}

/** Keep pino quiet while a test file runs */
export function silenceLogs(): () => void {
  const saved = process.env.LOG_LEVEL
  process.env.LOG_LEVEL = 'silent'
  return () => {
    if (saved === undefined) delete process.env.LOG_LEVEL
    else process.env.LOG_LEVEL = saved
  }
}

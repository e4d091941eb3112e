/**
 * Unit tests for FileDispatcher and the built-in rejection policies.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import type { Task } from '../../../persistence/queries/tasks.js'
import { FileDispatcher, inboxPath } from '../file-dispatcher.js'
import { failPolicy, rejectionPolicyFromConfig, requeuePolicy } from '../rejection-policy.js'

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    task_id: 'S1-2',
    story_id: 'S1',
    title: 'Write: Weekly digest',
    phase: 'writing',
    status: 'assigned',
    priority: 'P1',
    assigned_to: 'writer',
    depends_on: ['S1-1'],
    attempt: 1,
    created_at: '2026-03-02T09:00:00.000Z',
    assigned_at: '2026-03-02T09:05:00.000Z',
    completed_at: null,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// FileDispatcher
// ---------------------------------------------------------------------------

describe('FileDispatcher', () => {
  let inboxDir: string

  beforeEach(async () => {
    inboxDir = await mkdtemp(join(tmpdir(), 'conductor-inbox-'))
  })

  afterEach(async () => {
    await rm(inboxDir, { recursive: true, force: true })
  })

  it('writes the task to the role inbox', async () => {
    const dispatcher = new FileDispatcher(inboxDir)

    await dispatcher.dispatch({
      task: makeTask(),
      role: 'writer',
      story: { story_id: 'S1', priority: 'P1', user_story: 'Weekly digest' },
      dispatchedAt: '2026-03-02T09:05:00.000Z',
    })

    const target = inboxPath(inboxDir, 'writer', 'S1-2')
    expect(target).toBe(join(inboxDir, 'writer', 'S1-2.json'))
    const message: unknown = JSON.parse(await readFile(target, 'utf-8'))
    expect(message).toEqual({
      task_id: 'S1-2',
      story_id: 'S1',
      phase: 'writing',
      role: 'writer',
      title: 'Write: Weekly digest',
      attempt: 1,
      depends_on: ['S1-1'],
      dispatched_at: '2026-03-02T09:05:00.000Z',
      story: { story_id: 'S1', priority: 'P1', user_story: 'Weekly digest' },
    })
  })

  it('writes null when the story is unknown', async () => {
    const dispatcher = new FileDispatcher(inboxDir)

    await dispatcher.dispatch({
      task: makeTask({ task_id: 'S1-1', phase: 'research', depends_on: [] }),
      role: 'research',
      story: undefined,
      dispatchedAt: '2026-03-02T09:05:00.000Z',
    })

    const raw = await readFile(inboxPath(inboxDir, 'research', 'S1-1'), 'utf-8')
    expect(raw.endsWith('}\n')).toBe(true)
    expect(JSON.parse(raw)).toMatchObject({ task_id: 'S1-1', story: null })
  })
})

// ---------------------------------------------------------------------------
// Rejection policies
// ---------------------------------------------------------------------------

describe('rejection policies', () => {
  it('fail never requeues', () => {
    expect(failPolicy.decide(makeTask(), ['Missing output'])).toBe('fail')
  })

  it('requeue allows maxRequeues retries', () => {
    const policy = requeuePolicy(2)

    expect(policy.decide(makeTask({ attempt: 1 }), [])).toBe('requeue')
    expect(policy.decide(makeTask({ attempt: 2 }), [])).toBe('requeue')
    expect(policy.decide(makeTask({ attempt: 3 }), [])).toBe('fail')
  })

  it('requeue with zero retries behaves like fail', () => {
    expect(requeuePolicy(0).decide(makeTask(), [])).toBe('fail')
  })

  it('picks the policy named in configuration', () => {
    expect(rejectionPolicyFromConfig('fail', 3).name).toBe('fail')
    expect(rejectionPolicyFromConfig('requeue', 3).name).toBe('requeue')
  })
})

/**
 * FileDispatcher: hands tasks to workers through per-role inbox directories.
 *
 * Each dispatch writes `<inboxDir>/<role>/<task_id>.json`. Workers pick the
 * file up and report back through the agent status record.
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { createLogger } from '../../utils/logger.js'
import type { DispatchRequest, TaskDispatcher } from './orchestrator.js'

const logger = createLogger('dispatcher')

/** Document a worker finds in its inbox */
export interface InboxMessage {
  task_id: string
  story_id: string
  phase: string
  role: string
  title: string
  attempt: number
  depends_on: string[]
  dispatched_at: string
  story: unknown
}

export function inboxPath(inboxDir: string, role: string, taskId: string): string {
  return join(inboxDir, role, `${taskId}.json`)
}

export class FileDispatcher implements TaskDispatcher {
  private readonly _inboxDir: string

  constructor(inboxDir: string) {
    this._inboxDir = inboxDir
  }

  async dispatch(request: DispatchRequest): Promise<void> {
    const { task, role } = request
    const message: InboxMessage = {
      task_id: task.task_id,
      story_id: task.story_id,
      phase: task.phase,
      role,
      title: task.title,
      attempt: task.attempt,
      depends_on: task.depends_on,
      dispatched_at: request.dispatchedAt,
      story: request.story ?? null,
    }

    const target = inboxPath(this._inboxDir, role, task.task_id)
    await mkdir(join(this._inboxDir, role), { recursive: true })
    await writeFile(target, JSON.stringify(message, null, 2) + '\n', 'utf-8')
    logger.debug({ taskId: task.task_id, role, target }, 'Task written to inbox')
  }
}

/**
 * AgentStatusMonitorImpl: SQLite-backed agent status records.
 *
 * Polling claims each completion with a conditional UPDATE on `processed`, so
 * two monitors reading the same database never report the same completion.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { NotFoundError } from '../../core/errors.js'
import {
  isAgentRole,
  type AgentRole,
  type AgentStatusValue,
  type TaskId,
} from '../../core/types.js'
import {
  claimCompletion,
  getAgentStatus,
  getAgentStatusesByStatus,
  getAllAgentStatuses,
  getLastPoll,
  insertAgentIfMissing,
  setLastPoll,
  upsertAgentStatus,
  type AgentStatus,
} from '../../persistence/queries/agent-status.js'
import type { Pipeline } from '../pipeline/pipeline-definition.js'
import { createLogger } from '../../utils/logger.js'
import type {
  AgentStatusMonitor,
  AgentStatusSnapshot,
  AgentStatusUpdate,
} from './agent-status-monitor.js'

const logger = createLogger('agent-monitor')

export interface AgentStatusMonitorOptions {
  now?: () => Date
}

export class AgentStatusMonitorImpl implements AgentStatusMonitor {
  private readonly _db: BetterSqlite3Database
  private readonly _pipeline: Pipeline
  private readonly _now: () => Date

  constructor(db: BetterSqlite3Database, pipeline: Pipeline, options: AgentStatusMonitorOptions = {}) {
    this._db = db
    this._pipeline = pipeline
    this._now = options.now ?? (() => new Date())
  }

  ensureAgents(): AgentRole[] {
    return this._db.transaction(() => {
      const timestamp = this._timestamp()
      const created = this._pipeline.roles.filter((role) =>
        insertAgentIfMissing(this._db, role, timestamp),
      )
      if (created.length > 0) {
        logger.debug({ roles: created }, 'Seeded agent status records')
      }
      return created
    })()
  }

  pollStatusUpdates(): AgentStatus[] {
    const completions = this._db.transaction(() => {
      const claimed: AgentStatus[] = []
      for (const record of getAgentStatusesByStatus(this._db, 'complete')) {
        if (record.processed) continue
        if (claimCompletion(this._db, record.agent_role)) {
          claimed.push({ ...record, processed: true })
        }
      }
      setLastPoll(this._db, this._timestamp())
      return claimed
    })()

    if (completions.length > 0) {
      logger.debug(
        { roles: completions.map((c) => c.agent_role) },
        'Claimed agent completions',
      )
    }
    return completions
  }

  determineNextAgent(role: string): AgentRole | null {
    return this._pipeline.nextRole(role)
  }

  detectBlockers(): AgentStatus[] {
    return getAgentStatusesByStatus(this._db, 'blocked')
  }

  updateAgentStatus(
    role: string,
    status: AgentStatusValue,
    update: AgentStatusUpdate = {},
  ): AgentStatus {
    if (!isAgentRole(role)) {
      throw new NotFoundError('agent', role)
    }

    return this._db.transaction(() => {
      const existing = getAgentStatus(this._db, role)
      const record: AgentStatus = {
        agent_role: role,
        status,
        current_task_id:
          update.currentTaskId !== undefined ? update.currentTaskId : (existing?.current_task_id ?? null),
        processed: false,
        deliverable: update.deliverable !== undefined ? update.deliverable : (existing?.deliverable ?? null),
        updated_at: this._timestamp(),
      }
      upsertAgentStatus(this._db, record)
      logger.debug({ role, status, taskId: record.current_task_id }, 'Agent status updated')
      return record
    })()
  }

  recordDispatch(role: AgentRole, taskId: TaskId): void {
    upsertAgentStatus(this._db, {
      agent_role: role,
      status: 'in_progress',
      current_task_id: taskId,
      processed: false,
      deliverable: null,
      updated_at: this._timestamp(),
    })
  }

  isAvailable(role: AgentRole): boolean {
    const record = getAgentStatus(this._db, role)
    if (record === undefined) return true
    switch (record.status) {
      case 'idle':
        return true
      case 'complete':
        return record.processed
      case 'in_progress':
      case 'blocked':
        return false
    }
  }

  getAgent(role: AgentRole): AgentStatus | undefined {
    return getAgentStatus(this._db, role)
  }

  listAgents(): AgentStatus[] {
    return getAllAgentStatuses(this._db)
  }

  snapshot(): AgentStatusSnapshot {
    return this._db.transaction(() => ({
      last_poll: getLastPoll(this._db),
      agents: getAllAgentStatuses(this._db),
    }))()
  }

  private _timestamp(): string {
    return this._now().toISOString()
  }
}

export function createAgentStatusMonitor(
  db: BetterSqlite3Database,
  pipeline: Pipeline,
  options: AgentStatusMonitorOptions = {},
): AgentStatusMonitor {
  return new AgentStatusMonitorImpl(db, pipeline, options)
}

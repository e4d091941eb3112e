/**
 * EscalationManagerImpl: SQLite-backed escalation log.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { InvalidTransitionError, NotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { EscalationId, StoryId } from '../../core/types.js'
import {
  countUnresolvedForStory,
  getAllEscalations,
  getEscalation,
  getUnresolvedEscalations,
  insertEscalation,
  markEscalationResolved,
  type Escalation,
} from '../../persistence/queries/escalations.js'
import { createLogger } from '../../utils/logger.js'
import type {
  CreateEscalationRequest,
  EscalationManager,
  EscalationSnapshot,
} from './escalation-manager.js'

const logger = createLogger('escalation')

/** Value stored in `raised_by` for escalations the conductor opens */
export const CONDUCTOR_AUTHOR = 'conductor'

export interface EscalationManagerOptions {
  now?: () => Date
}

export class EscalationManagerImpl implements EscalationManager {
  private readonly _db: BetterSqlite3Database
  private readonly _eventBus: TypedEventBus
  private readonly _now: () => Date

  constructor(db: BetterSqlite3Database, eventBus: TypedEventBus, options: EscalationManagerOptions = {}) {
    this._db = db
    this._eventBus = eventBus
    this._now = options.now ?? (() => new Date())
  }

  create(request: CreateEscalationRequest): EscalationId {
    const escalationId = this._db.transaction(() =>
      insertEscalation(this._db, {
        story_id: request.storyId,
        type: request.type,
        question: request.question,
        context: request.context ?? {},
        recommendation: request.recommendation ?? null,
        raised_by: CONDUCTOR_AUTHOR,
        created_at: this._now().toISOString(),
      }),
    )()

    logger.info({ escalationId, storyId: request.storyId, type: request.type }, 'Escalation created')
    this._eventBus.emit('escalation:created', {
      escalationId,
      storyId: request.storyId,
      type: request.type,
    })
    return escalationId
  }

  getUnresolved(): Escalation[] {
    return getUnresolvedEscalations(this._db)
  }

  resolve(escalationId: EscalationId, resolution: string): Escalation {
    const resolved = this._db.transaction(() => {
      const existing = getEscalation(this._db, escalationId)
      if (existing === undefined) {
        throw new NotFoundError('escalation', escalationId)
      }
      const resolvedAt = this._now().toISOString()
      if (existing.resolved || !markEscalationResolved(this._db, escalationId, resolution, resolvedAt)) {
        throw new InvalidTransitionError(`Escalation ${escalationId} is already resolved`, {
          escalationId,
          resolvedAt: existing.resolved_at,
        })
      }
      const updated = getEscalation(this._db, escalationId)
      if (updated === undefined) {
        throw new NotFoundError('escalation', escalationId)
      }
      return updated
    })()

    logger.info({ escalationId, storyId: resolved.story_id }, 'Escalation resolved')
    this._eventBus.emit('escalation:resolved', { escalationId, storyId: resolved.story_id })
    return resolved
  }

  get(escalationId: EscalationId): Escalation | undefined {
    return getEscalation(this._db, escalationId)
  }

  list(): Escalation[] {
    return getAllEscalations(this._db)
  }

  hasUnresolvedForStory(storyId: StoryId): boolean {
    return countUnresolvedForStory(this._db, storyId) > 0
  }

  snapshot(): EscalationSnapshot {
    return { escalations: getAllEscalations(this._db) }
  }
}

export function createEscalationManager(
  db: BetterSqlite3Database,
  eventBus: TypedEventBus,
  options: EscalationManagerOptions = {},
): EscalationManager {
  return new EscalationManagerImpl(db, eventBus, options)
}

/**
 * Error definitions for sprint-conductor
 * Provides a structured error hierarchy for queue, gate and escalation operations
 */

/** Base error class for all conductor errors */
export class ConductorError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ConductorError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConductorError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a story fails the Definition of Ready and cannot be decomposed */
export class InvalidStoryError extends ConductorError {
  public readonly storyId: string
  public readonly missingFields: string[]

  constructor(storyId: string, missingFields: string[], message?: string) {
    super(
      message ?? `Story "${storyId}" is not ready: missing ${missingFields.join(', ')}`,
      'INVALID_STORY',
      { storyId, missingFields }
    )
    this.name = 'InvalidStoryError'
    this.storyId = storyId
    this.missingFields = missingFields
  }
}

/** Kinds of entity a NotFoundError can refer to */
export type NotFoundEntity = 'task' | 'agent' | 'escalation'

/** Error thrown when an operation references an unknown task, agent role or escalation */
export class NotFoundError extends ConductorError {
  public readonly entity: NotFoundEntity
  public readonly id: string

  constructor(entity: NotFoundEntity, id: string) {
    super(`Unknown ${entity}: ${id}`, 'NOT_FOUND', { entity, id })
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

/**
 * Raised as a warning when the queue can never fully unblock.
 * `cycle` is empty when nothing is pending but no literal cycle exists
 * (e.g. a dependency failed).
 */
export class DependencyCycleError extends ConductorError {
  public readonly cycle: string[]
  public readonly blockedTaskIds: string[]

  constructor(blockedTaskIds: string[], cycle: string[] = []) {
    super(
      cycle.length > 0
        ? `Circular dependency detected in task queue: ${cycle.join(' -> ')}`
        : `No task is pending but ${String(blockedTaskIds.length)} task(s) remain blocked`,
      'DEPENDENCY_CYCLE',
      { cycle, blockedTaskIds }
    )
    this.name = 'DependencyCycleError'
    this.cycle = cycle
    this.blockedTaskIds = blockedTaskIds
  }
}

/** Error thrown when a task or escalation is moved to a state it cannot reach */
export class InvalidTransitionError extends ConductorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_TRANSITION', context)
    this.name = 'InvalidTransitionError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends ConductorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a backlog file cannot be read, parsed or validated */
export class BacklogParseError extends ConductorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BACKLOG_PARSE_ERROR', context)
    this.name = 'BacklogParseError'
  }
}

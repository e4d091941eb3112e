/**
 * sprint-conductor - Main module exports
 * Public API surface for embedding the conductor in another process
 */

// Core types
export * from './core/types.js'

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, setLogLevel, logger } from './utils/logger.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { ConductorEvents, StallKind } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Persistence
export type { DatabaseService, OpenDatabaseOptions } from './persistence/database.js'
export {
  DatabaseServiceImpl,
  createDatabaseService,
  openDatabase,
  openMemoryDatabase,
  IN_MEMORY_DATABASE,
} from './persistence/database.js'
export {
  runMigrations,
  currentSchemaVersion,
  LATEST_SCHEMA_VERSION,
  SchemaVersionError,
} from './persistence/migrations/index.js'
export type { Task } from './persistence/queries/tasks.js'
export type { AgentStatus } from './persistence/queries/agent-status.js'
export type { Escalation } from './persistence/queries/escalations.js'

// Domain modules
export * from './modules/pipeline/index.js'
export * from './modules/backlog/index.js'
export * from './modules/quality-gates/index.js'
export * from './modules/task-queue/index.js'
export * from './modules/agent-monitor/index.js'
export * from './modules/escalation/index.js'
export * from './modules/config/index.js'
export * from './modules/orchestrator/index.js'

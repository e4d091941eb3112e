/**
 * task-queue module: durable story tasks, dependency unblocking, scheduling order
 */

export type { TaskQueue, TaskQueueSnapshot } from './task-queue.js'
export { VALID_TRANSITIONS } from './task-queue.js'
export type { TaskQueueOptions } from './task-queue-impl.js'
export { TaskQueueImpl, createTaskQueue } from './task-queue-impl.js'
export type { DependencyNode } from './dependency-resolver.js'
export { detectCycle, dependenciesComplete, incompleteDependencies } from './dependency-resolver.js'

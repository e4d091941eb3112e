/**
 * Dependency graph helpers for the task queue.
 *
 * Pure functions over `task_id → depends_on` maps; the queue builds the map
 * from persisted tasks before calling in.
 */

import type { TaskId, TaskStatus } from '../../core/types.js'

/** Minimal view of a task needed to reason about its dependencies */
export interface DependencyNode {
  status: TaskStatus
  depends_on: readonly TaskId[]
}

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * Detect a cycle in the dependency graph using depth-first search.
 *
 * @returns The cycle path as an array of task ids (e.g. ['a', 'b', 'a']),
 *          or null if no cycle is detected
 */
export function detectCycle(tasks: ReadonlyMap<TaskId, DependencyNode>): TaskId[] | null {
  const visited = new Set<TaskId>()
  const inStack = new Set<TaskId>()

  function dfs(nodeId: TaskId, path: TaskId[]): TaskId[] | null {
    visited.add(nodeId)
    inStack.add(nodeId)

    for (const dep of tasks.get(nodeId)?.depends_on ?? []) {
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(nodeId)
    return null
  }

  for (const id of tasks.keys()) {
    if (!visited.has(id)) {
      const cycle = dfs(id, [id])
      if (cycle) return cycle
    }
  }
  return null
}

// ---------------------------------------------------------------------------
// dependenciesComplete
// ---------------------------------------------------------------------------

/**
 * True when every dependency of `node` exists and is complete.
 * A dependency on an unknown task id never counts as complete.
 */
export function dependenciesComplete(
  node: DependencyNode,
  tasks: ReadonlyMap<TaskId, DependencyNode>,
): boolean {
  return node.depends_on.every((dep) => tasks.get(dep)?.status === 'complete')
}

/**
 * Dependencies of `node` that are not yet complete, in declaration order.
 */
export function incompleteDependencies(
  node: DependencyNode,
  tasks: ReadonlyMap<TaskId, DependencyNode>,
): TaskId[] {
  return node.depends_on.filter((dep) => tasks.get(dep)?.status !== 'complete')
}

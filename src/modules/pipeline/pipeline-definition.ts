/**
 * Pipeline definition: the fixed phase and routing tables, held as data.
 *
 *   phase → role:  research → research, writing → writer, editing → editor,
 *                  graphics → graphics, final-review → final-review
 *   routing:       research → writer → editor → graphics → final-review → (end)
 *
 * `createPipeline()` validates the tables and the configured decomposition
 * phases once at startup; everything downstream trusts the result.
 */

import { ConfigError, NotFoundError } from '../../core/errors.js'
import {
  AGENT_ROLES,
  PHASES,
  isAgentRole,
  type AgentRole,
  type Phase,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const PHASE_TO_ROLE: Readonly<Record<Phase, AgentRole>> = {
  research: 'research',
  writing: 'writer',
  editing: 'editor',
  graphics: 'graphics',
  'final-review': 'final-review',
}

/** Next role in the pipeline; null marks the terminal role */
export const ROUTING_TABLE: Readonly<Record<AgentRole, AgentRole | null>> = {
  research: 'writer',
  writer: 'editor',
  editor: 'graphics',
  graphics: 'final-review',
  'final-review': null,
}

/** Phases a story decomposes into when configuration does not say otherwise */
export const DEFAULT_STORY_PHASES: readonly Phase[] = ['research', 'writing', 'editing']

/** Human-readable verb used in task titles */
const PHASE_TITLES: Readonly<Record<Phase, string>> = {
  research: 'Research',
  writing: 'Write',
  editing: 'Edit',
  graphics: 'Graphics',
  'final-review': 'Final review',
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface Pipeline {
  /** Ordered phases every story decomposes into */
  readonly storyPhases: readonly Phase[]
  roleForPhase(phase: Phase): AgentRole
  phaseForRole(role: AgentRole): Phase
  /**
   * Next role after `role`, or null when `role` is terminal.
   * @throws {NotFoundError} for a role outside the routing table
   */
  nextRole(role: string): AgentRole | null
  titleFor(phase: Phase, narrative: string): string
  /** Swap the phase label of an existing task title, keeping its summary */
  retitle(phase: Phase, title: string): string
  readonly roles: readonly AgentRole[]
}

/**
 * Validate the routing tables and the decomposition phases.
 * @throws {ConfigError} describing every problem found
 */
export function validatePipeline(
  storyPhases: readonly Phase[],
  phaseToRole: Readonly<Record<Phase, AgentRole>> = PHASE_TO_ROLE,
  routing: Readonly<Record<AgentRole, AgentRole | null>> = ROUTING_TABLE,
): void {
  const problems: string[] = []

  for (const phase of PHASES) {
    if (!isAgentRole(phaseToRole[phase])) {
      problems.push(`phase "${phase}" has no role`)
    }
  }

  const mappedRoles = new Set(Object.values(phaseToRole))
  for (const role of AGENT_ROLES) {
    if (!(role in routing)) {
      problems.push(`role "${role}" has no routing entry`)
    }
    if (!mappedRoles.has(role)) {
      problems.push(`role "${role}" is not reachable from any phase`)
    }
  }

  // Walk the routing chain from every role; it must end without revisiting a role
  for (const start of AGENT_ROLES) {
    const seen = new Set<AgentRole>([start])
    let cursor = routing[start]
    while (cursor !== null) {
      if (seen.has(cursor)) {
        problems.push(`routing cycle through "${cursor}"`)
        break
      }
      seen.add(cursor)
      cursor = routing[cursor]
    }
  }

  const terminals = AGENT_ROLES.filter((role) => routing[role] === null)
  if (terminals.length !== 1) {
    problems.push(`expected exactly one terminal role, found ${String(terminals.length)}`)
  }

  if (storyPhases.length === 0) {
    problems.push('pipeline.phases must list at least one phase')
  }
  if (new Set(storyPhases).size !== storyPhases.length) {
    problems.push('pipeline.phases contains duplicates')
  }
  for (let i = 1; i < storyPhases.length; i++) {
    const prev = storyPhases[i - 1]
    const curr = storyPhases[i]
    if (prev === undefined || curr === undefined) continue
    if (routing[phaseToRole[prev]] !== phaseToRole[curr]) {
      problems.push(`phase "${curr}" does not follow "${prev}" in the routing table`)
    }
  }

  // Deduplicate: a single cycle is reported once per starting role
  const unique = [...new Set(problems)]
  if (unique.length > 0) {
    throw new ConfigError(`Invalid pipeline definition:\n${unique.map((p) => `  • ${p}`).join('\n')}`, {
      problems: unique,
    })
  }
}

class PipelineImpl implements Pipeline {
  readonly storyPhases: readonly Phase[]
  readonly roles: readonly AgentRole[] = AGENT_ROLES
  private readonly _roleToPhase: Map<AgentRole, Phase>

  constructor(storyPhases: readonly Phase[]) {
    this.storyPhases = [...storyPhases]
    this._roleToPhase = new Map(PHASES.map((phase) => [PHASE_TO_ROLE[phase], phase]))
  }

  roleForPhase(phase: Phase): AgentRole {
    return PHASE_TO_ROLE[phase]
  }

  phaseForRole(role: AgentRole): Phase {
    const phase = this._roleToPhase.get(role)
    if (phase === undefined) {
      throw new NotFoundError('agent', role)
    }
    return phase
  }

  nextRole(role: string): AgentRole | null {
    if (!isAgentRole(role)) {
      throw new NotFoundError('agent', role)
    }
    return ROUTING_TABLE[role]
  }

  titleFor(phase: Phase, narrative: string): string {
    const summary = narrative.length > 50 ? `${narrative.slice(0, 50)}...` : narrative
    return `${PHASE_TITLES[phase]}: ${summary}`
  }

  retitle(phase: Phase, title: string): string {
    const separator = title.indexOf(': ')
    const summary = separator === -1 ? title : title.slice(separator + 2)
    return `${PHASE_TITLES[phase]}: ${summary}`
  }
}

/**
 * Build a validated pipeline.
 *
 * @example
 * const pipeline = createPipeline(['research', 'writing', 'editing'])
 * pipeline.nextRole('research') // 'writer'
 */
export function createPipeline(storyPhases: readonly Phase[] = DEFAULT_STORY_PHASES): Pipeline {
  validatePipeline(storyPhases)
  return new PipelineImpl(storyPhases)
}

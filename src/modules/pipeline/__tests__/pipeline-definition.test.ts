/**
 * Unit tests for the pipeline tables and their startup validation.
 */

import { describe, it, expect } from 'vitest'
import { ConfigError, NotFoundError } from '../../../core/errors.js'
import {
  DEFAULT_STORY_PHASES,
  PHASE_TO_ROLE,
  ROUTING_TABLE,
  createPipeline,
  validatePipeline,
} from '../pipeline-definition.js'

describe('createPipeline', () => {
  it('decomposes into research, writing and editing by default', () => {
    expect(createPipeline().storyPhases).toEqual(['research', 'writing', 'editing'])
    expect(DEFAULT_STORY_PHASES).toEqual(['research', 'writing', 'editing'])
  })

  it('routes roles in pipeline order and ends at final-review', () => {
    const pipeline = createPipeline()

    expect(pipeline.nextRole('research')).toBe('writer')
    expect(pipeline.nextRole('writer')).toBe('editor')
    expect(pipeline.nextRole('editor')).toBe('graphics')
    expect(pipeline.nextRole('graphics')).toBe('final-review')
    expect(pipeline.nextRole('final-review')).toBeNull()
  })

  it('rejects an unknown role', () => {
    expect(() => createPipeline().nextRole('publisher')).toThrow(NotFoundError)
  })

  it('maps phases and roles both ways', () => {
    const pipeline = createPipeline()

    expect(pipeline.roleForPhase('writing')).toBe('writer')
    expect(pipeline.roleForPhase('final-review')).toBe('final-review')
    expect(pipeline.phaseForRole('editor')).toBe('editing')
  })

  it('rejects configured phases that skip a step', () => {
    expect(() => createPipeline(['research', 'editing'])).toThrow(
      'phase "editing" does not follow "research" in the routing table',
    )
  })
})

describe('task titles', () => {
  const pipeline = createPipeline()

  it('keeps a short narrative whole', () => {
    expect(pipeline.titleFor('research', 'Weekly digest')).toBe('Research: Weekly digest')
  })

  it('truncates a narrative longer than 50 characters', () => {
    const narrative = 'As a subscriber I want the weekly digest to arrive on Mondays'
    expect(pipeline.titleFor('editing', narrative)).toBe(
      'Edit: As a subscriber I want the weekly digest to arrive...',
    )
  })

  it('swaps the phase label of an existing title', () => {
    expect(pipeline.retitle('graphics', 'Edit: Weekly digest')).toBe('Graphics: Weekly digest')
    expect(pipeline.retitle('final-review', 'Untitled')).toBe('Final review: Untitled')
  })
})

describe('validatePipeline', () => {
  it('accepts the built-in tables', () => {
    expect(() => validatePipeline(['research', 'writing', 'editing', 'graphics', 'final-review'])).not.toThrow()
  })

  it('requires at least one phase', () => {
    expect(() => validatePipeline([])).toThrow(ConfigError)
    expect(() => validatePipeline([])).toThrow('pipeline.phases must list at least one phase')
  })

  it('rejects duplicate phases', () => {
    expect(() => validatePipeline(['research', 'research'])).toThrow('pipeline.phases contains duplicates')
  })

  it('reports a routing cycle', () => {
    const routing = { ...ROUTING_TABLE, writer: 'research' as const }

    expect(() => validatePipeline(['research'], PHASE_TO_ROLE, routing)).toThrow(
      'routing cycle through "research"',
    )
  })
})

/**
 * Zod schemas for backlog files and worker deliverables.
 *
 * Story fields are optional at the schema level: a story missing a field is
 * still a well-formed backlog entry, and the Definition of Ready check reports
 * what is absent. Only type mismatches fail parsing.
 */

import { z } from 'zod'
import { PRIORITIES } from '../../core/types.js'

// ---------------------------------------------------------------------------
// StorySchema
// ---------------------------------------------------------------------------

export const PrioritySchema = z.enum(PRIORITIES)

/** Story ids name inbox files, so they stay a single safe path segment */
export const StoryIdSchema = z
  .string()
  .min(1, 'story_id is required')
  .regex(/^[A-Za-z0-9._-]+$/, 'story_id may only contain letters, digits, ".", "_" and "-"')
  .refine((id) => !id.includes('..'), 'story_id may not contain ".."')

export const StorySchema = z
  .object({
    story_id: StoryIdSchema,
    user_story: z.string().optional(),
    acceptance_criteria: z.array(z.string()).optional(),
    quality_requirements: z.record(z.string(), z.string()).optional(),
    priority: PrioritySchema.default('P1'),
    story_points: z.number().int().optional(),
  })
  .passthrough()

export type Story = z.infer<typeof StorySchema>

/** Story shape accepted by callers, before defaults are applied */
export type StoryInput = z.input<typeof StorySchema>

// ---------------------------------------------------------------------------
// BacklogFileSchema
// ---------------------------------------------------------------------------

export const BacklogFileSchema = z.object({
  sprint_id: z.union([z.string(), z.number()]).transform(String).optional(),
  stories: z.array(StorySchema),
})

export type BacklogFile = z.infer<typeof BacklogFileSchema>

// ---------------------------------------------------------------------------
// DeliverableSchema
// ---------------------------------------------------------------------------

// Each field is read on its own: a mistyped value drops only that field, so
// the Definition of Done reports it without discarding the valid ones.

export const AcceptanceCriterionResultSchema = z
  .object({
    criterion: z.string().optional().catch(undefined),
    // anything but `true` fails the criterion
    passed: z.boolean().optional().catch(false),
  })
  .passthrough()
  .catch({ passed: false })

export const DeliverableSchema = z
  .object({
    self_validation: z
      .object({
        passed: z.boolean().optional().catch(undefined),
        notes: z.string().optional().catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
    output: z
      .object({ path: z.string().optional().catch(undefined) })
      .passthrough()
      .optional()
      .catch(undefined),
    acceptance_criteria_results: z.array(AcceptanceCriterionResultSchema).optional().catch(undefined),
  })
  .passthrough()

export type Deliverable = z.infer<typeof DeliverableSchema>

/**
 * Zod validation schemas for the conductor configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings (logging, state directory)
 *  - pipeline (phases a story decomposes into)
 *  - orchestrator (dispatch limits, DoR escalation, rejection policy)
 *  - full config document
 */

import { z } from 'zod'
import { PHASES } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Format version
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory holding state.db and the dispatch inbox, relative to the project root */
    state_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export const PipelineSettingsSchema = z
  .object({
    phases: z.array(z.enum(PHASES)).min(1),
  })
  .strict()

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/** What happens to a task the quality gate rejects */
export const RejectionPolicySchema = z.enum(['fail', 'requeue'])
export type RejectionPolicyName = z.infer<typeof RejectionPolicySchema>

export const OrchestratorSettingsSchema = z
  .object({
    max_dispatch_per_cycle: z.number().int().min(1),
    /** Raise a dor_gap escalation for stories that fail the Definition of Ready */
    escalate_dor_gaps: z.boolean(),
    rejection_policy: RejectionPolicySchema,
    /** How many times the requeue policy may retry one rejected task */
    max_requeues: z.number().int().min(0),
  })
  .strict()

export type OrchestratorSettings = z.infer<typeof OrchestratorSettingsSchema>

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const ConductorConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    pipeline: PipelineSettingsSchema,
    orchestrator: OrchestratorSettingsSchema,
  })
  .strict()

export type ConductorConfig = z.infer<typeof ConductorConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer, before merging)
// ---------------------------------------------------------------------------

export const PartialConductorConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    pipeline: PipelineSettingsSchema.partial().optional(),
    orchestrator: OrchestratorSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialConductorConfig = z.infer<typeof PartialConductorConfigSchema>

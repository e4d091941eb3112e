/**
 * Built-in default values for the conductor configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   project config → environment variables → CLI flags
 */

import { DEFAULT_STORY_PHASES } from '../pipeline/pipeline-definition.js'
import type { ConductorConfig } from './config-schema.js'

/** Project-relative directory holding config.yaml and runtime state */
export const DEFAULT_STATE_DIR = '.conductor'

export const DEFAULT_CONFIG: ConductorConfig = {
  config_format_version: '1',
  global: {
    log_level: 'warn',
    state_dir: DEFAULT_STATE_DIR,
  },
  pipeline: {
    phases: [...DEFAULT_STORY_PHASES],
  },
  orchestrator: {
    max_dispatch_per_cycle: 5,
    escalate_dor_gaps: true,
    rejection_policy: 'fail',
    max_requeues: 2,
  },
}

/**
 * pipeline module: phase and routing tables
 */

export type { Pipeline } from './pipeline-definition.js'
export {
  PHASE_TO_ROLE,
  ROUTING_TABLE,
  DEFAULT_STORY_PHASES,
  validatePipeline,
  createPipeline,
} from './pipeline-definition.js'

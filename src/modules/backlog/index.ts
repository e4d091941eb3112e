/**
 * backlog module: story and deliverable schemas, backlog file parsing
 */

export type { Story, StoryInput, BacklogFile, Deliverable } from './schemas.js'
export {
  PrioritySchema,
  StorySchema,
  BacklogFileSchema,
  AcceptanceCriterionResultSchema,
  DeliverableSchema,
} from './schemas.js'

export type { BacklogFormat } from './backlog-parser.js'
export { parseBacklogString, parseBacklogFile } from './backlog-parser.js'
